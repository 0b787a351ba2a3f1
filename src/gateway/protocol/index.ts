// ---------------------------------------------------------------------------
// Gateway protocol – error codes and response shapes
// ---------------------------------------------------------------------------

export const ErrorCodes = {
  INVALID_REQUEST: "INVALID_REQUEST",
  NOT_FOUND: "NOT_FOUND",
  UNAVAILABLE: "UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorShape = {
  code: ErrorCode;
  message: string;
  details?: unknown;
};

export function errorShape(code: ErrorCode, message: string, details?: unknown): ErrorShape {
  return details === undefined ? { code, message } : { code, message, details };
}

/** HTTP status the REST surface uses for each error code. */
export function httpStatusFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCodes.INVALID_REQUEST:
      return 400;
    case ErrorCodes.NOT_FOUND:
      return 404;
    case ErrorCodes.UNAVAILABLE:
      return 503;
  }
}
