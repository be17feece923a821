// Shapes the API client and its transports use to report an HTTP status
type ApiErrorLike = {
  response?: { statusCode?: number };
  statusCode?: number;
  code?: number | string;
};

/**
 * Extract the HTTP status code from an error thrown by the Kubernetes client
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const errorObj = error as ApiErrorLike;
  if (typeof errorObj.code === "number") {
    return errorObj.code;
  }
  if (typeof errorObj.statusCode === "number") {
    return errorObj.statusCode;
  }
  return errorObj.response?.statusCode;
}

export function isNotFound(error: unknown): boolean {
  return statusCodeOf(error) === 404;
}

export function isConflict(error: unknown): boolean {
  return statusCodeOf(error) === 409;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = statusCodeOf(error);
    return code === undefined ? error.message : `${error.message} (HTTP ${code})`;
  }
  return String(error);
}
