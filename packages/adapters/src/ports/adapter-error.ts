/**
 * Adapter errors shared by every port
 */
export type AdapterError =
  | { type: "http_error"; message: string; status?: number }
  | { type: "invalid_response"; message: string }
  | { type: "connection_failed"; message: string };

export function httpError(message: string, status?: number): AdapterError {
  return status === undefined ? { type: "http_error", message } : { type: "http_error", message, status };
}

export function invalidResponse(message: string): AdapterError {
  return { type: "invalid_response", message };
}

export function connectionFailed(message: string): AdapterError {
  return { type: "connection_failed", message };
}

export function toConnectionError(e: unknown): AdapterError {
  return connectionFailed(e instanceof Error ? e.message : String(e));
}
