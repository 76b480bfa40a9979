/**
 * Repository Types
 *
 * Error shape shared by every repository.
 */

export type RepositoryError = { type: "DB_ERROR"; message: string } | { type: "NOT_FOUND"; message: string };

export function toDbError(e: unknown): RepositoryError {
  return {
    type: "DB_ERROR",
    message: e instanceof Error ? e.message : "Unknown error",
  };
}

export function notFound(message: string): RepositoryError {
  return { type: "NOT_FOUND", message };
}
