export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Storage operation "${operation}" failed: ${reason}`, { cause });
    this.name = "StorageError";
    this.operation = operation;
  }
}

export function withStorageError<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    throw new StorageError(operation, error);
  }
}
