/**
 * @buildmeta/server - Error taxonomy
 */

export class InvalidProjectPathError extends Error {
  readonly code = 'INVALID_PROJECT_PATH' as const;

  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Invalid project path "${path}": ${reason}`);
    this.name = 'InvalidProjectPathError';
  }
}

/**
 * Backing-store failure or a stored value that does not decode. Surfaced to
 * the caller as an internal failure; the engine never retries it.
 */
export class MetadataStorageError extends Error {
  readonly code = 'STORAGE_ERROR' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetadataStorageError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Run a store operation, re-throwing anything that is not already part of
 * the taxonomy as a {@link MetadataStorageError}.
 */
export async function withStorageErrors<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (
      error instanceof InvalidProjectPathError ||
      error instanceof MetadataStorageError ||
      isAbortError(error)
    ) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new MetadataStorageError(`${operation} failed: ${detail}`, {
      cause: error,
    });
  }
}
