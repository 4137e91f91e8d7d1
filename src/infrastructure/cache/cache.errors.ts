import { TierName } from './cache.types';

export type TierOperation = 'read' | 'write' | 'remove' | 'flush' | 'list';

/**
 * Raised by a storage tier whose backend cannot be reached or written.
 * The cache engine catches it and degrades to a miss or a `false` result.
 */
export class StorageUnavailableError extends Error {
  readonly name = 'StorageUnavailableError';

  constructor(
    readonly tier: TierName,
    readonly operation: TierOperation,
    cause?: unknown,
  ) {
    super(
      `Storage tier "${tier}" unavailable during ${operation}` +
        (cause instanceof Error ? `: ${cause.message}` : ''),
      { cause },
    );
  }
}
