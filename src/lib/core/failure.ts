/**
 * Failure values returned by grid engine operations.
 */

/**
 * Reasons why a grid operation can fail.
 *
 * - NOT_INITIALIZED: the grid has no cell storage
 * - NO_MEMORY: cell storage or output text could not be allocated
 */
export type GridFailureReason = 'NOT_INITIALIZED' | 'NO_MEMORY';

/**
 * Information about a failed grid operation.
 */
export interface GridFailure {
  readonly reason: GridFailureReason;
  readonly details?: string;
}

/**
 * Create a GridFailure.
 */
export function gridFailure(reason: GridFailureReason, details?: string): GridFailure {
  return details === undefined ? { reason } : { reason, details };
}

/**
 * Type guard to check if a result is a GridFailure.
 */
export function isGridFailure(value: unknown): value is GridFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'reason' in value &&
    (value.reason === 'NOT_INITIALIZED' || value.reason === 'NO_MEMORY')
  );
}
