/**
 * Failure taxonomy shared by the store, the context compactor and the tools.
 *
 * Expected failures travel as values (`Result`), never as thrown errors.
 * Exceptions are left for infrastructure faults such as a dead database.
 */

export const FAILURE_CODES = [
  'DuplicateReceipt',
  'InvalidRange',
  'InvalidArgument',
  'NotFound',
  'EmbeddingUnavailable',
  'GatewayTimeout',
  'ImageUnavailable',
  'AgentUnavailable',
  'StorageUnavailable',
] as const;

export type FailureCode = (typeof FAILURE_CODES)[number];

export interface Failure {
  code: FailureCode;
  message: string;
  /** Whether the caller may reasonably try the same call again */
  retryable: boolean;
  details?: Record<string, unknown>;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: Failure };

const RETRYABLE: Record<FailureCode, boolean> = {
  DuplicateReceipt: false,
  InvalidRange: false,
  InvalidArgument: false,
  NotFound: false,
  EmbeddingUnavailable: true,
  GatewayTimeout: true,
  ImageUnavailable: false,
  AgentUnavailable: true,
  StorageUnavailable: true,
};

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure(
  code: FailureCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  return {
    code,
    message,
    retryable: RETRYABLE[code],
    ...(details && { details }),
  };
}

export function fail<T = never>(
  code: FailureCode,
  message: string,
  details?: Record<string, unknown>
): Result<T> {
  return { ok: false, error: failure(code, message, details) };
}

/**
 * Raised by `withDeadline` when an external call outlives its budget.
 */
export class GatewayTimeoutError extends Error {
  constructor(
    readonly gateway: string,
    readonly timeoutMs: number
  ) {
    super(`${gateway} did not respond within ${timeoutMs}ms`);
    this.name = 'GatewayTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
