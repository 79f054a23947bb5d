/**
 * Common Types
 *
 * Shared type definitions used by the adapters, the store writers and the
 * pipeline stages.
 */

// =============================================================================
// RESULT
// =============================================================================

/**
 * Outcome of an operation whose failure is an expected value rather than an
 * exception. `errorKind` is a closed set chosen by the producer.
 */
export type Result<T, K extends string> =
  | { ok: true; value: T }
  | { ok: false; errorKind: K; message: string };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<K extends string>(
  errorKind: K,
  message: string
): { ok: false; errorKind: K; message: string } {
  return { ok: false, errorKind, message };
}

// =============================================================================
// CONNECTION STATUS
// =============================================================================

/**
 * Connection status for store handles.
 */
export interface ConnectionStatus {
  /** Whether the connection is active */
  connected: boolean;

  /** Last successful connection time */
  lastConnectedAt?: number;

  /** Error message if connection failed */
  error?: string;
}

// =============================================================================
// JSON
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
