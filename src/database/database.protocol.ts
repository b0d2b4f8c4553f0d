/** Messages exchanged between {@link DatabaseService} and the SQLite worker thread. */

export type StatementMode = 'get' | 'all' | 'run';

/** Positional values, or one object of named `@param` values. */
export type BindParameters = unknown[] | Record<string, unknown>;

export interface WorkerOptions {
  path: string;
  schemaPath: string;
}

export type WorkerRequest =
  | { type: 'statement'; id: number; mode: StatementMode; sql: string; params: BindParameters }
  | { type: 'close' };

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
}

export type WorkerResponse =
  | { type: 'ready' }
  | { type: 'result'; id: number; value: unknown }
  | { type: 'error'; id: number; error: SerializedError };

export interface StatementResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isWorkerOptions(value: unknown): value is WorkerOptions {
  return isRecord(value) && typeof value.path === 'string' && typeof value.schemaPath === 'string';
}

export function isWorkerResponse(value: unknown): value is WorkerResponse {
  if (!isRecord(value)) {
    return false;
  }

  switch (value.type) {
    case 'ready':
      return true;
    case 'result':
      return typeof value.id === 'number';
    case 'error':
      return (
        typeof value.id === 'number' &&
        isRecord(value.error) &&
        typeof value.error.name === 'string' &&
        typeof value.error.message === 'string'
      );
    default:
      return false;
  }
}

export function isStatementResult(value: unknown): value is StatementResult {
  return (
    isRecord(value) &&
    typeof value.changes === 'number' &&
    (typeof value.lastInsertRowid === 'number' || typeof value.lastInsertRowid === 'bigint')
  );
}
