import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { parentPort, workerData } from 'worker_threads';
import {
  BindParameters,
  isWorkerOptions,
  SerializedError,
  StatementMode,
  WorkerRequest,
  WorkerResponse,
} from './database.protocol';

// Runs in a worker thread and owns the SQLite connection. Statements execute
// one at a time in arrival order, off the main event loop.

const port = parentPort;
const options: unknown = workerData;

if (!port) {
  throw new Error('The database worker must run in a worker thread');
}
if (!isWorkerOptions(options)) {
  throw new Error('The database worker needs a database path and a schema path');
}

const db = new Database(options.path);
db.pragma('journal_mode = WAL');
db.exec(readFileSync(options.schemaPath, 'utf8'));

function execute(mode: StatementMode, sql: string, params: BindParameters): unknown {
  const statement = db.prepare(sql);
  const args: unknown[] = Array.isArray(params) ? params : [params];

  switch (mode) {
    case 'get':
      return statement.get(...args);
    case 'all':
      return statement.all(...args);
    case 'run': {
      const { changes, lastInsertRowid } = statement.run(...args);
      return { changes, lastInsertRowid };
    }
  }
}

function serializeError(error: unknown): SerializedError {
  if (error instanceof Database.SqliteError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

const reply = (response: WorkerResponse): void => {
  port.postMessage(response);
};

port.on('message', (request: WorkerRequest) => {
  if (request.type === 'close') {
    db.close();
    port.close();
    return;
  }

  try {
    reply({ type: 'result', id: request.id, value: execute(request.mode, request.sql, request.params) });
  } catch (error) {
    reply({ type: 'error', id: request.id, error: serializeError(error) });
  }
});

reply({ type: 'ready' });
