import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { extname, resolve } from 'path';
import { Worker } from 'worker_threads';
import { DEFAULT_DATABASE_PATH } from '../config/env.validation';
import { DatabaseError } from './database.error';
import {
  BindParameters,
  isStatementResult,
  isWorkerResponse,
  StatementMode,
  StatementResult,
  WorkerOptions,
  WorkerRequest,
} from './database.protocol';

const SCHEMA_PATH = resolve(__dirname, '..', '..', 'db', 'schema.sql');
const WORKER_PATH = resolve(__dirname, `database.worker${extname(__filename)}`);
// Compiled builds load database.worker.js; running from sources, tsx compiles the worker.
const WORKER_EXEC_ARGV = WORKER_PATH.endsWith('.ts') ? ['--require', 'tsx/cjs'] : undefined;

interface PendingStatement {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

/**
 * Owns the SQLite connection for the lifetime of the application. The
 * connection lives in a worker thread, so a slow statement never blocks the
 * event loop and callers can give up on it.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pending = new Map<number, PendingStatement>();
  private worker?: Worker;
  private nextId = 1;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const path = this.configService.get<string>('DATABASE_PATH', DEFAULT_DATABASE_PATH);
    const workerData: WorkerOptions = { path, schemaPath: SCHEMA_PATH };

    const worker = new Worker(WORKER_PATH, { workerData, execArgv: WORKER_EXEC_ARGV });
    await this.waitUntilReady(worker);

    worker.on('message', (message: unknown) => this.settle(message));
    worker.on('error', (error) => {
      this.logger.error('Database worker failed', error.stack);
      this.rejectPending(new DatabaseError(error.message));
    });
    worker.on('exit', () => {
      this.worker = undefined;
      this.rejectPending(new DatabaseError('Database connection is not open'));
    });

    this.worker = worker;
    this.logger.log(`Opened book database at ${path}`);
  }

  async onModuleDestroy(): Promise<void> {
    const worker = this.worker;
    if (!worker) {
      return;
    }

    this.worker = undefined;
    const exited = new Promise<void>((resolve) => worker.once('exit', () => resolve()));
    const close: WorkerRequest = { type: 'close' };
    worker.postMessage(close);
    await exited;
  }

  get isOpen(): boolean {
    return this.worker !== undefined;
  }

  /** First matching row, or undefined. */
  get(sql: string, params: BindParameters = []): Promise<unknown> {
    return this.execute('get', sql, params);
  }

  async all(sql: string, params: BindParameters = []): Promise<unknown[]> {
    const rows = await this.execute('all', sql, params);
    if (!Array.isArray(rows)) {
      throw new DatabaseError('Expected a list of rows from the database worker');
    }
    return rows;
  }

  async run(sql: string, params: BindParameters = []): Promise<StatementResult> {
    const result = await this.execute('run', sql, params);
    if (!isStatementResult(result)) {
      throw new DatabaseError('Expected a change count from the database worker');
    }
    return result;
  }

  private execute(mode: StatementMode, sql: string, params: BindParameters): Promise<unknown> {
    const worker = this.worker;
    if (!worker) {
      return Promise.reject(new DatabaseError('Database connection is not open'));
    }

    const id = this.nextId++;
    const request: WorkerRequest = { type: 'statement', id, mode, sql, params };
    this.logger.debug(sql);

    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.postMessage(request);
    });
  }

  private settle(message: unknown): void {
    if (!isWorkerResponse(message) || message.type === 'ready') {
      return;
    }

    const pending = this.pending.get(message.id);
    if (!pending) {
      return;
    }
    this.pending.delete(message.id);

    if (message.type === 'result') {
      pending.resolve(message.value);
    } else {
      pending.reject(new DatabaseError(message.error.message, message.error.code));
    }
  }

  private rejectPending(error: DatabaseError): void {
    for (const { reject } of this.pending.values()) {
      reject(error);
    }
    this.pending.clear();
  }

  private waitUntilReady(worker: Worker): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
      };
      const onMessage = (message: unknown) => {
        if (isWorkerResponse(message) && message.type === 'ready') {
          cleanup();
          resolve();
        }
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onExit = (code: number) => {
        cleanup();
        reject(new DatabaseError(`Database worker exited with code ${code} before it was ready`));
      };

      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
    });
  }
}
