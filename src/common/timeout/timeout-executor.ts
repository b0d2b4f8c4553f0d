import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_OPERATION_TIMEOUT_MS } from '../../config/env.validation';
import { OperationTimeoutError } from './operation-timeout.error';

/**
 * Races an operation against a timer. The first one to settle decides what
 * the caller gets; the other outcome is dropped.
 *
 * Timing out does not cancel the operation: it keeps running and whatever it
 * eventually produces is discarded. A synchronous operation blocks the event
 * loop for its whole duration, so the timer can only beat asynchronous work.
 */
@Injectable()
export class TimeoutExecutor {
  private readonly logger = new Logger(TimeoutExecutor.name);
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs = this.configService.get<number>(
      'BOOKS_OPERATION_TIMEOUT_MS',
      DEFAULT_OPERATION_TIMEOUT_MS,
    );
  }

  run<T>(operation: () => T | Promise<T>, timeoutMs: number = this.timeoutMs): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) {
          return;
        }
        settled = true;
        reject(new OperationTimeoutError(timeoutMs));
      }, timeoutMs);

      void Promise.resolve()
        .then(operation)
        .then(
          (value) => {
            if (settled) {
              this.logger.debug(`Discarding result of an operation that exceeded ${timeoutMs}ms`);
              return;
            }
            settled = true;
            clearTimeout(timer);
            resolve(value);
          },
          (error: unknown) => {
            if (settled) {
              const message = error instanceof Error ? error.message : JSON.stringify(error);
              this.logger.warn(`Operation failed after exceeding ${timeoutMs}ms: ${message}`);
              return;
            }
            settled = true;
            clearTimeout(timer);
            reject(error);
          },
        );
    });
  }
}
