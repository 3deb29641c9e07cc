import { QueuedOperation, QueueStatus } from "./types";
import { toError } from "./errors";
import { logger, errorLogger } from "./utils/logger";

/**
 * Runs async operations one at a time, in the order they were added.
 * Failures reject the caller's promise and never stall the queue; nothing is
 * retried.
 */
export class OperationQueue {
  private queue: QueuedOperation[] = [];
  private processing: boolean = false;
  private currentOperation: QueuedOperation | null = null;
  private label: string;

  constructor(label: string) {
    this.label = label;
  }

  public add<T>(name: string, run: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        name,
        execute: async () => {
          resolve(await run());
        },
        reject,
        timestamp: Date.now(),
      });

      if (!this.processing) {
        void this.processNext();
      }
    });
  }

  private async processNext(): Promise<void> {
    this.processing = true;

    let operation = this.queue.shift();
    while (operation) {
      this.currentOperation = operation;
      logger.debug(`[${this.label}] Processing: ${operation.name}`);

      try {
        await operation.execute();
        logger.debug(`[${this.label}] Done: ${operation.name}`);
      } catch (error) {
        const failure = toError(error);
        errorLogger.error(
          `[${this.label}] Error: ${operation.name} - ${failure.message}`
        );
        operation.reject(failure);
      }

      operation = this.queue.shift();
    }

    this.processing = false;
    this.currentOperation = null;
  }

  public getStatus(): QueueStatus {
    return {
      queueSize: this.queue.length,
      processing: this.processing,
      currentOperation: this.currentOperation
        ? this.currentOperation.name
        : null,
    };
  }

  public isEmpty(): boolean {
    return this.queue.length === 0 && !this.processing;
  }
}
