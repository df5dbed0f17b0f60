/**
 * Serial Queue
 *
 * Single-writer execution for engine state. Protocol calls, renderer
 * feedback and timer fires all enter here, so no two mutations interleave.
 */

import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { getErrorMessage } from "../logging/error-utils.js";

export interface SerialQueueOptions {
  /** Called each time the queue goes idle */
  onIdle?: () => void;
  logger?: Logger;
}

export class SerialQueue {
  private tasks: Array<() => void> = [];
  private running = false;
  private onIdle?: () => void;
  private logger: Logger;

  constructor(options: SerialQueueOptions = {}) {
    this.onIdle = options.onIdle;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  get busy(): boolean {
    return this.running;
  }

  get pending(): number {
    return this.tasks.length;
  }

  /**
   * Queue a fire-and-forget task. Runs immediately when idle, otherwise
   * after the task currently running. A failing task is logged and the
   * queue moves on.
   */
  post(task: () => void): void {
    this.tasks.push(task);
    this.drain();
  }

  /**
   * Run a task and return its result. Errors propagate to the caller.
   * Must not be called from inside a queued task.
   */
  run<T>(task: () => T): T {
    if (this.running) {
      throw new Error("SerialQueue.run() called from inside a queued task");
    }

    this.running = true;
    let result: T;
    try {
      result = task();
    } finally {
      this.running = false;
      this.drain();
    }
    return result;
  }

  private drain(): void {
    if (this.running) return;

    this.running = true;
    try {
      let task = this.tasks.shift();
      while (task) {
        try {
          task();
        } catch (err) {
          this.logger.error(`[Queue] Task failed: ${getErrorMessage(err)}`);
        }
        task = this.tasks.shift();
      }
    } finally {
      this.running = false;
    }

    this.onIdle?.();
  }
}
