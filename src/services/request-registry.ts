/**
 * In-flight streaming answers, by client-supplied request id.
 */

import { logger } from '../utils/logger.js';

export class RequestRegistry {
  private readonly controllers = new Map<string, AbortController>();

  /**
   * Register an id and return the signal that stops it. A second
   * registration under a live id aborts the first.
   */
  register(requestId: string): AbortSignal {
    this.controllers.get(requestId)?.abort();
    const controller = new AbortController();
    this.controllers.set(requestId, controller);
    return controller.signal;
  }

  /**
   * @returns false when the id is unknown or already finished
   */
  stop(requestId: string): boolean {
    const controller = this.controllers.get(requestId);
    if (!controller) {
      return false;
    }
    controller.abort();
    this.controllers.delete(requestId);
    logger.info(`Stop requested for ${requestId}`);
    return true;
  }

  /**
   * Forget an id once its stream ends. Only removes the entry owned by
   * `signal`, so a newer registration under the same id survives.
   */
  release(requestId: string, signal: AbortSignal): void {
    if (this.controllers.get(requestId)?.signal === signal) {
      this.controllers.delete(requestId);
    }
  }

  get size(): number {
    return this.controllers.size;
  }
}
