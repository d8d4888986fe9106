import type { StateManager } from "../state/state-manager.js";
import { logger } from "../../infra/logger.js";

/**
 * Periodically expires sessions past their timeout. The timer is unref'd so
 * it never keeps the process alive by itself.
 */
export class ExpirySweeper {
  private intervalId: NodeJS.Timeout | undefined;
  private lastSweptCount = 0;

  constructor(
    private readonly stateManager: StateManager,
    private readonly intervalMs: number
  ) {}

  /**
   * Expire timed-out sessions once
   */
  sweep(now?: Date): number {
    const expired = this.stateManager.cleanupExpiredSessions(now);
    this.lastSweptCount = expired;
    return expired;
  }

  /**
   * @returns A function that stops the sweeper
   */
  start(): () => void {
    this.stop();

    this.intervalId = setInterval(() => {
      try {
        this.sweep();
      } catch (error) {
        logger.warn("Session expiry sweep failed", { error: String(error) });
      }
    }, this.intervalMs);
    this.intervalId.unref();

    logger.debug(`Started session expiry sweep every ${this.intervalMs}ms`);
    return () => this.stop();
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      logger.debug("Stopped session expiry sweep");
    }
  }

  get running(): boolean {
    return this.intervalId !== undefined;
  }

  get lastSwept(): number {
    return this.lastSweptCount;
  }
}
