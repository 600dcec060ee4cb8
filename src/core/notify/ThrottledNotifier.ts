import { Logger } from '../../utils/Logger';

export interface ThrottleConfig {
  /** Delay before the first notification of a quiet period, ms */
  minDelay: number;
  /** Upper bound on the delay; a gap this long also resets the backoff */
  maxDelay: number;
  /** Added to the delay for every notification in the current burst, ms */
  perUpdatePenalty: number;
}

export const DEFAULT_THROTTLE_CONFIG: ThrottleConfig = {
  minDelay: 1000,
  maxDelay: 60000,
  perUpdatePenalty: 1000
};

export type NotifyCallback = () => void | Promise<void>;

/**
 * Coalesces change notifications. A quiet source is reported after
 * `minDelay`; a chattering one backs off by `perUpdatePenalty` per
 * notification up to `maxDelay`.
 */
export class ThrottledNotifier {
  private readonly config: ThrottleConfig;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private lastNotify = Number.NEGATIVE_INFINITY;
  private successiveCount = 0;

  constructor(
    private readonly callback: NotifyCallback,
    config: Partial<ThrottleConfig> = {},
    logger: Logger = Logger.getInstance()
  ) {
    this.config = { ...DEFAULT_THROTTLE_CONFIG, ...config };
    this.logger = logger;
  }

  requestUpdate(): void {
    if (this.timer) {
      return;
    }
    this.timer = setTimeout(() => {
      void this.fire();
    }, this.calculateDelay(Date.now()));
  }

  calculateDelay(now: number): number {
    const delay = Math.min(
      this.config.maxDelay,
      this.config.minDelay + this.successiveCount * this.config.perUpdatePenalty
    );
    return Math.max(0, delay - (now - this.lastNotify));
  }

  isPending(): boolean {
    return this.timer !== null;
  }

  getSuccessiveCount(): number {
    return this.successiveCount;
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async fire(): Promise<void> {
    // Requests made while the callback runs schedule the next notification
    this.timer = null;
    const now = Date.now();
    if (now - this.lastNotify >= this.config.maxDelay) {
      this.successiveCount = 0;
    } else {
      this.successiveCount++;
    }

    try {
      await this.callback();
    } catch (error) {
      this.logger.error('Notification callback failed', {
        error: error instanceof Error ? error.message : String(error)
      });
    } finally {
      this.lastNotify = Date.now();
    }
  }
}
