import { EventEmitter } from 'events';
import { Logger } from '../utils/Logger';
import { ConnectionSlotPool } from './ConnectionSlotPool';

/**
 * What a run gets from the scheduler.
 */
export interface RunContext {
  signal: AbortSignal;
  /** True while other devices wait for admission or for a connection slot */
  hasWaiters(): boolean;
}

export interface SchedulableDevice {
  readonly id: string;
  run(context: RunContext): Promise<void>;
  /** Dirty work the device can still make progress on */
  hasPendingWork(): boolean;
  markQueued(): void;
}

export interface SchedulerConfig {
  parallelism: number;
  /** Polls made by `cancel` before giving up on a run */
  cancelAttempts: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  parallelism: 3,
  cancelAttempts: 20
};

export interface SchedulerStats {
  registered: number;
  queued: number;
  running: number;
  peakRunning: number;
  completedRuns: number;
  failedRuns: number;
}

export enum SchedulerEvent {
  ADMITTED = 'admitted',
  COMPLETED = 'completed',
  RUN_ERROR = 'runError',
  IDLE = 'idle'
}

interface RunningEntry {
  controller: AbortController;
}

const MAX_CANCEL_POLL = 500;

/**
 * Bounded-concurrency work queue. Devices ask to be run; at most
 * `parallelism` runs are in flight and each device has at most one.
 */
export class UpdateScheduler extends EventEmitter {
  private readonly config: SchedulerConfig;
  private readonly logger: Logger;
  private readonly devices = new Map<string, SchedulableDevice>();
  private readonly queue: string[] = [];
  private readonly running = new Map<string, RunningEntry>();
  private idleWaiters: Array<() => void> = [];
  private shuttingDown = false;
  private stats = {
    peakRunning: 0,
    completedRuns: 0,
    failedRuns: 0
  };

  constructor(
    config: Partial<SchedulerConfig> = {},
    private readonly pool?: ConnectionSlotPool,
    logger: Logger = Logger.getInstance()
  ) {
    super();
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.logger = logger.child({ component: 'scheduler' });
  }

  register(device: SchedulableDevice): void {
    if (this.devices.has(device.id)) {
      throw new Error(`Device ${device.id} is already registered`);
    }
    this.devices.set(device.id, device);
  }

  async unregister(id: string): Promise<void> {
    await this.cancel(id);
    this.devices.delete(id);
  }

  /**
   * Queues a run for `id` unless one is already queued or in flight.
   * Returns whether a run was queued.
   */
  requestRun(id: string): boolean {
    const device = this.devices.get(id);
    if (!device) {
      this.logger.warn('Run requested for unknown device', { device: id });
      return false;
    }
    if (this.shuttingDown || this.running.has(id) || this.queue.includes(id)) {
      return false;
    }

    this.enqueue(device);
    this.pump();
    return true;
  }

  isQueued(id: string): boolean {
    return this.queue.includes(id);
  }

  isRunning(id: string): boolean {
    return this.running.has(id);
  }

  hasPendingDemand(): boolean {
    return this.queue.length > 0 || (this.pool?.hasWaiters() ?? false);
  }

  /**
   * Aborts the device's run and waits for it to wind down. Returns false if
   * it was still running after `cancelAttempts` polls.
   */
  async cancel(id: string): Promise<boolean> {
    const queuedAt = this.queue.indexOf(id);
    if (queuedAt !== -1) {
      this.queue.splice(queuedAt, 1);
    }

    const entry = this.running.get(id);
    if (!entry) {
      this.checkIdle();
      return true;
    }

    entry.controller.abort();
    for (let attempt = 0; attempt < this.config.cancelAttempts; attempt++) {
      if (this.running.get(id) !== entry) {
        return true;
      }
      await delay(Math.min(10 * 2 ** attempt, MAX_CANCEL_POLL));
    }

    if (this.running.get(id) !== entry) {
      return true;
    }
    this.logger.error('Run did not stop after cancellation', {
      device: id,
      attempts: this.config.cancelAttempts
    });
    return false;
  }

  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  getStats(): SchedulerStats {
    return {
      registered: this.devices.size,
      queued: this.queue.length,
      running: this.running.size,
      ...this.stats
    };
  }

  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.queue.length = 0;
    const results = await Promise.all([...this.running.keys()].map(id => this.cancel(id)));
    this.checkIdle();
    this.logger.info('Scheduler stopped', {
      cancelled: results.length,
      stuck: results.filter(stopped => !stopped).length
    });
  }

  private enqueue(device: SchedulableDevice): void {
    this.queue.push(device.id);
    device.markQueued();
  }

  private pump(): void {
    while (this.running.size < this.config.parallelism && this.queue.length > 0) {
      const id = this.queue.shift();
      const device = id === undefined ? undefined : this.devices.get(id);
      if (device) {
        this.start(device);
      }
    }
    this.checkIdle();
  }

  private start(device: SchedulableDevice): void {
    const controller = new AbortController();
    const entry: RunningEntry = { controller };
    this.running.set(device.id, entry);
    this.stats.peakRunning = Math.max(this.stats.peakRunning, this.running.size);
    this.emit(SchedulerEvent.ADMITTED, device.id);
    this.logger.debug('Run admitted', { device: device.id, running: this.running.size });

    const context: RunContext = {
      signal: controller.signal,
      hasWaiters: () => this.hasPendingDemand()
    };

    device
      .run(context)
      .then(
        () => {
          this.stats.completedRuns++;
        },
        error => {
          this.stats.failedRuns++;
          this.logger.error('Run failed', {
            device: device.id,
            error: error instanceof Error ? error.message : String(error)
          });
          this.emit(SchedulerEvent.RUN_ERROR, device.id, error);
        }
      )
      .finally(() => this.finish(device, entry))
      .catch(error => {
        this.logger.error('Failed to settle run', {
          device: device.id,
          error: error instanceof Error ? error.message : String(error)
        });
      });
  }

  private finish(device: SchedulableDevice, entry: RunningEntry): void {
    if (this.running.get(device.id) === entry) {
      this.running.delete(device.id);
    }
    this.emit(SchedulerEvent.COMPLETED, device.id);

    const stillRegistered = this.devices.get(device.id) === device;
    if (
      stillRegistered &&
      !this.shuttingDown &&
      !entry.controller.signal.aborted &&
      device.hasPendingWork() &&
      !this.queue.includes(device.id)
    ) {
      // Back of the line, behind whoever waited while it ran
      this.enqueue(device);
    }
    this.pump();
  }

  private isIdle(): boolean {
    return this.running.size === 0 && this.queue.length === 0;
  }

  private checkIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
    if (waiters.length > 0 || this.stats.completedRuns + this.stats.failedRuns > 0) {
      this.emit(SchedulerEvent.IDLE);
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
