import { EventEmitter } from 'events';
import { CancelledError, CapacityExhaustedError } from '../core/errors/LightError';
import { Logger } from '../utils/Logger';
import { Mutex } from '../utils/Mutex';

export interface SlotPoolConfig {
  /** Upper bound on open connections, active and stale together */
  capacity: number;
  /** Waiters allowed in the queue; 0 means unlimited */
  maxQueued: number;
}

export const DEFAULT_SLOT_POOL_CONFIG: SlotPoolConfig = {
  capacity: 5,
  maxQueued: 0
};

export interface SlotPoolSnapshot {
  capacity: number;
  active: string[];
  stale: string[];
  queued: string[];
}

/** Asks a stale holder to disconnect and give its slot back */
export type EvictionHandler = () => void;

interface Waiter {
  id: string;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Process-wide budget of BLE connections. Holders are either active (in a
 * protocol exchange) or stale (connected and idling); a stale holder is asked
 * to yield as soon as someone is waiting.
 */
export class ConnectionSlotPool extends EventEmitter {
  private readonly config: SlotPoolConfig;
  private readonly logger: Logger;
  private readonly mutex = new Mutex();
  private readonly active = new Set<string>();
  // Insertion order doubles as staleness order
  private readonly stale = new Set<string>();
  private readonly queue: Waiter[] = [];
  private readonly evictionHandlers = new Map<string, EvictionHandler>();

  constructor(config: Partial<SlotPoolConfig> = {}, logger: Logger = Logger.getInstance()) {
    super();
    this.config = { ...DEFAULT_SLOT_POOL_CONFIG, ...config };
    this.logger = logger.child({ component: 'slot-pool' });
  }

  get capacity(): number {
    return this.config.capacity;
  }

  /**
   * Resolves once `id` holds an active slot. A stale holder is promoted in
   * place; anyone else joins the FIFO queue when the pool is full.
   */
  async acquire(id: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError('Slot acquisition cancelled', id);
    }

    // The wait is boxed so runExclusive does not await it under the lock
    const pending = await this.mutex.runExclusive<{ wait: Promise<void> } | null>(() => {
      if (signal?.aborted) {
        throw new CancelledError('Slot acquisition cancelled', id);
      }
      if (this.active.has(id)) {
        return null;
      }
      if (this.stale.delete(id)) {
        this.active.add(id);
        return null;
      }
      if (this.queue.length === 0 && this.occupied() < this.config.capacity) {
        this.active.add(id);
        this.emit('acquired', id);
        return null;
      }
      if (this.config.maxQueued > 0 && this.queue.length >= this.config.maxQueued) {
        throw new CapacityExhaustedError(
          `Connection slot queue is full (${this.queue.length} waiting)`,
          id,
          this.config.capacity,
          this.queue.length
        );
      }

      const wait = new Promise<void>((resolve, reject) => {
        this.queue.push({ id, resolve, reject });
      });
      this.logger.debug('Waiting for connection slot', { device: id, queued: this.queue.length });
      this.requestEvictions();
      return { wait };
    });

    if (!pending) {
      return;
    }

    const onAbort = () => {
      this.mutex
        .runExclusive(() => this.dropWaiter(id))
        .catch(error => this.logger.error('Failed to drop slot waiter', {
          device: id,
          error: error instanceof Error ? error.message : String(error)
        }));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    // Aborted between queueing and the listener being attached
    if (signal?.aborted) {
      onAbort();
    }
    try {
      await pending.wait;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Moves an active holder to the stale set, where it may be evicted.
   */
  async markStale(id: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (!this.active.delete(id)) {
        return;
      }
      this.stale.add(id);
      this.requestEvictions();
    });
  }

  async release(id: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      const held = this.active.delete(id) || this.stale.delete(id);
      if (!held) {
        return;
      }
      this.emit('released', id);
      this.grantWaiters();
    });
  }

  registerEvictionHandler(id: string, handler: EvictionHandler): void {
    this.evictionHandlers.set(id, handler);
  }

  unregisterEvictionHandler(id: string): void {
    this.evictionHandlers.delete(id);
  }

  hasWaiters(): boolean {
    return this.queue.length > 0;
  }

  snapshot(): SlotPoolSnapshot {
    return {
      capacity: this.config.capacity,
      active: [...this.active],
      stale: [...this.stale],
      queued: this.queue.map(waiter => waiter.id)
    };
  }

  private occupied(): number {
    return this.active.size + this.stale.size;
  }

  private grantWaiters(): void {
    while (this.queue.length > 0 && this.occupied() < this.config.capacity) {
      const waiter = this.queue.shift();
      if (!waiter) {
        break;
      }
      this.active.add(waiter.id);
      this.emit('acquired', waiter.id);
      waiter.resolve();
    }
    this.requestEvictions();
  }

  /**
   * Asks the oldest stale holders to yield, one per waiter.
   */
  private requestEvictions(): void {
    let wanted = this.queue.length;
    for (const id of this.stale) {
      if (wanted === 0) {
        break;
      }
      const handler = this.evictionHandlers.get(id);
      if (handler) {
        this.logger.debug('Requesting eviction', { device: id });
        this.emit('evictionRequested', id);
        handler();
        wanted--;
      }
    }
  }

  private dropWaiter(id: string): void {
    const index = this.queue.findIndex(waiter => waiter.id === id);
    if (index === -1) {
      return;
    }
    const [waiter] = this.queue.splice(index, 1);
    waiter.reject(new CancelledError('Slot acquisition cancelled', id));
  }
}
