import { EventEmitter } from 'events';
import { MAX_KELVIN, MIN_KELVIN, kelvinToRgb } from '../core/color/kelvinToRgb';
import {
  CancelledError,
  CapacityExhaustedError,
  DeviceUnavailableError,
  ErrorType,
  IntentValidationError,
  isLightError
} from '../core/errors/LightError';
import { ThrottleConfig, ThrottledNotifier } from '../core/notify/ThrottledNotifier';
import {
  ColorIntent,
  ConnectionStatus,
  ControlMode,
  DeviceEventType,
  DeviceSnapshot,
  DeviceState,
  IntentCategory,
  LightIntent,
  ModelProfile,
  RGB
} from '../core/types/LightTypes';
import { ConnectionSlotPool } from '../scheduler/ConnectionSlotPool';
import { RunContext, SchedulableDevice } from '../scheduler/UpdateScheduler';
import { Logger } from '../utils/Logger';
import {
  CommandPacket,
  brightnessPacket,
  colorPacket,
  powerPacket,
  toFrame
} from './protocol/LightCommands';
import { formatFrame } from './protocol/FrameCodec';
import { BleTransport, ConnectionHandle } from './transport/BleTransport';

export interface DeviceTimings {
  /** Consecutive link failures (connect or write) before the device is marked unavailable */
  maxReconnectAttempts: number;
  reconnectBaseDelay: number;
  maxReconnectDelay: number;
  /** Shortest pause after a failed write before reconnecting */
  retryDelay: number;
  /** Pause between frames while dirty work remains */
  sendInterval: number;
  /** Length of one keep-alive tick */
  idleInterval: number;
  /** Every n-th keep-alive tick re-sends a confirmed value */
  pingInterval: number;
  /** Keep-alive ticks before the link is closed */
  keepAliveTicks: number;
  /** Frames sent before the run yields to waiting devices */
  maxSendsPerRun: number;
}

export const DEFAULT_DEVICE_TIMINGS: DeviceTimings = {
  maxReconnectAttempts: 5,
  reconnectBaseDelay: 1000,
  maxReconnectDelay: 10000,
  retryDelay: 250,
  sendInterval: 50,
  idleInterval: 1000,
  pingInterval: 3,
  keepAliveTicks: 10,
  maxSendsPerRun: 8
};

/** Jitter added per link failure, drawn once per run */
const JITTER_MIN_MS = 100;
const JITTER_SPAN_MS = 200;

const CATEGORY_ORDER: IntentCategory[] = ['power', 'brightness', 'color'];

export interface LightDeviceOptions {
  address: string;
  model: string;
  name?: string;
  profile: ModelProfile;
  transport: BleTransport;
  pool: ConnectionSlotPool;
  scheduler: { requestRun(id: string): boolean };
  timings?: Partial<DeviceTimings>;
  notify?: Partial<ThrottleConfig>;
  /** Source of jitter, uniform in [0, 1) */
  random?: () => number;
  logger?: Logger;
}

export interface FrameSentEvent {
  address: string;
  category: IntentCategory;
  keepAlive: boolean;
  frame: string;
}

interface ConfirmedState {
  power?: boolean;
  brightness?: number;
  color?: ColorIntent;
}

function sameColor(a: ColorIntent | undefined, b: ColorIntent | undefined): boolean {
  if (!a || !b) {
    return a === b;
  }
  if (a.mode === ControlMode.COLOR && b.mode === ControlMode.COLOR) {
    return a.rgb.every((channel, index) => channel === b.rgb[index]);
  }
  if (a.mode === ControlMode.TEMPERATURE && b.mode === ControlMode.TEMPERATURE) {
    return a.kelvin === b.kelvin;
  }
  return false;
}

function clampKelvin(kelvin: number): number {
  return Math.min(MAX_KELVIN, Math.max(MIN_KELVIN, kelvin));
}

function normalizeColor(color: ColorIntent): ColorIntent {
  return color.mode === ControlMode.TEMPERATURE
    ? { mode: ControlMode.TEMPERATURE, kelvin: clampKelvin(color.kelvin) }
    : color;
}

function isByte(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * One BLE fixture: desired and confirmed state plus the connection lifecycle
 * that reconciles them. Runs are driven by the UpdateScheduler.
 */
export class LightDevice extends EventEmitter implements SchedulableDevice {
  readonly address: string;
  readonly name: string;
  readonly model: string;

  private readonly profile: ModelProfile;
  private readonly transport: BleTransport;
  private readonly pool: ConnectionSlotPool;
  private readonly scheduler: { requestRun(id: string): boolean };
  private readonly timings: DeviceTimings;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly notifier: ThrottledNotifier;

  private desired: LightIntent = {};
  private confirmed: ConfirmedState = {};
  private dirty: Record<IntentCategory, boolean> = { power: false, brightness: false, color: false };

  private state = DeviceState.IDLE;
  private connectionStatus = ConnectionStatus.DISCONNECTED;
  private available = true;
  private handle: ConnectionHandle | null = null;
  private holdsSlot = false;

  private reconnectAttempts = 0;
  private pingCounter = 0;
  private keepAliveCursor = 0;
  private jitter = JITTER_MIN_MS;
  private lastTrafficTime?: Date;
  private lastConnectionAttempt?: Date;
  private lastPacketAttempt?: Date;

  private evictRequested = false;
  private wakeSleeper: (() => void) | null = null;

  constructor(options: LightDeviceOptions) {
    super();
    this.address = options.address.toUpperCase();
    this.model = options.model;
    this.name = options.name ?? `${options.model} ${this.address.replace(/:/g, '').slice(-4)}`;
    this.profile = options.profile;
    this.transport = options.transport;
    this.pool = options.pool;
    this.scheduler = options.scheduler;
    this.timings = { ...DEFAULT_DEVICE_TIMINGS, ...options.timings };
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? Logger.getInstance()).child({ device: this.address });
    this.notifier = new ThrottledNotifier(
      () => {
        this.emit(DeviceEventType.STATE_CHANGED, this.snapshot());
      },
      options.notify,
      this.logger
    );

    this.pool.registerEvictionHandler(this.address, () => {
      this.evictRequested = true;
      this.wake();
    });
  }

  get id(): string {
    return this.address;
  }

  getProfile(): ModelProfile {
    return { ...this.profile };
  }

  /**
   * Records what the fixture should look like. Only fields that differ from
   * the current desired state become dirty.
   */
  setIntent(intent: LightIntent): void {
    this.validateIntent(intent);

    let changed = false;
    if (intent.power !== undefined && intent.power !== this.desired.power) {
      this.desired.power = intent.power;
      this.dirty.power = true;
      changed = true;
    }
    if (intent.brightness !== undefined && intent.brightness !== this.desired.brightness) {
      this.desired.brightness = intent.brightness;
      this.dirty.brightness = true;
      changed = true;
    }
    if (intent.color !== undefined && !sameColor(normalizeColor(intent.color), this.desired.color)) {
      this.desired.color = intent.color.mode === ControlMode.COLOR
        ? { mode: ControlMode.COLOR, rgb: [...intent.color.rgb] }
        : { mode: ControlMode.TEMPERATURE, kelvin: clampKelvin(intent.color.kelvin) };
      this.dirty.color = true;
      changed = true;
    }

    if (changed) {
      this.logger.debug('Intent updated', { dirty: this.dirtyCategories() });
      this.wake();
      this.notifier.requestUpdate();
    }
    if (this.isDirty()) {
      this.scheduler.requestRun(this.address);
    }
  }

  isDirty(): boolean {
    return this.dirty.power || this.dirty.brightness || this.dirty.color;
  }

  hasPendingWork(): boolean {
    return this.available && this.isDirty();
  }

  isAvailable(): boolean {
    return this.available;
  }

  markQueued(): void {
    if (this.state === DeviceState.IDLE) {
      this.setState(DeviceState.QUEUED);
    }
  }

  /**
   * Connect, drain dirty categories, keep the link warm, disconnect.
   * Cancellation ends the run quietly; validation errors escape.
   */
  async run(context: RunContext): Promise<void> {
    const { signal } = context;
    this.jitter = JITTER_MIN_MS + this.random() * JITTER_SPAN_MS;
    this.evictRequested = false;
    if (!this.available) {
      this.reconnectAttempts = 0;
    }

    let sends = 0;
    let idleTicks = 0;
    try {
      while (!signal.aborted) {
        if (this.isDirty()) {
          idleTicks = 0;
          if (!this.handle) {
            const connected = await this.establish(signal);
            if (!connected) {
              if (!this.available) {
                return;
              }
              continue;
            }
          } else if (this.state === DeviceState.KEEP_ALIVE) {
            await this.acquireSlot(signal);
          }

          if (sends >= this.timings.maxSendsPerRun && context.hasWaiters()) {
            this.logger.debug('Yielding to waiting devices', { sends });
            return;
          }

          sends++;
          if (await this.sendNext(signal)) {
            await this.sleep(this.timings.sendInterval, signal);
          } else if (!this.available) {
            return;
          }
          continue;
        }

        if (!this.handle) {
          return;
        }

        if (this.state !== DeviceState.KEEP_ALIVE) {
          this.setState(DeviceState.KEEP_ALIVE);
          await this.pool.markStale(this.address);
        }
        if (this.evictRequested || context.hasWaiters()) {
          this.logger.debug('Releasing idle link', { evicted: this.evictRequested });
          return;
        }
        if (idleTicks >= this.timings.keepAliveTicks) {
          return;
        }

        await this.sleep(this.timings.idleInterval, signal);
        if (signal.aborted || this.isDirty() || this.evictRequested || !this.handle) {
          continue;
        }
        idleTicks++;
        this.pingCounter++;
        if (this.pingCounter % this.timings.pingInterval === 0) {
          await this.sendKeepAlive();
        }
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        throw error;
      }
    } finally {
      await this.teardown();
    }
  }

  /**
   * Backoff before the next connect: grows with every failure, never
   * shrinks within a run, and is capped.
   */
  getReconnectDelay(attempts: number = this.reconnectAttempts): number {
    return Math.min(
      this.timings.maxReconnectDelay,
      this.timings.reconnectBaseDelay + attempts * this.jitter
    );
  }

  snapshot(): DeviceSnapshot {
    const { color } = this.confirmed;
    return {
      address: this.address,
      name: this.name,
      model: this.model,
      state: this.state,
      connectionStatus: this.connectionStatus,
      available: this.available,
      power: this.confirmed.power,
      brightness: this.confirmed.brightness,
      rgb: color ? this.displayRgb(color) : undefined,
      kelvin: color?.mode === ControlMode.TEMPERATURE ? color.kelvin : undefined,
      controlMode: color?.mode,
      dirty: { ...this.dirty },
      reconnectAttempts: this.reconnectAttempts,
      pingCounter: this.pingCounter,
      lastTrafficTime: this.lastTrafficTime,
      lastConnectionAttempt: this.lastConnectionAttempt,
      lastPacketAttempt: this.lastPacketAttempt
    };
  }

  getDesired(): LightIntent {
    return { ...this.desired };
  }

  dispose(): void {
    this.notifier.cancel();
    this.pool.unregisterEvictionHandler(this.address);
    this.wake();
    this.removeAllListeners();
  }

  private validateIntent(intent: LightIntent): void {
    if (intent.power !== undefined && typeof intent.power !== 'boolean') {
      throw new IntentValidationError('Power must be a boolean', 'power', intent.power, this.address);
    }
    if (intent.brightness !== undefined && !isByte(intent.brightness)) {
      throw new IntentValidationError(
        'Brightness must be an integer between 0 and 255',
        'brightness',
        intent.brightness,
        this.address
      );
    }

    const color = intent.color;
    if (color === undefined) {
      return;
    }
    if (color.mode === ControlMode.COLOR) {
      if (!Array.isArray(color.rgb) || color.rgb.length !== 3 || !color.rgb.every(isByte)) {
        throw new IntentValidationError(
          'RGB color must be three integers between 0 and 255',
          'color.rgb',
          color.rgb,
          this.address
        );
      }
    } else if (color.mode === ControlMode.TEMPERATURE) {
      if (!Number.isInteger(color.kelvin) || color.kelvin < 0) {
        throw new IntentValidationError(
          'Color temperature must be a non-negative integer',
          'color.kelvin',
          color.kelvin,
          this.address
        );
      }
    } else {
      throw new IntentValidationError('Unknown color mode', 'color.mode', color, this.address);
    }
  }

  private async establish(signal: AbortSignal): Promise<boolean> {
    this.setState(DeviceState.CONNECTING);
    try {
      await this.acquireSlot(signal);
    } catch (error) {
      if (error instanceof CapacityExhaustedError) {
        this.logger.debug('Slot queue full, staying queued');
        this.setState(DeviceState.QUEUED);
        await this.sleep(this.timings.idleInterval, signal);
        return false;
      }
      throw error;
    }

    this.lastConnectionAttempt = new Date();
    this.setConnectionStatus(ConnectionStatus.ESTABLISHING);
    try {
      this.handle = await this.transport.connect(
        { address: this.address, name: this.name, model: this.model },
        handle => this.onLinkLost(handle)
      );
    } catch (error) {
      if (isLightError(error) && error.code === ErrorType.VALIDATION_ERROR) {
        throw error;
      }
      await this.recordLinkFailure('Connection failed', error, signal);
      return false;
    }

    if (signal.aborted) {
      throw new CancelledError('Run cancelled while connecting', this.address);
    }

    this.lastTrafficTime = new Date();
    this.setConnectionStatus(ConnectionStatus.CONNECTED);
    if (!this.available) {
      this.available = true;
      this.logger.info('Device available again');
      this.notifier.requestUpdate();
    }
    return true;
  }

  /**
   * Counts a failed connect or write towards the reconnect ceiling. Below it
   * the device backs off; at it the device is marked unavailable.
   */
  private async recordLinkFailure(
    message: string,
    error: unknown,
    signal: AbortSignal,
    minDelay = 0
  ): Promise<void> {
    this.reconnectAttempts++;
    await this.releaseSlot();
    this.logger.warn(message, {
      attempt: this.reconnectAttempts,
      error: error instanceof Error ? error.message : String(error)
    });

    if (this.reconnectAttempts >= this.timings.maxReconnectAttempts) {
      this.available = false;
      this.setConnectionStatus(ConnectionStatus.FAILED);
      const unavailable = new DeviceUnavailableError(this.address, this.reconnectAttempts);
      this.logger.error(unavailable.message);
      this.emit(DeviceEventType.UNAVAILABLE, unavailable);
      this.notifier.requestUpdate();
      return;
    }

    this.setConnectionStatus(ConnectionStatus.DISCONNECTED);
    await this.sleep(Math.max(minDelay, this.getReconnectDelay()), signal);
  }

  private async sendNext(signal: AbortSignal): Promise<boolean> {
    const category = CATEGORY_ORDER.find(candidate => this.dirty[candidate]);
    const handle = this.handle;
    if (!category || !handle) {
      return false;
    }

    const sent = this.snapshotDesired(category);
    const packet = this.packetFor(sent);
    if (!packet) {
      this.dirty[category] = false;
      return false;
    }
    const frame = toFrame(packet);

    this.setState(DeviceState.SENDING);
    this.lastPacketAttempt = new Date();
    try {
      await this.transport.write(handle, frame);
    } catch (error) {
      if (isLightError(error) && error.code === ErrorType.VALIDATION_ERROR) {
        throw error;
      }
      await this.dropLink();
      await this.recordLinkFailure('Write failed', error, signal, this.timings.retryDelay);
      return false;
    }

    this.reconnectAttempts = 0;
    this.lastTrafficTime = new Date();
    this.confirm(sent);
    if (this.desiredMatches(sent)) {
      this.dirty[category] = false;
    }
    this.emitFrameSent(category, frame, false);
    this.notifier.requestUpdate();
    return true;
  }

  private async sendKeepAlive(): Promise<void> {
    const handle = this.handle;
    const candidates = CATEGORY_ORDER.filter(category => this.confirmed[category] !== undefined);
    if (!handle || candidates.length === 0) {
      return;
    }

    const category = candidates[this.keepAliveCursor % candidates.length];
    this.keepAliveCursor++;
    const packet = this.packetFor(this.confirmedValue(category));
    if (!packet) {
      return;
    }
    const frame = toFrame(packet);

    this.lastPacketAttempt = new Date();
    try {
      await this.transport.write(handle, frame);
      this.lastTrafficTime = new Date();
      this.emitFrameSent(category, frame, true);
    } catch (error) {
      this.logger.debug('Keep-alive write failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      await this.dropLink();
    }
  }

  private snapshotDesired(category: IntentCategory): ConfirmedState {
    switch (category) {
      case 'power':
        return { power: this.desired.power };
      case 'brightness':
        return { brightness: this.desired.brightness };
      case 'color':
        return { color: this.desired.color };
    }
  }

  private confirmedValue(category: IntentCategory): ConfirmedState {
    switch (category) {
      case 'power':
        return { power: this.confirmed.power };
      case 'brightness':
        return { brightness: this.confirmed.brightness };
      case 'color':
        return { color: this.confirmed.color };
    }
  }

  private packetFor(value: ConfirmedState): CommandPacket | null {
    if (value.power !== undefined) {
      return powerPacket(value.power);
    }
    if (value.brightness !== undefined) {
      return brightnessPacket(value.brightness, this.profile);
    }
    if (value.color !== undefined) {
      return colorPacket(value.color, this.profile);
    }
    return null;
  }

  private confirm(value: ConfirmedState): void {
    this.confirmed = { ...this.confirmed, ...value };
  }

  // The desired value may have moved on while the write was in flight
  private desiredMatches(value: ConfirmedState): boolean {
    if (value.power !== undefined) {
      return value.power === this.desired.power;
    }
    if (value.brightness !== undefined) {
      return value.brightness === this.desired.brightness;
    }
    return sameColor(value.color, this.desired.color);
  }

  private displayRgb(color: ColorIntent): RGB {
    return color.mode === ControlMode.COLOR ? [...color.rgb] : kelvinToRgb(color.kelvin);
  }

  private emitFrameSent(category: IntentCategory, frame: Buffer, keepAlive: boolean): void {
    const event: FrameSentEvent = {
      address: this.address,
      category,
      keepAlive,
      frame: formatFrame(frame)
    };
    this.logger.trace('Frame sent', { category, keepAlive, frame: event.frame });
    this.emit(DeviceEventType.FRAME_SENT, event);
  }

  private async acquireSlot(signal: AbortSignal): Promise<void> {
    await this.pool.acquire(this.address, signal);
    this.holdsSlot = true;
    this.evictRequested = false;
  }

  private async releaseSlot(): Promise<void> {
    if (!this.holdsSlot) {
      return;
    }
    this.holdsSlot = false;
    await this.pool.release(this.address);
  }

  private onLinkLost(handle: ConnectionHandle): void {
    if (this.handle?.id !== handle.id) {
      return;
    }
    this.logger.warn('Connection lost');
    this.handle = null;
    this.setConnectionStatus(ConnectionStatus.DISCONNECTED);
    this.wake();
  }

  private async dropLink(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      try {
        await this.transport.disconnect(handle);
      } catch (error) {
        this.logger.debug('Disconnect after failure did not complete', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
    this.setConnectionStatus(ConnectionStatus.DISCONNECTED);
  }

  private async teardown(): Promise<void> {
    if (this.handle) {
      this.setState(DeviceState.DISCONNECTING);
      await this.dropLink();
    }
    await this.releaseSlot();
    this.setState(DeviceState.IDLE);
  }

  /**
   * Waits `ms`, or less if woken by new intent, eviction or cancellation.
   */
  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        if (this.wakeSleeper === done) {
          this.wakeSleeper = null;
        }
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
      this.wakeSleeper = done;
    });
  }

  private wake(): void {
    this.wakeSleeper?.();
  }

  private dirtyCategories(): IntentCategory[] {
    return CATEGORY_ORDER.filter(category => this.dirty[category]);
  }

  private setState(state: DeviceState): void {
    if (this.state === state) {
      return;
    }
    this.logger.debug('State transition', { from: this.state, to: state });
    this.state = state;
    this.notifier.requestUpdate();
  }

  private setConnectionStatus(status: ConnectionStatus): void {
    if (this.connectionStatus === status) {
      return;
    }
    this.connectionStatus = status;
    this.emit(DeviceEventType.CONNECTION_STATUS, status);
    this.notifier.requestUpdate();
  }
}
