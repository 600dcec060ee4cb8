import { EventEmitter } from 'events';
import { LightDevice } from '../devices/LightDevice';
import { ModelCatalog } from '../devices/models/ModelCatalog';
import { BleTransport } from '../devices/transport/BleTransport';
import { ConnectionSlotPool } from '../scheduler/ConnectionSlotPool';
import { UpdateScheduler } from '../scheduler/UpdateScheduler';
import { Logger } from '../utils/Logger';
import { DeviceConfig, LumenConfig } from './config/LightConfig';
import { DeviceUnavailableError, ValidationError } from './errors/LightError';
import { DeviceEventType, DeviceSnapshot, LightIntent } from './types/LightTypes';

export interface LightManagerOptions {
  catalog: ModelCatalog;
  transport: BleTransport;
  config: LumenConfig;
  random?: () => number;
  logger?: Logger;
}

/**
 * Owns the fixtures of one process together with the scheduler and
 * connection pool they share.
 */
export class LightManager extends EventEmitter {
  readonly catalog: ModelCatalog;
  readonly pool: ConnectionSlotPool;
  readonly scheduler: UpdateScheduler;

  private readonly transport: BleTransport;
  private readonly config: LumenConfig;
  private readonly random?: () => number;
  private readonly logger: Logger;
  private readonly devices = new Map<string, LightDevice>();

  constructor(options: LightManagerOptions) {
    super();
    this.catalog = options.catalog;
    this.transport = options.transport;
    this.config = options.config;
    this.random = options.random;
    this.logger = options.logger ?? Logger.getInstance();

    const { scheduler } = this.config;
    this.pool = new ConnectionSlotPool(
      { capacity: scheduler.slotCapacity, maxQueued: scheduler.maxQueued },
      this.logger
    );
    this.scheduler = new UpdateScheduler(
      { parallelism: scheduler.parallelism, cancelAttempts: scheduler.cancelAttempts },
      this.pool,
      this.logger
    );
  }

  /**
   * Builds the catalog and every configured device.
   */
  static async fromConfig(
    config: LumenConfig,
    transport: BleTransport,
    options: Pick<LightManagerOptions, 'random' | 'logger'> = {}
  ): Promise<LightManager> {
    const catalog = await ModelCatalog.load(config.modelsPath);
    const manager = new LightManager({ ...options, catalog, transport, config });
    for (const device of config.devices) {
      manager.addDevice(device);
    }
    return manager;
  }

  addDevice(deviceConfig: DeviceConfig): LightDevice {
    const address = deviceConfig.address.toUpperCase();
    if (this.devices.has(address)) {
      throw new ValidationError(`Device ${address} already exists`, 'address', address);
    }

    const device = new LightDevice({
      address,
      model: deviceConfig.model,
      name: deviceConfig.name,
      profile: this.catalog.lookup(deviceConfig.model),
      transport: this.transport,
      pool: this.pool,
      scheduler: this.scheduler,
      timings: this.config.device,
      notify: this.config.notify,
      random: this.random,
      logger: this.logger
    });

    device.on(DeviceEventType.STATE_CHANGED, (snapshot: DeviceSnapshot) => {
      this.emit(DeviceEventType.STATE_CHANGED, snapshot);
    });
    device.on(DeviceEventType.UNAVAILABLE, (error: DeviceUnavailableError) => {
      this.emit(DeviceEventType.UNAVAILABLE, error);
    });

    this.scheduler.register(device);
    this.devices.set(address, device);
    this.logger.info(`Device added: ${address}`, { model: device.model, name: device.name });
    return device;
  }

  async removeDevice(address: string): Promise<void> {
    const device = this.getDevice(address);
    await this.scheduler.unregister(device.address);
    device.dispose();
    this.devices.delete(device.address);
    this.logger.info(`Device removed: ${device.address}`);
  }

  getDevice(address: string): LightDevice {
    const device = this.devices.get(address.toUpperCase());
    if (!device) {
      throw new ValidationError(`Device not found: ${address}`, 'address', address);
    }
    return device;
  }

  hasDevice(address: string): boolean {
    return this.devices.has(address.toUpperCase());
  }

  listDevices(): DeviceSnapshot[] {
    return Array.from(this.devices.values(), device => device.snapshot());
  }

  setIntent(address: string, intent: LightIntent): void {
    this.getDevice(address).setIntent(intent);
  }

  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  async shutdown(): Promise<void> {
    await this.scheduler.shutdown();
    for (const device of this.devices.values()) {
      device.dispose();
    }
    this.devices.clear();
    this.logger.info('Light manager stopped');
  }
}
