import type { Characteristic, Peripheral } from '@abandonware/noble';
import { v4 as uuidv4 } from 'uuid';
import { TransientLinkError } from '../../core/errors/LightError';
import { DeviceRef } from '../../core/types/LightTypes';
import { Logger } from '../../utils/Logger';
import { Mutex } from '../../utils/Mutex';
import {
  BleTransport,
  ConnectionHandle,
  DEFAULT_TRANSPORT_CONFIG,
  DisconnectListener,
  TransportConfig
} from './BleTransport';

type Noble = typeof import('@abandonware/noble');

interface NobleLink {
  handle: ConnectionHandle;
  peripheral: Peripheral;
  characteristic: Characteristic;
  onPeripheralDisconnect: () => void;
}

/**
 * BLE transport on @abandonware/noble. The native module is only loaded on
 * first use so the rest of the library runs on hosts without a radio.
 */
export class NobleTransport implements BleTransport {
  private readonly config: TransportConfig;
  private readonly logger: Logger;
  private readonly scanMutex = new Mutex();
  private readonly peripherals = new Map<string, Peripheral>();
  private readonly links = new Map<string, NobleLink>();
  private noble?: Noble;

  constructor(config: Partial<TransportConfig> = {}, logger: Logger = Logger.getInstance()) {
    this.config = { ...DEFAULT_TRANSPORT_CONFIG, ...config };
    this.logger = logger.child({ component: 'noble-transport' });
  }

  async connect(ref: DeviceRef, onDisconnect: DisconnectListener): Promise<ConnectionHandle> {
    const address = ref.address.toUpperCase();
    const peripheral = await this.resolvePeripheral(address);

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.config.connectAttempts; attempt++) {
      try {
        await peripheral.connectAsync();
        const characteristic = await this.findControlCharacteristic(peripheral, address);
        const handle: ConnectionHandle = {
          id: uuidv4(),
          address,
          connectedAt: new Date()
        };
        const onPeripheralDisconnect = () => {
          if (this.links.delete(handle.id)) {
            this.logger.debug('Peripheral disconnected', { device: address });
            onDisconnect(handle);
          }
        };
        peripheral.once('disconnect', onPeripheralDisconnect);
        this.links.set(handle.id, { handle, peripheral, characteristic, onPeripheralDisconnect });
        return handle;
      } catch (error) {
        lastError = error;
        this.logger.debug('Connection attempt failed', {
          device: address,
          attempt,
          error: error instanceof Error ? error.message : String(error)
        });
        await this.safeDisconnect(peripheral, address);
      }
    }

    throw new TransientLinkError(
      `Failed to connect to ${address} after ${this.config.connectAttempts} attempts`,
      address,
      lastError
    );
  }

  async write(handle: ConnectionHandle, frame: Buffer): Promise<void> {
    const link = this.links.get(handle.id);
    if (!link) {
      throw new TransientLinkError(`Not connected to ${handle.address}`, handle.address);
    }
    try {
      await link.characteristic.writeAsync(frame, this.config.writeWithoutResponse);
    } catch (error) {
      throw new TransientLinkError(`Write to ${handle.address} failed`, handle.address, error);
    }
  }

  async disconnect(handle: ConnectionHandle): Promise<void> {
    const link = this.links.get(handle.id);
    if (!link) {
      return;
    }
    this.links.delete(handle.id);
    link.peripheral.removeListener('disconnect', link.onPeripheralDisconnect);
    try {
      await link.peripheral.disconnectAsync();
    } catch (error) {
      throw new TransientLinkError(`Disconnect from ${handle.address} failed`, handle.address, error);
    }
  }

  private async safeDisconnect(peripheral: Peripheral, address: string): Promise<void> {
    try {
      await peripheral.disconnectAsync();
    } catch (error) {
      this.logger.debug('Cleanup disconnect failed', {
        device: address,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private async findControlCharacteristic(peripheral: Peripheral, address: string): Promise<Characteristic> {
    const uuid = this.config.controlCharacteristic.replace(/-/g, '').toLowerCase();
    const { characteristics } = await peripheral.discoverSomeServicesAndCharacteristicsAsync([], [uuid]);
    const characteristic = characteristics.find(candidate => candidate.uuid === uuid);
    if (!characteristic) {
      throw new TransientLinkError(`Control characteristic ${uuid} not found`, address);
    }
    return characteristic;
  }

  /**
   * Scans until `address` advertises. Scans are serialized because noble's
   * scanner is process-wide.
   */
  private resolvePeripheral(address: string): Promise<Peripheral> {
    return this.scanMutex.runExclusive(async () => {
      const cached = this.peripherals.get(address);
      if (cached) {
        return cached;
      }

      const noble = await this.ensurePoweredOn();
      this.logger.debug('Scanning for peripheral', { device: address });

      return new Promise<Peripheral>((resolve, reject) => {
        const finish = () => {
          clearTimeout(timer);
          noble.removeListener('discover', onDiscover);
          noble.stopScanningAsync().catch(error => {
            this.logger.warn('Failed to stop scanning', {
              error: error instanceof Error ? error.message : String(error)
            });
          });
        };
        const onDiscover = (peripheral: Peripheral) => {
          const seen = peripheral.address.toUpperCase();
          this.peripherals.set(seen, peripheral);
          if (seen === address) {
            finish();
            resolve(peripheral);
          }
        };
        const timer = setTimeout(() => {
          finish();
          reject(new TransientLinkError(
            `${address} not seen within ${this.config.scanTimeout} ms`,
            address
          ));
        }, this.config.scanTimeout);

        noble.on('discover', onDiscover);
        noble.startScanningAsync([], false).catch(error => {
          finish();
          reject(new TransientLinkError('Failed to start scanning', address, error));
        });
      });
    });
  }

  private async ensurePoweredOn(): Promise<Noble> {
    const noble: Noble = this.noble ?? require('@abandonware/noble');
    this.noble = noble;
    if (noble.state === 'poweredOn') {
      return noble;
    }

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        reject(new TransientLinkError(`Bluetooth adapter not ready (state ${noble.state})`));
      }, this.config.scanTimeout);
      const onStateChange = (state: string) => {
        if (state === 'poweredOn') {
          cleanup();
          resolve();
        }
      };
      const cleanup = () => {
        clearTimeout(timer);
        noble.removeListener('stateChange', onStateChange);
      };
      noble.on('stateChange', onStateChange);
    });
    return noble;
  }
}
