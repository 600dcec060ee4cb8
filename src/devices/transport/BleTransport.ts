import { DeviceRef } from '../../core/types/LightTypes';

/**
 * An open link to one fixture. Owned by exactly one device at a time.
 */
export interface ConnectionHandle {
  readonly id: string;
  readonly address: string;
  readonly connectedAt: Date;
}

export type DisconnectListener = (handle: ConnectionHandle) => void;

/**
 * Radio boundary. Every failure is reported as a `TransientLinkError`.
 */
export interface BleTransport {
  connect(ref: DeviceRef, onDisconnect: DisconnectListener): Promise<ConnectionHandle>;
  write(handle: ConnectionHandle, frame: Buffer): Promise<void>;
  disconnect(handle: ConnectionHandle): Promise<void>;
}

export interface TransportConfig {
  /** Control characteristic UUID */
  controlCharacteristic: string;
  scanTimeout: number;
  connectAttempts: number;
  writeWithoutResponse: boolean;
}

export const CONTROL_CHARACTERISTIC_UUID = '00010203-0405-0607-0809-0a0b0c0d2b11';

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
  controlCharacteristic: CONTROL_CHARACTERISTIC_UUID,
  scanTimeout: 10000,
  connectAttempts: 3,
  writeWithoutResponse: false
};
