/**
 * Command byte of a control frame.
 */
export enum LedCommand {
  POWER = 0x01,
  BRIGHTNESS = 0x04,
  COLOR = 0x05
}

/**
 * Color payload layout. Scene and microphone modes are not driven by lumenlink.
 */
export enum LedMode {
  MODE_2 = 0x02,
  MODE_D = 0x0d,
  /** Extended layout with the trailing `0xFF 0x74` bytes */
  MODE_1501 = 0x15
}

export enum ControlMode {
  COLOR = 'color',
  TEMPERATURE = 'temperature'
}

export type TemperatureEncoding = 'native' | 'rgb';

export type RGB = [number, number, number];

export type ColorIntent =
  | { mode: ControlMode.COLOR; rgb: RGB }
  | { mode: ControlMode.TEMPERATURE; kelvin: number };

export interface LightIntent {
  power?: boolean;
  /** 0-255, scaled to the model's native range on the wire */
  brightness?: number;
  color?: ColorIntent;
}

export interface ModelProfile {
  model: string;
  ledMode: LedMode;
  brightnessMax: number;
  minKelvin: number;
  maxKelvin: number;
  temperatureEncoding: TemperatureEncoding;
}

export interface DeviceRef {
  address: string;
  name: string;
  model: string;
}

export enum DeviceState {
  IDLE = 'idle',
  QUEUED = 'queued',
  CONNECTING = 'connecting',
  SENDING = 'sending',
  KEEP_ALIVE = 'keep_alive',
  DISCONNECTING = 'disconnecting'
}

export enum ConnectionStatus {
  DISCONNECTED = 'Disconnected',
  ESTABLISHING = 'Establishing',
  CONNECTED = 'Connected',
  FAILED = 'Failed to connect'
}

export type IntentCategory = 'power' | 'brightness' | 'color';

export interface DeviceSnapshot {
  address: string;
  name: string;
  model: string;
  state: DeviceState;
  connectionStatus: ConnectionStatus;
  available: boolean;
  power?: boolean;
  brightness?: number;
  rgb?: RGB;
  kelvin?: number;
  controlMode?: ControlMode;
  dirty: Record<IntentCategory, boolean>;
  reconnectAttempts: number;
  pingCounter: number;
  lastTrafficTime?: Date;
  lastConnectionAttempt?: Date;
  lastPacketAttempt?: Date;
}

export enum DeviceEventType {
  STATE_CHANGED = 'stateChanged',
  CONNECTION_STATUS = 'connectionStatus',
  UNAVAILABLE = 'unavailable',
  FRAME_SENT = 'frameSent'
}
