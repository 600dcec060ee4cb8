// Types
export * from './core/types/LightTypes';

// Errors
export * from './core/errors/LightError';

// Protocol
export * from './devices/protocol/FrameCodec';
export * from './devices/protocol/LightCommands';
export { kelvinToRgb, MIN_KELVIN, MAX_KELVIN } from './core/color/kelvinToRgb';

// Models
export { ModelCatalog, ModelEntry, ModelTable, DEFAULT_MODEL, BUILTIN_MODELS_PATH } from './devices/models/ModelCatalog';

// Devices
export { LightDevice, LightDeviceOptions, DeviceTimings, DEFAULT_DEVICE_TIMINGS, FrameSentEvent } from './devices/LightDevice';
export * from './devices/transport/BleTransport';
export { NobleTransport } from './devices/transport/NobleTransport';
export { SimulatedTransport, SimulationConfig, ReceivedFrame } from './testing/SimulatedTransport';

// Scheduling
export * from './scheduler/ConnectionSlotPool';
export * from './scheduler/UpdateScheduler';
export * from './core/notify/ThrottledNotifier';
export { Mutex } from './utils/Mutex';

// Management
export { LightManager, LightManagerOptions } from './core/LightManager';
export * from './core/config/LightConfig';

// Utils
export { Logger, LoggerConfig, LogLevel } from './utils/Logger';
