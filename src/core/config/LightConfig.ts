import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname, resolve } from 'path';
import yaml from 'js-yaml';
import { DEFAULT_DEVICE_TIMINGS, DeviceTimings } from '../../devices/LightDevice';
import { DEFAULT_TRANSPORT_CONFIG, TransportConfig } from '../../devices/transport/BleTransport';
import { DEFAULT_SLOT_POOL_CONFIG } from '../../scheduler/ConnectionSlotPool';
import { DEFAULT_SCHEDULER_CONFIG } from '../../scheduler/UpdateScheduler';
import { LoggerConfig } from '../../utils/Logger';
import { ConfigurationError } from '../errors/LightError';
import { DEFAULT_THROTTLE_CONFIG, ThrottleConfig } from '../notify/ThrottledNotifier';
import { ValidationResult, ajv, configSchema, formatIssues } from './validation';

export const DEFAULT_CONFIG_FILE = 'lumenlink.yml';

export interface DeviceConfig {
  address: string;
  model: string;
  name?: string;
}

export interface SchedulerSettings {
  parallelism: number;
  slotCapacity: number;
  maxQueued: number;
  cancelAttempts: number;
}

export interface LumenConfig {
  scheduler: SchedulerSettings;
  device: DeviceTimings;
  notify: ThrottleConfig;
  transport: TransportConfig;
  logging: LoggerConfig;
  devices: DeviceConfig[];
  /** Model table merged over the built-in one */
  modelsPath?: string;
}

export interface PartialLumenConfig {
  scheduler?: Partial<SchedulerSettings>;
  device?: Partial<DeviceTimings>;
  notify?: Partial<ThrottleConfig>;
  transport?: Partial<TransportConfig>;
  logging?: Partial<LoggerConfig>;
  devices?: DeviceConfig[];
  modelsPath?: string;
}

export const DEFAULT_CONFIG: LumenConfig = {
  scheduler: {
    parallelism: DEFAULT_SCHEDULER_CONFIG.parallelism,
    slotCapacity: DEFAULT_SLOT_POOL_CONFIG.capacity,
    maxQueued: DEFAULT_SLOT_POOL_CONFIG.maxQueued,
    cancelAttempts: DEFAULT_SCHEDULER_CONFIG.cancelAttempts
  },
  device: { ...DEFAULT_DEVICE_TIMINGS },
  notify: { ...DEFAULT_THROTTLE_CONFIG },
  transport: { ...DEFAULT_TRANSPORT_CONFIG },
  logging: { level: 'info' },
  devices: []
};

const validatePartial = ajv.compile<PartialLumenConfig>(configSchema(false));
const validateComplete = ajv.compile<LumenConfig>(configSchema(true));

/**
 * Checks a raw configuration object, before defaults are applied.
 */
export function validateConfig(config: unknown): ValidationResult {
  if (validatePartial(config)) {
    return { valid: true, issues: [] };
  }
  return { valid: false, issues: formatIssues(validatePartial.errors) };
}

export function applyDefaults(config: PartialLumenConfig): LumenConfig {
  return {
    scheduler: { ...DEFAULT_CONFIG.scheduler, ...config.scheduler },
    device: { ...DEFAULT_CONFIG.device, ...config.device },
    notify: { ...DEFAULT_CONFIG.notify, ...config.notify },
    transport: { ...DEFAULT_CONFIG.transport, ...config.transport },
    logging: { ...DEFAULT_CONFIG.logging, ...config.logging },
    devices: (config.devices ?? []).map(device => ({ ...device, address: device.address.toUpperCase() })),
    ...(config.modelsPath ? { modelsPath: config.modelsPath } : {})
  };
}

function parseInteger(name: string, value: string, issues: string[]): number | undefined {
  if (!/^-?\d+$/.test(value.trim())) {
    issues.push(`Invalid value for ${name}: expected an integer, got "${value}"`);
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Overlays environment variables on a configuration with defaults applied.
 */
export function applyEnvironment(config: LumenConfig, env: NodeJS.ProcessEnv = process.env): LumenConfig {
  const issues: string[] = [];
  const result: LumenConfig = {
    ...config,
    scheduler: { ...config.scheduler },
    device: { ...config.device },
    logging: { ...config.logging }
  };

  if (env.LUMENLINK_PARALLELISM) {
    const value = parseInteger('LUMENLINK_PARALLELISM', env.LUMENLINK_PARALLELISM, issues);
    if (value !== undefined) result.scheduler.parallelism = value;
  }
  if (env.LUMENLINK_SLOT_CAPACITY) {
    const value = parseInteger('LUMENLINK_SLOT_CAPACITY', env.LUMENLINK_SLOT_CAPACITY, issues);
    if (value !== undefined) result.scheduler.slotCapacity = value;
  }
  if (env.LUMENLINK_MAX_RECONNECT_ATTEMPTS) {
    const value = parseInteger('LUMENLINK_MAX_RECONNECT_ATTEMPTS', env.LUMENLINK_MAX_RECONNECT_ATTEMPTS, issues);
    if (value !== undefined) result.device.maxReconnectAttempts = value;
  }
  if (env.LOG_LEVEL) {
    result.logging.level = env.LOG_LEVEL.toLowerCase();
  }
  if (env.LUMENLINK_LOG_FILE) {
    result.logging.file = env.LUMENLINK_LOG_FILE;
  }
  if (env.LUMENLINK_MODELS_PATH) {
    result.modelsPath = env.LUMENLINK_MODELS_PATH;
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid environment configuration', issues);
  }
  return result;
}

export async function readConfigFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read configuration ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    const parsed = extname(path).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
    // An empty YAML file means "all defaults"
    return parsed ?? {};
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Resolves which file to read: an explicit path, LUMENLINK_CONFIG, or
 * ./lumenlink.yml when it exists.
 */
export function resolveConfigPath(path?: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (path) {
    return resolve(path);
  }
  if (env.LUMENLINK_CONFIG) {
    return resolve(env.LUMENLINK_CONFIG);
  }
  const fallback = resolve(DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : undefined;
}

export async function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): Promise<LumenConfig> {
  const source = resolveConfigPath(path, env);
  const raw = source ? await readConfigFile(source) : {};

  if (!validatePartial(raw)) {
    throw new ConfigurationError(
      `Invalid configuration in ${source ?? 'defaults'}`,
      formatIssues(validatePartial.errors)
    );
  }

  const config = applyEnvironment(applyDefaults(raw), env);
  if (!validateComplete(config)) {
    throw new ConfigurationError('Invalid configuration', formatIssues(validateComplete.errors));
  }
  return config;
}
