import Ajv, { ErrorObject } from 'ajv';

export const ajv = new Ajv({ allErrors: true });

export interface ValidationResult {
  valid: boolean;
  issues: string[];
}

/**
 * Turns ajv errors into one readable line each.
 */
export function formatIssues(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map(error => {
    const path = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
    const params = error.params;
    switch (error.keyword) {
      case 'required':
        return `Missing required field: ${path ? path + '.' : ''}${String(params.missingProperty)}`;
      case 'type':
        return `Invalid type for ${path}: expected ${String(params.type)}`;
      case 'enum': {
        const allowed = Array.isArray(params.allowedValues) ? params.allowedValues.join(', ') : '';
        return `Invalid value for ${path}: must be one of [${allowed}]`;
      }
      case 'minimum':
        return `Invalid value for ${path}: must be at least ${String(params.limit)}`;
      case 'maximum':
        return `Invalid value for ${path}: must be at most ${String(params.limit)}`;
      case 'pattern':
        return `Invalid format for ${path}: must match pattern ${String(params.pattern)}`;
      case 'additionalProperties':
        return `Unknown field: ${path ? path + '.' : ''}${String(params.additionalProperty)}`;
      default:
        return `Validation error for ${path}: ${error.message}`;
    }
  });
}

const positiveInteger = { type: 'integer', minimum: 1 };
const nonNegativeInteger = { type: 'integer', minimum: 0 };

export const MAC_ADDRESS_PATTERN = '^[0-9A-Fa-f]{2}(:[0-9A-Fa-f]{2}){5}$';

function section(properties: Record<string, object>, required: boolean) {
  return {
    type: 'object',
    additionalProperties: false,
    properties,
    ...(required ? { required: Object.keys(properties).filter(key => key !== 'file') } : {})
  };
}

/**
 * Schema for the configuration file. With `required` false every field is
 * optional, which is how files are checked before defaults are applied.
 */
export function configSchema(required: boolean) {
  return {
    type: 'object',
    additionalProperties: false,
    properties: {
      scheduler: section({
        parallelism: positiveInteger,
        slotCapacity: positiveInteger,
        maxQueued: nonNegativeInteger,
        cancelAttempts: positiveInteger
      }, required),
      device: section({
        maxReconnectAttempts: nonNegativeInteger,
        reconnectBaseDelay: nonNegativeInteger,
        maxReconnectDelay: nonNegativeInteger,
        retryDelay: nonNegativeInteger,
        sendInterval: nonNegativeInteger,
        idleInterval: positiveInteger,
        pingInterval: positiveInteger,
        keepAliveTicks: nonNegativeInteger,
        maxSendsPerRun: positiveInteger
      }, required),
      notify: section({
        minDelay: nonNegativeInteger,
        maxDelay: nonNegativeInteger,
        perUpdatePenalty: nonNegativeInteger
      }, required),
      transport: section({
        controlCharacteristic: { type: 'string', minLength: 1 },
        scanTimeout: positiveInteger,
        connectAttempts: positiveInteger,
        writeWithoutResponse: { type: 'boolean' }
      }, required),
      logging: section({
        level: { type: 'string', enum: ['error', 'warn', 'info', 'debug', 'trace'] },
        file: { type: 'string', minLength: 1 }
      }, required),
      devices: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['address', 'model'],
          properties: {
            address: { type: 'string', pattern: MAC_ADDRESS_PATTERN },
            model: { type: 'string', minLength: 1 },
            name: { type: 'string', minLength: 1 }
          }
        }
      },
      modelsPath: { type: 'string', minLength: 1 }
    },
    ...(required ? { required: ['scheduler', 'device', 'notify', 'transport', 'logging', 'devices'] } : {})
  };
}

const modelEntryProperties = {
  ledMode: { type: 'string', enum: ['MODE_2', 'MODE_D', 'MODE_1501'] },
  brightnessMax: { type: 'integer', minimum: 1, maximum: 255 },
  minKelvin: { type: 'integer', minimum: 0, maximum: 65535 },
  maxKelvin: { type: 'integer', minimum: 0, maximum: 65535 },
  temperatureEncoding: { type: 'string', enum: ['native', 'rgb'] }
};

const modelEntrySchema = {
  type: 'object',
  additionalProperties: false,
  properties: modelEntryProperties
};

/**
 * Model table: `default` must be complete, other entries inherit from it.
 */
export function modelTableSchema(requireDefault: boolean) {
  return {
    type: 'object',
    additionalProperties: modelEntrySchema,
    properties: {
      default: requireDefault
        ? { ...modelEntrySchema, required: Object.keys(modelEntryProperties) }
        : modelEntrySchema
    },
    ...(requireDefault ? { required: ['default'] } : {})
  };
}
