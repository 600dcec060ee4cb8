import { InvalidArgumentError } from 'commander';
import { ColorIntent, ControlMode, LightIntent, RGB } from '../core/types/LightTypes';

export interface SetOptions {
  model?: string;
  on?: boolean;
  off?: boolean;
  brightness?: number;
  rgb?: RGB;
  kelvin?: number;
  dryRun?: boolean;
}

/**
 * Decimal or 0x-prefixed hex.
 */
export function parseInteger(value: string): number {
  const text = value.trim();
  if (/^0x[0-9a-f]+$/i.test(text)) {
    return parseInt(text.slice(2), 16);
  }
  if (/^\d+$/.test(text)) {
    return parseInt(text, 10);
  }
  throw new InvalidArgumentError(`"${value}" is not an integer`);
}

export function parseByte(value: string): number {
  const parsed = parseInteger(value);
  if (parsed > 255) {
    throw new InvalidArgumentError(`${parsed} does not fit in a byte`);
  }
  return parsed;
}

export function parseRgb(value: string): RGB {
  const parts = value.split(',');
  if (parts.length !== 3) {
    throw new InvalidArgumentError('Expected three comma-separated channels, e.g. 255,128,0');
  }
  const [red, green, blue] = parts.map(parseByte);
  return [red, green, blue];
}

/**
 * Turns `set` flags into an intent; conflicting or missing flags are refused.
 */
export function buildIntent(options: SetOptions): LightIntent {
  if (options.on && options.off) {
    throw new InvalidArgumentError('--on and --off are mutually exclusive');
  }
  if (options.rgb && options.kelvin !== undefined) {
    throw new InvalidArgumentError('--rgb and --kelvin are mutually exclusive');
  }

  const intent: LightIntent = {};
  if (options.on) {
    intent.power = true;
  } else if (options.off) {
    intent.power = false;
  }
  if (options.brightness !== undefined) {
    intent.brightness = options.brightness;
  }

  let color: ColorIntent | undefined;
  if (options.rgb) {
    color = { mode: ControlMode.COLOR, rgb: options.rgb };
  } else if (options.kelvin !== undefined) {
    color = { mode: ControlMode.TEMPERATURE, kelvin: options.kelvin };
  }
  if (color) {
    intent.color = color;
  }

  if (Object.keys(intent).length === 0) {
    throw new InvalidArgumentError('Nothing to set: pass --on, --off, --brightness, --rgb or --kelvin');
  }
  return intent;
}
