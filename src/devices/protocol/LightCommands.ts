import { kelvinToRgb } from '../../core/color/kelvinToRgb';
import {
  ColorIntent,
  ControlMode,
  LedCommand,
  LedMode,
  ModelProfile,
  RGB
} from '../../core/types/LightTypes';
import { encodeFrame } from './FrameCodec';

export interface CommandPacket {
  command: LedCommand;
  payload: number[];
}

/**
 * What a color command actually puts on the wire, after the model's
 * temperature policy has been applied.
 */
export interface ResolvedColor {
  rgb: RGB;
  /** 0 when the temperature was approximated as RGB */
  kelvin: number;
}

export function powerPacket(on: boolean): CommandPacket {
  return { command: LedCommand.POWER, payload: [on ? 0x01 : 0x00] };
}

/**
 * Scales a 0-255 brightness to the model's native range.
 */
export function scaleBrightness(brightness: number, brightnessMax: number): number {
  return Math.floor((brightness * brightnessMax) / 255);
}

export function brightnessPacket(brightness: number, profile: ModelProfile): CommandPacket {
  return {
    command: LedCommand.BRIGHTNESS,
    payload: [scaleBrightness(brightness, profile.brightnessMax)]
  };
}

export function supportsNativeKelvin(profile: ModelProfile, kelvin: number): boolean {
  return (
    profile.temperatureEncoding === 'native' &&
    kelvin >= profile.minKelvin &&
    kelvin <= profile.maxKelvin
  );
}

export function resolveColor(color: ColorIntent, profile: ModelProfile): ResolvedColor {
  if (color.mode === ControlMode.COLOR) {
    return { rgb: color.rgb, kelvin: 0 };
  }
  if (supportsNativeKelvin(profile, color.kelvin)) {
    return { rgb: [0xff, 0xff, 0xff], kelvin: color.kelvin };
  }
  return { rgb: kelvinToRgb(color.kelvin), kelvin: 0 };
}

export function colorPayload(ledMode: LedMode, { rgb, kelvin }: ResolvedColor): number[] {
  const [red, green, blue] = rgb;
  const kelvinHigh = (kelvin >> 8) & 0xff;
  const kelvinLow = kelvin & 0xff;

  if (ledMode === LedMode.MODE_1501) {
    return [ledMode, 0x01, red, green, blue, kelvinHigh, kelvinLow, 0, 0, 0, 0xff, 0x74];
  }
  return [ledMode, red, green, blue, kelvinHigh, kelvinLow, 0, 0, 0];
}

export function colorPacket(color: ColorIntent, profile: ModelProfile): CommandPacket {
  return {
    command: LedCommand.COLOR,
    payload: colorPayload(profile.ledMode, resolveColor(color, profile))
  };
}

export function toFrame(packet: CommandPacket): Buffer {
  return encodeFrame(packet.command, packet.payload);
}
