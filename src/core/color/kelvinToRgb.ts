import { RGB } from '../types/LightTypes';

export const MIN_KELVIN = 1000;
export const MAX_KELVIN = 40000;

function channel(value: number): number {
  return Math.round(Math.min(255, Math.max(0, value)));
}

/**
 * Approximates the RGB color of a black body at the given temperature
 * (Tanner Helland's fit). Input is clamped to 1000-40000 K.
 */
export function kelvinToRgb(kelvin: number): RGB {
  const clamped = Math.min(MAX_KELVIN, Math.max(MIN_KELVIN, kelvin));
  const temp = clamped / 100;

  let red: number;
  let green: number;
  let blue: number;

  if (temp <= 66) {
    red = 255;
    green = 99.4708025861 * Math.log(temp) - 161.1195681661;
  } else {
    red = 329.698727446 * Math.pow(temp - 60, -0.1332047592);
    green = 288.1221695283 * Math.pow(temp - 60, -0.0755148492);
  }

  if (temp >= 66) {
    blue = 255;
  } else if (temp <= 19) {
    blue = 0;
  } else {
    blue = 138.5177312231 * Math.log(temp - 10) - 305.0447927307;
  }

  return [channel(red), channel(green), channel(blue)];
}
