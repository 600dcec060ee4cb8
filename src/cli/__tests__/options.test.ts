import { InvalidArgumentError } from 'commander';
import { ControlMode } from '../../core/types/LightTypes';
import { buildIntent, parseByte, parseInteger, parseRgb } from '../options';

describe('cli options', () => {
  describe('parseInteger', () => {
    test('should accept decimal and hex', () => {
      expect(parseInteger('42')).toBe(42);
      expect(parseInteger(' 7 ')).toBe(7);
      expect(parseInteger('0x1F')).toBe(31);
    });

    test('should refuse anything else', () => {
      expect(() => parseInteger('-1')).toThrow(InvalidArgumentError);
      expect(() => parseInteger('1.5')).toThrow('"1.5" is not an integer');
      expect(() => parseInteger('0xZZ')).toThrow('"0xZZ" is not an integer');
    });
  });

  describe('parseByte', () => {
    test('should refuse values above 255', () => {
      expect(parseByte('0xff')).toBe(255);
      expect(() => parseByte('256')).toThrow('256 does not fit in a byte');
    });
  });

  describe('parseRgb', () => {
    test('should split three channels', () => {
      expect(parseRgb('255,128,0')).toEqual([255, 128, 0]);
    });

    test('should refuse the wrong number of channels', () => {
      expect(() => parseRgb('255,128')).toThrow('Expected three comma-separated channels, e.g. 255,128,0');
      expect(() => parseRgb('255,128,300')).toThrow('300 does not fit in a byte');
    });
  });

  describe('buildIntent', () => {
    test('should combine power, brightness and color temperature', () => {
      expect(buildIntent({ on: true, brightness: 10, kelvin: 2700 })).toEqual({
        power: true,
        brightness: 10,
        color: { mode: ControlMode.TEMPERATURE, kelvin: 2700 }
      });
    });

    test('should map --off and --rgb', () => {
      expect(buildIntent({ off: true, rgb: [0, 0, 255] })).toEqual({
        power: false,
        color: { mode: ControlMode.COLOR, rgb: [0, 0, 255] }
      });
    });

    test('should keep a zero brightness', () => {
      expect(buildIntent({ brightness: 0 })).toEqual({ brightness: 0 });
    });

    test('should refuse conflicting flags', () => {
      expect(() => buildIntent({ on: true, off: true })).toThrow('--on and --off are mutually exclusive');
      expect(() => buildIntent({ rgb: [1, 2, 3], kelvin: 3000 })).toThrow('--rgb and --kelvin are mutually exclusive');
    });

    test('should refuse an empty intent', () => {
      expect(() => buildIntent({ dryRun: true, model: 'H6008' })).toThrow(/^Nothing to set/);
    });
  });
});
