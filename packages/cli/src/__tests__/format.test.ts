import { describe, it, expect, vi } from 'vitest';

// Mock chalk to tag text with the styles applied, e.g. "[red]91.0%"
vi.mock('chalk', () => {
  const styled = (styles: string[]): unknown => {
    const handler: ProxyHandler<object> = {
      get(_target, prop) {
        if (prop === 'default') return styled(styles);
        return styled([...styles, String(prop)]);
      },
      apply(_target, _thisArg, args) {
        const text = String(args[0]);
        return styles.length > 0 ? `[${styles.join('.')}]${text}` : text;
      },
    };
    return new Proxy(function () {} as object, handler);
  };

  return { default: styled([]) };
});

import {
  colorPercent,
  formatBytes,
  formatCounter,
  formatFrequency,
  formatTemperature,
  formatTimestamp,
  formatUptime,
  formatVoltage,
} from '../utils/format.js';

describe('format utilities', () => {
  describe('colorPercent', () => {
    it('should show low usage in green', () => {
      expect(colorPercent(12.5)).toBe('[green]12.5%');
    });

    it('should show usage above 50% in yellow', () => {
      expect(colorPercent(50.5)).toBe('[yellow]50.5%');
    });

    it('should show usage above 80% in red', () => {
      expect(colorPercent(91)).toBe('[red]91.0%');
    });

    it('should show a dash for a missing reading', () => {
      expect(colorPercent(null)).toBe('[gray]-');
    });
  });

  describe('formatTemperature', () => {
    it('should format degrees with one decimal', () => {
      expect(formatTemperature(48.312)).toBe('[green]48.3°C');
    });

    it('should warn from 60°C and alert from 80°C', () => {
      expect(formatTemperature(60)).toBe('[yellow]60.0°C');
      expect(formatTemperature(82.5)).toBe('[red]82.5°C');
    });

    it('should show a dash when there is no sensor', () => {
      expect(formatTemperature(null)).toBe('[gray]-');
    });
  });

  describe('formatFrequency', () => {
    it('should use GHz from 1000 MHz', () => {
      expect(formatFrequency(1500)).toBe('1.50 GHz');
    });

    it('should use MHz below 1000', () => {
      expect(formatFrequency(600)).toBe('600 MHz');
    });

    it('should show a dash when unknown', () => {
      expect(formatFrequency(null)).toBe('[gray]-');
    });
  });

  describe('formatVoltage', () => {
    it('should show four decimals', () => {
      expect(formatVoltage(0.85)).toBe('0.8500 V');
    });

    it('should show a dash when unknown', () => {
      expect(formatVoltage(null)).toBe('[gray]-');
    });
  });

  describe('formatCounter', () => {
    it('should highlight non-zero counters', () => {
      expect(formatCounter(3)).toBe('[red]3');
      expect(formatCounter(0)).toBe('[gray]0');
    });
  });

  describe('formatTimestamp', () => {
    it('should format ISO strings and dates alike', () => {
      expect(formatTimestamp('2024-03-01T10:05:09.000Z')).toBe('2024-03-01 10:05:09');
      expect(formatTimestamp(new Date('2024-03-01T23:59:00.000Z'))).toBe('2024-03-01 23:59:00');
    });
  });

  describe('re-exported helpers', () => {
    it('should format bytes with two decimals', () => {
      expect(formatBytes(1536)).toBe('1.50 KB');
      expect(formatBytes(null)).toBe('0 B');
    });

    it('should format uptime', () => {
      expect(formatUptime(90_000)).toBe('1d 1h');
    });
  });
});
