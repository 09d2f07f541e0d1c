import { describe, it, expect } from 'vitest';
import { ConfigError } from '@eskema/core';
import {
  parseFormatOptions,
  resolveColor,
  resolveExportName,
  resolveOutputFormat,
} from '../flags.js';

describe('CLI flag helpers', () => {
  describe('resolveOutputFormat', () => {
    it('defaults to text', () => {
      expect(resolveOutputFormat(undefined)).toBe('text');
      expect(resolveOutputFormat('')).toBe('text');
    });

    it('accepts known formats case-insensitively', () => {
      expect(resolveOutputFormat('JSON')).toBe('json');
      expect(resolveOutputFormat('text')).toBe('text');
    });

    it('rejects unknown formats with a ConfigError', () => {
      expect(() => resolveOutputFormat('yaml')).toThrow(ConfigError);
      expect(() => resolveOutputFormat('yaml')).toThrow(
        'Invalid --format value "yaml". Supported formats are "text" and "json".'
      );
    });
  });

  describe('parseFormatOptions', () => {
    it('falls back to the library defaults', () => {
      expect(parseFormatOptions({})).toEqual({
        maxValueLength: 120,
        maxErrorsToList: 20,
      });
    });

    it('parses numeric strings from the command line', () => {
      expect(
        parseFormatOptions({ maxErrors: '3', maxValueLength: '40' })
      ).toEqual({ maxValueLength: 40, maxErrorsToList: 3 });
    });

    it('throws on non-positive values', () => {
      expect(() => parseFormatOptions({ maxErrors: '0' })).toThrow(
        /Invalid --max-errors value "0"/
      );
      expect(() => parseFormatOptions({ maxValueLength: '1.5' })).toThrow(
        /Invalid --max-value-length/
      );
    });

    it('names the offending setting on the error', () => {
      try {
        parseFormatOptions({ maxErrors: 'many' });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.setting).toBe('max-errors');
          expect(err.getExitCode()).toBe(50);
        }
      }
    });
  });

  describe('resolveExportName', () => {
    it('defaults to the default export', () => {
      expect(resolveExportName(undefined)).toBe('default');
    });

    it('keeps identifiers and rejects anything else', () => {
      expect(resolveExportName(' userSchema ')).toBe('userSchema');
      expect(() => resolveExportName('user-schema')).toThrow(
        /Expected an identifier/
      );
    });
  });

  describe('resolveColor', () => {
    it('colors only a terminal', () => {
      expect(resolveColor(true, true)).toBe(true);
      expect(resolveColor(undefined, true)).toBe(true);
      expect(resolveColor(true, false)).toBe(false);
      expect(resolveColor(true, undefined)).toBe(false);
    });

    it('honours --no-color on a terminal', () => {
      expect(resolveColor(false, true)).toBe(false);
    });
  });
});
