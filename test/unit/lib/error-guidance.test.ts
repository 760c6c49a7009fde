/**
 * Tests for error guidance pattern matching
 */

import { describe, it, expect } from '@jest/globals';
import { createErrorGuidanceBuilder, customPattern } from '@/lib/error-guidance';

describe('error-guidance', () => {
  describe('customPattern', () => {
    it('should use custom match function', () => {
      const pattern = customPattern((error) => error instanceof TypeError, {
        message: 'Type error occurred',
      });

      expect(pattern.match(new TypeError('Cannot read property'))).toBe(true);
      expect(pattern.match(new Error('Generic error'))).toBe(false);
      expect(pattern.guidance(new TypeError('x'))).toEqual({ message: 'Type error occurred' });
    });

    it('should build guidance from the error when given a function', () => {
      const pattern = customPattern(
        () => true,
        (error) => ({ message: `Wrapped: ${String(error)}` }),
      );

      expect(pattern.guidance('boom')).toEqual({ message: 'Wrapped: boom' });
    });
  });

  describe('createErrorGuidanceBuilder', () => {
    const timeout = customPattern((error) => String(error).includes('timed out'), {
      message: 'Timed out',
      resolution: 'Raise the timeout',
    });
    const any = customPattern(() => true, { message: 'Anything' });

    it('should return the first matching pattern', () => {
      const extract = createErrorGuidanceBuilder([timeout, any]);

      expect(extract('helm timed out')).toEqual({ message: 'Timed out', resolution: 'Raise the timeout' });
      expect(extract('other')).toEqual({ message: 'Anything' });
    });

    it('should use the supplied default when nothing matches', () => {
      const extract = createErrorGuidanceBuilder([timeout], (error) => ({
        message: `default: ${String(error)}`,
      }));

      expect(extract('boom')).toEqual({ message: 'default: boom' });
    });

    it('should fall back to generic guidance', () => {
      const extract = createErrorGuidanceBuilder([]);

      expect(extract(new Error('boom'))).toEqual({
        message: 'boom',
        hint: 'An unexpected error occurred',
        resolution: 'Check the error message and logs for more details',
      });
    });
  });
});
