import { describe, it, expect, afterEach, vi } from 'vitest';
import { ProfileGenError, errors, formatError, handleError, isProfileGenError } from './errors.js';

describe('errors', () => {
  describe('ProfileGenError', () => {
    it('should carry code and suggestion', () => {
      const error = errors.outputExists('/tmp/profile');

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ProfileGenError');
      expect(error.code).toBe('OUTPUT_EXISTS');
      expect(error.suggestion).toBe('Use --force to regenerate into it, or choose another directory with --output.');
    });

    it('should format without color', () => {
      const error = new ProfileGenError('Something broke', 'UNKNOWN_ERROR', 'Try again');

      expect(error.format(false)).toBe('Error [UNKNOWN_ERROR]: Something broke\n\nSuggestion: Try again');
    });

    it('should omit the suggestion line when there is none', () => {
      expect(new ProfileGenError('Something broke', 'UNKNOWN_ERROR').format(false)).toBe(
        'Error [UNKNOWN_ERROR]: Something broke'
      );
    });

    it('should color the labels', () => {
      const formatted = new ProfileGenError('x', 'UNKNOWN_ERROR', 'y').format(true);

      expect(formatted).toBe('\x1b[31mError [UNKNOWN_ERROR]:\x1b[0m x\n\n\x1b[33mSuggestion:\x1b[0m y');
    });
  });

  describe('factories', () => {
    it('should name the collection of an unknown query type', () => {
      const error = errors.unknownQueryType('speed', ['items', 'position'], 'stations');

      expect(error.message).toBe(
        'Unknown query type "speed" in collection "stations": every query type must exist in the query-type catalog'
      );
      expect(error.suggestion).toBe('Supported query types: items, position');
    });

    it('should list only the non-empty include differences', () => {
      expect(errors.includeMismatch([], ['sections/a.adoc']).message).toBe(
        'Document include list does not match generated files; missing (included but not generated): "sections/a.adoc"'
      );
    });

    it('should append validation details on a new line', () => {
      expect(errors.invalidConfig('profile_config.yml', '  - title: Required').message).toBe(
        'Invalid profile configuration in profile_config.yml:\n  - title: Required'
      );
      expect(errors.invalidConfig('profile_config.yml').message).toBe(
        'Invalid profile configuration in profile_config.yml'
      );
    });
  });

  describe('isProfileGenError', () => {
    it('should distinguish profile errors from other values', () => {
      expect(isProfileGenError(errors.configNotFound('x.yml'))).toBe(true);
      expect(isProfileGenError(new Error('plain'))).toBe(false);
      expect(isProfileGenError('text')).toBe(false);
    });
  });

  describe('formatError', () => {
    it('should wrap unknown errors', () => {
      expect(formatError(new Error('disk full'), false)).toBe(
        'Error [UNKNOWN_ERROR]: An unexpected error occurred: disk full\n\n' +
          'Suggestion: Run again with --verbose for more details.'
      );
      expect(formatError('boom', false)).toContain('An unexpected error occurred: boom');
    });
  });

  describe('handleError', () => {
    afterEach(() => {
      process.exitCode = undefined;
      vi.restoreAllMocks();
    });

    it('should print the error and set a failing exit code', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      handleError(errors.configNotFound('missing.yml'));

      expect(spy).toHaveBeenCalledTimes(1);
      expect(String(spy.mock.calls[0][0])).toContain('Configuration file not found at missing.yml');
      expect(process.exitCode).toBe(1);
    });
  });
});
