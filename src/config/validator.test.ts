import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  ConfigValidationError,
  validateConfig,
  assertConfigValid,
  type PathChecker,
} from './validator.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should pass validation for the default config', () => {
      const result = validateConfig(DEFAULT_CONFIG);
      expect(result).toEqual({ valid: true, errors: [] });
    });

    describe('threshold validation', () => {
      it('should reject a threshold of exactly 1', () => {
        const config = parseConfig('[duplication]\nthreshold = 1.0\n');
        const result = validateConfig(config);

        expect(result.errors).toEqual([
          {
            field: 'duplication.threshold',
            value: 1,
            message: "Threshold 'duplication.threshold' must be greater than 0 and less than 1, got 1",
          },
        ]);
      });

      it('should reject a lead section threshold of exactly 1', () => {
        const config = parseConfig('[duplication]\nlead_section_threshold = 1\n');

        expect(validateConfig(config).errors.map((e) => e.field)).toEqual([
          'duplication.lead_section_threshold',
        ]);
      });

      it('should reject a zero threshold', () => {
        const config = parseConfig('[duplication]\nthreshold = 0.0\n');
        const result = validateConfig(config);

        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
          {
            field: 'duplication.threshold',
            value: 0,
            message: "Threshold 'duplication.threshold' must be greater than 0 and less than 1, got 0",
          },
        ]);
      });

      it('should reject a lead section threshold above 1', () => {
        const config = parseConfig('[duplication]\nlead_section_threshold = 1.5\n');
        const result = validateConfig(config);

        expect(result.errors.map((e) => e.field)).toEqual(['duplication.lead_section_threshold']);
      });

      it('should accept any threshold in (0, 1)', () => {
        fc.assert(
          fc.property(
            fc.double({ min: Number.MIN_VALUE, max: 1, maxExcluded: true, noNaN: true }),
            (threshold) => {
              const config = {
                ...DEFAULT_CONFIG,
                duplication: { ...DEFAULT_CONFIG.duplication, threshold },
              };
              expect(validateConfig(config).valid).toBe(true);
            }
          )
        );
      });
    });

    it('should reject a blank lead section', () => {
      const config = parseConfig('[duplication]\nlead_section = "  "\n');
      const result = validateConfig(config);

      expect(result.errors).toEqual([
        {
          field: 'duplication.lead_section',
          value: '  ',
          message: "'duplication.lead_section' must not be empty",
        },
      ]);
    });

    describe('path validation', () => {
      const config = parseConfig('[paths]\nrules = "/catalogs/rules.toml"\n');

      it('should skip path validation without a path checker', () => {
        expect(validateConfig(config).valid).toBe(true);
      });

      it('should pass when the rules file exists', () => {
        const checker: PathChecker = () => ({ exists: true, isDirectory: false });
        expect(validateConfig(config, { pathChecker: checker }).valid).toBe(true);
      });

      it('should report a missing rules file', () => {
        const checked: string[] = [];
        const checker: PathChecker = (path) => {
          checked.push(path);
          return { exists: false };
        };

        const result = validateConfig(config, { pathChecker: checker });

        expect(checked).toEqual(['/catalogs/rules.toml']);
        expect(result.errors[0]?.message).toBe("Path does not exist: '/catalogs/rules.toml'");
      });

      it('should use the checker error message when given', () => {
        const checker: PathChecker = () => ({ exists: false, errorMessage: 'Permission denied' });
        const result = validateConfig(config, { pathChecker: checker });

        expect(result.errors[0]?.message).toBe('Permission denied');
      });

      it('should reject a directory', () => {
        const checker: PathChecker = () => ({ exists: true, isDirectory: true });
        const result = validateConfig(config, { pathChecker: checker });

        expect(result.errors[0]?.message).toBe(
          "Path is a directory, expected a rule catalog file: '/catalogs/rules.toml'"
        );
      });

      it('should not call the checker when no rules path is set', () => {
        let calls = 0;
        const checker: PathChecker = () => {
          calls++;
          return { exists: false };
        };

        validateConfig(DEFAULT_CONFIG, { pathChecker: checker });

        expect(calls).toBe(0);
      });
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for a valid config', () => {
      expect(() => {
        assertConfigValid(DEFAULT_CONFIG);
      }).not.toThrow();
    });

    it('should throw ConfigValidationError listing every error', () => {
      const config = parseConfig(`
[duplication]
threshold = 2.0
lead_section = ""
`);

      try {
        assertConfigValid(config);
        expect.fail('Expected ConfigValidationError');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(2);
          expect(error.message).toBe(
            [
              'Configuration validation failed with 2 error(s):',
              "  - duplication.threshold: Threshold 'duplication.threshold' must be greater than 0 and less than 1, got 2",
              "  - duplication.lead_section: 'duplication.lead_section' must not be empty",
            ].join('\n')
          );
        }
      }
    });
  });
});
