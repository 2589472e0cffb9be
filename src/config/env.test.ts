/**
 * Tests for environment variable overrides.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { DEFAULT_CONFIG } from './defaults.js';
import {
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
  resolveConfig,
} from './env.js';

describe('readEnvOverrides', () => {
  it('returns no overrides for an empty environment', () => {
    expect(readEnvOverrides({})).toEqual({ overrides: {}, appliedVars: [], errors: [] });
  });

  it('reads every supported variable', () => {
    const result = readEnvOverrides({
      TOMLRAIDER_FORMAT: 'json',
      TOMLRAIDER_QUIET: 'yes',
      TOMLRAIDER_DEBUG: 'off',
      MESON_SOURCE_ROOT: '/src/project',
    });
    expect(result.overrides).toEqual({
      format: 'json',
      quiet: true,
      debug: false,
      projectRoot: '/src/project',
    });
    expect(result.appliedVars).toEqual([
      'TOMLRAIDER_FORMAT',
      'TOMLRAIDER_QUIET',
      'TOMLRAIDER_DEBUG',
      'MESON_SOURCE_ROOT',
    ]);
  });

  it('normalizes format names', () => {
    expect(readEnvOverrides({ TOMLRAIDER_FORMAT: ' Shell ' }).overrides.format).toBe('shell');
  });

  it('ignores empty values', () => {
    expect(readEnvOverrides({ TOMLRAIDER_QUIET: '', MESON_SOURCE_ROOT: '' }).appliedVars).toEqual(
      []
    );
  });

  it('ignores unrelated variables', () => {
    expect(readEnvOverrides({ HOME: '/root', TOMLRAIDER_OTHER: '1' }).overrides).toEqual({});
  });

  it('throws EnvCoercionError for invalid booleans', () => {
    expect(() => readEnvOverrides({ TOMLRAIDER_DEBUG: 'maybe' })).toThrow(EnvCoercionError);
    expect(() => readEnvOverrides({ TOMLRAIDER_DEBUG: 'maybe' })).toThrow(
      "Cannot coerce 'TOMLRAIDER_DEBUG' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
    );
  });

  it('throws EnvCoercionError for unknown formats', () => {
    expect(() => readEnvOverrides({ TOMLRAIDER_FORMAT: 'yaml' })).toThrow(
      "Invalid value for 'TOMLRAIDER_FORMAT': expected one of text, json, shell, got 'yaml'"
    );
  });

  it('collects errors and keeps valid overrides when asked to', () => {
    const result = readEnvOverrides(
      { TOMLRAIDER_FORMAT: 'yaml', TOMLRAIDER_QUIET: 'true' },
      { collectErrors: true }
    );
    expect(result.overrides).toEqual({ quiet: true });
    expect(result.errors).toHaveLength(1);
    const [error] = result.errors;
    expect(error?.envVar).toBe('TOMLRAIDER_FORMAT');
    expect(error?.rawValue).toBe('yaml');
    expect(error?.expectedType).toBe('format');
  });

  it('accepts every boolean spelling in any case (property-based)', () => {
    const spellings = ['true', '1', 'yes', 'on', 'false', '0', 'no', 'off'];
    fc.assert(
      fc.property(fc.constantFrom(...spellings), fc.boolean(), (spelling, upper) => {
        const value = upper ? spelling.toUpperCase() : spelling;
        const expected = spellings.indexOf(spelling) < 4;
        expect(readEnvOverrides({ TOMLRAIDER_QUIET: value }).overrides.quiet).toBe(expected);
      })
    );
  });
});

describe('resolveConfig', () => {
  it('returns the defaults without flags or environment', () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it('lets the environment override defaults', () => {
    expect(resolveConfig({}, { TOMLRAIDER_FORMAT: 'shell' }).format).toBe('shell');
  });

  it('lets flags override the environment', () => {
    const config = resolveConfig(
      { format: 'json', quiet: false },
      { TOMLRAIDER_FORMAT: 'shell', TOMLRAIDER_QUIET: 'true', TOMLRAIDER_DEBUG: '1' }
    );
    expect(config).toEqual({ format: 'json', quiet: false, debug: true });
  });

  it('does not modify the defaults', () => {
    resolveConfig({ debug: true }, {});
    expect(DEFAULT_CONFIG.debug).toBe(false);
  });
});

describe('getEnvVarDocumentation', () => {
  it('documents every variable with its type', () => {
    const docs = getEnvVarDocumentation();
    expect(Object.keys(docs)).toEqual([
      'TOMLRAIDER_FORMAT',
      'TOMLRAIDER_QUIET',
      'TOMLRAIDER_DEBUG',
      'MESON_SOURCE_ROOT',
    ]);
    expect(docs.MESON_SOURCE_ROOT?.type).toBe('string');
  });
});
