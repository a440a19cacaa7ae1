/**
 * CLI Tests: Configuration Loading
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  loadConfig,
  parseConfig,
  validateConfig,
} from '../../src/cli-config.js';

describe('parseConfig', () => {
  it('reads every setting', () => {
    const text = [
      'domain: complex',
      'allowAssignment: false',
      'allowFreeVariables: true',
      'variables:',
      '  a: 2',
      '  b: -0.5',
      'constants:',
      '  tau: 6.283185307179586',
    ].join('\n');

    expect(parseConfig(text)).toEqual({
      domain: 'complex',
      allowAssignment: false,
      allowFreeVariables: true,
      variables: { a: 2, b: -0.5 },
      constants: { tau: 6.283185307179586 },
    });
  });

  it('treats an empty document as no settings', () => {
    expect(parseConfig('')).toEqual({});
    expect(parseConfig('# comments only\n')).toEqual({});
  });

  it('rejects invalid YAML', () => {
    expect(() => parseConfig('domain: [real')).toThrow(
      /^Invalid configuration: invalid YAML/
    );
  });
});

describe('validateConfig', () => {
  it('requires a mapping', () => {
    expect(() => validateConfig([1, 2])).toThrow(
      'Invalid configuration: must be a mapping'
    );
    expect(() => validateConfig('real')).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => validateConfig({ colour: 'red' })).toThrow(
      'Invalid configuration: unknown key colour'
    );
  });

  it('rejects unknown domains', () => {
    expect(() => validateConfig({ domain: 'quaternion' })).toThrow(
      `Invalid configuration: domain has invalid value "quaternion" (must be 'real' or 'complex')`
    );
  });

  it('rejects non-boolean flags', () => {
    expect(() => validateConfig({ allowAssignment: 'yes' })).toThrow(
      'Invalid configuration: allowAssignment must be a boolean'
    );
  });

  it('rejects non-numeric bindings', () => {
    expect(() => validateConfig({ variables: { a: 'two' } })).toThrow(
      'Invalid configuration: variables.a must be a number, got "two"'
    );
    expect(() => validateConfig({ constants: [1] })).toThrow(
      'Invalid configuration: constants must be a mapping'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'exprfold-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null when there is no configuration file', () => {
    expect(loadConfig(dir)).toBeNull();
  });

  it('reads the configuration file from the directory', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'allowFreeVariables: true\n');
    expect(loadConfig(dir)).toEqual({ allowFreeVariables: true });
  });

  it('reads an explicit path', () => {
    const path = join(dir, 'custom.yaml');
    writeFileSync(path, 'domain: complex\n');
    expect(loadConfig('/nonexistent', path)).toEqual({ domain: 'complex' });
  });

  it('fails when an explicit path does not exist', () => {
    expect(() => loadConfig(dir, join(dir, 'missing.yaml'))).toThrow(
      /^Invalid configuration: failed to read file/
    );
  });
});
