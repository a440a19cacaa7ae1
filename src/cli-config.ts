/**
 * Configuration Loader for exprfold
 * Loads and validates .exprfold.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { NumericDomain } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.exprfold.yaml';

// ============================================================
// TYPES
// ============================================================

/** Session settings read from a configuration file */
export interface CliConfig {
  domain?: NumericDomain | undefined;
  allowAssignment?: boolean | undefined;
  allowFreeVariables?: boolean | undefined;
  /** Initial variable bindings */
  variables?: Record<string, number> | undefined;
  /** Replaces the built-in constants (pi, e) */
  constants?: Record<string, number> | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDomain(value: unknown): value is NumericDomain {
  return value === 'real' || value === 'complex';
}

function validateBoolean(config: Record<string, unknown>, key: string): void {
  if (key in config && typeof config[key] !== 'boolean') {
    throw new Error(`Invalid configuration: ${key} must be a boolean`);
  }
}

function validateNumberTable(
  value: unknown,
  key: string
): asserts value is Record<string, number> {
  if (!isRecord(value)) {
    throw new Error(`Invalid configuration: ${key} must be a mapping`);
  }
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'number') {
      throw new Error(
        `Invalid configuration: ${key}.${name} must be a number, got ${JSON.stringify(entry)}`
      );
    }
  }
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
export function validateConfig(data: unknown): CliConfig {
  // An empty file parses as null
  if (data === null || data === undefined) {
    return {};
  }

  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const known = new Set([
    'domain',
    'allowAssignment',
    'allowFreeVariables',
    'variables',
    'constants',
  ]);
  for (const key of Object.keys(data)) {
    if (!known.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const config: CliConfig = {};

  if ('domain' in data) {
    const domain = data['domain'];
    if (!isDomain(domain)) {
      throw new Error(
        `Invalid configuration: domain has invalid value "${String(domain)}" (must be 'real' or 'complex')`
      );
    }
    config.domain = domain;
  }

  validateBoolean(data, 'allowAssignment');
  validateBoolean(data, 'allowFreeVariables');
  const allowAssignment = data['allowAssignment'];
  const allowFreeVariables = data['allowFreeVariables'];
  if (typeof allowAssignment === 'boolean') {
    config.allowAssignment = allowAssignment;
  }
  if (typeof allowFreeVariables === 'boolean') {
    config.allowFreeVariables = allowFreeVariables;
  }

  if ('variables' in data) {
    const variables = data['variables'];
    validateNumberTable(variables, 'variables');
    config.variables = variables;
  }

  if ('constants' in data) {
    const constants = data['constants'];
    validateNumberTable(constants, 'constants');
    config.constants = constants;
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from a YAML file.
 *
 * Without an explicit path, looks for .exprfold.yaml in `cwd` and returns
 * null when there is none. An explicit path must exist.
 *
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string, path?: string): CliConfig | null {
  const configPath = path ?? join(cwd, CONFIG_FILE_NAME);

  if (path === undefined && !existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent);
}

/** Parse and validate YAML configuration text */
export function parseConfig(text: string): CliConfig {
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(text);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(parsedData);
}
