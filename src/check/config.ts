/**
 * Configuration Loader for tmpl-check
 * Loads and validates .tmplcheck.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { createError } from '../types.js';
import type { CheckConfig, RuleState, Severity } from './types.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.tmplcheck.yaml';

const KNOWN_KEYS = new Set([
  'rules',
  'severity',
  'funcs',
  'dynamicTemplates',
  'leftDelim',
  'rightDelim',
]);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with all rules enabled.
 * Returns configuration where all known rules are set to 'on'.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const rule of VALIDATION_RULES) {
    rules[rule.code] = 'on';
    severity[rule.code] = rule.severity;
  }

  return { rules, severity };
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): Error {
  return createError('TMPL-C001', { reason });
}

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRules(value: unknown): Record<string, RuleState> {
  if (!isRecord(value)) {
    throw invalid('rules must be a mapping');
  }
  const rules: Record<string, RuleState> = {};
  for (const [code, state] of Object.entries(value)) {
    if (!isRuleState(state)) {
      throw invalid(
        `rule ${code} has invalid state "${String(state)}" (must be 'on', 'off', or 'warn')`
      );
    }
    rules[code] = state;
  }
  return rules;
}

function readSeverity(value: unknown): Record<string, Severity> {
  if (!isRecord(value)) {
    throw invalid('severity must be a mapping');
  }
  const severity: Record<string, Severity> = {};
  for (const [code, sev] of Object.entries(value)) {
    if (!isSeverity(sev)) {
      throw invalid(
        `rule ${code} has invalid severity "${String(sev)}" (must be 'error', 'warning', or 'info')`
      );
    }
    severity[code] = sev;
  }
  return severity;
}

function readFuncs(value: unknown): string[] {
  if (
    !Array.isArray(value) ||
    !value.every((name): name is string => typeof name === 'string')
  ) {
    throw invalid('funcs must be a list of names');
  }
  return value;
}

function readDelim(key: string, value: unknown): string {
  if (typeof value !== 'string' || value === '') {
    throw invalid(`${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Validate that all rule codes in config are known rules.
 */
function validateRuleCodes(config: CheckConfig): void {
  const knownRules = new Set(VALIDATION_RULES.map((r) => r.code));

  for (const code of [
    ...Object.keys(config.rules),
    ...Object.keys(config.severity),
  ]) {
    if (!knownRules.has(code)) {
      throw invalid(`unknown rule ${code}`);
    }
  }
}

/**
 * Build a CheckConfig from parsed YAML, merged over the defaults.
 * An empty document yields the defaults.
 *
 * @throws TemplateError TMPL-C001 when a field is malformed
 */
export function parseConfig(data: unknown): CheckConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }
  if (!isRecord(data)) {
    throw invalid('must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(`unknown key ${key}`);
    }
  }

  let config: CheckConfig = {
    rules: {
      ...defaults.rules,
      ...('rules' in data ? readRules(data['rules']) : {}),
    },
    severity: {
      ...defaults.severity,
      ...('severity' in data ? readSeverity(data['severity']) : {}),
    },
  };

  if ('funcs' in data) {
    config = { ...config, funcs: readFuncs(data['funcs']) };
  }
  if ('dynamicTemplates' in data) {
    const dynamicTemplates = data['dynamicTemplates'];
    if (typeof dynamicTemplates !== 'boolean') {
      throw invalid('dynamicTemplates must be true or false');
    }
    config = { ...config, dynamicTemplates };
  }
  if ('leftDelim' in data) {
    config = { ...config, leftDelim: readDelim('leftDelim', data['leftDelim']) };
  }
  if ('rightDelim' in data) {
    config = {
      ...config,
      rightDelim: readDelim('rightDelim', data['rightDelim']),
    };
  }

  validateRuleCodes(config);
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .tmplcheck.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns CheckConfig object, or null if file not found
 * @throws TemplateError "Invalid configuration: {reason}" on unreadable or malformed files
 */
export function loadConfig(cwd: string): CheckConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(parsedData);
}
