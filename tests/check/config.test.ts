/**
 * Configuration Tests
 * parseConfig validation and .tmplcheck.yaml loading
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../../src/check/index.js';

describe('createDefaultConfig', () => {
  it('enables every rule at its default severity', () => {
    expect(createDefaultConfig()).toEqual({
      rules: { UNDEFINED_TEMPLATE: 'on', UNUSED_VARIABLE: 'on' },
      severity: { UNDEFINED_TEMPLATE: 'error', UNUSED_VARIABLE: 'warning' },
    });
  });
});

describe('parseConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseConfig(null)).toEqual(createDefaultConfig());
    expect(parseConfig(undefined)).toEqual(createDefaultConfig());
  });

  it('merges every setting over the defaults', () => {
    expect(
      parseConfig({
        rules: { UNUSED_VARIABLE: 'off' },
        funcs: ['len'],
        dynamicTemplates: true,
        leftDelim: '<%',
        rightDelim: '%>',
      })
    ).toEqual({
      rules: { UNDEFINED_TEMPLATE: 'on', UNUSED_VARIABLE: 'off' },
      severity: { UNDEFINED_TEMPLATE: 'error', UNUSED_VARIABLE: 'warning' },
      funcs: ['len'],
      dynamicTemplates: true,
      leftDelim: '<%',
      rightDelim: '%>',
    });
  });

  it.each([
    [[], 'must be a mapping'],
    [{ colour: 'red' }, 'unknown key colour'],
    [{ rules: 'all' }, 'rules must be a mapping'],
    [
      { rules: { UNUSED_VARIABLE: 'maybe' } },
      `rule UNUSED_VARIABLE has invalid state "maybe" (must be 'on', 'off', or 'warn')`,
    ],
    [{ severity: ['error'] }, 'severity must be a mapping'],
    [
      { severity: { UNUSED_VARIABLE: 'loud' } },
      `rule UNUSED_VARIABLE has invalid severity "loud" (must be 'error', 'warning', or 'info')`,
    ],
    [{ funcs: ['len', 1] }, 'funcs must be a list of names'],
    [{ dynamicTemplates: 'yes' }, 'dynamicTemplates must be true or false'],
    [{ leftDelim: '' }, 'leftDelim must be a non-empty string'],
    [{ rules: { NO_SUCH_RULE: 'on' } }, 'unknown rule NO_SUCH_RULE'],
  ])('rejects %j', (data, reason) => {
    expect(() => parseConfig(data)).toThrow(`Invalid configuration: ${reason}`);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tmplcheck-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null without a config file', () => {
    expect(loadConfig(dir)).toBeNull();
  });

  it('reads YAML settings', () => {
    writeFileSync(
      join(dir, CONFIG_FILE_NAME),
      'rules:\n  UNUSED_VARIABLE: warn\nfuncs: [len, printf]\n'
    );
    const config = loadConfig(dir);
    expect(config?.rules['UNUSED_VARIABLE']).toBe('warn');
    expect(config?.funcs).toEqual(['len', 'printf']);
  });

  it('treats an empty file as the defaults', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), '');
    expect(loadConfig(dir)).toEqual(createDefaultConfig());
  });

  it('reports malformed YAML', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'rules: [unclosed\n');
    expect(() => loadConfig(dir)).toThrow('Invalid configuration: invalid YAML (');
  });

  it('reports unreadable files', () => {
    mkdirSync(join(dir, CONFIG_FILE_NAME));
    expect(() => loadConfig(dir)).toThrow('Invalid configuration: failed to read file (');
  });
});
