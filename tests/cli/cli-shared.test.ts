/**
 * CLI Shared Utilities Tests
 */

import { describe, expect, it } from 'vitest';
import { formatError, readVersion } from '../../src/cli-shared.js';
import { createError } from '../../src/index.js';
import { parseFailure } from '../helpers/trees.js';

describe('formatError', () => {
  it('prefixes parse errors', () => {
    expect(formatError(parseFailure('{{end}}'))).toBe(
      'Parse error: template: t:1:unexpected {{end}}'
    );
  });

  it('prints registry errors as they are', () => {
    const err = createError('TMPL-C002', {
      reason: 'File not found',
      path: 'page.tmpl',
    });
    expect(formatError(err)).toBe('File not found: page.tmpl');
  });

  it('names the path of a missing file', () => {
    const err = Object.assign(new Error('ENOENT: no such file'), {
      code: 'ENOENT',
      path: '/tmp/missing.tmpl',
    });
    expect(formatError(err)).toBe('File not found: /tmp/missing.tmpl');
  });

  it('falls back to the message', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
  });
});

describe('readVersion', () => {
  it('reads the package version', async () => {
    expect(await readVersion()).toBe('0.1.0');
  });
});
