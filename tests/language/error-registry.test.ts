/**
 * Error Registry Tests
 * Definitions, message rendering and documented examples
 */

import { describe, expect, it } from 'vitest';
import { ERROR_REGISTRY, renderMessage } from '../../src/index.js';
import { parseFailure } from '../helpers/trees.js';

describe('ERROR_REGISTRY', () => {
  it('holds twenty parse errors and two check errors', () => {
    const ids = [...ERROR_REGISTRY.entries()].map(([id]) => id);
    expect(ERROR_REGISTRY.size).toBe(22);
    expect(ids.filter((id) => id.startsWith('TMPL-P'))).toHaveLength(20);
    expect(ids.filter((id) => id.startsWith('TMPL-C'))).toEqual([
      'TMPL-C001',
      'TMPL-C002',
    ]);
  });

  it('keys each definition by its own id and category', () => {
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.errorId).toBe(id);
      expect(definition.category).toBe(
        id.startsWith('TMPL-P') ? 'parse' : 'check'
      );
    }
  });

  const examples = [...ERROR_REGISTRY.entries()].flatMap(([id, definition]) =>
    (definition.examples ?? []).map((example) => ({ id, ...example }))
  );

  it.each(examples)('$id: $description', ({ id, code }) => {
    expect(parseFailure(code).errorId).toBe(id);
  });
});

describe('renderMessage', () => {
  it('fills placeholders', () => {
    expect(renderMessage('function {name} not defined', { name: 'eq' })).toBe(
      'function eq not defined'
    );
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('a{x}b', {})).toBe('ab');
  });

  it('leaves a template with an unclosed brace unchanged', () => {
    expect(renderMessage('a {b', { b: 1 })).toBe('a {b');
  });
});
