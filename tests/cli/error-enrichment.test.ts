/**
 * Error Enrichment Tests
 * Source snippets, name suggestions and stderr rendering
 */

import { describe, expect, it } from 'vitest';
import {
  enrichError,
  extractSnippet,
  formatEnrichedError,
  suggestSimilarNames,
} from '../../src/cli-error-enrichment.js';
import { parseFailure } from '../helpers/trees.js';

describe('extractSnippet', () => {
  it('returns the window around the error line', () => {
    expect(extractSnippet('a\nb\nc\nd\ne', 3, 1)).toEqual({
      lines: [
        { lineNumber: 2, content: 'b', isErrorLine: false },
        { lineNumber: 3, content: 'c', isErrorLine: true },
        { lineNumber: 4, content: 'd', isErrorLine: false },
      ],
    });
  });

  it('clamps the window to the source', () => {
    const { lines } = extractSnippet('a\nb', 1);
    expect(lines.map((l) => l.lineNumber)).toEqual([1, 2]);
  });

  it('returns no lines for empty sources and lines outside them', () => {
    expect(extractSnippet('', 1).lines).toEqual([]);
    expect(extractSnippet('a', 5).lines).toEqual([]);
    expect(extractSnippet('a', 0).lines).toEqual([]);
  });
});

describe('suggestSimilarNames', () => {
  it('orders by distance, then name', () => {
    expect(
      suggestSimilarNames('uper', ['upper', 'lower', 'print', 'super'])
    ).toEqual(['super', 'upper']);
  });

  it('returns at most three names', () => {
    expect(suggestSimilarNames('ab', ['a', 'b', 'abc', 'abd', 'x'])).toEqual([
      'a',
      'abc',
      'abd',
    ]);
  });

  it('returns nothing for an empty name', () => {
    expect(suggestSimilarNames('', ['a'])).toEqual([]);
  });
});

describe('enrichError', () => {
  const source = '<h1>\n{{uper .Title}}';

  it('suggests known functions for an undefined one', () => {
    const err = parseFailure(source, ['upper']);
    const enriched = enrichError(err, source, ['upper']);
    expect(enriched.suggestions).toEqual(['upper']);
    expect(formatEnrichedError(enriched)).toBe(
      [
        'template: t:2:function uper not defined',
        '  1 | <h1>',
        '> 2 | {{uper .Title}}',
        'Did you mean: upper',
      ].join('\n')
    );
  });

  it('omits suggestions when nothing is close', () => {
    const err = parseFailure(source, ['lowercase']);
    expect(enrichError(err, source, ['lowercase']).suggestions).toBeUndefined();
  });

  it('omits suggestions for other errors', () => {
    const text = '{{$upper}}';
    const enriched = enrichError(parseFailure(text), text, ['upper']);
    expect(enriched.suggestions).toBeUndefined();
    expect(formatEnrichedError(enriched)).toBe(
      'template: t:1:undefined variable $upper\n> 1 | {{$upper}}'
    );
  });
});
