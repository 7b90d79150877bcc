/**
 * CLI Error Enrichment
 * Functions for extracting source snippets and suggesting similar names
 */

import type { ParseError } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface EnrichedError {
  readonly errorId: string;
  readonly message: string;
  readonly line: number;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: string[] | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around an error line.
 *
 * Lines are 1-based; the window is clamped to the source.
 * An empty source or a line outside it yields no lines.
 */
export function extractSnippet(
  source: string,
  line: number,
  contextLines: number = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [] };
  }

  const lines = source.split('\n');
  if (line < 1 || line > lines.length) {
    return { lines: [] };
  }

  const firstLine = Math.max(1, line - contextLines);
  const lastLine = Math.min(lines.length, line + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippetLines.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '',
      isErrorLine: lineNum === line,
    });
  }

  return { lines: snippetLines };
}

// ============================================================
// NAME SUGGESTION
// ============================================================

/**
 * Find similar names using fuzzy matching.
 *
 * Constraints:
 * - Edit distance threshold: <= 2
 * - Max suggestions: 3
 * - Sort: ascending by distance, then alphabetically
 */
export function suggestSimilarNames(
  target: string,
  candidates: Iterable<string>
): string[] {
  if (target === '') {
    return [];
  }

  const candidatesWithDistance = [...candidates]
    .map((candidate) => ({
      name: candidate,
      distance: levenshteinDistance(target, candidate),
    }))
    .filter((item) => item.distance <= 2);

  candidatesWithDistance.sort((a, b) => {
    if (a.distance !== b.distance) {
      return a.distance - b.distance;
    }
    return a.name.localeCompare(b.name);
  });

  return candidatesWithDistance.slice(0, 3).map((item) => item.name);
}

/**
 * Levenshtein distance with a rolling row.
 */
function levenshteinDistance(a: string, b: string): number {
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;
  if (m === 0) return n;

  let prevRow = Array.from({ length: m + 1 }, (_, i) => i);
  let currRow = new Array<number>(m + 1).fill(0);

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;

    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1, // deletion
        (currRow[i - 1] ?? 0) + 1, // insertion
        (prevRow[i - 1] ?? 0) + cost // substitution
      );
    }

    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m] ?? 0;
}

// ============================================================
// ERROR ENRICHMENT
// ============================================================

/**
 * Attach a source snippet and, for undefined functions, similar known names.
 *
 * @param funcs - Function names the parse accepted
 */
export function enrichError(
  error: ParseError,
  source: string,
  funcs: Iterable<string> = []
): EnrichedError {
  const snippet = extractSnippet(source, error.line);

  let suggestions: string[] | undefined;
  const name = error.context?.['name'];
  if (error.errorId === 'TMPL-P003' && typeof name === 'string') {
    const similar = suggestSimilarNames(name, funcs);
    if (similar.length > 0) {
      suggestions = similar;
    }
  }

  return {
    errorId: error.errorId,
    message: error.message,
    line: error.line,
    sourceSnippet: snippet.lines.length > 0 ? snippet : undefined,
    suggestions,
  };
}

/**
 * Render an enriched error for stderr:
 *
 * ```
 * template: page:2:function uper not defined
 *   1 | <h1>
 * > 2 | {{uper .Title}}
 * Did you mean: upper
 * ```
 */
export function formatEnrichedError(error: EnrichedError): string {
  const lines = [error.message];

  if (error.sourceSnippet) {
    const width = String(
      error.sourceSnippet.lines.at(-1)?.lineNumber ?? error.line
    ).length;
    for (const line of error.sourceSnippet.lines) {
      const marker = line.isErrorLine ? '>' : ' ';
      const number = String(line.lineNumber).padStart(width, ' ');
      lines.push(`${marker} ${number} | ${line.content}`);
    }
  }

  if (error.suggestions) {
    lines.push(`Did you mean: ${error.suggestions.join(', ')}`);
  }

  return lines.join('\n');
}
