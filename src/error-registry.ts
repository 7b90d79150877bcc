/**
 * Error Registry
 * Central error definition registry with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse' | 'check';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Template source demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TMPL-{category letter}{3-digit} (e.g., TMPL-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Parse Errors (TMPL-P0xx)
  {
    errorId: 'TMPL-P001',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'unexpected end of input in {context}',
    cause: 'The token stream ended while a construct was still open.',
    resolution:
      'Close every action with the right delimiter and every if, range, with, block and define with {{end}}.',
    examples: [
      { description: 'Missing {{end}}', code: '{{if .Ready}}go' },
      { description: 'Unfinished define', code: '{{define "x"}}body' },
    ],
  },
  {
    errorId: 'TMPL-P002',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'unexpected {token} in {context}',
    cause: 'A token appeared where the grammar does not allow it.',
    resolution:
      'Check the syntax of the construct named in the message; keywords such as define are only valid at top level.',
    examples: [
      { description: 'Keyword used as an operand', code: '{{.A if}}' },
      { description: 'Unquoted template name', code: '{{template main}}' },
    ],
  },
  {
    errorId: 'TMPL-P003',
    category: 'parse',
    description: 'Undefined function',
    messageTemplate: 'function {name} not defined',
    cause: 'An identifier is not in the set of known functions.',
    resolution:
      'Register the function name with the parser, or fix the spelling.',
    examples: [{ description: 'Unregistered eq', code: '{{if eq .A .B}}{{end}}' }],
  },
  {
    errorId: 'TMPL-P004',
    category: 'parse',
    description: 'Undefined variable',
    messageTemplate: 'undefined variable {name}',
    cause: 'A variable is used outside the scope of its declaration.',
    resolution:
      'Declare the variable first with $name := value. Variables declared in if, range or with end at {{end}}.',
    examples: [
      { description: 'Never declared', code: '{{$x}}' },
      {
        description: 'Used after its scope closed',
        code: '{{with $x := .}}{{end}}{{$x}}',
      },
    ],
  },
  {
    errorId: 'TMPL-P005',
    category: 'parse',
    description: 'Duplicate template definition',
    messageTemplate: 'multiple definition of template {name}',
    cause: 'Two non-empty templates share the same name.',
    resolution: 'Rename one of the definitions, or remove the duplicate.',
    examples: [
      {
        description: 'Same define twice',
        code: '{{define "a"}}1{{end}}{{define "a"}}2{{end}}',
      },
    ],
  },
  {
    errorId: 'TMPL-P006',
    category: 'parse',
    description: 'Malformed string literal',
    messageTemplate: 'unable to unquote string {text}',
    cause: 'A quoted string contains an invalid escape sequence.',
    resolution:
      'Use a valid escape (\\n, \\t, \\\\, \\", \\xHH, \\uHHHH) or a raw `string`.',
  },
  {
    errorId: 'TMPL-P007',
    category: 'parse',
    description: 'Malformed number literal',
    messageTemplate: '{reason}: {text}',
    cause:
      'A number or character constant cannot be decoded, or does not fit in 64 bits.',
    resolution: 'Fix the literal or pass large values as strings.',
    examples: [{ description: 'Too large', code: '{{99999999999999999999}}' }],
  },
  {
    errorId: 'TMPL-P008',
    category: 'parse',
    description: 'Too many declarations',
    messageTemplate: 'too many declarations in {context}',
    cause:
      'More than one variable was declared outside range, or more than two inside range.',
    resolution: 'Declare $index, $element only in range; elsewhere declare one variable.',
    examples: [
      { description: 'Two variables in if', code: '{{if $a, $b := .}}{{end}}' },
      {
        description: 'Three variables in range',
        code: '{{range $a, $b, $c := .}}{{end}}',
      },
    ],
  },
  {
    errorId: 'TMPL-P009',
    category: 'parse',
    description: 'Invalid range declaration',
    messageTemplate: 'range can only initialize variables',
    cause: 'The comma in a range declaration is not followed by a variable.',
    resolution: 'Write {{range $i, $e := pipeline}}.',
  },
  {
    errorId: 'TMPL-P010',
    category: 'parse',
    description: 'Non-executable pipeline stage',
    messageTemplate: 'non executable command in pipeline stage {stage}',
    cause:
      'A command after a | starts with a literal, dot or nil, which cannot receive the piped value.',
    resolution: 'Start every stage after the first with a function or method.',
    examples: [{ description: 'Literal stage', code: '{{. | "x"}}' }],
  },
  {
    errorId: 'TMPL-P011',
    category: 'parse',
    description: 'Missing pipeline value',
    messageTemplate: 'missing value for {context}',
    cause: 'A construct that needs a pipeline has none.',
    resolution: 'Add a value: {{if .Ready}}, {{range .Items}}.',
    examples: [{ description: 'Empty if', code: '{{if}}{{end}}' }],
  },
  {
    errorId: 'TMPL-P012',
    category: 'parse',
    description: 'Empty command',
    messageTemplate: 'empty command',
    cause: 'A pipeline stage contains no operands.',
    resolution: 'Remove the stray | or add an operand.',
  },
  {
    errorId: 'TMPL-P013',
    category: 'parse',
    description: 'Unclosed parenthesis',
    messageTemplate: 'unclosed right paren: unexpected {token}',
    cause: 'A parenthesized pipeline is not followed by ).',
    resolution: 'Balance the parentheses.',
  },
  {
    errorId: 'TMPL-P014',
    category: 'parse',
    description: 'Dynamic template name unsupported',
    messageTemplate: 'dynamic template names are not enabled',
    cause: '{{template (pipeline)}} was used without enabling dynamic names.',
    resolution: 'Pass dynamicTemplates: true, or use a quoted name.',
  },
  {
    errorId: 'TMPL-P015',
    category: 'parse',
    description: 'No active tree',
    messageTemplate: 'no active tree in {context}',
    cause: 'A parser routine ran without a tree being parsed (caller sequencing bug).',
    resolution: 'Start a tree before parsing a body.',
  },
  {
    errorId: 'TMPL-P016',
    category: 'parse',
    description: 'Lexical error',
    messageTemplate: '{detail}',
    cause: 'The token source reported an error token.',
    resolution: 'Fix the malformed input at the reported line.',
    examples: [
      { description: 'Unclosed action', code: 'Hello {{.Name' },
      { description: 'Unterminated string', code: '{{"abc}}' },
    ],
  },
  {
    errorId: 'TMPL-P017',
    category: 'parse',
    description: 'Field access on literal',
    messageTemplate: 'unexpected . after term {term}',
    cause: 'A .field was chained onto a literal, nil or dot.',
    resolution: 'Chain fields onto fields, variables or parenthesized pipelines.',
    examples: [{ description: 'Field on string', code: '{{"abc".Len}}' }],
  },
  {
    errorId: 'TMPL-P018',
    category: 'parse',
    description: 'Unexpected end or else',
    messageTemplate: 'unexpected {node}',
    cause: 'An {{end}} or {{else}} appeared without an open construct.',
    resolution: 'Remove it, or add the matching if, range, with or block.',
    examples: [{ description: 'Stray end', code: 'text{{end}}' }],
  },
  {
    errorId: 'TMPL-P019',
    category: 'parse',
    description: 'Expected end',
    messageTemplate: 'expected end; found {node}',
    cause: 'A second {{else}} appeared in the same construct.',
    resolution: 'Use {{else if ...}} chains or close with {{end}}.',
  },
  {
    errorId: 'TMPL-P020',
    category: 'parse',
    description: 'Lookahead overflow',
    messageTemplate: 'cannot push back more than {max} tokens',
    cause: 'The grammar pushed back more tokens than the lookahead buffer holds.',
    resolution: 'Internal parser error; report it with the template that triggered it.',
  },

  // Check Errors (TMPL-C0xx)
  {
    errorId: 'TMPL-C001',
    category: 'check',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'The checker configuration file is malformed.',
    resolution: 'Fix the reported field in .tmplcheck.yaml.',
  },
  {
    errorId: 'TMPL-C002',
    category: 'check',
    description: 'Unreadable template file',
    messageTemplate: '{reason}: {path}',
    cause: 'The template file does not exist or cannot be read.',
    resolution: 'Check the path and file permissions.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} with context values.
 * Missing placeholders render as empty strings.
 *
 * @example
 * renderMessage("function {name} not defined", {name: "eq"})
 * // Returns: "function eq not defined"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace - return template unchanged
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
