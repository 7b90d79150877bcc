import type { SourceLocation } from './source-location.js';

interface BaseNode {
  /** Id of the tree that owns this node */
  readonly treeId: number;
  readonly pos: SourceLocation;
}

// ============================================================
// STRUCTURE
// ============================================================

/** Ordered sequence of text and action nodes: the body of a tree or construct. */
export interface ListNode extends BaseNode {
  readonly type: 'List';
  readonly nodes: ItemNode[];
}

/** Literal text between actions. */
export interface TextNode extends BaseNode {
  readonly type: 'Text';
  readonly text: string;
}

/**
 * Action: {{pipeline}}
 * A bare pipeline whose value is printed, or a declaration such as {{$x := .}}.
 */
export interface ActionNode extends BaseNode {
  readonly type: 'Action';
  readonly pipe: PipeNode;
}

// ============================================================
// CONTROL CONSTRUCTS
// ============================================================

interface BranchNode extends BaseNode {
  readonly pipe: PipeNode;
  readonly list: ListNode;
  /** null when the construct has no {{else}} */
  readonly elseList: ListNode | null;
}

/**
 * {{if pipeline}} list {{else}} list {{end}}
 * An {{else if ...}} chain is an elseList holding a single nested IfNode.
 */
export interface IfNode extends BranchNode {
  readonly type: 'If';
}

/** {{range pipeline}} list {{else}} list {{end}} */
export interface RangeNode extends BranchNode {
  readonly type: 'Range';
}

/** {{with pipeline}} list {{else}} list {{end}} */
export interface WithNode extends BranchNode {
  readonly type: 'With';
}

/**
 * Template invocation: {{template "name" pipeline}}
 * Also produced by {{block}}, which defines the named tree elsewhere.
 * `name` is a PipeNode only for dynamic names: {{template (.Name) .}}
 */
export interface TemplateNode extends BaseNode {
  readonly type: 'Template';
  readonly name: string | PipeNode;
  readonly pipe: PipeNode | null;
}

/** {{end}}: terminator only, never stored in a tree. */
export interface EndNode extends BaseNode {
  readonly type: 'End';
}

/** {{else}}: terminator only, never stored in a tree. */
export interface ElseNode extends BaseNode {
  readonly type: 'Else';
}

// ============================================================
// PIPELINES
// ============================================================

/**
 * Pipeline: optional declaration followed by |-separated commands.
 * - .Name | printf "%s"
 * - $x := .Items
 * - $i, $e := .Items   (range only)
 */
export interface PipeNode extends BaseNode {
  readonly type: 'Pipe';
  readonly decl: VariableNode[];
  readonly cmds: CommandNode[];
}

/** Space-separated operands: a function and its arguments, or a single value. */
export interface CommandNode extends BaseNode {
  readonly type: 'Command';
  readonly args: OperandNode[];
}

// ============================================================
// OPERANDS
// ============================================================

/** Field chain rooted at dot: .a.b → ['a', 'b'] */
export interface FieldNode extends BaseNode {
  readonly type: 'Field';
  readonly ident: string[];
}

/** Variable with optional field chain: $x.a → ['$x', 'a'] */
export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly ident: string[];
}

/** Field chain on any other term: (pipeline).a.b */
export interface ChainNode extends BaseNode {
  readonly type: 'Chain';
  readonly node: OperandNode;
  readonly field: string[];
}

/** Function name. Only names from the known-function set parse. */
export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly ident: string;
}

export interface BoolNode extends BaseNode {
  readonly type: 'Bool';
  readonly value: boolean;
}

/**
 * Numeric or character constant.
 * A literal may satisfy several interpretations at once: 1 is int, uint and float.
 */
export interface NumberNode extends BaseNode {
  readonly type: 'Number';
  /** Source text as written */
  readonly text: string;
  readonly isInt: boolean;
  readonly isUint: boolean;
  readonly isFloat: boolean;
  /** True for character constants ('a') */
  readonly isChar: boolean;
  /** Set when isInt or isUint */
  readonly intValue: bigint | null;
  /** Set when isFloat */
  readonly floatValue: number | null;
}

export interface NilNode extends BaseNode {
  readonly type: 'Nil';
}

export interface DotNode extends BaseNode {
  readonly type: 'Dot';
}

export interface StringNode extends BaseNode {
  readonly type: 'String';
  /** Original text including quotes */
  readonly quoted: string;
  /** Decoded value */
  readonly text: string;
}

// ============================================================
// UNIONS
// ============================================================

/** Nodes that may appear in a ListNode */
export type ItemNode =
  | TextNode
  | ActionNode
  | IfNode
  | RangeNode
  | WithNode
  | TemplateNode;

/** Nodes that may appear as command arguments */
export type OperandNode =
  | FieldNode
  | VariableNode
  | ChainNode
  | IdentifierNode
  | BoolNode
  | NumberNode
  | NilNode
  | DotNode
  | StringNode
  | PipeNode;

export type ASTNode =
  | ListNode
  | ItemNode
  | EndNode
  | ElseNode
  | CommandNode
  | OperandNode;

export type NodeType = ASTNode['type'];
