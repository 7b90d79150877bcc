/**
 * Node Renderer
 * Prints nodes back to canonical template source
 */

import type {
  ASTNode,
  CommandNode,
  ListNode,
  OperandNode,
  PipeNode,
} from './types.js';

function renderList(list: ListNode): string {
  return list.nodes.map(nodeToString).join('');
}

function renderPipe(pipe: PipeNode): string {
  const decl =
    pipe.decl.length > 0
      ? `${pipe.decl.map(nodeToString).join(', ')} := `
      : '';
  return decl + pipe.cmds.map(renderCommand).join(' | ');
}

/** Operands that are pipelines print in parentheses */
function renderOperand(node: OperandNode): string {
  return node.type === 'Pipe' ? `(${renderPipe(node)})` : nodeToString(node);
}

function renderCommand(cmd: CommandNode): string {
  return cmd.args.map(renderOperand).join(' ');
}

function renderBranch(
  keyword: string,
  pipe: PipeNode,
  list: ListNode,
  elseList: ListNode | null
): string {
  let out = `{{${keyword} ${renderPipe(pipe)}}}${renderList(list)}`;
  if (elseList) {
    out += `{{else}}${renderList(elseList)}`;
  }
  return `${out}{{end}}`;
}

/**
 * Render a node as template source.
 *
 * @example
 * nodeToString(parse('t', '{{if .A}}x{{end}}').get('t')?.root)
 * // "{{if .A}}x{{end}}"
 */
export function nodeToString(node: ASTNode): string {
  switch (node.type) {
    case 'List':
      return renderList(node);
    case 'Text':
      return node.text;
    case 'Action':
      return `{{${renderPipe(node.pipe)}}}`;
    case 'If':
      return renderBranch('if', node.pipe, node.list, node.elseList);
    case 'Range':
      return renderBranch('range', node.pipe, node.list, node.elseList);
    case 'With':
      return renderBranch('with', node.pipe, node.list, node.elseList);
    case 'Template': {
      const name =
        typeof node.name === 'string'
          ? JSON.stringify(node.name)
          : `(${renderPipe(node.name)})`;
      const pipe = node.pipe ? ` ${renderPipe(node.pipe)}` : '';
      return `{{template ${name}${pipe}}}`;
    }
    case 'End':
      return '{{end}}';
    case 'Else':
      return '{{else}}';
    case 'Pipe':
      return renderPipe(node);
    case 'Command':
      return renderCommand(node);
    case 'Field':
      return `.${node.ident.join('.')}`;
    case 'Variable':
      return node.ident.join('.');
    case 'Chain':
      return [renderOperand(node.node), ...node.field].join('.');
    case 'Identifier':
      return node.ident;
    case 'Bool':
      return node.value ? 'true' : 'false';
    case 'Number':
      return node.text;
    case 'Nil':
      return 'nil';
    case 'Dot':
      return '.';
    case 'String':
      return node.quoted;
  }
}
