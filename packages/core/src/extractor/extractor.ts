/**
 * Docstring extractor - finds the docstring of every module, class and
 * function scope in a Python source file
 */

import { endLine, startLine } from '../parser/python-parser.js';
import type { ParsedSource, PythonParser, SyntaxNode } from '../parser/python-parser.js';
import { parseStringLiteral } from '../parser/string-literal.js';
import type { DocstringCandidate, ScopeKind } from '../types.js';

const SCOPE_NODES = new Set(['function_definition', 'class_definition']);

/**
 * Nodes that can hold statements, and so nested scopes. Expressions are
 * never entered.
 */
const CONTAINER_NODES = new Set([
  'block',
  'decorated_definition',
  'function_definition',
  'class_definition',
  'if_statement',
  'elif_clause',
  'else_clause',
  'for_statement',
  'while_statement',
  'try_statement',
  'except_clause',
  'except_group_clause',
  'finally_clause',
  'with_statement',
  'match_statement',
  'case_clause',
]);

const PARAMETER_NODES = new Set([
  'identifier',
  'typed_parameter',
  'default_parameter',
  'typed_default_parameter',
  'list_splat_pattern',
  'dictionary_splat_pattern',
]);

const RECEIVER_NAMES = new Set(['self', 'cls']);

/** Expression nodes a docstring may be built from */
const STRING_NODES = new Set(['string', 'concatenated_string', 'parenthesized_expression']);

interface PendingNode {
  node: SyntaxNode;
  /** Qualified name of the enclosing scope, empty at module level */
  qualifier: string;
}

interface DocstringLiteral {
  text: string;
  startLine: number;
  endLine: number;
}

/**
 * Parse `source` and return its docstring candidates in document order.
 *
 * Parsing happens eagerly, so a syntax error throws `SourceParseError`
 * here and no candidate is ever produced for that file. The returned
 * iterator is lazy and can be consumed once.
 */
export function extractDocstrings(source: string, parser: PythonParser): IterableIterator<DocstringCandidate> {
  return walkScopes(parser.parse(source));
}

function* walkScopes(parsed: ParsedSource): IterableIterator<DocstringCandidate> {
  try {
    const root = parsed.tree.rootNode;
    yield buildCandidate(root, 'module', '<module>', 1);

    const stack: PendingNode[] = [];
    pushContainers(stack, root, '');

    while (stack.length > 0) {
      const pending = stack.pop();
      if (!pending) break;
      const { node, qualifier } = pending;

      let childQualifier = qualifier;
      if (SCOPE_NODES.has(node.type)) {
        const nameNode = node.childForFieldName('name');
        const name = nameNode ? nameNode.text : '<anonymous>';
        const qualifiedName = qualifier ? `${qualifier}.${name}` : name;
        yield buildCandidate(node, scopeKind(node), qualifiedName, startLine(node));
        childQualifier = qualifiedName;
      }

      pushContainers(stack, node, childQualifier);
    }
  } finally {
    parsed.tree.delete();
  }
}

/**
 * Push the container children of `node` so they pop in source order.
 */
function pushContainers(stack: PendingNode[], node: SyntaxNode, qualifier: string): void {
  const children = node.namedChildren;
  for (let i = children.length - 1; i >= 0; i--) {
    if (CONTAINER_NODES.has(children[i].type)) {
      stack.push({ node: children[i], qualifier });
    }
  }
}

function buildCandidate(
  scope: SyntaxNode,
  kind: ScopeKind,
  name: string,
  definitionLine: number
): DocstringCandidate {
  const body = kind === 'module' ? scope : scope.childForFieldName('body');
  const literal = body ? findDocstring(body) : null;
  const signature = kind === 'module' ? {} : { parameters: scopeParameters(scope, body) };

  if (!literal) {
    return {
      scopeKind: kind,
      scopeName: name,
      rawText: null,
      startLine: definitionLine,
      endLine: definitionLine,
      ...signature,
    };
  }

  return {
    scopeKind: kind,
    scopeName: name,
    rawText: literal.text,
    startLine: literal.startLine,
    endLine: literal.endLine,
    ...signature,
  };
}

/**
 * Parameters of a function, or of the `__init__` defined directly in a
 * class body.
 */
function scopeParameters(scope: SyntaxNode, body: SyntaxNode | null): string[] {
  if (scope.type === 'function_definition') {
    return parameterNames(scope);
  }

  for (const child of body ? body.namedChildren : []) {
    const definition = child.type === 'decorated_definition' ? child.childForFieldName('definition') : child;
    if (definition?.type === 'function_definition' && definition.childForFieldName('name')?.text === '__init__') {
      return parameterNames(definition);
    }
  }
  return [];
}

function parameterNames(definition: SyntaxNode): string[] {
  const list = definition.childForFieldName('parameters');
  const names: string[] = [];
  for (const parameter of list ? list.namedChildren : []) {
    if (!PARAMETER_NODES.has(parameter.type)) continue;
    const name = parameterName(parameter);
    if (name) names.push(name);
  }

  if (names.length > 0 && RECEIVER_NAMES.has(names[0])) {
    names.shift();
  }
  return names;
}

function parameterName(parameter: SyntaxNode): string | null {
  switch (parameter.type) {
    case 'default_parameter':
    case 'typed_default_parameter':
      return parameter.childForFieldName('name')?.text ?? null;
    case 'typed_parameter':
      return parameter.firstNamedChild?.text ?? null;
    default:
      return parameter.text;
  }
}

function scopeKind(node: SyntaxNode): ScopeKind {
  if (node.type === 'class_definition') return 'class';
  return node.firstChild?.type === 'async' ? 'async_function' : 'function';
}

/**
 * Named children without comments. Semicolon-separated statements sit
 * side by side in the block, so the first entry is the first statement.
 */
function statements(body: SyntaxNode): SyntaxNode[] {
  return body.namedChildren.filter((child) => child.type !== 'comment');
}

/**
 * The docstring is the first statement of a body, and only when that
 * statement is a bare str literal (possibly parenthesized or implicitly
 * concatenated).
 */
function findDocstring(body: SyntaxNode): DocstringLiteral | null {
  const first = statements(body)[0];
  if (!first || first.type !== 'expression_statement') {
    return null;
  }

  // `"a", "b"` is a tuple statement, not a docstring
  const expressions = statements(first);
  if (expressions.length !== 1) {
    return null;
  }

  const parts = collectStringParts(expressions[0]);
  if (!parts || parts.length === 0) {
    return null;
  }

  let text = '';
  for (const part of parts) {
    const literal = parseStringLiteral(part.text);
    if (!literal || literal.isBytes || literal.isFormat) {
      return null;
    }
    text += literal.value;
  }

  return {
    text,
    startLine: startLine(parts[0]),
    endLine: endLine(parts[parts.length - 1]),
  };
}

/**
 * Flatten the string tokens of an expression, or return null when the
 * expression is anything other than string literals.
 */
function collectStringParts(expression: SyntaxNode): SyntaxNode[] | null {
  const parts: SyntaxNode[] = [];
  const pending: SyntaxNode[] = [expression];

  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;

    if (!STRING_NODES.has(node.type)) {
      return null;
    }
    if (node.type === 'string') {
      parts.push(node);
      continue;
    }

    const children = statements(node);
    for (let i = children.length - 1; i >= 0; i--) {
      pending.push(children[i]);
    }
  }

  return parts;
}
