/**
 * Python source parsing on top of the tree-sitter Python grammar
 */

import { createRequire } from 'module';
import { dirname, join } from 'path';

import Parser from 'web-tree-sitter';

import { SourceParseError } from '../errors.js';
import { normalizeSource } from '../utils/text.js';

export type SyntaxNode = Parser.SyntaxNode;

export interface ParsedSource {
  /** Normalized source text the tree was built from */
  text: string;
  tree: Parser.Tree;
}

const require = createRequire(import.meta.url);

/**
 * The grammar package ships its wasm build at the package root, next to
 * the `bindings/node` entry point.
 */
function grammarPath(): string {
  return join(dirname(require.resolve('tree-sitter-python')), '..', '..', 'tree-sitter-python.wasm');
}

let loading: Promise<PythonParser> | undefined;

export class PythonParser {
  private constructor(private parser: Parser) {}

  /**
   * Load the grammar once per process.
   */
  static load(): Promise<PythonParser> {
    if (!loading) {
      loading = PythonParser.create();
    }
    return loading;
  }

  private static async create(): Promise<PythonParser> {
    await Parser.init();
    const language = await Parser.Language.load(grammarPath());
    const parser = new Parser();
    parser.setLanguage(language);
    return new PythonParser(parser);
  }

  /**
   * Parse Python source. tree-sitter recovers from syntax errors by
   * inserting ERROR and MISSING nodes, so any such node makes the whole
   * file a parse failure. The caller owns the returned tree and must
   * `delete()` it.
   */
  parse(source: string): ParsedSource {
    const text = normalizeSource(source);
    const tree = this.parser.parse(text);

    const error = firstError(tree.rootNode);
    if (error) {
      tree.delete();
      throw new SourceParseError(error.startPosition.row + 1);
    }

    return { text, tree };
  }
}

function firstError(root: SyntaxNode): SyntaxNode | null {
  if (!root.hasError) {
    return null;
  }

  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === 'ERROR' || node.isMissing) {
      return node;
    }
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      if (children[i].hasError) {
        stack.push(children[i]);
      }
    }
  }

  return root;
}

/**
 * 1-based line of the first character of `node`.
 */
export function startLine(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/**
 * 1-based line of the last character of `node`.
 */
export function endLine(node: SyntaxNode): number {
  return node.endPosition.row + 1;
}
