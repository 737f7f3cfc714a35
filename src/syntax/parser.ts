import path from 'node:path';
import Parser from 'web-tree-sitter';
import { computeChecksum } from '../util/id';
import { CstAdapter } from './adapt';
import type { SyntaxTree } from './model';
import { positionAt } from './positions';

/** Raised for source the C# grammar cannot parse; the rules never see such input. */
export class CSharpSyntaxError extends Error {
  constructor(
    message: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(message);
    this.name = 'CSharpSyntaxError';
  }
}

export type CSharpParser = {
  /** Parses one document into an immutable syntax model. Throws `CSharpSyntaxError` on malformed input. */
  parse(text: string): SyntaxTree;
};

let loading: Promise<CSharpParser> | undefined;

function grammarWasmPath(): string {
  const pkg = require.resolve('tree-sitter-wasms/package.json');
  return path.join(path.dirname(pkg), 'out', 'tree-sitter-c_sharp.wasm');
}

function firstErrorNode(node: Parser.SyntaxNode): Parser.SyntaxNode | undefined {
  if (node.type === 'ERROR' || node.isMissing()) return node;
  for (const child of node.children) {
    if (!child.hasError() && !child.isMissing()) continue;
    const hit = firstErrorNode(child);
    if (hit) return hit;
  }
  return undefined;
}

async function createParser(): Promise<CSharpParser> {
  await Parser.init();
  const language = await Parser.Language.load(grammarWasmPath());
  const parser = new Parser();
  parser.setLanguage(language);

  return {
    parse(text: string): SyntaxTree {
      const tree = parser.parse(text);
      try {
        const root = tree.rootNode;
        if (root.hasError()) {
          const bad = firstErrorNode(root) ?? root;
          const pos = positionAt(text, bad.startIndex);
          const what = bad.isMissing() ? `missing '${bad.type}'` : 'unexpected syntax';
          throw new CSharpSyntaxError(`${what} at ${pos.line}:${pos.column}`, pos.line, pos.column);
        }
        return {
          text,
          checksum: computeChecksum(text),
          root: new CstAdapter(text).compilationUnit(root),
        };
      } finally {
        tree.delete();
      }
    },
  };
}

/**
 * Loads the WebAssembly C# grammar once per process and returns the shared parser.
 * Parsing is synchronous, so one instance serves concurrent scans.
 */
export function loadCSharpParser(): Promise<CSharpParser> {
  if (!loading) {
    loading = createParser().catch((e: unknown) => {
      loading = undefined;
      throw e;
    });
  }
  return loading;
}
