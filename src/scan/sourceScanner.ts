import fg from 'fast-glob';
import path from 'node:path';
import { toPosixPath } from '../util/id';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** When false, designer and source-generator outputs are excluded by name. */
  includeGenerated?: boolean;
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
};

const DEFAULT_EXCLUDES = [
  '**/bin/**',
  '**/obj/**',
  '**/.vs/**',
  '**/.git/**',
  '**/node_modules/**',
  '**/packages/**',
  '**/TestResults/**',
];

const GENERATED_EXCLUDES = ['**/*.g.cs', '**/*.g.i.cs', '**/*.[Dd]esigner.cs', '**/*.AssemblyInfo.cs'];

const DEFAULT_INCLUDES = ['**/*.cs'];

const AUTO_GENERATED_HEADER = /^\s*(\/\/[^\n]*\n\s*)*\/\/\s*<auto-generated/;

/** True for files carrying the `// <auto-generated>` banner tools write. */
export function isGeneratedSource(text: string): boolean {
  return AUTO_GENERATED_HEADER.test(text.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n'));
}

/**
 * Deterministically discovers C# source files in a project.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanSourceFiles(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const exclude = [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])];
  if (!opts.includeGenerated) exclude.push(...GENERATED_EXCLUDES);

  const matches = await fg(DEFAULT_INCLUDES, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: exclude,
  });

  // fast-glob usually returns posix paths even on Windows, but normalize anyway
  const rel = matches.map((p) => toPosixPath(p));

  rel.sort((a, b) => a.localeCompare(b));
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}
