// ============================================================================
// FILE: src/clone.test.ts
// PURPOSE: Repository naming, source discovery and the project tree
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildProjectTree, extractRepoName, getSourceFiles, isRemoteRepository } from './clone.js';
import { EXCLUDED_DIRS, SUPPORTED_EXTS } from './config.js';

describe('extractRepoName', () => {
  it.each([
    ['https://github.com/acme/widgets', 'acme-widgets'],
    ['https://github.com/acme/widgets.git', 'acme-widgets'],
    ['https://github.com/acme/widgets/', 'acme-widgets'],
    ['git@github.com:acme/widgets.git', 'acme-widgets'],
  ])('%s -> %s', (url, expected) => {
    expect(extractRepoName(url)).toBe(expected);
  });
});

describe('isRemoteRepository', () => {
  it('recognises URLs and SSH remotes', () => {
    expect(isRemoteRepository('https://example.com/a/b')).toBe(true);
    expect(isRemoteRepository('git@example.com:a/b.git')).toBe(true);
    expect(isRemoteRepository('../target-repo')).toBe(false);
  });
});

describe('source discovery', () => {
  let base: string;
  let root: string;

  beforeEach(async () => {
    base = await mkdtemp(join(tmpdir(), 'codemill-clone-'));
    root = join(base, 'proj');
    const files: Record<string, string> = {
      'main.ts': 'export {};\n',
      'README.md': '# proj\n',
      'src/app.ts': 'export const app = 1;\n',
      'src/Util.JAVA': 'class Util {}\n',
      'node_modules/dep/index.js': 'module.exports = 1;\n',
      '.hidden/x.ts': 'export {};\n',
    };
    for (const [rel, content] of Object.entries(files)) {
      const full = join(root, rel);
      await mkdir(join(full, '..'), { recursive: true });
      await writeFile(full, content, 'utf-8');
    }
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it('finds supported files, sorted, skipping excluded directories', async () => {
    const files = await getSourceFiles(root, SUPPORTED_EXTS, EXCLUDED_DIRS);

    expect(files).toEqual([
      join(root, '.hidden/x.ts'),
      join(root, 'main.ts'),
      join(root, 'src/Util.JAVA'),
      join(root, 'src/app.ts'),
    ]);
  });

  it('renders an indented tree without hidden or excluded directories', async () => {
    const tree = await buildProjectTree(root, { extensions: SUPPORTED_EXTS, excludedDirs: EXCLUDED_DIRS });

    expect(tree).toBe('proj/\n  main.ts\n  src/\n    Util.JAVA\n    app.ts');
  });

  it('stops descending at maxDepth', async () => {
    const tree = await buildProjectTree(root, {
      extensions: SUPPORTED_EXTS,
      excludedDirs: EXCLUDED_DIRS,
      maxDepth: 0,
    });

    expect(tree).toBe('proj/\n  main.ts');
  });

  it('truncates after maxEntries lines', async () => {
    const tree = await buildProjectTree(root, {
      extensions: SUPPORTED_EXTS,
      excludedDirs: EXCLUDED_DIRS,
      maxEntries: 1,
    });

    expect(tree).toBe('proj/\n  main.ts\n  ... (truncated)');
  });
});
