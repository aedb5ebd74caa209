// ============================================================================
// FILE: src/clone.ts
// PURPOSE: Git clone operations and source file discovery
// ============================================================================

import { simpleGit, type SimpleGit } from 'simple-git';
import * as fs from 'fs/promises';
import * as path from 'path';
import { type Logger, consoleLogger } from './types.js';

// ----------------------------------------------------------------------------
// SECTION 1: REPOSITORY CLONING
// ----------------------------------------------------------------------------

/**
 * isRemoteRepository - Whether a target looks like a git URL rather than a path
 */
export function isRemoteRepository(target: string): boolean {
  return /^(https?:\/\/|git@)/.test(target);
}

/**
 * cloneRepository - Clone a remote repository into the cache directory
 *
 * If the repository was cloned before, pulls instead. A failed pull keeps
 * the existing checkout.
 *
 * @param repoUrl - HTTPS or SSH git URL
 * @param cacheDir - Directory holding cloned repositories
 * @param token - Optional access token for private HTTPS repositories
 * @returns Path to the local checkout
 *
 * EXAMPLE:
 * await cloneRepository('https://github.com/acme/widgets', './temp')
 * // Returns: 'temp/acme-widgets'
 */
export async function cloneRepository(
  repoUrl: string,
  cacheDir: string,
  token?: string,
  log: Logger = consoleLogger
): Promise<string> {
  // Ensure cache directory exists
  await fs.mkdir(cacheDir, { recursive: true });

  const targetPath = path.join(cacheDir, extractRepoName(repoUrl));

  // SECURITY: never log cloneUrl, it may carry the token
  let cloneUrl = repoUrl;
  if (token) {
    try {
      const url = new URL(repoUrl);
      url.username = token;
      cloneUrl = url.toString();
    } catch {
      throw new Error(`Token auth only supported for HTTPS URLs. Got: ${repoUrl}`);
    }
  }

  if (await pathExists(targetPath)) {
    log.info(`📁 Repository already exists at ${targetPath}`);
    try {
      await simpleGit(targetPath).pull();
      log.info('✅ Updated to latest');
    } catch {
      log.warn('⚠️  Could not pull (using existing code)');
    }
    return targetPath;
  }

  log.info(`🔍 Cloning ${repoUrl}...`);
  const git: SimpleGit = simpleGit();

  try {
    await git.clone(cloneUrl, targetPath, ['--depth', '1', '--single-branch']);
    log.info(`✅ Cloned to ${targetPath}`);
  } catch (cloneError) {
    const errorMessage = cloneError instanceof Error ? cloneError.message : String(cloneError);
    if (errorMessage.includes('not found') || errorMessage.includes('404')) {
      throw new Error(`Repository not found: ${repoUrl}`);
    }
    if (errorMessage.includes('Authentication') || errorMessage.includes('403')) {
      throw new Error(`Authentication failed for: ${repoUrl}\nSet GITHUB_TOKEN for private repositories.`);
    }
    throw new Error(`Failed to clone repository: ${errorMessage}`);
  }

  return targetPath;
}

/**
 * extractRepoName - Safe directory name from a git URL
 *
 * extractRepoName('https://github.com/acme/widgets.git') -> 'acme-widgets'
 * extractRepoName('git@github.com:acme/widgets.git') -> 'acme-widgets'
 */
export function extractRepoName(url: string): string {
  const cleaned = url.replace(/\/$/, '').replace(/\.git$/, '');
  const parts = cleaned.split(/[\/:]/).filter(Boolean);

  const owner = parts[parts.length - 2] || 'unknown';
  const repo = parts[parts.length - 1] || 'repo';

  return `${owner}-${repo}`;
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

// ----------------------------------------------------------------------------
// SECTION 2: SOURCE FILE DISCOVERY
// ----------------------------------------------------------------------------

/**
 * getSourceFiles - Recursively find source files under a root
 *
 * Directories whose name is in excludedDirs are skipped entirely.
 * Extensions are compared case-insensitively.
 *
 * @param root - Directory to search
 * @param extensions - Lowercase extensions including the dot
 * @param excludedDirs - Directory names never descended into
 * @returns Sorted file paths
 */
export async function getSourceFiles(
  root: string,
  extensions: readonly string[],
  excludedDirs: readonly string[]
): Promise<string[]> {
  const files: string[] = [];

  async function walkDir(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!excludedDirs.includes(entry.name)) {
          await walkDir(fullPath);
        }
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (extensions.includes(ext)) {
          files.push(fullPath);
        }
      }
      // Symbolic links and other types are ignored
    }
  }

  await walkDir(root);

  // Sort for reproducible chunk manifests
  files.sort();

  return files;
}

// ----------------------------------------------------------------------------
// SECTION 3: PROJECT TREE
// ----------------------------------------------------------------------------

export interface ProjectTreeOptions {
  extensions: readonly string[];
  excludedDirs: readonly string[];
  maxDepth?: number;
  maxEntries?: number;
}

/**
 * buildProjectTree - Indented text listing of directories and source files
 *
 * Hidden directories are skipped along with excludedDirs. Directories
 * deeper than maxDepth are not listed. Once more than maxEntries lines
 * have been produced the listing ends with "  ... (truncated)".
 *
 * ALGORITHM:
 * 1. Emit the directory line, indented two spaces per level
 * 2. Emit its source files, sorted, one level deeper
 * 3. Stop everything once the line budget is exceeded
 * 4. Recurse into sorted subdirectories while within maxDepth
 *
 * EXAMPLE:
 * widgets/
 *   index.ts
 *   src/
 *     app.ts
 */
export async function buildProjectTree(
  root: string,
  options: ProjectTreeOptions
): Promise<string> {
  const { extensions, excludedDirs, maxDepth = 5, maxEntries = 400 } = options;
  const absRoot = path.resolve(root);
  const lines: string[] = [];

  // Returns false once the listing has been truncated
  async function visit(dir: string, depth: number): Promise<boolean> {
    const indent = '  '.repeat(depth);
    lines.push(depth === 0 ? `${path.basename(absRoot)}/` : `${indent}${path.basename(dir)}/`);

    // Split entries into listed files and directories worth visiting
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const fileNames = entries
      .filter(e => e.isFile() && extensions.includes(path.extname(e.name).toLowerCase()))
      .map(e => e.name)
      .sort();
    const dirNames = entries
      .filter(e => e.isDirectory() && !e.name.startsWith('.') && !excludedDirs.includes(e.name))
      .map(e => e.name)
      .sort();

    for (const name of fileNames) {
      lines.push(`${indent}  ${name}`);
    }

    if (lines.length > maxEntries) {
      lines.push('  ... (truncated)');
      return false;
    }

    // Deeper directories are left out, not truncated
    if (depth + 1 > maxDepth) return true;

    for (const name of dirNames) {
      if (!(await visit(path.join(dir, name), depth + 1))) return false;
    }
    return true;
  }

  await visit(absRoot, 0);
  return lines.join('\n');
}
