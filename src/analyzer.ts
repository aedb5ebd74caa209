// ============================================================================
// FILE: src/analyzer.ts
// PURPOSE: Scan a repository into project_skeleton.* and chunks.json
// ============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { buildChunks, readFileWithLines } from './chunker.js';
import {
  buildProjectTree,
  cloneRepository,
  getSourceFiles,
  isRemoteRepository,
  pathExists,
} from './clone.js';
import { EXCLUDED_DIRS, SUPPORTED_EXTS, artifactPaths } from './config.js';
import { ConfigurationError } from './errors.js';
import { extractManifestDependencies } from './manifest.js';
import {
  type AnalysisResult,
  type CodeChunk,
  type FactoryConfig,
  type Logger,
  type ProjectSkeleton,
  consoleLogger,
} from './types.js';

export type AnalyzerSettings = Pick<
  FactoryConfig,
  'targetRepo' | 'outputDir' | 'cacheDir' | 'maxChunkChars' | 'githubToken'
>;

/**
 * resolveRepository - Local checkout for the configured target
 *
 * @throws ConfigurationError when a local target does not exist
 */
export async function resolveRepository(settings: AnalyzerSettings, log: Logger): Promise<string> {
  const root = isRemoteRepository(settings.targetRepo)
    ? await cloneRepository(settings.targetRepo, settings.cacheDir, settings.githubToken, log)
    : settings.targetRepo;

  if (!(await pathExists(root))) {
    throw new ConfigurationError(`TARGET_REPO_PATH does not exist: ${root}`);
  }
  return path.resolve(root);
}

/**
 * runAnalysis - Build every scan artifact for the target repository
 *
 * Writes, under outputDir:
 * - project_skeleton.txt: indented tree of source files
 * - chunks.json: every source file split into numbered chunks
 * - project_skeleton.json: { root, paths, dependencies }
 */
export async function runAnalysis(
  settings: AnalyzerSettings,
  log: Logger = consoleLogger
): Promise<AnalysisResult> {
  const root = await resolveRepository(settings, log);
  const paths = artifactPaths(settings.outputDir);
  await fs.mkdir(settings.outputDir, { recursive: true });

  log.info(`[Analyzer] Scanning repo: ${root}`);

  // 1. Directory tree
  const tree = await buildProjectTree(root, {
    extensions: SUPPORTED_EXTS,
    excludedDirs: EXCLUDED_DIRS,
  });
  await fs.writeFile(paths.skeletonText, tree, 'utf-8');
  log.info(`[Analyzer] Project tree saved to: ${paths.skeletonText}`);

  // 2. Manifest dependencies
  const deps = await extractManifestDependencies(root);

  // 3. Chunks
  const files = await getSourceFiles(root, SUPPORTED_EXTS, EXCLUDED_DIRS);
  const chunks: CodeChunk[] = [];
  for (const file of files) {
    const numbered = await readFileWithLines(file);
    chunks.push(...buildChunks(file, numbered, settings.maxChunkChars, { deps }));
  }
  // Single lines longer than the budget become oversized chunks
  const oversized = chunks.filter(c => c.content_with_lines.length > settings.maxChunkChars).length;

  await fs.writeFile(paths.chunks, JSON.stringify(chunks, null, 2), 'utf-8');
  log.info(`[Analyzer] Code chunks saved to: ${paths.chunks} (total ${chunks.length} items)`);

  // 4. Path list: relative, '/'-separated, unique, sorted
  const relative = files.map(f => path.relative(root, f).split(path.sep).join('/'));
  const skeleton: ProjectSkeleton = {
    root,
    paths: Array.from(new Set(relative)).sort(),
    dependencies: deps,
  };
  await fs.writeFile(paths.skeletonJson, JSON.stringify(skeleton, null, 2), 'utf-8');
  log.info(`[Analyzer] Path list saved to: ${paths.skeletonJson}`);

  return {
    root,
    filesScanned: files.length,
    chunksWritten: chunks.length,
    oversizedChunks: oversized,
  };
}
