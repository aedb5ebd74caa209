// ============================================================================
// FILE: src/config.ts
// PURPOSE: Environment-driven settings and artifact locations
// ============================================================================

import * as path from 'path';
import { z } from 'zod';
import { isRemoteRepository } from './clone.js';
import { ConfigurationError } from './errors.js';
import type { FactoryConfig } from './types.js';

// ----------------------------------------------------------------------------
// SECTION 1: CONSTANTS
// ----------------------------------------------------------------------------

/**
 * SUPPORTED_EXTS - Source extensions the scanner picks up (lowercase)
 */
export const SUPPORTED_EXTS: readonly string[] = [
  '.py', '.js', '.ts', '.java', '.kt',
  '.go', '.cpp', '.c', '.cs', '.rs',
  '.swift', '.php', '.rb', '.h',
];

/**
 * EXCLUDED_DIRS - Directory names never descended into
 */
export const EXCLUDED_DIRS: readonly string[] = [
  '.git', '.idea', '.vscode', 'node_modules',
  'build', 'dist', 'target', '__pycache__',
];

export const DEFAULT_MAX_CHUNK_CHARS = 4000;

// ----------------------------------------------------------------------------
// SECTION 2: ENVIRONMENT PARSING
// ----------------------------------------------------------------------------

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  TARGET_REPO_PATH: z.string().default('../target-repo'),
  OUTPUT_DIR: z.string().default('./data'),
  CACHE_DIR: z.string().default('./temp'),
  MAX_CHUNK_CHARS: z.coerce.number().int().positive().default(DEFAULT_MAX_CHUNK_CHARS),
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_BASE_URL: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  MAX_NEW_TOKENS: z.coerce.number().int().positive().default(768),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.35),
  DRY_RUN: flag.default('1'),
  GITHUB_TOKEN: optionalString,
});

/**
 * loadConfig - Resolve settings from the environment
 *
 * Empty variables count as unset. Invalid values raise a
 * ConfigurationError listing every offending variable.
 *
 * @param env - Variables to read (defaults to process.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FactoryConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const details = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration:\n  ${details.join('\n  ')}`);
  }

  const e = parsed.data;

  return {
    targetRepo: isRemoteRepository(e.TARGET_REPO_PATH)
      ? e.TARGET_REPO_PATH
      : path.resolve(e.TARGET_REPO_PATH),
    outputDir: path.resolve(e.OUTPUT_DIR),
    cacheDir: path.resolve(e.CACHE_DIR),
    maxChunkChars: e.MAX_CHUNK_CHARS,
    provider: e.LLM_PROVIDER,
    model: e.LLM_MODEL,
    baseUrl: e.LLM_BASE_URL,
    apiKey: e.LLM_PROVIDER === 'anthropic' ? e.ANTHROPIC_API_KEY : e.OPENAI_API_KEY,
    maxNewTokens: e.MAX_NEW_TOKENS,
    temperature: e.TEMPERATURE,
    dryRun: e.DRY_RUN,
    githubToken: e.GITHUB_TOKEN,
  };
}

/**
 * parseCount - Non-negative integer from a CLI option value
 *
 * parseCount('5', '--limit') -> 5
 * parseCount('5x', '--limit') -> ConfigurationError
 */
export function parseCount(value: string, name: string): number {
  const n = Number(value);
  if (!value.trim() || !Number.isInteger(n) || n < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

// ----------------------------------------------------------------------------
// SECTION 3: ARTIFACT PATHS
// ----------------------------------------------------------------------------

export interface ArtifactPaths {
  skeletonText: string;
  skeletonJson: string;
  chunks: string;
  scene1Raw: string;
  scene2Raw: string;
  scene1Sft: string;
  scene2Sft: string;
  combinedSft: string;
}

/**
 * artifactPaths - Every file the pipeline reads or writes under outputDir
 */
export function artifactPaths(outputDir: string): ArtifactPaths {
  return {
    skeletonText: path.join(outputDir, 'project_skeleton.txt'),
    skeletonJson: path.join(outputDir, 'project_skeleton.json'),
    chunks: path.join(outputDir, 'chunks.json'),
    scene1Raw: path.join(outputDir, 'scene1_raw.jsonl'),
    scene2Raw: path.join(outputDir, 'scene2_raw.jsonl'),
    scene1Sft: path.join(outputDir, 'scene1_sft.jsonl'),
    scene2Sft: path.join(outputDir, 'scene2_sft.jsonl'),
    combinedSft: path.join(outputDir, 'combined_sft.jsonl'),
  };
}
