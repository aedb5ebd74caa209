// ============================================================================
// FILE: src/generator.ts
// PURPOSE: Scene pipelines: prompt -> backend -> extract -> raw JSONL log
// ============================================================================

import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { extractRecords } from './extractor.js';
import type { TextGenerationBackend } from './llm-client.js';
import { JsonlAppender } from './output.js';
import { buildChunkRequest, buildDesignRequest, sampleFiles } from './prompts.js';
import {
  type CodeChunk,
  type Logger,
  type Scene1RawRecord,
  type Scene2RawRecord,
  consoleLogger,
} from './types.js';

// ----------------------------------------------------------------------------
// SECTION 1: INPUT LOADING
// ----------------------------------------------------------------------------

const chunkSchema = z.object({
  file_path: z.string().default(''),
  class_name: z.string().default(''),
  content_with_lines: z.string().default(''),
  language: z.string().default(''),
  metadata: z.record(z.unknown()).default({}),
});

const skeletonSchema = z.union([
  z.object({ paths: z.array(z.string()) }).transform(s => s.paths),
  z.array(z.string()),
]);

async function readJSONFile(filePath: string, label: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    throw new ConfigurationError(`${label} not found: ${filePath}. Run "codemill analyze" first.`);
  }
  try {
    return JSON.parse(content);
  } catch {
    throw new ConfigurationError(`${label} is not valid JSON: ${filePath}`);
  }
}

/**
 * loadChunks - Read chunks.json
 *
 * @param chunksPath - Manifest written by the analyzer
 * @param limit - Keep only the first N chunks
 * @throws ConfigurationError when the file is missing or not a chunk array
 */
export async function loadChunks(chunksPath: string, limit?: number): Promise<CodeChunk[]> {
  const data = await readJSONFile(chunksPath, 'Chunk file');

  const parsed = z.array(chunkSchema).safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Expected an array of chunks in ${chunksPath}`);
  }

  return limit === undefined ? parsed.data : parsed.data.slice(0, Math.max(0, limit));
}

/**
 * loadProjectSkeleton - Read the project path list
 *
 * Accepts project_skeleton.json as written by the analyzer
 * ({ root, paths, dependencies }) or a bare array of paths.
 */
export async function loadProjectSkeleton(skeletonPath: string): Promise<string[]> {
  const data = await readJSONFile(skeletonPath, 'Project skeleton');

  const parsed = skeletonSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Expected a path list in ${skeletonPath}`);
  }
  return parsed.data;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ----------------------------------------------------------------------------
// SECTION 2: SCENE 1 - CODE Q&A
// ----------------------------------------------------------------------------

export interface Scene1Options {
  chunksPath: string;
  rawPath: string;
  backend: TextGenerationBackend;
  limit?: number;
  qaCount?: number;
  /** Overrides the backend's own dry-run setting when defined */
  dryRun?: boolean;
  log?: Logger;
}

/**
 * generateScene1 - Ask for Q&A samples about each chunk
 *
 * Chunks are handled one at a time. A backend failure or an unparseable
 * response is logged and the chunk skipped. The raw log is truncated at
 * the start of the run.
 *
 * @returns Number of records written to rawPath
 */
export async function generateScene1(options: Scene1Options): Promise<number> {
  const { backend, qaCount = 3, dryRun, log = consoleLogger } = options;
  const chunks = await loadChunks(options.chunksPath, options.limit ?? 50);
  const out = await JsonlAppender.open(options.rawPath);

  try {
    for (let i = 0; i < chunks.length; i++) {
      const chunk = chunks[i];
      log.info(`[Scene1] Processing chunk ${i + 1}/${chunks.length}: ${chunk.file_path}`);

      const request = buildChunkRequest(chunk, qaCount);

      let text: string;
      try {
        text = await backend.complete(request.messages, { dryRun, scene: request.scene });
      } catch (err) {
        log.warn(`[Scene1] ERROR calling LLM for ${chunk.file_path}: ${errorMessage(err)}`);
        continue;
      }

      const samples = extractRecords(text, 'code');
      if (samples.length === 0) {
        log.warn(`[Scene1] WARNING: Could not parse response for ${chunk.file_path}`);
        continue;
      }

      for (const sample of samples) {
        const record: Scene1RawRecord = {
          file_path: chunk.file_path,
          class_name: chunk.class_name,
          code: chunk.content_with_lines,
          question: sample.question,
          thinking_trace: sample.thinking_trace,
          answer: sample.answer,
        };
        await out.append(record);
      }
    }
  } finally {
    await out.close();
  }

  log.info(`[Scene1] Done. Total samples: ${out.count}. Saved to: ${options.rawPath}`);
  return out.count;
}

// ----------------------------------------------------------------------------
// SECTION 3: SCENE 2 - FEATURE DESIGN
// ----------------------------------------------------------------------------

export interface Scene2Options {
  skeletonPath: string;
  rawPath: string;
  backend: TextGenerationBackend;
  /** project_skeleton.txt; the path list is used when it is missing */
  skeletonTextPath?: string;
  count?: number;
  sampleFileCount?: number;
  dryRun?: boolean;
  random?: () => number;
  log?: Logger;
}

async function loadSkeletonText(textPath: string | undefined, paths: string[]): Promise<string> {
  if (textPath) {
    try {
      return await fs.readFile(textPath, 'utf-8');
    } catch {
      // fall through to the path list
    }
  }
  return paths.join('\n');
}

/**
 * generateScene2 - Ask for feature proposals, one plan per batch
 *
 * Each batch shows the full path list plus a fresh random sample of
 * sampleFileCount paths.
 *
 * @returns Number of records written to rawPath
 */
export async function generateScene2(options: Scene2Options): Promise<number> {
  const {
    backend,
    count = 10,
    sampleFileCount = 20,
    dryRun,
    random = Math.random,
    log = consoleLogger,
  } = options;

  const files = await loadProjectSkeleton(options.skeletonPath);
  // Truncate first: an empty project still leaves an empty log
  const out = await JsonlAppender.open(options.rawPath);

  try {
    if (files.length === 0) {
      log.info(`[Scene2] No project files found in ${options.skeletonPath}`);
      return 0;
    }

    const skeletonText = await loadSkeletonText(options.skeletonTextPath, files);

    for (let i = 0; i < count; i++) {
      log.info(`[Scene2] Generating design batch ${i + 1}/${count}`);

      const sample = sampleFiles(files, sampleFileCount, random);
      const request = buildDesignRequest(files, sample, 1);

      let text: string;
      try {
        text = await backend.complete(request.messages, { dryRun, scene: request.scene });
      } catch (err) {
        log.warn(`[Scene2] ERROR calling LLM: ${errorMessage(err)}`);
        continue;
      }

      const plans = extractRecords(text, 'design');
      if (plans.length === 0) {
        log.warn('[Scene2] WARNING: Could not parse response');
        continue;
      }

      for (const plan of plans) {
        const record: Scene2RawRecord = {
          project_files: files,
          sample_files: sample,
          project_skeleton: skeletonText,
          feature_title: plan.feature_title,
          thinking_trace: plan.thinking_trace,
          design_spec: plan.design_spec,
        };
        await out.append(record);
      }
    }
  } finally {
    await out.close();
  }

  log.info(`[Scene2] Done. Total plans: ${out.count}. Saved to: ${options.rawPath}`);
  return out.count;
}
