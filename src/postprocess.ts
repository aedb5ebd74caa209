// ============================================================================
// FILE: src/postprocess.ts
// PURPOSE: Filter raw scene logs into SFT files and merge them
// ============================================================================

import type { ArtifactPaths } from './config.js';
import { accept, viewRawRecord } from './quality.js';
import { mergeRecords, readJSONL, toDesignSft, toQASft, writeJSONL } from './output.js';
import { type Logger, type PostprocessResult, type SftRecord, consoleLogger } from './types.js';

export type PostprocessPaths = Pick<
  ArtifactPaths,
  'scene1Raw' | 'scene2Raw' | 'scene1Sft' | 'scene2Sft' | 'combinedSft'
>;

export interface PostprocessOptions {
  /** Put the chunk text into input for code records */
  includeCode?: boolean;
  log?: Logger;
}

/**
 * postprocessScene1 - scene1_raw.jsonl -> scene1_sft.jsonl
 *
 * @returns Number of records kept
 */
export async function postprocessScene1(
  paths: PostprocessPaths,
  options: PostprocessOptions = {}
): Promise<number> {
  const { log = consoleLogger } = options;
  const records: SftRecord[] = [];

  for (const raw of await readJSONL(paths.scene1Raw)) {
    const view = viewRawRecord(raw, 'code');
    if (!accept(view, 'code')) continue;
    records.push(toQASft(raw, view, { includeCode: options.includeCode }));
  }

  await writeJSONL(records, paths.scene1Sft);
  log.info(`[Postprocess] Scene1 SFT saved: ${paths.scene1Sft} (total ${records.length})`);
  return records.length;
}

/**
 * postprocessScene2 - scene2_raw.jsonl -> scene2_sft.jsonl
 *
 * @returns Number of records kept
 */
export async function postprocessScene2(
  paths: PostprocessPaths,
  options: PostprocessOptions = {}
): Promise<number> {
  const { log = consoleLogger } = options;
  const records: SftRecord[] = [];

  for (const raw of await readJSONL(paths.scene2Raw)) {
    const view = viewRawRecord(raw, 'design');
    if (!accept(view, 'design')) continue;
    records.push(toDesignSft(raw, view));
  }

  await writeJSONL(records, paths.scene2Sft);
  log.info(`[Postprocess] Scene2 SFT saved: ${paths.scene2Sft} (total ${records.length})`);
  return records.length;
}

/**
 * mergeSft - Scene 1 SFT lines followed by scene 2 SFT lines
 *
 * @returns Number of records in the combined file
 */
export async function mergeSft(
  paths: PostprocessPaths,
  options: PostprocessOptions = {}
): Promise<number> {
  const { log = consoleLogger } = options;
  const combined = mergeRecords(await readJSONL(paths.scene1Sft), await readJSONL(paths.scene2Sft));

  await writeJSONL(combined, paths.combinedSft);
  log.info(`[Postprocess] Combined SFT saved: ${paths.combinedSft} (total ${combined.length})`);
  return combined.length;
}

/**
 * runPostprocess - Both scenes, then the merge
 *
 * Re-running on unchanged raw logs rewrites byte-identical files.
 */
export async function runPostprocess(
  paths: PostprocessPaths,
  options: PostprocessOptions = {}
): Promise<PostprocessResult> {
  const scene1 = await postprocessScene1(paths, options);
  const scene2 = await postprocessScene2(paths, options);
  const combined = await mergeSft(paths, options);
  return { scene1, scene2, combined };
}
