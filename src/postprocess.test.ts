// ============================================================================
// FILE: src/postprocess.test.ts
// PURPOSE: Raw logs -> filtered scene SFT files -> combined dataset
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { artifactPaths } from './config.js';
import { mergeSft, runPostprocess } from './postprocess.js';
import { readJSONL } from './output.js';
import { silentLogger } from './types.js';

const TRACE = 'First read the loop, then note the guard, then check the return value.';

function qaLine(question: string): string {
  return JSON.stringify({
    file_path: '/repo/src/a.ts',
    class_name: 'a',
    code: '1 | const a = 1;',
    question,
    thinking_trace: TRACE,
    answer: `Answer to ${question}`,
  });
}

function designLine(title: string): string {
  return JSON.stringify({
    project_files: ['src/a.ts'],
    sample_files: ['src/a.ts'],
    project_skeleton: 'repo/\n  src/',
    feature_title: title,
    thinking_trace: TRACE,
    design_spec: `Spec for ${title}`,
  });
}

describe('runPostprocess', () => {
  let dir: string;
  let paths: ReturnType<typeof artifactPaths>;
  const options = { log: silentLogger };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'codemill-post-'));
    paths = artifactPaths(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('merges QA records before design records, in emission order', async () => {
    await writeFile(paths.scene1Raw, `${qaLine('qa-a')}\n${qaLine('qa-b')}\n`, 'utf-8');
    await writeFile(paths.scene2Raw, `${designLine('design-c')}\n`, 'utf-8');

    const result = await runPostprocess(paths, options);
    const combined = await readJSONL(paths.combinedSft);

    expect(result).toEqual({ scene1: 2, scene2: 1, combined: 3 });
    expect(combined.map(r => r.instruction)).toEqual(['qa-a', 'qa-b', 'design-c']);
    expect(combined[0]).toEqual({
      instruction: 'qa-a',
      input: '',
      output: `### Reasoning\n${TRACE}\n\n### Answer\nAnswer to qa-a`,
      meta: { file_path: '/repo/src/a.ts', class_name: 'a' },
    });
    expect(combined[2]).toEqual({
      instruction: 'design-c',
      input: 'Project structure:\nrepo/\n  src/',
      output: `### Architecture Analysis\n${TRACE}\n\n### Design\n\`\`\`json\n"Spec for design-c"\n\`\`\``,
      meta: {},
    });
  });

  it('drops records that fail the quality gate', async () => {
    const short = JSON.stringify({ question: 'q', thinking_trace: 'only five words right here', answer: 'a' });
    await writeFile(paths.scene1Raw, `${short}\n${qaLine('kept')}\n`, 'utf-8');

    const result = await runPostprocess(paths, options);

    expect(result.scene1).toBe(1);
    expect((await readJSONL(paths.scene1Sft)).map(r => r.instruction)).toEqual(['kept']);
  });

  it('produces byte-identical files when re-run', async () => {
    await writeFile(paths.scene1Raw, `${qaLine('qa-a')}\n${qaLine('qa-b')}\n`, 'utf-8');
    await writeFile(paths.scene2Raw, `${designLine('design-c')}\n`, 'utf-8');

    await runPostprocess(paths, options);
    const first = await Promise.all(
      [paths.scene1Sft, paths.scene2Sft, paths.combinedSft].map(p => readFile(p))
    );
    await runPostprocess(paths, options);
    const second = await Promise.all(
      [paths.scene1Sft, paths.scene2Sft, paths.combinedSft].map(p => readFile(p))
    );

    expect(second).toEqual(first);
  });

  it('writes empty files when every line is malformed', async () => {
    await writeFile(paths.scene1Raw, 'garbage\n{"question": \n', 'utf-8');
    await writeFile(paths.scene2Raw, '[1, 2, 3]\nnull\n', 'utf-8');

    const result = await runPostprocess(paths, options);

    expect(result).toEqual({ scene1: 0, scene2: 0, combined: 0 });
    expect(await readFile(paths.scene1Sft, 'utf-8')).toBe('');
    expect(await readFile(paths.scene2Sft, 'utf-8')).toBe('');
    expect(await readFile(paths.combinedSft, 'utf-8')).toBe('');
  });

  it('treats missing raw logs as empty', async () => {
    expect(await runPostprocess(paths, options)).toEqual({ scene1: 0, scene2: 0, combined: 0 });
  });

  it('puts chunk text into input with includeCode', async () => {
    await writeFile(paths.scene1Raw, `${qaLine('qa-a')}\n`, 'utf-8');

    await runPostprocess(paths, { ...options, includeCode: true });
    const [record] = await readJSONL(paths.scene1Sft);

    expect(record.input).toBe('1 | const a = 1;');
  });
});

describe('mergeSft', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'codemill-merge-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('does not deduplicate identical records across scenes', async () => {
    const paths = artifactPaths(dir);
    const line = '{"instruction":"same","input":"","output":"o","meta":{}}\n';
    await writeFile(paths.scene1Sft, line, 'utf-8');
    await writeFile(paths.scene2Sft, line, 'utf-8');

    expect(await mergeSft(paths, { log: silentLogger })).toBe(2);
    expect(await readFile(paths.combinedSft, 'utf-8')).toBe(line + line);
  });
});
