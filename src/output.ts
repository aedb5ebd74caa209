// ============================================================================
// FILE: src/output.ts
// PURPOSE: JSONL I/O, SFT reshaping, merging and dataset statistics
// ============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { type DatasetStats, type RecordView, type SftRecord, isRecord } from './types.js';

// ----------------------------------------------------------------------------
// SECTION 1: JSONL FILES
// ----------------------------------------------------------------------------

/**
 * writeJSONL - Write records to a JSONL file, replacing its contents
 *
 * Each record is one JSON line terminated by "\n". No records gives an
 * empty file.
 */
export async function writeJSONL(records: readonly unknown[], outputPath: string): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  const content = records.map(r => JSON.stringify(r) + '\n').join('');

  await fs.writeFile(outputPath, content, 'utf-8');
}

/**
 * readJSONL - Read JSON objects from a JSONL file
 *
 * A missing file reads as empty. Blank lines, lines that are not valid
 * JSON and lines that are not objects are skipped.
 */
export async function readJSONL(filePath: string): Promise<Record<string, unknown>[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const records: Record<string, unknown>[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      const value: unknown = JSON.parse(trimmed);
      if (isRecord(value)) records.push(value);
    } catch {
      continue;
    }
  }
  return records;
}

/**
 * JsonlAppender - Append-only JSONL log for one run
 *
 * Opening truncates the file. Writes are sequential; close() must be
 * called once the run is over.
 *
 * EXAMPLE:
 * const log = await JsonlAppender.open('data/scene1_raw.jsonl');
 * await log.append({ question: '...' });
 * await log.close();
 */
export class JsonlAppender {
  private written = 0;

  private constructor(
    readonly filePath: string,
    private readonly handle: fs.FileHandle
  ) {}

  static async open(filePath: string): Promise<JsonlAppender> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const handle = await fs.open(filePath, 'w');
    return new JsonlAppender(filePath, handle);
  }

  async append(record: unknown): Promise<void> {
    await this.handle.write(JSON.stringify(record) + '\n');
    this.written++;
  }

  get count(): number {
    return this.written;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

// ----------------------------------------------------------------------------
// SECTION 2: SFT RESHAPING
// ----------------------------------------------------------------------------

export const QA_REASONING_HEADER = '### Reasoning';
export const QA_ANSWER_HEADER = '### Answer';
export const DESIGN_ANALYSIS_HEADER = '### Architecture Analysis';
export const DESIGN_SPEC_HEADER = '### Design';

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * toQASft - Reshape an accepted code record
 *
 * input stays empty unless includeCode is set, in which case it carries
 * the chunk the question was asked about.
 *
 * @param raw - Persisted raw-log record (provenance source)
 * @param view - Its trimmed view
 */
export function toQASft(
  raw: Record<string, unknown>,
  view: RecordView,
  options: { includeCode?: boolean } = {}
): SftRecord {
  return {
    instruction: view.primary,
    input: options.includeCode ? text(raw.code).trim() : '',
    output: `${QA_REASONING_HEADER}\n${view.reasoning}\n\n${QA_ANSWER_HEADER}\n${text(view.payload)}`,
    meta: {
      file_path: text(raw.file_path),
      class_name: text(raw.class_name),
    },
  };
}

/**
 * toDesignSft - Reshape an accepted design record
 *
 * The design payload is rendered as indented JSON in a ```json fence.
 * meta is always empty for design records.
 */
export function toDesignSft(raw: Record<string, unknown>, view: RecordView): SftRecord {
  const design = JSON.stringify(view.payload, null, 2);
  return {
    instruction: view.primary,
    input: `Project structure:\n${text(raw.project_skeleton)}`,
    output:
      `${DESIGN_ANALYSIS_HEADER}\n${view.reasoning}\n\n` +
      `${DESIGN_SPEC_HEADER}\n\`\`\`json\n${design}\n\`\`\``,
    meta: {},
  };
}

/**
 * mergeRecords - QA records followed by design records
 *
 * Plain concatenation: order is kept and nothing is deduplicated.
 */
export function mergeRecords<T>(qa: readonly T[], design: readonly T[]): T[] {
  return [...qa, ...design];
}

// ----------------------------------------------------------------------------
// SECTION 3: STATISTICS
// ----------------------------------------------------------------------------

/**
 * calculateDatasetStats - Summarise an SFT file's records
 *
 * Token estimate uses chars / 4.
 */
export function calculateDatasetStats(
  file: string,
  records: Record<string, unknown>[]
): DatasetStats {
  let instructionChars = 0;
  let outputChars = 0;
  let totalChars = 0;
  let withInput = 0;
  const sources = new Set<string>();

  for (const r of records) {
    const instruction = text(r.instruction);
    const input = text(r.input);
    const output = text(r.output);

    instructionChars += instruction.length;
    outputChars += output.length;
    totalChars += instruction.length + input.length + output.length;
    if (input) withInput++;

    const meta = r.meta;
    if (isRecord(meta) && typeof meta.file_path === 'string' && meta.file_path) {
      sources.add(meta.file_path);
    }
  }

  const n = records.length;
  return {
    file,
    records: n,
    withInput,
    sourceFiles: sources.size,
    avgInstructionChars: n ? Math.round(instructionChars / n) : 0,
    avgOutputChars: n ? Math.round(outputChars / n) : 0,
    estimatedTokens: Math.ceil(totalChars / 4),
  };
}

/**
 * formatStats - Format dataset statistics for console output
 */
export function formatStats(stats: DatasetStats): string {
  return `
📊 Dataset Statistics
═══════════════════════════════
File:            ${stats.file}
Records:         ${stats.records}
With input:      ${stats.withInput}
Source files:    ${stats.sourceFiles}
Avg instruction: ${stats.avgInstructionChars} chars
Avg output:      ${stats.avgOutputChars} chars
Tokens:          ${stats.estimatedTokens.toLocaleString()}
`;
}
