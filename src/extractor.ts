// ============================================================================
// FILE: src/extractor.ts
// PURPOSE: Parse free-form backend output into structured candidate records
// ============================================================================

import { z } from 'zod';
import {
  type CandidateRecord,
  type DesignRecord,
  type QARecord,
  type RecordView,
  type Scene,
  isRecord,
} from './types.js';

/**
 * MIN_EXTRACT_WORDS - Reasoning length below which a parsed element is dropped
 *
 * The postprocessing filter applies a higher threshold on top of this.
 */
export const MIN_EXTRACT_WORDS = 5;

/**
 * countWords - Number of whitespace-delimited tokens
 *
 * countWords('  one two\tthree\n') -> 3
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

// ----------------------------------------------------------------------------
// SECTION 1: RECORD SCHEMAS
// ----------------------------------------------------------------------------

const requiredText = z
  .string()
  .transform(s => s.trim())
  .refine(s => s.length > 0, { message: 'must not be blank' });

const reasoningText = z
  .string()
  .transform(s => s.trim())
  .refine(s => countWords(s) >= MIN_EXTRACT_WORDS, {
    message: `needs at least ${MIN_EXTRACT_WORDS} words`,
  });

const qaSchema: z.ZodType<QARecord> = z.object({
  question: requiredText,
  thinking_trace: reasoningText,
  answer: requiredText,
});

const designSchema: z.ZodType<DesignRecord> = z.object({
  feature_title: requiredText,
  thinking_trace: reasoningText,
  design_spec: requiredText,
});

/**
 * SCENE_KEYS - Key holding the records array in each scene's response
 */
export const SCENE_KEYS: Record<Scene, string> = {
  code: 'samples',
  design: 'plans',
};

// ----------------------------------------------------------------------------
// SECTION 2: FALLBACK CHAIN
// ----------------------------------------------------------------------------

/**
 * stripCodeFence - Remove an enclosing ``` fence and its language tag
 *
 * Only applies when the trimmed text starts with a fence.
 *
 * stripCodeFence('```json\n{"a":1}\n```') -> '{"a":1}\n'
 */
export function stripCodeFence(text: string): string {
  let t = text.trim();
  if (t.startsWith('```')) {
    t = t.replace(/^`+/, '').replace(/`+$/, '');
    t = t.replace(/^[A-Za-z][\w+-]*/, '').trimStart();
  }
  return t;
}

/**
 * candidateTexts - Texts to try parsing, in order
 *
 * The stripped text itself, then the span from the first "{" to the
 * last "}" when both exist in that order.
 */
export function candidateTexts(stripped: string): string[] {
  const candidates = [stripped];
  const start = stripped.indexOf('{');
  const end = stripped.lastIndexOf('}');
  if (start !== -1 && end !== -1 && start < end) {
    candidates.push(stripped.slice(start, end + 1));
  }
  return candidates;
}

type ParseOutcome = { ok: true; value: unknown } | { ok: false };

function tryParseJSON(text: string): ParseOutcome {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * recordsArray - Locate the records array in a parsed value
 *
 * Accepts { [key]: [...] } or a bare array; anything else is undefined.
 */
function recordsArray(value: unknown, key: string): unknown[] | undefined {
  const items = isRecord(value) && key in value ? value[key] : value;
  return Array.isArray(items) ? items : undefined;
}

/**
 * extractWith - Shared extraction loop for both scenes
 *
 * ALGORITHM:
 * 1. Strip a surrounding code fence
 * 2. For each candidate (whole text, then outermost brace span):
 *    a. Skip it unless it parses as JSON
 *    b. Skip it unless it holds a records array
 *    c. Otherwise validate each element and stop here
 */
function extractWith<T>(
  raw: string,
  key: string,
  schema: z.ZodType<T>
): T[] {
  for (const candidate of candidateTexts(stripCodeFence(raw))) {
    const parsed = tryParseJSON(candidate);
    if (!parsed.ok) continue;

    const items = recordsArray(parsed.value, key);
    if (!items) continue;

    // This candidate decides the result, even if every element fails
    const cleaned: T[] = [];
    for (const item of items) {
      const result = schema.safeParse(item);
      if (result.success) cleaned.push(result.data);
    }
    return cleaned;
  }

  return [];
}

// ----------------------------------------------------------------------------
// SECTION 3: PUBLIC API
// ----------------------------------------------------------------------------

/**
 * extractRecords - Parse backend text into validated records
 *
 * Tries the fence-stripped text, then its outermost brace span. The first
 * candidate that parses into a records array decides the result; its
 * invalid elements are dropped individually. Returns [] when nothing
 * parses. Never throws.
 *
 * @param raw - Backend output
 * @param scene - Which record shape to expect
 * @returns Trimmed records in their original order
 */
export function extractRecords(raw: string, scene: 'code'): QARecord[];
export function extractRecords(raw: string, scene: 'design'): DesignRecord[];
export function extractRecords(raw: string, scene: Scene): CandidateRecord[];
export function extractRecords(raw: string, scene: Scene): CandidateRecord[] {
  return scene === 'code'
    ? extractWith(raw, SCENE_KEYS.code, qaSchema)
    : extractWith(raw, SCENE_KEYS.design, designSchema);
}

export function parseQAResponse(raw: string): QARecord[] {
  return extractRecords(raw, 'code');
}

export function parseDesignResponse(raw: string): DesignRecord[] {
  return extractRecords(raw, 'design');
}

/**
 * viewCandidate - Scene-independent view of a parsed record
 */
export function viewCandidate(record: CandidateRecord): RecordView {
  if ('question' in record) {
    return { primary: record.question, reasoning: record.thinking_trace, payload: record.answer };
  }
  return { primary: record.feature_title, reasoning: record.thinking_trace, payload: record.design_spec };
}
