// ============================================================================
// FILE: src/quality.ts
// PURPOSE: Accept or reject persisted records before they become SFT data
// ============================================================================

import { countWords } from './extractor.js';
import type { RecordView, Scene } from './types.js';

/**
 * MIN_FILTER_WORDS - Reasoning length required at postprocessing
 *
 * Stricter than the extractor, so anything accepted here was also
 * accepted at extraction time.
 */
export const MIN_FILTER_WORDS = 10;

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * isEmptyPayload - Whether a design payload counts as absent
 *
 * undefined, null, false, 0, NaN, "", [] and {} are all absent.
 * Whitespace-only strings are not.
 */
export function isEmptyPayload(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.length === 0;
  if (typeof value === 'number') return value === 0 || Number.isNaN(value);
  if (typeof value === 'boolean') return !value;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

/**
 * viewRawRecord - Read a persisted raw-log line as a RecordView
 *
 * Code records: question / thinking_trace / answer.
 * Design records: instruction (else feature_title) / thinking_trace /
 * design_output (else design_spec). Non-string text fields read as "".
 * The design payload is passed through untouched.
 */
export function viewRawRecord(raw: Record<string, unknown>, scene: Scene): RecordView {
  if (scene === 'code') {
    return {
      primary: text(raw.question),
      reasoning: text(raw.thinking_trace),
      payload: text(raw.answer),
    };
  }

  return {
    primary: text(raw.instruction) || text(raw.feature_title),
    reasoning: text(raw.thinking_trace),
    payload: 'design_output' in raw ? raw.design_output : raw.design_spec,
  };
}

/**
 * accept - Quality gate applied during postprocessing
 *
 * Rejects a blank question / instruction, a blank answer, an absent
 * design payload, or reasoning shorter than MIN_FILTER_WORDS.
 */
export function accept(view: RecordView, scene: Scene): boolean {
  if (!view.primary.trim()) return false;
  if (countWords(view.reasoning) < MIN_FILTER_WORDS) return false;

  if (scene === 'code') {
    return typeof view.payload === 'string' && view.payload.trim().length > 0;
  }
  return !isEmptyPayload(view.payload);
}
