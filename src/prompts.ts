// ============================================================================
// FILE: src/prompts.ts
// PURPOSE: Render chunks and file listings into generation requests
// ============================================================================

import type { ChatMessage, CodeChunk, GenerationRequest } from './types.js';

// ----------------------------------------------------------------------------
// SECTION 1: INSTRUCTION BLOCKS
// ----------------------------------------------------------------------------

export const CODE_SYSTEM_PROMPT =
  'You are a senior software engineer. ' +
  'You read code and generate developer-style questions, step-by-step reasoning, ' +
  'and clear answers. You MUST respond in strict JSON only.';

export const DESIGN_SYSTEM_PROMPT =
  'You are a senior software architect. ' +
  'You design new features that fit into an existing codebase. ' +
  'You must provide clear reasoning and final design specifications. ' +
  'Respond in strict JSON only.';

// ----------------------------------------------------------------------------
// SECTION 2: CODE Q&A SCENE
// ----------------------------------------------------------------------------

/**
 * buildMessagesForChunk - Prompt asking for Q&A samples about one chunk
 *
 * The chunk text is embedded verbatim inside a ```text fence. The
 * response must be {"samples": [{question, thinking_trace, answer}]}.
 *
 * @param chunk - Chunk from chunks.json
 * @param qaCount - Number of samples to ask for
 */
export function buildMessagesForChunk(chunk: CodeChunk, qaCount: number): ChatMessage[] {
  const user = `File path: ${chunk.file_path}
Class / module: ${chunk.class_name}

Code (with line numbers):

\`\`\`text
${chunk.content_with_lines}
\`\`\`

Task:

Propose ${qaCount} realistic questions a developer or product owner might ask
about this code (behavior, intent, edge cases, business logic, etc.).

For each question, write a detailed thinking_trace that explains, step by step,
how you reason about the code to reach an answer.

Then give a concise final answer.

Output STRICTLY as JSON (no comments, no extra text):

{
  "samples": [
    {
      "question": "string",
      "thinking_trace": "string, multi-step reasoning",
      "answer": "string, concise answer"
    }
  ]
}`;

  return [
    { role: 'system', content: CODE_SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

export function buildChunkRequest(chunk: CodeChunk, qaCount: number): GenerationRequest {
  return {
    messages: buildMessagesForChunk(chunk, qaCount),
    count: qaCount,
    scene: 'code',
  };
}

// ----------------------------------------------------------------------------
// SECTION 3: FEATURE DESIGN SCENE
// ----------------------------------------------------------------------------

/**
 * buildMessagesForDesign - Prompt asking for feature proposals
 *
 * @param projectFiles - Every known project path
 * @param sampleFiles - Representative subset shown separately
 * @param designCount - Number of plans to ask for
 */
export function buildMessagesForDesign(
  projectFiles: string[],
  sampleFiles: string[],
  designCount: number
): ChatMessage[] {
  const projectOverview = projectFiles.map(p => `- ${p}`).join('\n');
  const samplesOverview = sampleFiles.map(p => `- ${p}`).join('\n');

  const user = `Existing project structure (partial):

${projectOverview}

Representative files (subset):

${samplesOverview}

Task:
1. Propose ${designCount} realistic new features or enhancements that could be added
to this project. They should be consistent with the existing structure and naming.
2. For each feature, provide a detailed thinking_trace explaining:
- why this feature makes sense,
- how it fits into the architecture,
- what modules or layers it touches,
- what trade-offs you considered.
3. Then write a design_spec describing the final design in a concise, implementable way.

Output STRICTLY as JSON (no comments, no extra text):

{
  "plans": [
    {
      "feature_title": "string",
      "thinking_trace": "string, multi-step reasoning",
      "design_spec": "string, final proposed design"
    }
  ]
}`;

  return [
    { role: 'system', content: DESIGN_SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

export function buildDesignRequest(
  projectFiles: string[],
  sampleFiles: string[],
  designCount: number
): GenerationRequest {
  return {
    messages: buildMessagesForDesign(projectFiles, sampleFiles, designCount),
    count: designCount,
    scene: 'design',
  };
}

/**
 * sampleFiles - Pick min(n, files.length) distinct paths uniformly
 *
 * Partial Fisher-Yates over a copy; the input array is left untouched.
 *
 * @param random - Source of numbers in [0, 1), injectable for tests
 */
export function sampleFiles(
  files: string[],
  n: number,
  random: () => number = Math.random
): string[] {
  const pool = [...files];
  const k = Math.max(0, Math.min(n, pool.length));

  for (let i = 0; i < k; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, k);
}
