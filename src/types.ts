// ============================================================================
// FILE: src/types.ts
// PURPOSE: Core type definitions for the codemill data factory
// ============================================================================

// ----------------------------------------------------------------------------
// SECTION 1: SOURCE TYPES
// These types represent repository content after scanning
// ----------------------------------------------------------------------------

/**
 * DependencyMap - Dependency coordinates scraped from common manifests
 *
 * - maven: "groupId:artifactId" from pom.xml
 * - gradle: coordinates from build.gradle configurations
 * - npm: "name@range" from package.json (dependencies, then devDependencies)
 * - pip: requirement lines from requirements.txt
 */
export interface DependencyMap {
  maven: string[];
  gradle: string[];
  npm: string[];
  pip: string[];
}

/**
 * CodeChunk - A bounded, line-numbered slice of one source file
 *
 * This is the unit written to chunks.json by the analyzer and consumed
 * by the scene 1 pipeline. Field names are snake_case because the
 * manifest is a shared on-disk format.
 *
 * @property file_path - Absolute path of the originating file
 * @property class_name - File stem, used as a short label in prompts
 * @property content_with_lines - "<n> | <line>" rows joined by "\n"
 * @property language - File extension without the dot
 * @property metadata - Opaque sidecar payload (e.g. { deps }), never inspected
 */
export interface CodeChunk {
  file_path: string;
  class_name: string;
  content_with_lines: string;
  language: string;
  metadata: Record<string, unknown>;
}

/**
 * ProjectSkeleton - Contents of project_skeleton.json
 *
 * @property root - Absolute repository root
 * @property paths - Sorted unique relative paths of recognised source files
 * @property dependencies - Manifest dependencies
 */
export interface ProjectSkeleton {
  root: string;
  paths: string[];
  dependencies: DependencyMap;
}

// ----------------------------------------------------------------------------
// SECTION 2: GENERATION TYPES
// ----------------------------------------------------------------------------

/**
 * Scene - The two generation tasks
 *
 * - 'code': question / reasoning / answer triples about one chunk
 * - 'design': feature proposals for the whole project
 */
export type Scene = 'code' | 'design';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * GenerationRequest - One prompt for the backend
 *
 * @property messages - Fixed instruction block followed by the task block
 * @property count - How many records the prompt asks for
 * @property scene - Which record shape the response should carry
 */
export interface GenerationRequest {
  messages: ChatMessage[];
  count: number;
  scene: Scene;
}

// ----------------------------------------------------------------------------
// SECTION 3: RECORD TYPES
// Parsed backend output, one variant per scene
// ----------------------------------------------------------------------------

export interface QARecord {
  question: string;
  thinking_trace: string;
  answer: string;
}

export interface DesignRecord {
  feature_title: string;
  thinking_trace: string;
  design_spec: string;
}

/**
 * CandidateRecord - Closed union of per-scene record shapes
 */
export type CandidateRecord = QARecord | DesignRecord;

/**
 * RecordView - Scene-independent view of a record
 *
 * primary is the question or feature title, reasoning the thinking
 * trace, payload the answer or design. Persisted design payloads may be
 * structured values, hence unknown.
 */
export interface RecordView {
  primary: string;
  reasoning: string;
  payload: unknown;
}

/**
 * Scene1RawRecord - One line of scene1_raw.jsonl
 */
export interface Scene1RawRecord extends QARecord {
  file_path: string;
  class_name: string;
  code: string;
}

/**
 * Scene2RawRecord - One line of scene2_raw.jsonl
 *
 * @property project_files - Every path offered to the backend
 * @property sample_files - The subset highlighted in the prompt
 * @property project_skeleton - Textual project-structure listing
 */
export interface Scene2RawRecord extends DesignRecord {
  project_files: string[];
  sample_files: string[];
  project_skeleton: string;
}

// ----------------------------------------------------------------------------
// SECTION 4: OUTPUT TYPES
// ----------------------------------------------------------------------------

export interface SftMeta {
  file_path?: string;
  class_name?: string;
}

/**
 * SftRecord - One supervised fine-tuning example
 *
 * EXAMPLE:
 * {
 *   "instruction": "What does parseHeader return on an empty buffer?",
 *   "input": "",
 *   "output": "### Reasoning\n...\n\n### Answer\n...",
 *   "meta": { "file_path": "/repo/src/header.ts", "class_name": "header" }
 * }
 */
export interface SftRecord {
  instruction: string;
  input: string;
  output: string;
  meta: SftMeta;
}

// ----------------------------------------------------------------------------
// SECTION 5: CONFIGURATION TYPES
// ----------------------------------------------------------------------------

export type LLMProvider = 'openai' | 'anthropic';

/**
 * FactoryConfig - Resolved settings for a run
 *
 * Built by loadConfig() from environment variables (and .env).
 */
export interface FactoryConfig {
  targetRepo: string;
  outputDir: string;
  cacheDir: string;
  maxChunkChars: number;
  provider: LLMProvider;
  model: string;
  baseUrl: string | undefined;
  apiKey: string | undefined;
  maxNewTokens: number;
  temperature: number;
  dryRun: boolean;
  githubToken: string | undefined;
}

/**
 * Logger - Minimal sink for progress output
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};

/**
 * isRecord - Narrow parsed JSON to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ----------------------------------------------------------------------------
// SECTION 6: STATISTICS TYPES
// ----------------------------------------------------------------------------

export interface AnalysisResult {
  root: string;
  filesScanned: number;
  chunksWritten: number;
  oversizedChunks: number;
}

export interface PostprocessResult {
  scene1: number;
  scene2: number;
  combined: number;
}

/**
 * DatasetStats - Summary of an SFT file, shown by the stats command
 */
export interface DatasetStats {
  file: string;
  records: number;
  withInput: number;
  sourceFiles: number;
  avgInstructionChars: number;
  avgOutputChars: number;
  estimatedTokens: number;
}
