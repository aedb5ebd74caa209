#!/usr/bin/env node
// ============================================================================
// FILE: src/index.ts
// PURPOSE: CLI entry point for codemill
// ============================================================================

import 'dotenv/config';
import { Command } from 'commander';
import { runAnalysis } from './analyzer.js';
import { artifactPaths, loadConfig, parseCount } from './config.js';
import { generateScene1, generateScene2 } from './generator.js';
import { LLMClient } from './llm-client.js';
import { calculateDatasetStats, formatStats, readJSONL } from './output.js';
import { runPostprocess } from './postprocess.js';

const program = new Command();

program
  .name('codemill')
  .description('Turn a source repository into supervised fine-tuning data')
  .version('1.0.0');

function fail(err: unknown): never {
  console.error('\n❌ Error:', err instanceof Error ? err.message : err);
  process.exit(1);
}

// ============================================================================
// ANALYZE COMMAND
// ============================================================================

program
  .command('analyze')
  .description('Scan the target repository and build skeleton + chunks')
  .action(async () => {
    console.log('\n🔍 codemill analyze\n');
    const startTime = Date.now();

    try {
      const config = loadConfig();
      const result = await runAnalysis(config);
      console.log(`
📊 Analysis
═══════════════════════════════
Repository:      ${result.root}
Files:           ${result.filesScanned}
Chunks:          ${result.chunksWritten} (${result.oversizedChunks} oversized)
Time:            ${((Date.now() - startTime) / 1000).toFixed(2)}s
`);
      console.log('✅ Done!\n');
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// SCENE 1 COMMAND
// ============================================================================

program
  .command('scene1')
  .description('Generate code Q&A data from chunks.json')
  .option('--limit <n>', 'Max number of chunks', '50')
  .option('--qa-count <n>', 'Q&A pairs per chunk', '3')
  .option('--dry-run', 'Return canned responses instead of calling the model')
  .action(async (opts: { limit: string; qaCount: string; dryRun?: boolean }) => {
    console.log('\n🧠 codemill scene1\n');

    try {
      const config = loadConfig();
      const paths = artifactPaths(config.outputDir);
      const dryRun = opts.dryRun ? true : undefined;

      const total = await generateScene1({
        chunksPath: paths.chunks,
        rawPath: paths.scene1Raw,
        backend: LLMClient.fromConfig(config, dryRun),
        limit: parseCount(opts.limit, '--limit'),
        qaCount: parseCount(opts.qaCount, '--qa-count'),
        dryRun,
      });
      console.log(`\n✅ Done! ${total} samples\n`);
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// SCENE 2 COMMAND
// ============================================================================

program
  .command('scene2')
  .description('Generate feature-design data from project_skeleton.json')
  .option('--count <n>', 'Design batches to generate', '10')
  .option('--sample-files <n>', 'Files shown as representative per batch', '20')
  .option('--dry-run', 'Return canned responses instead of calling the model')
  .action(async (opts: { count: string; sampleFiles: string; dryRun?: boolean }) => {
    console.log('\n🏗️  codemill scene2\n');

    try {
      const config = loadConfig();
      const paths = artifactPaths(config.outputDir);
      const dryRun = opts.dryRun ? true : undefined;

      const total = await generateScene2({
        skeletonPath: paths.skeletonJson,
        skeletonTextPath: paths.skeletonText,
        rawPath: paths.scene2Raw,
        backend: LLMClient.fromConfig(config, dryRun),
        count: parseCount(opts.count, '--count'),
        sampleFileCount: parseCount(opts.sampleFiles, '--sample-files'),
        dryRun,
      });
      console.log(`\n✅ Done! ${total} plans\n`);
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// POSTPROCESS COMMAND
// ============================================================================

program
  .command('postprocess')
  .description('Filter raw scene logs and merge them into one SFT file')
  .option('--include-code', 'Use the chunk text as input for code Q&A records')
  .action(async (opts: { includeCode?: boolean }) => {
    console.log('\n🧹 codemill postprocess\n');

    try {
      const config = loadConfig();
      const result = await runPostprocess(artifactPaths(config.outputDir), {
        includeCode: opts.includeCode === true,
      });
      console.log(`\n✅ Done! ${result.scene1} + ${result.scene2} = ${result.combined} records\n`);
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// STATS COMMAND
// ============================================================================

program
  .command('stats')
  .description('Show stats for an SFT dataset')
  .argument('<file>', 'JSONL file to analyze')
  .action(async (file: string) => {
    try {
      const records = await readJSONL(file);
      console.log(formatStats(calculateDatasetStats(file, records)));
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
