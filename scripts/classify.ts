import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '@verita/schemas/src/config-loader.js';
import { createLlmClient } from '@verita/core/src/llm/llm-client.js';
import { createReasoningModel } from '@verita/core/src/llm/reasoning-model.js';
import { createSearchProvider } from '@verita/core/src/services/web-search/search-provider.js';
import { createSearchSurface } from '@verita/core/src/services/web-search/search-surface.js';
import { createPipeline } from '@verita/core/src/orchestration/pipeline.js';
import { createImageDescriber } from '@verita/ingestion/src/image/image-describer.js';
import { ingest } from '@verita/ingestion/src/claim.js';
import type { IngestionPayload } from '@verita/shared/src/types/ingestion.types.js';

const DEFAULT_TEXT = 'Historical figure found alive after 200 years, scientists confirm.';

async function readPayload(args: readonly string[]): Promise<IngestionPayload> {
  if (args[0] === '--image') {
    const path = args[1];
    if (!path) {
      throw new Error('Usage: classify --image <path>');
    }
    return { modality: 'image', data: new Uint8Array(await readFile(path)) };
  }
  return { modality: 'text', content: args.join(' ') || DEFAULT_TEXT };
}

async function main(): Promise<void> {
  const configDir = process.env['VERITA_CONFIG_DIR'] ?? resolve(process.cwd(), 'config');
  const payload = await readPayload(process.argv.slice(2));

  console.log('=== Verita Classifier ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Input: ${payload.modality === 'text' ? payload.content : 'image'}`);
  console.log(`Mock LLM: ${process.env['VERITA_MOCK_LLM'] === 'true' ? 'yes' : 'no'}`);
  console.log(`Search backend: ${process.env['VERITA_SEARCH_BACKEND'] ?? 'duckduckgo'}\n`);

  const startTime = Date.now();
  const config = await loadConfig(configDir);

  const describer = payload.modality === 'image' ? await createImageDescriber(config.llm) : undefined;
  const claim = await ingest(payload, { describer });
  if (claim.modality === 'image') {
    console.log(`Extracted claim: ${claim.text}\n`);
  }

  const pipeline = createPipeline({
    config,
    llmClient: await createLlmClient(config.llm),
    reasoningModel: await createReasoningModel(config.llm),
    searchProvider: createSearchProvider(createSearchSurface(config.llm), {
      config: config.search,
      defaultMaxResults: config.agent.maxResultsPerSearch,
    }),
  });

  console.log('Running pipeline...\n');
  const verdict = await pipeline.classify(claim);
  const elapsed = Date.now() - startTime;

  console.log('--- Verdict ---');
  console.log(`  News: ${String(verdict.isNews)}`);
  console.log(`  Misinformation: ${String(verdict.isMisinformation)}`);
  console.log(`  Confidence: ${String(verdict.confidence)}`);
  console.log(`  Summary: ${verdict.summary}`);
  if (verdict.evidence.length > 0) {
    console.log('  Evidence:');
    for (const item of verdict.evidence) {
      console.log(`    - ${item}`);
    }
  }
  if (verdict.sourcesChecked.length > 0) {
    console.log('  Sources:');
    for (const source of verdict.sourcesChecked) {
      console.log(`    - ${source}`);
    }
  }
  console.log(`  Recommendation: ${verdict.recommendation}`);

  console.log(`\n=== Completed in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Classification failed:', error);
  process.exit(1);
});
