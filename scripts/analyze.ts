import { resolve } from 'node:path';
import { loadConfig } from '@epirisk/schemas/src/config-loader.js';
import { createLlmClient } from '@epirisk/core/src/llm/llm-client.js';
import { createEmbeddingClient } from '@epirisk/core/src/embedding/embedding-client.js';
import { createInMemoryEvidenceStore } from '@epirisk/core/src/retrieval/evidence-store.js';
import { indexDirectory } from '@epirisk/core/src/retrieval/corpus-indexer.js';
import { createDetector } from '@epirisk/core/src/orchestration/detector.js';
import { renderStructured } from '@epirisk/core/src/rendering/structured-renderer.js';
import { renderText } from '@epirisk/core/src/rendering/text-renderer.js';

const USAGE = 'Usage: analyze <corpusDir> <answerText> [--json] [--config path]';

interface CliArgs {
  readonly corpusDir: string;
  readonly answerText: string;
  readonly json: boolean;
  readonly configPath?: string;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let json = false;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json') {
      json = true;
    } else if (arg === '--config') {
      configPath = argv[++i];
      if (!configPath) throw new Error(`--config needs a path\n${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  const [corpusDir, answerText] = positional;
  if (!corpusDir || answerText === undefined || positional.length > 2) {
    throw new Error(USAGE);
  }

  return { corpusDir: resolve(corpusDir), answerText, json, configPath };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = await loadConfig(args.configPath);

  const evidenceStore = createInMemoryEvidenceStore(createEmbeddingClient(config), config.retrieval);
  const chunkCount = await indexDirectory(evidenceStore, args.corpusDir, config.retrieval.extensions);

  const detector = createDetector({
    llmClient: await createLlmClient(config.llm),
    evidenceStore,
    config,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
  });

  const { report, extraction } = await detector.analyze(args.answerText, {
    signal: controller.signal,
  });

  if (args.json) {
    console.log(JSON.stringify(renderStructured(report, extraction), null, 2));
    return;
  }

  console.log(`Corpus: ${args.corpusDir} (${String(chunkCount)} chunks)`);
  if (extraction.error) {
    console.log(`Extraction failed: ${extraction.error}`);
  }
  console.log('');
  console.log(renderText(report));
}

main().catch((error: unknown) => {
  console.error('Analysis failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
