/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration into one Config object.
 * 2. Create the Gemini embedding and generation clients.
 * 3. On first start (no persisted base indexes), build base indexes from
 *    DATA_ROOT/<project>/<version>/.
 * 4. Bootstrap the index registry: load base indexes, load or rebuild delta
 *    indexes from the injection log. Slugs that fail are reported, not fatal.
 * 5. Serve the request operations over HTTP (default; REST + MCP at /mcp) or
 *    MCP over stdio (MCP_TRANSPORT=stdio).
 *
 * Logging goes to stderr so stdout stays clean for the stdio transport.
 */
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { AnswerSynthesizer } from "./answer-synthesizer";
import { getConfig, type Config } from "./config";
import { buildBaseIndexes, storageIsEmpty } from "./corpus-builder";
import { Embeddings } from "./embeddings";
import { GeminiGenerator } from "./generation";
import { InjectionRecorder } from "./injection-recorder";
import { createMcpServerFactory } from "./mcp-server";
import { Persistence } from "./persistence";
import { RagService } from "./rag-service";
import { IndexRegistry } from "./registry";
import { StatusManager } from "./status";
import { ThreadStore } from "./thread-store";
import { createHttpApp, startHttpTransport } from "./transport/http";

const config: Config = getConfig();
const { GEMINI_API_KEY } = config;
if (!GEMINI_API_KEY) {
  console.error("[RAG] Error: GEMINI_API_KEY environment variable is required");
  process.exit(1);
}

const embeddings = new Embeddings(GEMINI_API_KEY, config.EMBEDDING_MODEL, config.GENERATION_TIMEOUT_MS);
embeddings.init();
const generator = new GeminiGenerator({
  apiKey: GEMINI_API_KEY,
  modelName: config.GENERATION_MODEL,
  timeoutMs: config.GENERATION_TIMEOUT_MS,
});

const status = new StatusManager();
status.setModels(embeddings.getModelName(), config.GENERATION_MODEL);

const persistence = new Persistence(config.VERBOSE);
const recorder = new InjectionRecorder({ root: config.INJECT_ROOT });
const registry = new IndexRegistry({
  storageRoot: config.STORAGE_ROOT,
  deltaRoot: config.DELTA_ROOT,
  embedder: embeddings,
  persistence,
  recorder,
});

if (storageIsEmpty(config.STORAGE_ROOT)) {
  console.error("[RAG] No base indexes found - building from data root (first startup may take a while)");
  const built = await buildBaseIndexes({
    dataRoot: config.DATA_ROOT,
    storageRoot: config.STORAGE_ROOT,
    embedder: embeddings,
    persistence,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    verbose: config.VERBOSE,
  });
  console.error(`[RAG] Built ${built.built.length} base indexes (${built.failed.length} failed)`);
}

status.markReady(await registry.bootstrap());

const service = new RagService({
  config,
  registry,
  recorder,
  threads: new ThreadStore(config.STATE_ROOT),
  synthesizer: new AnswerSynthesizer({
    generator,
    temperature: config.TEMPERATURE,
    domain: config.ASSISTANT_DOMAIN,
  }),
  status,
});
const createServer = createMcpServerFactory(service);

if (config.MCP_TRANSPORT === "stdio") {
  status.markTransport("stdio");
  await createServer().connect(new StdioServerTransport());
} else {
  status.markTransport("http");
  const opts = {
    port: config.PORT,
    host: config.HOST,
    allowedHosts: config.ALLOWED_HOSTS,
    dnsRebindingProtection: config.DNS_REBINDING_PROTECTION,
  };
  await startHttpTransport(createHttpApp(service, createServer, opts), opts);
}
