import { buildApp } from './app.js';
import { FilePayloadStore } from './cache/payloadStore.js';
import { ResultArchive } from './cache/resultArchive.js';
import { ResultCache } from './cache/resultCache.js';
import { assertRuntimeConfig, config } from './config/app.js';
import { OpenAIChatModel } from './llm/openaiModel.js';
import { HttpLogStore } from './logstore/httpLogStore.js';
import { LogGroupCatalog } from './orchestrator/groupCatalog.js';
import { Orchestrator, settingsFromConfig } from './orchestrator/index.js';
import { ConversationStore } from './services/conversationStore.js';
import { ToolAdapter } from './tools/index.js';
import { createComponentLogger } from './utils/logger.js';
import { createRedactor } from './utils/sanitize-text.js';
import { initTelemetry, shutdownTelemetry, telemetryOptionsFromConfig } from './utils/telemetry.js';

const log = createComponentLogger('server');

const runtimeConfig = assertRuntimeConfig(config);
initTelemetry(telemetryOptionsFromConfig(config));

const cache = new ResultCache({
  capacityBytes: Math.round(config.CACHE_MAX_SIZE_MB * 1024 * 1024),
  ttlMs: config.CACHE_TTL_SECONDS * 1000,
  recencyFloorMs: config.CACHE_RECENCY_FLOOR_MS,
  historicalAgeMs: config.CACHE_HISTORICAL_AGE_HOURS * 60 * 60 * 1000,
  store: new FilePayloadStore(config.CACHE_DIR)
});
await cache.ready();

const archive = new ResultArchive({
  ttlMs: config.RESULT_ARCHIVE_TTL_SECONDS * 1000,
  maxEntries: config.RESULT_ARCHIVE_MAX_ENTRIES
});

const remote = new HttpLogStore({ endpoint: runtimeConfig.LOG_STORE_ENDPOINT, apiKey: config.LOG_STORE_API_KEY });

const tools = new ToolAdapter({
  remote,
  cache,
  redactor: createRedactor({ enabled: config.PII_SANITIZATION_ENABLED }),
  archive,
  itemCap: config.TOOL_ITEM_CAP,
  retry: { maxRetries: config.REMOTE_MAX_RETRIES, timeoutMs: config.REMOTE_TIMEOUT_MS }
});

const model = new OpenAIChatModel({
  model: config.MODEL_NAME,
  apiKey: config.OPENAI_API_KEY,
  baseURL: config.OPENAI_BASE_URL,
  temperature: config.MODEL_TEMPERATURE,
  maxTokens: config.MODEL_MAX_TOKENS
});

let catalog: LogGroupCatalog | undefined;
if (config.GROUP_CATALOG_ENABLED) {
  catalog = new LogGroupCatalog(remote);
  await catalog.refresh();
}

const settings = settingsFromConfig(config);
const conversations = new ConversationStore(
  (conversationId) => new Orchestrator({ conversationId, model, tools, cache, settings, archive, catalog }),
  { idleMs: config.CONVERSATION_IDLE_MINUTES * 60 * 1000 }
);
const sweep = setInterval(() => {
  conversations.sweepIdle();
  archive.evictExpired();
}, 60_000);
sweep.unref();

const app = await buildApp({ conversations, cache, catalog });

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.on(signal, () => {
    app.log.info(`Received ${signal}, shutting down gracefully.`);
    clearInterval(sweep);
    app
      .close()
      .then(() => shutdownTelemetry())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        app.log.error({ err: error }, 'shutdown failed');
        process.exit(1);
      });
  });
});

try {
  await app.listen({ port: config.PORT, host: '0.0.0.0' });
  log.info({ port: config.PORT, model: config.MODEL_NAME }, 'logscope backend listening');
} catch (error) {
  app.log.error(error);
  process.exit(1);
}
