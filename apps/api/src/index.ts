import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

import { createApp, type ServiceState } from "./app.js";
import { loadConfig, type AppConfig } from "./config/env.js";
import { HashingEmbeddingProvider, OpenAIEmbeddingProvider, type EmbeddingProvider } from "./services/embedder.js";
import { HttpChatClient } from "./services/llmClient.js";
import { McqPipeline } from "./services/pipeline.js";

// Load `apps/api/.env` regardless of where the process is started from (repo root vs apps/api).
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });
dotenv.config(); // fallback to cwd `.env` if present

const config = loadConfig();

function createEmbedder(cfg: AppConfig["embedding"]): EmbeddingProvider {
  if (cfg.provider === "openai" && cfg.apiKey) {
    return new OpenAIEmbeddingProvider({ apiKey: cfg.apiKey, model: cfg.model, baseUrl: cfg.baseUrl, batchSize: cfg.batchSize });
  }
  return new HashingEmbeddingProvider();
}

async function warmUp(state: ServiceState) {
  const embedder = createEmbedder(config.embedding);
  // Fail fast on a bad embedding key or model before taking traffic.
  await embedder.embedText("warm-up");

  if (!config.llm.apiKey) console.warn("[api] LLM_API_KEY is not set; generation requests will fail to authenticate");
  const chat = new HttpChatClient({
    apiUrl: config.llm.apiUrl,
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    fallbackModel: config.llm.fallbackModel,
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries
  });

  state.pipeline = new McqPipeline({
    embedder,
    chat,
    settings: {
      indexBackend: config.indexBackend,
      chunkMaxChars: config.chunkMaxChars,
      language: config.language,
      validation: config.validation
    }
  });
  console.log(`[api] ready (embeddings: ${embedder.name}, index: ${config.indexBackend}, model: ${config.llm.model})`);
}

const state: ServiceState = { pipeline: null };
const app = createApp({ state, webOrigin: config.webOrigin });

app.listen(config.port, () => {
  console.log(`[api] listening on http://localhost:${config.port}`);
});

warmUp(state).catch((err: unknown) => {
  console.error("[api] warm-up failed", err);
  process.exit(1);
});
