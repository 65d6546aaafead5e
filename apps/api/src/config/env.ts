import { z } from "zod";

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === "boolean" ? v : ["1", "true", "yes", "on"].includes(v.trim().toLowerCase())));

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  WEB_ORIGIN: z.string().default("http://localhost:5173"),

  LLM_API_URL: z.string().url().default("https://api.cerebras.ai/v1/chat/completions"),
  LLM_API_KEY: optionalString,
  LLM_MODEL: z.string().min(1).default("gpt-oss-120b"),
  LLM_MODEL_FALLBACK: optionalString,
  LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  EMBEDDING_PROVIDER: z.enum(["openai", "hashing"]).default("hashing"),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(64),

  INDEX_BACKEND: z.enum(["flat", "brute"]).default("flat"),
  CHUNK_MAX_CHARS: z.coerce.number().int().min(50).max(20_000).default(1200),
  MCQ_LANGUAGE: z.string().min(1).default("English"),
  VALIDATION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  EVIDENCE_CUTOFF: z.coerce.number().min(0).max(1).default(0.5),
  MODEL_VERIFICATION: booleanFlag.default(true)
});

export type Env = z.infer<typeof EnvSchema>;

export type AppConfig = {
  port: number;
  webOrigin: string;
  llm: {
    apiUrl: string;
    apiKey?: string;
    model: string;
    fallbackModel?: string;
    timeoutMs: number;
    maxRetries: number;
  };
  embedding: {
    provider: "openai" | "hashing";
    apiKey?: string;
    baseUrl?: string;
    model: string;
    batchSize: number;
  };
  indexBackend: "flat" | "brute";
  chunkMaxChars: number;
  language: string;
  validation: {
    similarityThreshold: number;
    evidenceCutoff: number;
    useModelVerification: boolean;
  };
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const env = parsed.data;

  if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is required for EMBEDDING_PROVIDER=openai");
  }

  return {
    port: env.PORT,
    webOrigin: env.WEB_ORIGIN,
    llm: {
      apiUrl: env.LLM_API_URL,
      apiKey: env.LLM_API_KEY,
      model: env.LLM_MODEL,
      fallbackModel: env.LLM_MODEL_FALLBACK,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxRetries: env.LLM_MAX_RETRIES
    },
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.EMBEDDING_MODEL,
      batchSize: env.EMBEDDING_BATCH_SIZE
    },
    indexBackend: env.INDEX_BACKEND,
    chunkMaxChars: env.CHUNK_MAX_CHARS,
    language: env.MCQ_LANGUAGE,
    validation: {
      similarityThreshold: env.VALIDATION_THRESHOLD,
      evidenceCutoff: env.EVIDENCE_CUTOFF,
      useModelVerification: env.MODEL_VERIFICATION
    }
  };
}
