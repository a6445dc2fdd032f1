import { z } from "zod";
import { ConfigurationError } from "@/lib/errors";
import { validateChunkOptions } from "@/lib/chunking";

const int = (def: number) => z.coerce.number().int().default(def);
const positiveInt = (def: number) => z.coerce.number().int().positive().default(def);

const EnvSchema = z.object({
  MONGODB_URI: z.string().optional(),
  MONGODB_DB: z.string().min(1).default("doc_rag"),
  VECTOR_INDEX: z.enum(["mongo", "memory"]).default("mongo"),
  // índice Atlas Vector Search; sem ele a busca é exata sobre a partição
  MONGODB_VECTOR_SEARCH_INDEX: z.string().optional(),
  MONGODB_VECTOR_NUM_CANDIDATES: positiveInt(100),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDINGS_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-3.5-turbo"),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  OPENAI_MAX_TOKENS: positiveInt(500),

  EMBEDDING_DIMENSION: positiveInt(1536),
  EMBEDDING_BATCH_SIZE: positiveInt(256),

  CHUNK_SIZE: int(1000),
  CHUNK_OVERLAP: int(200),
  CHUNK_LOOKBACK: int(100),
  MAX_CHUNK_TEXT_CHARS: positiveInt(10000),

  RETRIEVAL_TOP_K: positiveInt(5),
  MAX_CONTEXT_CHARS: positiveInt(6000),
  MIN_FRAGMENT_CHARS: z.coerce.number().int().nonnegative().default(50),

  PROVIDER_MAX_ATTEMPTS: positiveInt(3),
  PROVIDER_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  PROVIDER_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8000),
  PROVIDER_TIMEOUT_MS: positiveInt(30000),

  MAX_UPLOAD_BYTES: positiveInt(25 * 1024 * 1024),
});

export type AppConfig = {
  mongo: {
    uri?: string;
    dbName: string;
    vectorSearchIndex?: string;
    numCandidates: number;
  };
  vectorIndex: "mongo" | "memory";
  openai: {
    apiKey?: string;
    embeddingsModel: string;
    chatModel: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  embedding: { dimension: number; batchSize: number };
  chunking: { chunkSize: number; overlap: number; lookback: number; maxChunkChars: number };
  retrieval: { topK: number; maxContextChars: number; minFragmentChars: number };
  retry: { maxAttempts: number; initialDelayMs: number; maxDelayMs: number };
  maxUploadBytes: number;
};

type Env = Record<string, string | undefined>;

/**
 * Lê e valida as variáveis de ambiente. Valores vazios contam como
 * ausentes. Qualquer inconsistência vira ConfigurationError.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const cleaned: Env = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") cleaned[k] = v.trim();
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  const chunking = validateChunkOptions({
    chunkSize: e.CHUNK_SIZE,
    overlap: e.CHUNK_OVERLAP,
    lookback: e.CHUNK_LOOKBACK,
  });
  // o campo de texto do chunk é limitado; nunca truncamos em silêncio
  if (chunking.chunkSize > e.MAX_CHUNK_TEXT_CHARS) {
    throw new ConfigurationError(
      `CHUNK_SIZE (${chunking.chunkSize}) exceeds MAX_CHUNK_TEXT_CHARS (${e.MAX_CHUNK_TEXT_CHARS})`
    );
  }
  if (e.PROVIDER_MAX_DELAY_MS < e.PROVIDER_INITIAL_DELAY_MS) {
    throw new ConfigurationError(
      "PROVIDER_MAX_DELAY_MS must be >= PROVIDER_INITIAL_DELAY_MS"
    );
  }
  if (e.VECTOR_INDEX === "mongo" && !e.MONGODB_URI) {
    throw new ConfigurationError("Missing MONGODB_URI (required when VECTOR_INDEX=mongo)");
  }

  return {
    mongo: {
      uri: e.MONGODB_URI,
      dbName: e.MONGODB_DB,
      vectorSearchIndex: e.MONGODB_VECTOR_SEARCH_INDEX,
      numCandidates: e.MONGODB_VECTOR_NUM_CANDIDATES,
    },
    vectorIndex: e.VECTOR_INDEX,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      embeddingsModel: e.OPENAI_EMBEDDINGS_MODEL,
      chatModel: e.OPENAI_CHAT_MODEL,
      temperature: e.OPENAI_TEMPERATURE,
      maxTokens: e.OPENAI_MAX_TOKENS,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
    },
    embedding: {
      dimension: e.EMBEDDING_DIMENSION,
      batchSize: e.EMBEDDING_BATCH_SIZE,
    },
    chunking: { ...chunking, maxChunkChars: e.MAX_CHUNK_TEXT_CHARS },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      maxContextChars: e.MAX_CONTEXT_CHARS,
      minFragmentChars: e.MIN_FRAGMENT_CHARS,
    },
    retry: {
      maxAttempts: e.PROVIDER_MAX_ATTEMPTS,
      initialDelayMs: e.PROVIDER_INITIAL_DELAY_MS,
      maxDelayMs: e.PROVIDER_MAX_DELAY_MS,
    },
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
  };
}
