import type { AppConfig } from "@/lib/config";
import { loadConfig } from "@/lib/config";
import { ConfigurationError } from "@/lib/errors";
import { connectToDB } from "@/lib/db";
import type { DocumentStore } from "@/lib/documents";
import type { VectorIndex } from "@/lib/vector-index";
import { EmbeddingProvider, OpenAIEmbeddingProvider } from "@/lib/embeddings";
import { AnswerGenerator, OpenAIAnswerGenerator } from "@/lib/answer";
import { createRetryPolicy, RetryPolicy } from "@/lib/retry";
import { InMemoryDocumentStore, InMemoryVectorIndex } from "@/lib/memory-store";
import { MongoDocumentStore, MongoVectorIndex } from "@/lib/mongo-store";
import { getOpenAI } from "@/lib/openai";
import { createLogger } from "@/lib/logger";
import { ChunkModel } from "@/models/Chunk";
import { DocumentModel } from "@/models/Document";

/**
 * Tudo que uma operação de ingestão/consulta precisa, passado de forma
 * explícita. Só existe depois de `connectRuntime` (conectado e pronto).
 */
export interface RagRuntime {
  config: AppConfig;
  documents: DocumentStore;
  index: VectorIndex;
  embedder: EmbeddingProvider;
  generator: AnswerGenerator;
  retry: RetryPolicy;
}

export type RuntimeOverrides = Partial<Omit<RagRuntime, "config">>;

export async function connectRuntime(
  config: AppConfig,
  overrides: RuntimeOverrides = {}
): Promise<RagRuntime> {
  const log = createLogger({ action: "connectRuntime" });
  const dimension = config.embedding.dimension;

  let documents = overrides.documents;
  let index = overrides.index;
  if (!documents || !index) {
    if (config.vectorIndex === "mongo") {
      await connectToDB(config.mongo.uri, config.mongo.dbName);
      // garante índices (fileId único, partição por documento) antes de servir
      await Promise.all([DocumentModel.init(), ChunkModel.init()]);
      documents ??= new MongoDocumentStore();
      index ??= new MongoVectorIndex({
        dimension,
        vectorSearchIndex: config.mongo.vectorSearchIndex,
        numCandidates: config.mongo.numCandidates,
      });
    } else {
      documents ??= new InMemoryDocumentStore();
      index ??= new InMemoryVectorIndex(dimension);
    }
  }

  const embedder =
    overrides.embedder ??
    new OpenAIEmbeddingProvider(
      getOpenAI(config.openai.apiKey, config.openai.timeoutMs),
      config.openai.embeddingsModel,
      dimension
    );
  const generator =
    overrides.generator ??
    new OpenAIAnswerGenerator(getOpenAI(config.openai.apiKey, config.openai.timeoutMs), {
      model: config.openai.chatModel,
      temperature: config.openai.temperature,
      maxTokens: config.openai.maxTokens,
    });

  if (index.dimension !== dimension || embedder.dimension !== dimension) {
    throw new ConfigurationError(
      `Dimension mismatch: config=${dimension}, index=${index.dimension}, embedder=${embedder.dimension}`
    );
  }

  const retry =
    overrides.retry ??
    createRetryPolicy({
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    });

  log.info("Runtime ready", { vectorIndex: config.vectorIndex, dimension });
  return { config, documents, index, embedder, generator, retry };
}

type GlobalWithRuntime = typeof globalThis & {
  _ragRuntime?: Promise<RagRuntime>;
};

/**
 * Runtime compartilhado pelas rotas do Next (um por processo). O núcleo
 * nunca chama isto; recebe o runtime como argumento.
 */
export function getRuntime(): Promise<RagRuntime> {
  const g = global as GlobalWithRuntime;
  if (!g._ragRuntime) {
    g._ragRuntime = connectRuntime(loadConfig()).catch((e: unknown) => {
      g._ragRuntime = undefined;
      throw e;
    });
  }
  return g._ragRuntime;
}
