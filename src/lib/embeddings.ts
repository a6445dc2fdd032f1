import { ProviderError, ValidationError, errorMessage } from "@/lib/errors";
import { executeWithRetry, RetryPolicy } from "@/lib/retry";
import { assertDimension } from "@/lib/vector-index";
import { createLogger } from "@/lib/logger";

type Vec = number[];

export interface EmbeddingProvider {
  readonly dimension: number;
  /** Um vetor por texto, na mesma ordem. */
  embed(texts: string[]): Promise<Vec[]>;
}

/** Parte do cliente OpenAI que usamos (facilita fakes nos testes). */
export type EmbeddingsClient = {
  embeddings: {
    create(body: { model: string; input: string[] }): Promise<{
      data: { embedding: number[]; index: number }[];
    }>;
  };
};

type ErrorLike = { name?: unknown; status?: unknown; message?: unknown };

function isErrorLike(e: unknown): e is ErrorLike {
  return typeof e === "object" && e !== null;
}

/**
 * Traduz erros do SDK/HTTP para ProviderError: 429 → rate_limited,
 * timeout de conexão → timeout, resto → provider_failure (com status).
 */
export function toProviderError(e: unknown, label: string): ProviderError {
  if (e instanceof ProviderError) return e;
  const message = `${label}: ${errorMessage(isErrorLike(e) && typeof e.message === "string" ? e.message : e)}`;

  if (isErrorLike(e) && e.name === "APIConnectionTimeoutError") {
    return new ProviderError(message, { code: "timeout", cause: e });
  }
  const status = isErrorLike(e) && typeof e.status === "number" ? e.status : undefined;
  if (status === 429) {
    return new ProviderError(message, { code: "rate_limited", status, cause: e });
  }
  if (status === 408) {
    return new ProviderError(message, { code: "timeout", status, cause: e });
  }
  return new ProviderError(message, { code: "provider_failure", status, cause: e });
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: EmbeddingsClient,
    private readonly model: string,
    readonly dimension: number
  ) {}

  async embed(texts: string[]): Promise<Vec[]> {
    let res: Awaited<ReturnType<EmbeddingsClient["embeddings"]["create"]>>;
    try {
      res = await this.client.embeddings.create({ model: this.model, input: texts });
    } catch (e) {
      throw toProviderError(e, "OpenAI embeddings");
    }
    const vecs = [...(res.data ?? [])]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
    if (!vecs.length) {
      throw new ProviderError("OpenAI embeddings: response without vectors");
    }
    return vecs;
  }
}

export type EmbedDeps = {
  embedder: EmbeddingProvider;
  retry: RetryPolicy;
  batchSize: number;
};

/**
 * Gera embeddings em lotes de `batchSize` (normalmente um único lote por
 * documento), cada lote sob a política de retry. Confere contagem e
 * dimensão de tudo que voltou; qualquer falha aborta o conjunto inteiro.
 */
export async function embedTexts(deps: EmbedDeps, texts: string[]): Promise<Vec[]> {
  const { embedder, retry, batchSize } = deps;
  const log = createLogger({ action: "embedTexts" });
  if (!texts.length) return [];
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ValidationError(`batchSize must be a positive integer (got ${batchSize})`);
  }

  const out: Vec[] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    const slice = texts.slice(i, i + batchSize);
    const vectors = await executeWithRetry(
      () => embedder.embed(slice),
      "embedding batch",
      retry
    );
    if (vectors.length !== slice.length) {
      throw new ValidationError(
        `Embedding provider returned ${vectors.length} vectors for ${slice.length} texts`
      );
    }
    vectors.forEach((v, j) => assertDimension(v, embedder.dimension, `Embedding ${i + j}`));
    out.push(...vectors);
  }

  log.debug("Generated embeddings", { count: out.length, dimension: embedder.dimension });
  return out;
}

export async function embedQuery(deps: EmbedDeps, query: string): Promise<Vec> {
  const [vec] = await embedTexts(deps, [query]);
  return vec;
}
