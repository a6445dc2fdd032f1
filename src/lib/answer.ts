import { NotFoundError, ValidationError, errorMessage } from "@/lib/errors";
import { toProviderError, embedQuery } from "@/lib/embeddings";
import { executeWithRetry } from "@/lib/retry";
import { retrieve, RetrievedChunk } from "@/lib/retrieval";
import { assembleContext } from "@/lib/context";
import { createLogger, startTimer } from "@/lib/logger";
import type { RagRuntime } from "@/lib/runtime";

export type ChatMsg =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export interface AnswerGenerator {
  generate(query: string, contextBlocks: string[]): Promise<string>;
}

/** Parte do cliente OpenAI usada na geração. */
export type ChatClient = {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: ChatMsg[];
        temperature: number;
        max_tokens: number;
      }): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
};

export function buildPrompt(query: string, contextBlocks: string[]): ChatMsg[] {
  const context = contextBlocks.join("\n\n");

  const system =
    "You are a helpful assistant that answers questions based on the provided context.";

  const user = `
You must answer from the provided context only.

Context:
${context}

User question: ${query}

Answer:
`.trim();

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  constructor(
    private readonly client: ChatClient,
    private readonly opts: { model: string; temperature: number; maxTokens: number }
  ) {}

  async generate(query: string, contextBlocks: string[]): Promise<string> {
    try {
      const res = await this.client.chat.completions.create({
        model: this.opts.model,
        messages: buildPrompt(query, contextBlocks),
        temperature: this.opts.temperature,
        max_tokens: this.opts.maxTokens,
      });
      return res.choices[0]?.message?.content ?? "";
    } catch (e) {
      throw toProviderError(e, "OpenAI chat");
    }
  }
}

export type QueryRequest = {
  documentId: string;
  query: string;
  topK?: number;
  showSimilarity?: boolean;
  showEmbeddings?: boolean;
};

export type SimilarityScore = {
  chunkId: string;
  rank: number;
  chunkText: string;
  l2Distance: number;
  cosineSimilarity: number;
  similarityPercentage: number;
  degenerate: boolean;
  embedding?: number[];
};

export type QueryAnswer = {
  answer: string;
  documentId: string;
  query: string;
  sources: { chunkId: string; rank: number; truncated: boolean }[];
  droppedChunkIds: string[];
  similarityScores?: SimilarityScore[];
  similarityExplanation?: typeof SIMILARITY_EXPLANATION;
};

export const SIMILARITY_EXPLANATION = {
  description:
    "Cosine similarity measures how similar the query embedding is to each chunk embedding",
  formula: "cosine_similarity = (A · B) / (||A|| × ||B||)",
  range: "Values range from -1 (opposite) to 1 (identical), with 0 meaning orthogonal",
  interpretation: "Higher values (closer to 1) indicate more similar content",
} as const;

/** Embedding da pergunta + busca no documento, sem geração. */
export async function searchDocument(
  rt: RagRuntime,
  req: QueryRequest
): Promise<RetrievedChunk[]> {
  const query = (req.query || "").trim();
  if (!query) throw new ValidationError("query cannot be empty");
  if (!req.documentId || !req.documentId.trim()) {
    throw new ValidationError("file_id cannot be empty");
  }

  const queryVector = await embedQuery(
    { embedder: rt.embedder, retry: rt.retry, batchSize: 1 },
    query
  );
  return retrieve(rt, {
    documentId: req.documentId.trim(),
    queryVector,
    topK: req.topK ?? rt.config.retrieval.topK,
    wantSimilarity: req.showSimilarity,
    includeEmbeddings: req.showEmbeddings,
  });
}

function toScore(c: RetrievedChunk, withEmbedding: boolean): SimilarityScore {
  return {
    chunkId: c.chunkId,
    rank: c.rank,
    chunkText: c.text,
    l2Distance: c.distance,
    cosineSimilarity: c.similarity ?? 0,
    similarityPercentage: c.similarityPercentage ?? 0,
    degenerate: c.degenerate ?? false,
    embedding: withEmbedding ? c.embedding : undefined,
  };
}

export async function answerQuery(rt: RagRuntime, req: QueryRequest): Promise<QueryAnswer> {
  const log = createLogger({ action: "answerQuery", documentId: req.documentId });
  const done = startTimer(log, "answerQuery");

  const retrieved = await searchDocument(rt, req);
  if (!retrieved.length) {
    throw new NotFoundError(`No chunks found for file_id: ${req.documentId}`);
  }

  const { maxContextChars, minFragmentChars } = rt.config.retrieval;
  const context = assembleContext(retrieved, maxContextChars, { minFragmentChars });
  if (!context.blocks.length) {
    throw new ValidationError(
      `No retrieved chunk fits in MAX_CONTEXT_CHARS=${maxContextChars}`
    );
  }

  const rankById = new Map(retrieved.map((c) => [c.chunkId, c.rank]));
  const query = req.query.trim();
  let answer: string;
  try {
    answer = await executeWithRetry(
      () => rt.generator.generate(query, context.blocks.map((b) => b.text)),
      "answer generation",
      rt.retry
    );
  } catch (e) {
    log.error("Answer generation failed", { error: errorMessage(e) });
    throw e;
  }

  done({ chunks: retrieved.length, contextChars: context.totalChars });

  const result: QueryAnswer = {
    answer,
    documentId: req.documentId.trim(),
    query,
    sources: context.blocks.map((b) => ({
      chunkId: b.chunkId,
      rank: rankById.get(b.chunkId) ?? 0,
      truncated: b.truncated,
    })),
    droppedChunkIds: context.dropped.map((d) => d.chunkId),
  };
  if (req.showSimilarity) {
    result.similarityScores = retrieved.map((c) => toScore(c, Boolean(req.showEmbeddings)));
    result.similarityExplanation = SIMILARITY_EXPLANATION;
  }
  return result;
}
