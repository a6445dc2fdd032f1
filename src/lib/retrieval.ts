import {
  DocumentNotReadyError,
  NotFoundError,
  ValidationError,
  VectorIndexError,
  errorMessage,
  isRagError,
} from "@/lib/errors";
import { cosineFromSquaredDistance, cosineSimilarity } from "@/lib/similarity";
import { assertDimension, compareHits, SearchHit, VectorIndex } from "@/lib/vector-index";
import type { DocumentStore } from "@/lib/documents";
import { createLogger } from "@/lib/logger";

export type RetrievedChunk = {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  /** Distância nativa do índice (L2²). */
  distance: number;
  rank: number; // 1 = mais relevante
  similarity?: number;
  similarityPercentage?: number;
  /** "cosine" recalculado do vetor; "distance" quando o índice não devolveu o vetor. */
  similarityMethod?: "cosine" | "distance";
  /** Vetor com norma ~0: similaridade forçada para 0. */
  degenerate?: boolean;
  embedding?: number[];
};

export type RetrieveRequest = {
  documentId: string;
  queryVector: number[];
  topK: number;
  wantSimilarity?: boolean;
  includeEmbeddings?: boolean;
};

export type RetrievalDeps = {
  documents: DocumentStore;
  index: VectorIndex;
};

function scoreHit(hit: SearchHit, queryVector: number[]) {
  if (hit.embedding) {
    const { similarity, degenerate } = cosineSimilarity(queryVector, hit.embedding);
    return { similarity, degenerate, similarityMethod: "cosine" as const };
  }
  return {
    similarity: cosineFromSquaredDistance(hit.distance),
    degenerate: false,
    similarityMethod: "distance" as const,
  };
}

/**
 * Busca os `topK` chunks mais próximos dentro de um único documento.
 * Documento desconhecido → NotFoundError; ainda processando (ou que
 * falhou) → DocumentNotReady; falha do índice → IndexError.
 */
export async function retrieve(
  deps: RetrievalDeps,
  req: RetrieveRequest
): Promise<RetrievedChunk[]> {
  const { documents, index } = deps;
  const { documentId, queryVector, topK } = req;
  const log = createLogger({ action: "retrieve", documentId });

  if (!documentId || !documentId.trim()) {
    throw new ValidationError("documentId cannot be empty");
  }
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError(`topK must be a positive integer (got ${topK})`);
  }
  assertDimension(queryVector, index.dimension, "Query vector");

  const doc = await documents.get(documentId);
  if (!doc) throw new NotFoundError(`Document ${documentId} not found`);
  if (doc.status !== "ready") throw new DocumentNotReadyError(documentId, doc.status);

  const needVectors = Boolean(req.wantSimilarity || req.includeEmbeddings);
  let hits: SearchHit[];
  try {
    hits = await index.search(queryVector, topK, {
      documentId,
      includeVectors: needVectors,
    });
  } catch (e) {
    if (isRagError(e)) throw e;
    throw new VectorIndexError(`Vector search failed: ${errorMessage(e)}`, { cause: e });
  }

  // o índice já ordena por distância; reordenar só fixa o desempate
  const ranked = [...hits].sort(compareHits).slice(0, topK);

  const results = ranked.map((hit, i): RetrievedChunk => {
    const base: RetrievedChunk = {
      chunkId: hit.chunkId,
      documentId: hit.documentId,
      sequenceIndex: hit.sequenceIndex,
      text: hit.text,
      distance: hit.distance,
      rank: i + 1,
    };
    if (req.wantSimilarity) {
      const s = scoreHit(hit, queryVector);
      base.similarity = s.similarity;
      base.similarityPercentage = Math.round(s.similarity * 10000) / 100;
      base.similarityMethod = s.similarityMethod;
      if (s.degenerate) {
        base.degenerate = true;
        log.warn("Degenerate vector in similarity computation", { chunkId: hit.chunkId });
      }
    }
    if (req.includeEmbeddings && hit.embedding) base.embedding = hit.embedding;
    return base;
  });

  log.info("Retrieved chunks", { topK, count: results.length });
  return results;
}
