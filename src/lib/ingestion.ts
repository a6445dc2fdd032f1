import { customAlphabet } from "nanoid";
import { chunkDocument, normalizeText } from "@/lib/chunking";
import { embedTexts } from "@/lib/embeddings";
import { NotFoundError, ValidationError, errorMessage } from "@/lib/errors";
import { createLogger, startTimer } from "@/lib/logger";
import type { RagRuntime } from "@/lib/runtime";
import type { VectorRecord } from "@/lib/vector-index";

const hex8 = customAlphabet("0123456789abcdef", 8);

const pad = (n: number) => String(n).padStart(2, "0");

/** file_<yyyymmdd>_<hhmmss>_<8 hex> */
export function generateDocumentId(now: Date = new Date()) {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `file_${date}_${time}_${hex8()}`;
}

export type IngestRequest = {
  filename: string;
  fileType: string;
  fileSize: number;
  text: string;
  /** Só para testes/reprocessamento; por padrão é gerado. */
  documentId?: string;
};

export type IngestionReport = {
  documentId: string;
  filename: string;
  fileType: string;
  charLength: number;
  chunksCreated: number;
  vectorsIndexed: number;
};

/**
 * Ingestão tudo-ou-nada: o documento só vira `ready` depois que todos os
 * vetores foram gravados. Qualquer falha depois de criado o registro
 * apaga o que tiver sido inserido, marca `failed` e relança o erro.
 */
export async function ingestDocument(
  rt: RagRuntime,
  req: IngestRequest
): Promise<IngestionReport> {
  const documentId = req.documentId ?? generateDocumentId();
  const log = createLogger({ action: "ingestDocument", documentId });
  const done = startTimer(log, "ingestDocument");

  if (!req.filename || !req.filename.trim()) {
    throw new ValidationError("filename cannot be empty");
  }
  if (documentId.length > 255) {
    throw new ValidationError(`file_id exceeds max length of 255: ${documentId.length} characters`);
  }

  // chunking é puro: erro de config ou texto vazio sai antes de qualquer escrita
  const text = normalizeText(req.text);
  const { chunkSize, overlap, lookback } = rt.config.chunking;
  const chunks = chunkDocument(documentId, text, { chunkSize, overlap, lookback });
  log.info("Chunked document", {
    chunks: chunks.length,
    charLength: text.length,
    chunkSize,
    overlap,
  });

  await rt.documents.create({
    documentId,
    filename: req.filename.trim(),
    fileType: req.fileType,
    fileSize: req.fileSize,
    charLength: text.length,
  });

  try {
    const vectors = await embedTexts(
      { embedder: rt.embedder, retry: rt.retry, batchSize: rt.config.embedding.batchSize },
      chunks.map((c) => c.text)
    );
    if (vectors.length !== chunks.length) {
      throw new ValidationError(
        `chunks and embeddings must have the same length: ${chunks.length} != ${vectors.length}`
      );
    }

    const records: VectorRecord[] = chunks.map((c, i) => ({
      chunkId: c.chunkId,
      documentId,
      sequenceIndex: c.sequenceIndex,
      text: c.text,
      charStart: c.charStart,
      charEnd: c.charEnd,
      embedding: vectors[i],
    }));
    const inserted = await rt.index.insert(records);

    await rt.documents.markReady(documentId, {
      chunksCount: chunks.length,
      vectorsCount: inserted,
    });
    done({ chunks: chunks.length, vectors: inserted });

    return {
      documentId,
      filename: req.filename.trim(),
      fileType: req.fileType,
      charLength: text.length,
      chunksCreated: chunks.length,
      vectorsIndexed: inserted,
    };
  } catch (e) {
    log.error("Ingestion failed, rolling back", { error: errorMessage(e) });
    await abortIngestion(rt, documentId, e);
    throw e;
  }
}

// Remove vetores parciais e marca `failed`. Falha aqui é logada mas não
// mascara o erro original, que é o que o chamador precisa ver.
async function abortIngestion(rt: RagRuntime, documentId: string, cause: unknown) {
  const log = createLogger({ action: "abortIngestion", documentId });
  try {
    await rt.index.deleteByDocument(documentId);
  } catch (cleanupError) {
    log.error("Could not remove partial vectors", { error: errorMessage(cleanupError) });
  }
  try {
    await rt.documents.markFailed(documentId, errorMessage(cause));
  } catch (statusError) {
    log.error("Could not mark document as failed", { error: errorMessage(statusError) });
  }
}

/** Apaga o documento e, em cascata, todos os seus vetores. */
export async function deleteDocument(rt: RagRuntime, documentId: string) {
  const id = (documentId || "").trim();
  if (!id) throw new ValidationError("file_id cannot be empty");

  const doc = await rt.documents.get(id);
  if (!doc) throw new NotFoundError(`Document ${id} not found`);

  const vectorsDeleted = await rt.index.deleteByDocument(id);
  await rt.documents.delete(id);
  createLogger({ action: "deleteDocument", documentId: id }).info("Document deleted", {
    vectorsDeleted,
  });
  return { documentId: id, filename: doc.filename, vectorsDeleted };
}
