import { ChunkModel } from "@/models/Chunk";
import { DocumentModel, IDocument } from "@/models/Document";
import {
  errorMessage,
  isRagError,
  NotFoundError,
  ValidationError,
  VectorIndexError,
} from "@/lib/errors";
import { squaredEuclidean } from "@/lib/similarity";
import {
  DocumentRecord,
  DocumentStore,
  NewDocument,
  toStatistics,
} from "@/lib/documents";
import {
  assertDimension,
  compareHits,
  ListOptions,
  SearchFilter,
  SearchHit,
  StoredVector,
  validateRecords,
  VectorIndex,
  VectorRecord,
} from "@/lib/vector-index";

type ChunkRow = {
  chunkId: string;
  fileId: string;
  sequenceIndex: number;
  text: string;
  charStart: number;
  charEnd: number;
  embedding?: number[];
};

type Scope = "Vector index" | "Document store";

// Falhas do driver viram IndexError; erros já tipados passam direto.
async function guard<T>(scope: Scope, op: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (isRagError(e)) throw e;
    throw new VectorIndexError(`${scope} ${op} failed: ${errorMessage(e)}`, {
      cause: e,
    });
  }
}

function toHit(row: ChunkRow, distance: number, includeVectors?: boolean): SearchHit {
  return {
    chunkId: row.chunkId,
    documentId: row.fileId,
    sequenceIndex: row.sequenceIndex,
    text: row.text,
    distance,
    embedding: includeVectors ? row.embedding : undefined,
  };
}

export type MongoVectorIndexOptions = {
  dimension: number;
  /** Nome do índice Atlas Vector Search (métrica euclidiana). */
  vectorSearchIndex?: string;
  numCandidates?: number;
};

/**
 * Índice vetorial sobre a coleção de chunks. Sem Atlas, a busca é exata
 * sobre a partição do documento (filtro por fileId, que é indexado).
 */
export class MongoVectorIndex implements VectorIndex {
  readonly dimension: number;
  private readonly vectorSearchIndex?: string;
  private readonly numCandidates: number;

  constructor(opts: MongoVectorIndexOptions) {
    this.dimension = opts.dimension;
    this.vectorSearchIndex = opts.vectorSearchIndex;
    this.numCandidates = opts.numCandidates ?? 100;
  }

  async insert(records: VectorRecord[]): Promise<number> {
    validateRecords(records, this.dimension);
    return guard("Vector index", "insert", async () => {
      const docs = await ChunkModel.insertMany(
        records.map((r) => ({
          chunkId: r.chunkId,
          fileId: r.documentId,
          sequenceIndex: r.sequenceIndex,
          text: r.text,
          charStart: r.charStart,
          charEnd: r.charEnd,
          embedding: r.embedding,
        })),
        { ordered: true }
      );
      return docs.length;
    });
  }

  async search(queryVector: number[], topK: number, filter: SearchFilter): Promise<SearchHit[]> {
    assertDimension(queryVector, this.dimension, "Query vector");
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer (got ${topK})`);
    }
    const index = this.vectorSearchIndex;
    return guard("Vector index", "search", () =>
      index
        ? this.atlasSearch(index, queryVector, topK, filter)
        : this.exactSearch(queryVector, topK, filter)
    );
  }

  private async exactSearch(queryVector: number[], topK: number, filter: SearchFilter) {
    const rows = await ChunkModel.find(
      { fileId: filter.documentId },
      { _id: 0, chunkId: 1, fileId: 1, sequenceIndex: 1, text: 1, embedding: 1 }
    ).lean<ChunkRow[]>();

    return rows
      .map((r) => toHit(r, squaredEuclidean(queryVector, r.embedding ?? []), filter.includeVectors))
      .sort(compareHits)
      .slice(0, topK);
  }

  // $vectorSearch devolve score euclidiano = 1 / (1 + d); voltamos para d²
  private async atlasSearch(
    index: string,
    queryVector: number[],
    topK: number,
    filter: SearchFilter
  ) {
    const pipeline = [
      {
        $vectorSearch: {
          index,
          path: "embedding",
          queryVector,
          numCandidates: Math.max(this.numCandidates, topK),
          limit: topK,
          filter: { fileId: filter.documentId },
        },
      },
      {
        $project: {
          _id: 0,
          chunkId: 1,
          fileId: 1,
          sequenceIndex: 1,
          text: 1,
          ...(filter.includeVectors ? { embedding: 1 } : {}),
          score: { $meta: "vectorSearchScore" },
        },
      },
    ];
    // coleção nativa: o estágio $vectorSearch só existe no Atlas
    const rows = await ChunkModel.collection
      .aggregate<ChunkRow & { score: number }>(pipeline)
      .toArray();
    return rows
      .map((r) => {
        const d = r.score > 0 ? 1 / r.score - 1 : Number.POSITIVE_INFINITY;
        return toHit(r, d * d, filter.includeVectors);
      })
      .sort(compareHits);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    return guard("Vector index", "delete", async () => {
      const res = await ChunkModel.deleteMany({ fileId: documentId });
      return res.deletedCount;
    });
  }

  async count(documentId?: string): Promise<number> {
    return guard("Vector index", "count", () =>
      ChunkModel.countDocuments(documentId !== undefined ? { fileId: documentId } : {}).exec()
    );
  }

  async list({ documentId, limit, includeVectors }: ListOptions): Promise<StoredVector[]> {
    return guard("Vector index", "list", async () => {
      const rows = await ChunkModel.find(
        documentId !== undefined ? { fileId: documentId } : {},
        {
          _id: 0,
          chunkId: 1,
          fileId: 1,
          sequenceIndex: 1,
          text: 1,
          charStart: 1,
          charEnd: 1,
          ...(includeVectors ? { embedding: 1 } : {}),
        }
      )
        .sort({ fileId: 1, sequenceIndex: 1 })
        .limit(limit)
        .lean<ChunkRow[]>();

      return rows.map((r) => ({
        chunkId: r.chunkId,
        documentId: r.fileId,
        sequenceIndex: r.sequenceIndex,
        text: r.text,
        charStart: r.charStart,
        charEnd: r.charEnd,
        embedding: includeVectors ? r.embedding : undefined,
      }));
    });
  }
}

function toRecord(d: IDocument): DocumentRecord {
  return {
    documentId: d.fileId,
    filename: d.filename,
    fileType: d.fileType,
    fileSize: d.fileSize,
    charLength: d.charLength,
    chunksCount: d.chunksCount,
    vectorsCount: d.vectorsCount,
    status: d.status,
    error: d.error ?? undefined,
    uploadedAt: d.uploadedAt,
  };
}

export class MongoDocumentStore implements DocumentStore {
  async create(doc: NewDocument): Promise<DocumentRecord> {
    return guard("Document store", "create", async () => {
      const created = await DocumentModel.create({
        fileId: doc.documentId,
        filename: doc.filename,
        fileType: doc.fileType,
        fileSize: doc.fileSize,
        charLength: doc.charLength,
        status: "processing",
      });
      return toRecord(created.toObject());
    });
  }

  async get(documentId: string): Promise<DocumentRecord | null> {
    return guard("Document store", "get", async () => {
      const doc = await DocumentModel.findOne({ fileId: documentId }).lean<IDocument>();
      return doc ? toRecord(doc) : null;
    });
  }

  // só transiciona a partir de "processing" (filtro atômico no update)
  private async transition(documentId: string, set: Partial<IDocument>) {
    const updated = await guard("Document store", "update", () =>
      DocumentModel.findOneAndUpdate(
        { fileId: documentId, status: "processing" },
        { $set: set },
        { new: true }
      )
        .lean<IDocument>()
        .exec()
    );
    if (updated) return toRecord(updated);

    const current = await this.get(documentId);
    if (!current) throw new NotFoundError(`Document ${documentId} not found`);
    throw new ValidationError(
      `Document ${documentId} already finished ingestion (status: ${current.status})`
    );
  }

  async markReady(documentId: string, counts: { chunksCount: number; vectorsCount: number }) {
    return this.transition(documentId, { ...counts, status: "ready" });
  }

  async markFailed(documentId: string, error: string) {
    return this.transition(documentId, {
      status: "failed",
      error,
      chunksCount: 0,
      vectorsCount: 0,
    });
  }

  async list(limit: number): Promise<DocumentRecord[]> {
    return guard("Document store", "list", async () => {
      const docs = await DocumentModel.find({})
        .sort({ uploadedAt: -1 })
        .limit(limit)
        .lean<IDocument[]>();
      return docs.map(toRecord);
    });
  }

  async delete(documentId: string): Promise<boolean> {
    return guard("Document store", "delete", async () => {
      const res = await DocumentModel.deleteOne({ fileId: documentId });
      return res.deletedCount > 0;
    });
  }

  async statistics() {
    return guard("Document store", "statistics", async () => {
      const docs = await DocumentModel.find(
        {},
        { chunksCount: 1, vectorsCount: 1, fileSize: 1 }
      ).lean<Pick<IDocument, "chunksCount" | "vectorsCount" | "fileSize">[]>();
      return toStatistics(docs);
    });
  }
}
