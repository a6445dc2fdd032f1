import { NotFoundError, ValidationError } from "@/lib/errors";
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

/**
 * Índice em memória (busca exata). Uma partição por documento; a
 * partição é trocada de uma vez no insert, então uma busca concorrente
 * nunca enxerga metade de um lote.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private partitions = new Map<string, readonly VectorRecord[]>();

  constructor(readonly dimension: number) {}

  async insert(records: VectorRecord[]): Promise<number> {
    validateRecords(records, this.dimension);

    const staged = new Map<string, VectorRecord[]>();
    for (const r of records) {
      const list = staged.get(r.documentId) ?? [...(this.partitions.get(r.documentId) ?? [])];
      list.push({ ...r, embedding: [...r.embedding] });
      staged.set(r.documentId, list);
    }
    for (const [documentId, list] of staged) {
      this.partitions.set(documentId, list);
    }
    return records.length;
  }

  async search(queryVector: number[], topK: number, filter: SearchFilter): Promise<SearchHit[]> {
    assertDimension(queryVector, this.dimension, "Query vector");
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer (got ${topK})`);
    }
    const partition = this.partitions.get(filter.documentId) ?? [];

    return partition
      .map((r) => ({
        chunkId: r.chunkId,
        documentId: r.documentId,
        sequenceIndex: r.sequenceIndex,
        text: r.text,
        distance: squaredEuclidean(queryVector, r.embedding),
        embedding: filter.includeVectors ? [...r.embedding] : undefined,
      }))
      .sort(compareHits)
      .slice(0, topK);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const n = this.partitions.get(documentId)?.length ?? 0;
    this.partitions.delete(documentId);
    return n;
  }

  async count(documentId?: string): Promise<number> {
    if (documentId !== undefined) return this.partitions.get(documentId)?.length ?? 0;
    let n = 0;
    for (const p of this.partitions.values()) n += p.length;
    return n;
  }

  async list({ documentId, limit, includeVectors }: ListOptions): Promise<StoredVector[]> {
    const source =
      documentId !== undefined
        ? this.partitions.get(documentId) ?? []
        : Array.from(this.partitions.values()).flat();
    return source.slice(0, limit).map(({ embedding, ...rest }) => ({
      ...rest,
      embedding: includeVectors ? [...embedding] : undefined,
    }));
  }
}

export class InMemoryDocumentStore implements DocumentStore {
  private docs = new Map<string, DocumentRecord>();

  async create(doc: NewDocument): Promise<DocumentRecord> {
    if (this.docs.has(doc.documentId)) {
      throw new ValidationError(`Document ${doc.documentId} already exists`);
    }
    const record: DocumentRecord = {
      ...doc,
      chunksCount: 0,
      vectorsCount: 0,
      status: "processing",
      uploadedAt: new Date(),
    };
    this.docs.set(doc.documentId, record);
    return { ...record };
  }

  async get(documentId: string): Promise<DocumentRecord | null> {
    const doc = this.docs.get(documentId);
    return doc ? { ...doc } : null;
  }

  private transition(documentId: string, patch: Partial<DocumentRecord>) {
    const doc = this.docs.get(documentId);
    if (!doc) throw new NotFoundError(`Document ${documentId} not found`);
    if (doc.status !== "processing") {
      throw new ValidationError(
        `Document ${documentId} already finished ingestion (status: ${doc.status})`
      );
    }
    const next = { ...doc, ...patch };
    this.docs.set(documentId, next);
    return { ...next };
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
    return Array.from(this.docs.values())
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime())
      .slice(0, limit)
      .map((d) => ({ ...d }));
  }

  async delete(documentId: string): Promise<boolean> {
    return this.docs.delete(documentId);
  }

  async statistics() {
    return toStatistics(Array.from(this.docs.values()));
  }
}
