import { ValidationError } from "@/lib/errors";

/** Registro persistido: um chunk com seu embedding. */
export type VectorRecord = {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  charStart: number;
  charEnd: number;
  embedding: number[];
};

export type SearchFilter = {
  documentId: string;
  /** Devolve o vetor armazenado junto (para o cosseno). */
  includeVectors?: boolean;
};

export type SearchHit = {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  /** Distância L2 ao quadrado; menor = mais perto. */
  distance: number;
  embedding?: number[];
};

export type ListOptions = {
  documentId?: string;
  limit: number;
  includeVectors?: boolean;
};

export type StoredVector = Omit<VectorRecord, "embedding"> & {
  embedding?: number[];
};

/**
 * Índice vetorial particionado por documento. Inserções de um documento
 * não interferem em buscas sobre outro.
 */
export interface VectorIndex {
  readonly dimension: number;
  /** Insere o lote inteiro de um documento. */
  insert(records: VectorRecord[]): Promise<number>;
  /** Candidatos do documento filtrado, em ordem crescente de distância. */
  search(queryVector: number[], topK: number, filter: SearchFilter): Promise<SearchHit[]>;
  deleteByDocument(documentId: string): Promise<number>;
  count(documentId?: string): Promise<number>;
  list(opts: ListOptions): Promise<StoredVector[]>;
}

export function assertDimension(vector: ArrayLike<number>, dimension: number, label: string) {
  if (vector.length !== dimension) {
    throw new ValidationError(
      `${label} has wrong dimension: ${vector.length} != ${dimension}`
    );
  }
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) {
      throw new ValidationError(`${label} contains a non-finite value at ${i}`);
    }
  }
}

export function validateRecords(records: VectorRecord[], dimension: number) {
  if (!records.length) {
    throw new ValidationError("Cannot insert an empty batch");
  }
  records.forEach((r, i) => {
    if (!r.documentId.trim()) {
      throw new ValidationError(`Record ${i} has an empty documentId`);
    }
    if (!(r.charStart < r.charEnd)) {
      throw new ValidationError(`Record ${i} has an empty span`);
    }
    assertDimension(r.embedding, dimension, `Embedding ${i}`);
  });
}

// Ordem determinística: distância, depois posição no documento.
export function compareHits(a: { distance: number; sequenceIndex: number }, b: { distance: number; sequenceIndex: number }) {
  return a.distance - b.distance || a.sequenceIndex - b.sequenceIndex;
}
