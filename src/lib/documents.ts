export type DocStatus = "processing" | "ready" | "failed";

export interface DocumentRecord {
  documentId: string;
  filename: string;
  fileType: string;
  fileSize: number;
  charLength: number;
  chunksCount: number;
  vectorsCount: number;
  status: DocStatus;
  error?: string;
  uploadedAt: Date;
}

export type NewDocument = Pick<
  DocumentRecord,
  "documentId" | "filename" | "fileType" | "fileSize" | "charLength"
>;

export type FileStatistics = {
  totalFiles: number;
  totalChunks: number;
  totalVectors: number;
  totalSizeBytes: number;
  totalSizeMb: number;
};

/**
 * Metadados por documento. `markReady`/`markFailed` só saem de
 * `processing`: o status muda uma vez e não volta.
 */
export interface DocumentStore {
  create(doc: NewDocument): Promise<DocumentRecord>;
  get(documentId: string): Promise<DocumentRecord | null>;
  markReady(documentId: string, counts: { chunksCount: number; vectorsCount: number }): Promise<DocumentRecord>;
  markFailed(documentId: string, error: string): Promise<DocumentRecord>;
  list(limit: number): Promise<DocumentRecord[]>;
  delete(documentId: string): Promise<boolean>;
  statistics(): Promise<FileStatistics>;
}

export function toStatistics(docs: Pick<DocumentRecord, "chunksCount" | "vectorsCount" | "fileSize">[]): FileStatistics {
  const totalSizeBytes = docs.reduce((s, d) => s + d.fileSize, 0);
  return {
    totalFiles: docs.length,
    totalChunks: docs.reduce((s, d) => s + d.chunksCount, 0),
    totalVectors: docs.reduce((s, d) => s + d.vectorsCount, 0),
    totalSizeBytes,
    totalSizeMb: Math.round((totalSizeBytes / (1024 * 1024)) * 100) / 100,
  };
}
