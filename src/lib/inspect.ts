import type { RagRuntime } from "@/lib/runtime";

export type InspectOptions = {
  documentId?: string;
  limit?: number;
  fullContent?: boolean;
  showVectors?: boolean;
};

export type InspectedVector = {
  id: string;
  documentId: string;
  sequenceIndex: number;
  vectorDim: number;
  chunkLength: number;
  preview: string;
  fullContent?: string;
  embedding?: number[];
  vectorValuesCount?: number;
};

export const MAX_INSPECT_LIMIT = 1000;

export function preview(text: string, max = 100) {
  return text.length > max ? text.slice(0, max) + "..." : text;
}

// Listagem de vetores gravados, para depuração e para a tela de inspeção.
export async function inspectVectors(rt: RagRuntime, opts: InspectOptions = {}) {
  const limit = Math.min(Math.max(Math.trunc(opts.limit ?? 10) || 1, 1), MAX_INSPECT_LIMIT);
  const documentId = opts.documentId?.trim() || undefined;

  const rows = await rt.index.list({
    documentId,
    limit,
    includeVectors: opts.showVectors,
  });

  const vectors = rows.map((r): InspectedVector => {
    const item: InspectedVector = {
      id: r.chunkId,
      documentId: r.documentId,
      sequenceIndex: r.sequenceIndex,
      vectorDim: rt.index.dimension,
      chunkLength: r.text.length,
      preview: preview(r.text),
    };
    if (opts.fullContent) item.fullContent = r.text;
    if (opts.showVectors && r.embedding) {
      item.embedding = r.embedding;
      item.vectorValuesCount = r.embedding.length;
    }
    return item;
  });

  return {
    count: vectors.length,
    fullContent: Boolean(opts.fullContent),
    showVectors: Boolean(opts.showVectors),
    vectors,
  };
}
