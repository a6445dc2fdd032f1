export const runtime = "nodejs";

import { z } from "zod";
import { boolParam, handle, parseWith, readJson } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";
import { answerQuery } from "@/lib/answer";

const Body = z.object({
  file_id: z.string().trim().min(1, "file_id cannot be empty"),
  query: z.string().trim().min(1, "query cannot be empty"),
  top_k: z.number().int().positive().max(100).optional(),
});

/** ------------------------------------------------------------------
 * POST /api/query[?show_similarity=true&show_embeddings=true]
 * Body: { file_id, query, top_k? }
 * ------------------------------------------------------------------*/
export async function POST(req: Request) {
  return handle("/api/query", async () => {
    const rt = await getRuntime();
    const { searchParams } = new URL(req.url);
    const body = parseWith(Body, await readJson(req));

    const res = await answerQuery(rt, {
      documentId: body.file_id,
      query: body.query,
      topK: body.top_k,
      showSimilarity: boolParam(searchParams.get("show_similarity")),
      showEmbeddings: boolParam(searchParams.get("show_embeddings")),
    });

    return {
      answer: res.answer,
      file_id: res.documentId,
      query: res.query,
      sources: res.sources,
      dropped_chunk_ids: res.droppedChunkIds,
      ...(res.similarityScores
        ? {
            similarity_scores: res.similarityScores,
            similarity_explanation: res.similarityExplanation,
          }
        : {}),
    };
  });
}
