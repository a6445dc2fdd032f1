export const runtime = "nodejs";

import { z } from "zod";
import { boolParam, handle, parseWith, readJson } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";
import { searchDocument } from "@/lib/answer";

const Body = z.object({
  file_id: z.string().trim().min(1, "file_id cannot be empty"),
  query: z.string().trim().min(1, "query cannot be empty"),
  top_k: z.number().int().positive().max(100).optional(),
});

// Só recuperação (sem LLM): útil para depurar o ranking.
export async function POST(req: Request) {
  return handle("/api/search", async () => {
    const rt = await getRuntime();
    const { searchParams } = new URL(req.url);
    const body = parseWith(Body, await readJson(req));

    const items = await searchDocument(rt, {
      documentId: body.file_id,
      query: body.query,
      topK: body.top_k,
      showSimilarity: true,
      showEmbeddings: boolParam(searchParams.get("show_embeddings")),
    });
    return { count: items.length, items };
  });
}
