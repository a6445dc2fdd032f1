export const runtime = "nodejs";

import { boolParam, handle } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";
import { inspectVectors } from "@/lib/inspect";

/** ------------------------------------------------------------------
 * GET /api/vectors?file_id=&limit=10&full_content=true&show_vectors=true
 * Mostra o que está gravado no índice (texto e, opcionalmente, vetores).
 * ------------------------------------------------------------------*/
export async function GET(req: Request) {
  return handle("/api/vectors", async () => {
    const rt = await getRuntime();
    const { searchParams } = new URL(req.url);

    return inspectVectors(rt, {
      documentId: searchParams.get("file_id") ?? undefined,
      limit: Number(searchParams.get("limit") || 10),
      fullContent: boolParam(searchParams.get("full_content")),
      showVectors: boolParam(searchParams.get("show_vectors")),
    });
  });
}
