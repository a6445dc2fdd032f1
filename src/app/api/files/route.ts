export const runtime = "nodejs";

import { handle } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";

/** GET /api/files?limit=100 — documentos mais recentes primeiro. */
export async function GET(req: Request) {
  return handle("/api/files", async () => {
    const rt = await getRuntime();
    const url = new URL(req.url);
    const limit = Math.min(Math.max(Number(url.searchParams.get("limit") || 100) || 100, 1), 500);

    const files = await rt.documents.list(limit);
    return { count: files.length, files };
  });
}
