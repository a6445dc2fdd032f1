export const runtime = "nodejs";

import { handle } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";
import { dbReadyState } from "@/lib/db";

// Leve: não chama o provedor; só confirma config, banco e índice.
export async function GET() {
  return handle("/api/health", async () => {
    const rt = await getRuntime();
    const vectors = await rt.index.count();
    return {
      vectorIndex: rt.config.vectorIndex,
      db: rt.config.vectorIndex === "mongo" ? { readyState: dbReadyState() } : null,
      openai: rt.config.openai.apiKey ? "configured" : "missing",
      embeddingDimension: rt.index.dimension,
      vectors,
    };
  });
}
