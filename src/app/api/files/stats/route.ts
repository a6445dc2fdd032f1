export const runtime = "nodejs";

import { handle } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";

export async function GET() {
  return handle("/api/files/stats", async () => {
    const rt = await getRuntime();
    return { stats: await rt.documents.statistics() };
  });
}
