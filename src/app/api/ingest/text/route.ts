export const runtime = "nodejs";

import { z } from "zod";
import { handle, parseWith, readJson } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";
import { ingestDocument } from "@/lib/ingestion";

const Body = z.object({
  text: z.string(),
  name: z.string().trim().min(1).optional(),
});

/** ------------------------------------------------------------------
 * POST /api/ingest/text
 * Aceita { text, name? } e indexa como um documento "Text".
 * ------------------------------------------------------------------*/
export async function POST(req: Request) {
  return handle("/api/ingest/text", async () => {
    const rt = await getRuntime();
    const body = parseWith(Body, await readJson(req));
    const name = body.name ?? `text-${new Date().toISOString().slice(0, 19)}.txt`;

    const report = await ingestDocument(rt, {
      filename: name,
      fileType: "Text",
      fileSize: Buffer.byteLength(body.text, "utf8"),
      text: body.text,
    });

    return {
      file_id: report.documentId,
      filename: report.filename,
      chunks_created: report.chunksCreated,
      vector_ids_count: report.vectorsIndexed,
    };
  });
}
