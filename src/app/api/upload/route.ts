export const runtime = "nodejs";

import { handle } from "@/lib/http";
import { getRuntime } from "@/lib/runtime";
import { ValidationError } from "@/lib/errors";
import { extractText, getFileType, isSupportedFile, SUPPORTED_EXTENSIONS } from "@/lib/extract";
import { ingestDocument } from "@/lib/ingestion";

/** ------------------------------------------------------------------
 * POST /api/upload  (multipart/form-data, campo "file")
 * Extrai o texto, quebra em chunks, gera embeddings e indexa.
 * ------------------------------------------------------------------*/
export async function POST(req: Request) {
  return handle("/api/upload", async () => {
    const rt = await getRuntime();

    const form = await req.formData().catch(() => null);
    const file = form?.get("file") ?? null;
    if (file === null || typeof file === "string") {
      throw new ValidationError("Missing 'file' (multipart/form-data)");
    }
    if (!isSupportedFile(file.name)) {
      throw new ValidationError(
        `Unsupported file format. Supported formats: ${Object.keys(SUPPORTED_EXTENSIONS).join(", ")}`
      );
    }
    if (file.size > rt.config.maxUploadBytes) {
      throw new ValidationError(
        `File too large: ${file.size} bytes (max ${rt.config.maxUploadBytes})`
      );
    }

    const buf = Buffer.from(await file.arrayBuffer());
    const text = await extractText(file.name, buf);

    const report = await ingestDocument(rt, {
      filename: file.name,
      fileType: getFileType(file.name),
      fileSize: file.size,
      text,
    });

    return {
      file_id: report.documentId,
      filename: report.filename,
      file_type: report.fileType,
      chunks_created: report.chunksCreated,
      vector_ids_count: report.vectorsIndexed,
    };
  });
}
