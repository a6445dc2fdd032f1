import { ValidationError } from "@/lib/errors";

// Extensão → tipo exibido. PDF passa pelo pdf-parse, DOCX pelo mammoth,
// PPTX/XLSX pelo officeparser; os demais são texto.
export const SUPPORTED_EXTENSIONS: Record<string, string> = {
  ".pdf": "PDF",
  ".docx": "Word Document",
  ".pptx": "PowerPoint",
  ".xlsx": "Excel",
  ".txt": "Text",
  ".md": "Markdown",
  ".markdown": "Markdown",
  ".csv": "CSV",
  ".html": "HTML",
  ".htm": "HTML",
};

export function fileExtension(filename: string) {
  const i = filename.lastIndexOf(".");
  return i >= 0 ? filename.slice(i).toLowerCase() : "";
}

export function isSupportedFile(filename: string) {
  return fileExtension(filename) in SUPPORTED_EXTENSIONS;
}

export function getFileType(filename: string) {
  return SUPPORTED_EXTENSIONS[fileExtension(filename)] ?? "Unknown";
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

// Remove scripts/estilos e tags; blocos viram quebra de linha.
export function htmlToText(html: string) {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|li|h[1-6]|tr)>/gi, "\n\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (m) => ENTITIES[m] ?? m);
}

async function pdfToText(buf: Buffer) {
  const { default: pdfParse } = await import("pdf-parse");
  const parsed = await pdfParse(buf);
  return parsed.text || "";
}

async function docxToText(buf: Buffer) {
  const { default: mammoth } = await import("mammoth");
  const result = await mammoth.extractRawText({ buffer: buf });
  return result.value || "";
}

async function officeToText(buf: Buffer) {
  const { parseOfficeAsync } = await import("officeparser");
  return (await parseOfficeAsync(buf)) || "";
}

/** Extrai o texto bruto de um upload; a normalização fica com a ingestão. */
export async function extractText(filename: string, buf: Buffer): Promise<string> {
  const ext = fileExtension(filename);
  if (!(ext in SUPPORTED_EXTENSIONS)) {
    throw new ValidationError(
      `Unsupported file format. Supported formats: ${Object.keys(SUPPORTED_EXTENSIONS).join(", ")}`
    );
  }
  if (ext === ".pdf") return pdfToText(buf);
  if (ext === ".docx") return docxToText(buf);
  if (ext === ".pptx" || ext === ".xlsx") return officeToText(buf);
  const raw = buf.toString("utf8");
  return ext === ".html" || ext === ".htm" ? htmlToText(raw) : raw;
}
