import { ConfigurationError, DegenerateInputError } from "@/lib/errors";

export type TextSpan = {
  sequenceIndex: number;
  text: string;
  charStart: number; // inclusivo
  charEnd: number; // exclusivo
};

export type Chunk = TextSpan & {
  chunkId: string;
  documentId: string;
};

export type ChunkOptions = {
  chunkSize?: number;
  overlap?: number;
  /** Quantos caracteres antes do corte procurar por fim de frase/espaço. */
  lookback?: number;
};

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
export const DEFAULT_BOUNDARY_LOOKBACK = 100;

const SENTENCE_END = new Set([".", "!", "?"]);
const WHITESPACE = /\s/;

// Mesma limpeza que o ingest de texto já fazia antes de quebrar em blocos.
export function normalizeText(raw: string) {
  return (raw || "")
    .replace(/\r/g, "")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function validateChunkOptions(opts: ChunkOptions = {}) {
  const chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = opts.overlap ?? DEFAULT_CHUNK_OVERLAP;
  const lookback = opts.lookback ?? DEFAULT_BOUNDARY_LOOKBACK;

  if (!Number.isInteger(chunkSize) || !Number.isInteger(overlap)) {
    throw new ConfigurationError(
      `chunkSize and overlap must be integers (got ${chunkSize}, ${overlap})`
    );
  }
  if (!(overlap > 0 && overlap < chunkSize)) {
    throw new ConfigurationError(
      `overlap must satisfy 0 < overlap < chunkSize (got overlap=${overlap}, chunkSize=${chunkSize})`
    );
  }
  if (!Number.isInteger(lookback) || lookback < 0) {
    throw new ConfigurationError(
      `lookback must be a non-negative integer (got ${lookback})`
    );
  }
  return { chunkSize, overlap, lookback };
}

const isHighSurrogate = (c: number) => c >= 0xd800 && c <= 0xdbff;
const isLowSurrogate = (c: number) => c >= 0xdc00 && c <= 0xdfff;

// true quando `i` cai entre as duas metades de um par UTF-16 (emoji etc.)
function splitsSurrogatePair(text: string, i: number) {
  return (
    i > 0 &&
    i < text.length &&
    isHighSurrogate(text.charCodeAt(i - 1)) &&
    isLowSurrogate(text.charCodeAt(i))
  );
}

/**
 * Procura, de trás para frente em [windowStart, end), o último fim de
 * frase; sem ele, o último espaço. Retorna a posição logo depois do
 * caractere encontrado, ou -1.
 */
function findBoundary(text: string, pos: number, end: number, lookback: number) {
  const windowStart = Math.max(pos, end - lookback);
  for (let i = end - 1; i >= windowStart; i--) {
    if (SENTENCE_END.has(text[i])) return i + 1;
  }
  for (let i = end - 1; i >= windowStart; i--) {
    if (WHITESPACE.test(text[i])) return i + 1;
  }
  return -1;
}

/**
 * Quebra o texto em trechos sobrepostos, alinhados a fim de frase quando
 * possível. Cada trecho guarda o intervalo [charStart, charEnd) no texto
 * original, então os intervalos cobrem o texto inteiro sem buracos.
 */
export function chunkText(text: string, opts: ChunkOptions = {}): TextSpan[] {
  const { chunkSize, overlap, lookback } = validateChunkOptions(opts);

  if (!text || text.length === 0) {
    throw new DegenerateInputError("Document contains no text to chunk");
  }

  const length = text.length;
  const spans: TextSpan[] = [];
  let pos = 0;

  for (;;) {
    let end = Math.min(pos + chunkSize, length);
    if (end < length) {
      const boundary = findBoundary(text, pos, end, lookback);
      if (boundary > pos) end = boundary;
      else if (end - 1 > pos && splitsSurrogatePair(text, end)) end -= 1;
    }

    spans.push({
      sequenceIndex: spans.length,
      text: text.slice(pos, end),
      charStart: pos,
      charEnd: end,
    });

    if (end === length) break;

    // garante avanço mesmo quando o corte recuou demais
    let next = end - overlap;
    if (splitsSurrogatePair(text, next)) next += 1;
    if (next <= pos) next = end;
    pos = next;
  }

  return spans;
}

export function chunkId(documentId: string, sequenceIndex: number) {
  return `${documentId}#${sequenceIndex}`;
}

export function chunkDocument(
  documentId: string,
  text: string,
  opts: ChunkOptions = {}
): Chunk[] {
  return chunkText(text, opts).map((span) => ({
    ...span,
    chunkId: chunkId(documentId, span.sequenceIndex),
    documentId,
  }));
}
