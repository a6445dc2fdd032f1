// Monta o bloco de contexto que vai para o prompt: ordem de relevância,
// sem texto repetido e sem passar de maxContextChars.

export type ContextInput = {
  chunkId: string;
  text: string;
};

export type ContextBlock = {
  chunkId: string;
  text: string;
  truncated: boolean;
};

export type DroppedChunk = {
  chunkId: string;
  reason: "duplicate" | "budget";
};

export type AssembledContext = {
  blocks: ContextBlock[];
  dropped: DroppedChunk[];
  /** Blocos unidos pelo separador; `text.length === totalChars`. */
  text: string;
  totalChars: number;
};

export type AssembleOptions = {
  /** Fragmento truncado só entra se for maior que isso. */
  minFragmentChars?: number;
  separator?: string;
};

export const DEFAULT_MIN_FRAGMENT_CHARS = 50;

const SENTENCE_END = /[.!?]/;
const WHITESPACE = /\s/;

/**
 * Maior prefixo de `text` com até `limit` caracteres que termina em fim
 * de frase; sem fim de frase, corta no último espaço. Sem nenhum dos
 * dois, devolve "".
 */
export function truncateAtSentence(text: string, limit: number) {
  if (limit <= 0) return "";
  if (text.length <= limit) return text;
  const prefix = text.slice(0, limit);
  for (let i = prefix.length - 1; i >= 0; i--) {
    if (SENTENCE_END.test(prefix[i])) return prefix.slice(0, i + 1);
  }
  for (let i = prefix.length - 1; i >= 0; i--) {
    if (WHITESPACE.test(prefix[i])) return prefix.slice(0, i).trimEnd();
  }
  return "";
}

export function assembleContext(
  ranked: ContextInput[],
  maxContextChars: number,
  opts: AssembleOptions = {}
): AssembledContext {
  const minFragment = opts.minFragmentChars ?? DEFAULT_MIN_FRAGMENT_CHARS;
  const separator = opts.separator ?? "\n\n";

  const blocks: ContextBlock[] = [];
  const dropped: DroppedChunk[] = [];
  const seen = new Set<string>();
  let used = 0;

  for (const chunk of ranked) {
    if (seen.has(chunk.text)) {
      dropped.push({ chunkId: chunk.chunkId, reason: "duplicate" });
      continue;
    }

    const sepCost = blocks.length ? separator.length : 0;
    const remaining = maxContextChars - used - sepCost;

    if (chunk.text.length <= remaining) {
      blocks.push({ chunkId: chunk.chunkId, text: chunk.text, truncated: false });
      seen.add(chunk.text);
      used += sepCost + chunk.text.length;
      continue;
    }

    const fragment = truncateAtSentence(chunk.text, remaining);
    if (fragment.length > minFragment) {
      blocks.push({ chunkId: chunk.chunkId, text: fragment, truncated: true });
      seen.add(chunk.text);
      used += sepCost + fragment.length;
    } else {
      dropped.push({ chunkId: chunk.chunkId, reason: "budget" });
    }
  }

  const text = blocks.map((b) => b.text).join(separator);
  return { blocks, dropped, text, totalChars: text.length };
}
