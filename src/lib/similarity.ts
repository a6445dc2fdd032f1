import { ValidationError } from "@/lib/errors";

type Vec = ArrayLike<number>;

/** Abaixo disso a norma é tratada como zero. */
export const NORM_EPSILON = 1e-12;

function assertSameLength(a: Vec, b: Vec) {
  if (a.length !== b.length) {
    throw new ValidationError(
      `Vector dimensions differ: ${a.length} != ${b.length}`
    );
  }
}

export function dot(a: Vec, b: Vec) {
  assertSameLength(a, b);
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}

export function norm(a: Vec) {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * a[i];
  return Math.sqrt(s);
}

// Métrica nativa do índice (L2 sem raiz): menor = mais perto.
export function squaredEuclidean(a: Vec, b: Vec) {
  assertSameLength(a, b);
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    s += d * d;
  }
  return s;
}

export type CosineResult = {
  similarity: number;
  /** Algum dos vetores tem norma ~0; `similarity` vem como 0. */
  degenerate: boolean;
};

export function cosineSimilarity(a: Vec, b: Vec): CosineResult {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na < NORM_EPSILON || nb < NORM_EPSILON) {
    return { similarity: 0, degenerate: true };
  }
  const sim = d / (na * nb);
  return { similarity: Math.max(-1, Math.min(1, sim)), degenerate: false };
}

/**
 * Aproximação do cosseno a partir da distância L2 ao quadrado, válida
 * para vetores unitários (embeddings da OpenAI já vêm normalizados).
 */
export function cosineFromSquaredDistance(distance: number) {
  return Math.max(-1, Math.min(1, 1 - distance / 2));
}
