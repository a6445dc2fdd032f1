// Taxonomia de erros do pipeline. Cada classe carrega um `kind` estável
// que as rotas usam para montar a resposta (ver lib/outcome.ts).

export type ErrorKind =
  | "ValidationError"
  | "ConfigurationError"
  | "ProviderError"
  | "IndexError"
  | "NotFoundError"
  | "DocumentNotReady"
  | "DegenerateInputError";

export type ProviderErrorCode = "provider_failure" | "rate_limited" | "timeout";

export abstract class RagError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Entrada inválida: id vazio, contagens divergentes, dimensão errada. */
export class ValidationError extends RagError {
  readonly kind = "ValidationError" as const;
}

/** Parâmetros de chunking ou variáveis de ambiente inválidas. */
export class ConfigurationError extends RagError {
  readonly kind = "ConfigurationError" as const;
}

export class ProviderError extends RagError {
  readonly kind = "ProviderError" as const;
  readonly code: ProviderErrorCode;
  readonly status?: number;

  constructor(
    message: string,
    options: { code?: ProviderErrorCode; status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.code = options.code ?? "provider_failure";
    this.status = options.status;
  }
}

/** Vector store inacessível ou rejeitou insert/search. */
export class VectorIndexError extends RagError {
  readonly kind = "IndexError" as const;
}

export class NotFoundError extends RagError {
  readonly kind = "NotFoundError" as const;
}

/** Consulta contra documento ainda em `processing` ou que terminou `failed`. */
export class DocumentNotReadyError extends RagError {
  readonly kind = "DocumentNotReady" as const;
  readonly status: string;

  constructor(documentId: string, status: string) {
    super(`Document ${documentId} is not ready (status: ${status})`);
    this.status = status;
  }
}

/** Documento sem texto (EmptyDocument): nada é indexado. */
export class DegenerateInputError extends RagError {
  readonly kind = "DegenerateInputError" as const;
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
