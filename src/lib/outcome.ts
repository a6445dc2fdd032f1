import { ErrorKind, errorMessage, isRagError } from "@/lib/errors";

// Formato de resposta das rotas: { ok: true, ...dados } ou uma falha
// com `kind` fixo, para o chamador tratar cada caso explicitamente.

export type Success<T extends object> = { ok: true } & T;

export type Failure =
  | { ok: false; kind: ErrorKind; error: string }
  | { ok: false; kind: "InternalError"; error: string };

export type Outcome<T extends object> = Success<T> | Failure;

export type FailureKind = Failure["kind"];

const STATUS_BY_KIND: Record<FailureKind, number> = {
  ValidationError: 400,
  DegenerateInputError: 400,
  NotFoundError: 404,
  DocumentNotReady: 409,
  ConfigurationError: 500,
  ProviderError: 502,
  IndexError: 503,
  InternalError: 500,
};

export function statusForKind(kind: FailureKind): number {
  return STATUS_BY_KIND[kind];
}

export function succeed<T extends object>(data: T): Success<T> {
  return { ok: true, ...data };
}

export function toFailure(error: unknown): Failure {
  if (isRagError(error)) {
    return { ok: false, kind: error.kind, error: error.message };
  }
  return { ok: false, kind: "InternalError", error: errorMessage(error) };
}
