import { NextResponse } from "next/server";
import type { z } from "zod";
import { ValidationError } from "@/lib/errors";
import { Failure, Outcome, statusForKind, succeed, toFailure } from "@/lib/outcome";
import { createLogger, generateRequestId } from "@/lib/logger";

export function respond<T extends object>(outcome: Outcome<T>) {
  if (outcome.ok) return NextResponse.json(outcome);
  return NextResponse.json(outcome, { status: statusForKind(outcome.kind) });
}

/**
 * Envolve o corpo de uma rota: sucesso vira { ok: true, ... }; erro vira
 * a variante tipada com o status HTTP do seu kind.
 */
export async function handle<T extends object>(
  route: string,
  fn: () => Promise<T>
) {
  const requestId = generateRequestId();
  const log = createLogger({ requestId, route });
  try {
    const data = await fn();
    return respond<T>(succeed(data));
  } catch (e) {
    const failure: Failure = toFailure(e);
    const status = statusForKind(failure.kind);
    if (status >= 500) log.error("Request failed", { kind: failure.kind, error: failure.error });
    else log.warn("Request rejected", { kind: failure.kind, error: failure.error });
    return respond<T>(failure);
  }
}

export function boolParam(v: string | null) {
  return v !== null && ["1", "true", "yes"].includes(v.toLowerCase());
}

export async function readJson(req: Request): Promise<unknown> {
  return req.json().catch(() => ({}));
}

/** Valida o corpo com zod; erro vira ValidationError com os campos. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
      .join("; ");
    throw new ValidationError(issues);
  }
  return parsed.data;
}
