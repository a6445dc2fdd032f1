import { ProviderError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

export interface RetryPolicy {
  /** Total de tentativas, contando a primeira. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
  isRetryable: (error: unknown) => boolean;
  sleep: (ms: number) => Promise<void>;
}

// Rate limit, timeout e 5xx do provedor valem nova tentativa; o resto não.
export function isRetryableProviderError(error: unknown): boolean {
  if (!(error instanceof ProviderError)) return false;
  if (error.code === "rate_limited" || error.code === "timeout") return true;
  return error.status !== undefined && error.status >= 500;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  backoffMultiplier: 2,
  jitterMs: 100,
  isRetryable: isRetryableProviderError,
  sleep: defaultSleep,
};

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/**
 * Atraso antes da tentativa `attempt + 1` (attempt começa em 1):
 * exponencial, limitado a maxDelayMs, mais jitter aleatório.
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  );
  return exponential + Math.random() * policy.jitterMs;
}

/**
 * Executa `fn` com novas tentativas conforme a política. Erros não
 * repetíveis sobem na hora; ao esgotar, um ProviderError é relançado
 * com o número de tentativas na mensagem.
 */
export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  context: string,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<T> {
  const log = createLogger({ action: "executeWithRetry", context });
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn();
      if (attempt > 1) log.info("Retry successful", { attempt });
      return result;
    } catch (error) {
      if (!policy.isRetryable(error)) throw error;

      if (attempt >= maxAttempts) {
        log.error("Max attempts exceeded", { attempts: attempt, error });
        if (error instanceof ProviderError) {
          throw new ProviderError(
            `${context} failed after ${attempt} attempts: ${error.message}`,
            { code: error.code, status: error.status, cause: error }
          );
        }
        throw error;
      }

      const delayMs = calculateDelay(attempt, policy);
      log.warn("Retryable error, will retry", { attempt, maxAttempts, delayMs, error });
      await policy.sleep(delayMs);
    }
  }
}
