import OpenAI from "openai";
import { ConfigurationError } from "@/lib/errors";

let _client: OpenAI | null = null;

// As novas tentativas ficam com a RetryPolicy; o SDK não repete nada.
export function getOpenAI(apiKey: string | undefined, timeoutMs: number) {
  if (!_client) {
    if (!apiKey) {
      throw new ConfigurationError("Missing OPENAI_API_KEY");
    }
    _client = new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs });
  }
  return _client;
}
