import { describe, it, expect } from "@jest/globals";
import {
  embedQuery,
  embedTexts,
  EmbeddingsClient,
  OpenAIEmbeddingProvider,
  toProviderError,
} from "@/lib/embeddings";
import { ProviderError, ValidationError } from "@/lib/errors";
import { isRetryableProviderError } from "@/lib/retry";
import { DIM, FakeEmbedder, noDelayRetry } from "../../helpers/fakes";

describe("toProviderError", () => {
  it("maps HTTP 429 to rate_limited", () => {
    const err = toProviderError({ status: 429, message: "slow down" }, "OpenAI embeddings");
    expect(err.code).toBe("rate_limited");
    expect(err.status).toBe(429);
    expect(err.message).toBe("OpenAI embeddings: slow down");
  });

  it("maps connection timeouts to timeout", () => {
    const e = Object.assign(new Error("Request timed out."), { name: "APIConnectionTimeoutError" });
    expect(toProviderError(e, "OpenAI chat").code).toBe("timeout");
  });

  it("keeps the status of other failures so 5xx stay retryable", () => {
    const err = toProviderError({ status: 503, message: "unavailable" }, "OpenAI chat");
    expect(err.code).toBe("provider_failure");
    expect(err.status).toBe(503);
    expect(isRetryableProviderError(err)).toBe(true);
  });

  it("passes ProviderError through", () => {
    const original = new ProviderError("x", { code: "timeout" });
    expect(toProviderError(original, "y")).toBe(original);
  });
});

describe("OpenAIEmbeddingProvider", () => {
  it("returns vectors in input order", async () => {
    const client: EmbeddingsClient = {
      embeddings: {
        create: async () => ({
          data: [
            { embedding: [2, 2], index: 1 },
            { embedding: [1, 1], index: 0 },
          ],
        }),
      },
    };
    const provider = new OpenAIEmbeddingProvider(client, "text-embedding-3-small", 2);
    await expect(provider.embed(["a", "b"])).resolves.toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it("wraps SDK errors", async () => {
    const client: EmbeddingsClient = {
      embeddings: {
        create: async () => {
          throw Object.assign(new Error("Rate limit"), { status: 429 });
        },
      },
    };
    const provider = new OpenAIEmbeddingProvider(client, "m", 2);
    await expect(provider.embed(["a"])).rejects.toMatchObject({
      kind: "ProviderError",
      code: "rate_limited",
    });
  });
});

describe("embedTexts", () => {
  it("splits the input into batches", async () => {
    const embedder = new FakeEmbedder();
    const vectors = await embedTexts(
      { embedder, retry: noDelayRetry(), batchSize: 2 },
      ["a", "b", "c", "d", "e"]
    );
    expect(vectors).toHaveLength(5);
    expect(embedder.calls).toEqual([["a", "b"], ["c", "d"], ["e"]]);
  });

  it("retries a batch that hit a rate limit", async () => {
    const embedder = new FakeEmbedder();
    embedder.failures.set(1, new ProviderError("busy", { code: "rate_limited" }));
    const vectors = await embedTexts({ embedder, retry: noDelayRetry(), batchSize: 10 }, ["a"]);
    expect(vectors).toHaveLength(1);
    expect(embedder.calls).toHaveLength(2);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const embedder = {
      dimension: DIM,
      embed: async () => [[1, 0, 0, 0]],
    };
    await expect(
      embedTexts({ embedder, retry: noDelayRetry(), batchSize: 10 }, ["a", "b"])
    ).rejects.toThrow(ValidationError);
  });

  it("rejects vectors of the wrong dimension", async () => {
    const embedder = {
      dimension: DIM,
      embed: async (texts: string[]) => texts.map(() => [1, 0]),
    };
    await expect(
      embedTexts({ embedder, retry: noDelayRetry(), batchSize: 10 }, ["a"])
    ).rejects.toThrow("Embedding 0 has wrong dimension: 2 != 4");
  });

  it("embeds a single query", async () => {
    const embedder = new FakeEmbedder();
    const vec = await embedQuery({ embedder, retry: noDelayRetry(), batchSize: 1 }, "hello");
    expect(vec).toHaveLength(DIM);
  });
});
