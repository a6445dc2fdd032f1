import { describe, it, expect } from "@jest/globals";
import {
  answerQuery,
  buildPrompt,
  ChatClient,
  OpenAIAnswerGenerator,
  searchDocument,
  SIMILARITY_EXPLANATION,
} from "@/lib/answer";
import { ingestDocument } from "@/lib/ingestion";
import { NotFoundError, ProviderError, ValidationError } from "@/lib/errors";
import { testRuntime } from "../../helpers/fakes";

const TEXT =
  "Refunds are accepted within 30 days of purchase. " +
  "Shipping is free for orders above fifty dollars. " +
  "Support is available on weekdays from nine to five.";

async function setup(env: Record<string, string> = {}) {
  const rt = await testRuntime({ CHUNK_SIZE: "60", CHUNK_OVERLAP: "10", ...env });
  const report = await ingestDocument(rt, {
    filename: "faq.txt",
    fileType: "Text",
    fileSize: TEXT.length,
    text: TEXT,
    documentId: "doc-faq",
  });
  return { rt, report };
}

describe("buildPrompt", () => {
  it("puts the context blocks and the question in the user message", () => {
    const [system, user] = buildPrompt("Why?", ["block one", "block two"]);
    expect(system.role).toBe("system");
    expect(user.content).toBe(
      "You must answer from the provided context only.\n\nContext:\nblock one\n\nblock two\n\nUser question: Why?\n\nAnswer:"
    );
  });
});

describe("OpenAIAnswerGenerator", () => {
  it("sends the configured model and sampling options", async () => {
    const bodies: unknown[] = [];
    const client: ChatClient = {
      chat: {
        completions: {
          create: async (body) => {
            bodies.push(body);
            return { choices: [{ message: { content: "42" } }] };
          },
        },
      },
    };
    const gen = new OpenAIAnswerGenerator(client, {
      model: "gpt-3.5-turbo",
      temperature: 0.7,
      maxTokens: 500,
    });

    await expect(gen.generate("q", ["c"])).resolves.toBe("42");
    expect(bodies[0]).toMatchObject({ model: "gpt-3.5-turbo", temperature: 0.7, max_tokens: 500 });
  });

  it("maps SDK failures to ProviderError", async () => {
    const client: ChatClient = {
      chat: {
        completions: {
          create: async () => {
            throw Object.assign(new Error("overloaded"), { status: 529 });
          },
        },
      },
    };
    const gen = new OpenAIAnswerGenerator(client, { model: "m", temperature: 0, maxTokens: 1 });
    await expect(gen.generate("q", ["c"])).rejects.toMatchObject({
      kind: "ProviderError",
      code: "provider_failure",
      status: 529,
    });
  });
});

describe("searchDocument", () => {
  it("embeds the query and ranks the document's chunks", async () => {
    const { rt, report } = await setup();
    const hits = await searchDocument(rt, { documentId: "doc-faq", query: "refunds", topK: 100 });

    expect(hits).toHaveLength(report.chunksCreated);
    expect(hits.map((h) => h.rank)).toEqual(hits.map((_, i) => i + 1));
    expect(rt.embedder.calls[rt.embedder.calls.length - 1]).toEqual(["refunds"]);
  });

  it("rejects an empty query", async () => {
    const { rt } = await setup();
    await expect(searchDocument(rt, { documentId: "doc-faq", query: "  " })).rejects.toThrow(
      ValidationError
    );
  });
});

describe("answerQuery", () => {
  it("answers from the assembled context", async () => {
    const { rt, report } = await setup();
    const res = await answerQuery(rt, { documentId: "doc-faq", query: " When can I get a refund? " });

    expect(res.answer).toBe("answer to: When can I get a refund?");
    expect(res.query).toBe("When can I get a refund?");
    expect(res.documentId).toBe("doc-faq");
    expect(res.sources).toHaveLength(Math.min(5, report.chunksCreated));
    expect(res.sources.map((s) => s.rank)).toEqual(res.sources.map((_, i) => i + 1));
    expect(res.similarityScores).toBeUndefined();

    expect(rt.generator.calls).toHaveLength(1);
    expect(rt.generator.calls[0].blocks).toHaveLength(res.sources.length);
  });

  it("reports similarity scores when asked", async () => {
    const { rt } = await setup();
    const res = await answerQuery(rt, {
      documentId: "doc-faq",
      query: "shipping",
      topK: 2,
      showSimilarity: true,
      showEmbeddings: true,
    });

    expect(res.similarityScores).toHaveLength(2);
    expect(res.similarityExplanation).toBe(SIMILARITY_EXPLANATION);
    for (const s of res.similarityScores ?? []) {
      expect(s.cosineSimilarity).toBeGreaterThanOrEqual(-1);
      expect(s.cosineSimilarity).toBeLessThanOrEqual(1);
      expect(s.embedding).toHaveLength(4);
    }
  });

  it("keeps the context inside MAX_CONTEXT_CHARS", async () => {
    const { rt } = await setup({ MAX_CONTEXT_CHARS: "70", MIN_FRAGMENT_CHARS: "5" });
    const res = await answerQuery(rt, { documentId: "doc-faq", query: "support" });

    expect(rt.generator.calls[0].blocks.join("\n\n").length).toBeLessThanOrEqual(70);
    expect(res.sources.length + res.droppedChunkIds.length).toBeGreaterThan(1);
  });

  it("retries a generation timeout", async () => {
    const { rt } = await setup();
    rt.generator.failures.push(new ProviderError("timed out", { code: "timeout" }));

    const res = await answerQuery(rt, { documentId: "doc-faq", query: "support" });
    expect(res.answer).toBe("answer to: support");
    expect(rt.generator.calls).toHaveLength(2);
  });

  it("fails with NotFoundError for an unknown document", async () => {
    const { rt } = await setup();
    await expect(answerQuery(rt, { documentId: "nope", query: "x" })).rejects.toThrow(
      NotFoundError
    );
    expect(rt.generator.calls).toHaveLength(0);
  });
});
