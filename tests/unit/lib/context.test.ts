import { describe, it, expect } from "@jest/globals";
import { assembleContext, ContextInput, truncateAtSentence } from "@/lib/context";

describe("truncateAtSentence", () => {
  it("keeps text that already fits", () => {
    expect(truncateAtSentence("Short one.", 20)).toBe("Short one.");
  });

  it("cuts at the last sentence terminator inside the limit", () => {
    expect(truncateAtSentence("One. Two! Three four five", 12)).toBe("One. Two!");
  });

  it("falls back to the last whitespace", () => {
    expect(truncateAtSentence("no terminators here at all", 10)).toBe("no");
  });

  it("gives up on a single long word", () => {
    expect(truncateAtSentence("abcdefghij", 5)).toBe("");
    expect(truncateAtSentence("abc", 0)).toBe("");
  });
});

describe("assembleContext", () => {
  const a = "A".repeat(60);
  const partial = "First sentence here. Second sentence is longer than room.";

  it("drops exact duplicates and keeps rank order", () => {
    const ctx = assembleContext(
      [
        { chunkId: "c1", text: "alpha" },
        { chunkId: "c2", text: "beta" },
        { chunkId: "c3", text: "alpha" },
      ],
      100
    );
    expect(ctx.blocks.map((b) => b.chunkId)).toEqual(["c1", "c2"]);
    expect(ctx.dropped).toEqual([{ chunkId: "c3", reason: "duplicate" }]);
    expect(ctx.text).toBe("alpha\n\nbeta");
    expect(ctx.totalChars).toBe(11);
  });

  it("counts the separator against the budget", () => {
    const ctx = assembleContext(
      [
        { chunkId: "c1", text: "x".repeat(10) },
        { chunkId: "c2", text: "y".repeat(10) },
      ],
      21
    );
    // 10 + 2 + 10 = 22 > 21, e o fragmento de "y" não tem onde cortar
    expect(ctx.blocks.map((b) => b.chunkId)).toEqual(["c1"]);
    expect(ctx.dropped).toEqual([{ chunkId: "c2", reason: "budget" }]);
  });

  it("keeps a sentence-cut fragment longer than minFragmentChars", () => {
    const ctx = assembleContext(
      [
        { chunkId: "c1", text: a },
        { chunkId: "c2", text: partial },
      ],
      100,
      { minFragmentChars: 10 }
    );
    expect(ctx.blocks).toEqual([
      { chunkId: "c1", text: a, truncated: false },
      { chunkId: "c2", text: "First sentence here.", truncated: true },
    ]);
    expect(ctx.totalChars).toBe(82);
  });

  it("drops a fragment that is too short", () => {
    const ctx = assembleContext(
      [
        { chunkId: "c1", text: a },
        { chunkId: "c2", text: partial },
      ],
      100
    );
    expect(ctx.blocks.map((b) => b.chunkId)).toEqual(["c1"]);
    expect(ctx.dropped).toEqual([{ chunkId: "c2", reason: "budget" }]);
  });

  it("never exceeds maxContextChars", () => {
    let seed = 7;
    const next = () => (seed = (seed * 1103515245 + 12345) % 2147483648);
    const words = ["lorem", "ipsum.", "dolor", "sit!", "amet", "consectetur?", "adipiscing"];

    for (let round = 0; round < 50; round++) {
      const chunks: ContextInput[] = [];
      const n = (next() % 8) + 1;
      for (let i = 0; i < n; i++) {
        const len = (next() % 40) + 1;
        const parts: string[] = [];
        for (let w = 0; w < len; w++) parts.push(words[next() % words.length]);
        chunks.push({ chunkId: `c${i}`, text: parts.join(" ") });
      }
      const max = (next() % 400) + 1;
      const ctx = assembleContext(chunks, max, { minFragmentChars: 5 });

      expect(ctx.totalChars).toBeLessThanOrEqual(max);
      expect(ctx.text.length).toBe(ctx.totalChars);
      expect(ctx.blocks.length + ctx.dropped.length).toBe(chunks.length);
    }
  });
});
