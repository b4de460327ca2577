import { describe, expect, it } from "vitest";
import { chunkText, estimateTokens } from "./chunker";

/** Paragraph of exactly `n` chars made of 9-letter words, ending in a period. */
function para(letter: string, n: number): string {
  return (letter.repeat(9) + " ").repeat(40).slice(0, n - 1) + ".";
}

describe("chunkText", () => {
  it("returns nothing for empty or whitespace-only text", () => {
    expect(chunkText("", 100, 10)).toEqual([]);
    expect(chunkText("  \n\t \n", 100, 10)).toEqual([]);
  });

  it("keeps short text as a single trimmed chunk", () => {
    const chunks = chunkText("  hello world  ", 500, 50);
    expect(chunks).toEqual([{ sequence: 0, offset: 2, length: 11, text: "hello world", tokenEstimate: 3 }]);
  });

  it("breaks on whitespace instead of mid-word", () => {
    const chunks = chunkText("alpha beta gamma delta", 12, 0);
    expect(chunks.map((c) => [c.text, c.offset])).toEqual([
      ["alpha beta", 0],
      ["gamma delta", 11],
    ]);
  });

  it("overlaps consecutive chunks on word boundaries", () => {
    const chunks = chunkText("alpha beta gamma delta", 12, 5);
    expect(chunks.map((c) => [c.text, c.offset, c.length])).toEqual([
      ["alpha beta", 0, 10],
      ["beta gamma", 6, 10],
      ["gamma delta", 11, 11],
    ]);
  });

  it("hard-cuts text without any break", () => {
    const chunks = chunkText("abcdefghijklmnopqrstuvwxyz", 10, 0);
    expect(chunks.map((c) => c.text)).toEqual(["abcdefghij", "klmnopqrst", "uvwxyz"]);
  });

  it("prefers paragraph boundaries", () => {
    const p1 = para("a", 120);
    const p2 = para("b", 110);
    const p3 = para("c", 90);
    const text = [p1, p2, p3].join("\n\n");
    const chunks = chunkText(text, 200, 20);

    expect(chunks).toHaveLength(3);
    expect(chunks[0].text).toBe(p1);
    expect(chunks[1].text.endsWith(p2)).toBe(true);
    expect(chunks[2].text.endsWith(p3)).toBe(true);
    for (const c of chunks) expect(c.length).toBeLessThanOrEqual(200);
  });

  it("produces spans that reproduce the source text", () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} talks about topic ${i % 7}.`).join(" ");
    const chunks = chunkText(text, 120, 30);

    expect(chunks.length).toBeGreaterThan(5);
    chunks.forEach((c, i) => {
      expect(c.sequence).toBe(i);
      expect(text.slice(c.offset, c.offset + c.length)).toBe(c.text);
      expect(c.length).toBeLessThanOrEqual(120);
      expect(c.text).toBe(c.text.trim());
      if (i > 0) expect(c.offset).toBeGreaterThan(chunks[i - 1].offset);
    });
    expect(chunks[chunks.length - 1].text.endsWith("topic 4.")).toBe(true);
  });

  it("is deterministic", () => {
    const text = para("q", 300) + "\n\n" + para("r", 300);
    expect(chunkText(text, 128, 16)).toEqual(chunkText(text, 128, 16));
  });

  it("rejects overlap that is not smaller than the size", () => {
    expect(() => chunkText("abc", 10, 10)).toThrow(RangeError);
    expect(() => chunkText("abc", 0, 0)).toThrow(RangeError);
  });
});

describe("estimateTokens", () => {
  it("rounds up at four characters per token", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});
