import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/domain/errors.js";
import { splitIntoChunks, toChunks } from "../src/pipelines/chunking.js";

function words(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `w${i}`);
}

describe("chunking pipeline", () => {
  it("splits 500 words into two overlapping windows with default settings", () => {
    const input = words(500);
    const chunks = splitIntoChunks(input.join(" "));

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toBe(input.slice(0, 300).join(" "));
    expect(chunks[1]).toBe(input.slice(250, 500).join(" "));
  });

  it("keeps stepping until a window would start past the last word", () => {
    const input = words(550);
    const chunks = splitIntoChunks(input.join(" "));

    expect(chunks).toEqual([
      input.slice(0, 300).join(" "),
      input.slice(250, 550).join(" "),
      input.slice(500, 550).join(" "),
    ]);
  });

  it("reconstructs the word sequence by dropping each window's overlap", () => {
    const input = words(37);
    const size = 10;
    const overlap = 3;
    const chunks = splitIntoChunks(input.join("  \n"), size, overlap);

    const rebuilt = chunks.flatMap((chunk, index) => {
      const chunkWords = chunk.split(" ");
      return index === 0 ? chunkWords : chunkWords.slice(overlap);
    });
    expect(rebuilt).toEqual(input);
    expect(chunks.every((chunk) => chunk.split(" ").length <= size)).toBe(true);
  });

  it("returns a single chunk when the text fits one window", () => {
    expect(splitIntoChunks("alpha beta gamma", 5, 1)).toEqual(["alpha beta gamma"]);
  });

  it("returns no chunks for blank text", () => {
    expect(splitIntoChunks("   \n\t ")).toEqual([]);
  });

  it("rejects an overlap that is not smaller than the size", () => {
    expect(() => splitIntoChunks("a b c", 5, 5)).toThrow(ConfigurationError);
    expect(() => splitIntoChunks("a b c", 0, 0)).toThrow(ConfigurationError);
  });

  it("numbers chunks in order", () => {
    expect(toChunks(["first", "second"])).toEqual([
      { text: "first", ordinal: 0 },
      { text: "second", ordinal: 1 },
    ]);
  });
});
