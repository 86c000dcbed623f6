import { ArtifactError } from "@infrastructure/artifacts/ArtifactError";
import {
  createVectorizer,
  loadVectorizer,
  translateTokenPattern,
} from "@infrastructure/artifacts/BagOfWordsVectorizer";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

const fixture = (name: string) =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("BagOfWordsVectorizer", () => {
  const vectorizer = createVectorizer({
    vocabulary: { car: 0, bought: 1, check: 2, "red car": 3 },
    ngram_range: [1, 2],
  });

  it("counts known unigrams and bigrams", () => {
    expect(Array.from(vectorizer.vectorize("bought car car"))).toEqual([
      2, 1, 0, 0,
    ]);
    expect(Array.from(vectorizer.vectorize("red car"))).toEqual([1, 0, 0, 1]);
  });

  it("ignores unknown and single-character tokens", () => {
    expect(Array.from(vectorizer.vectorize("a zebra x check"))).toEqual([
      0, 0, 1, 0,
    ]);
  });

  it("returns an all-zero vector of full width for empty text", () => {
    const vector = vectorizer.vectorize("");
    expect(vector.length).toBe(4);
    expect(Array.from(vector).every((value) => value === 0)).toBe(true);
  });

  it("keeps the same dimension for every input", () => {
    for (const text of ["", "car", "bought car check red car", "日本語 テキスト"]) {
      expect(vectorizer.vectorize(text).length).toBe(vectorizer.dimension);
    }
  });

  it("is deterministic", () => {
    expect(Array.from(vectorizer.vectorize("check car"))).toEqual(
      Array.from(vectorizer.vectorize("check car"))
    );
  });

  it("transforms a batch", () => {
    const rows = vectorizer.transform(["car", "check"]);
    expect(rows.map((row) => Array.from(row))).toEqual([
      [1, 0, 0, 0],
      [0, 0, 1, 0],
    ]);
  });

  it("caps counts at one in binary mode", () => {
    const binary = createVectorizer({ vocabulary: { car: 0 }, binary: true });
    expect(Array.from(binary.vectorize("car car car"))).toEqual([1]);
  });

  it("honours an explicit vocabulary size", () => {
    const wide = createVectorizer({ vocabulary: { car: 0 }, vocabulary_size: 5 });
    expect(wide.dimension).toBe(5);
  });

  it("honours a token pattern with the (?u) prefix", () => {
    const words = createVectorizer({
      vocabulary: { car: 0 },
      token_pattern: "(?u)\\b\\w\\w+\\b",
    });
    expect(Array.from(words.vectorize("car, car!"))).toEqual([2]);
  });

  it("matches accented words under the (?u) word pattern", () => {
    const words = createVectorizer({
      vocabulary: { café: 0, naïve: 1 },
      token_pattern: "(?u)\\b\\w\\w+\\b",
    });
    expect(Array.from(words.vectorize("café naïve"))).toEqual([1, 1]);
    expect(Array.from(words.vectorize("cafés naïvement"))).toEqual([0, 0]);
  });

  it("widens \\w inside a character class", () => {
    const words = createVectorizer({
      vocabulary: { "l'été": 0 },
      token_pattern: "(?u)[\\w']+",
    });
    expect(Array.from(words.vectorize("l'été, l'été"))).toEqual([2]);
  });

  it("translates word and digit escapes to property classes", () => {
    expect(translateTokenPattern("(?u)\\w+")).toBe("[\\p{L}\\p{N}_]+");
    expect(translateTokenPattern("[\\w-]")).toBe("[\\p{L}\\p{N}_-]");
    expect(translateTokenPattern("\\d\\.\\D")).toBe("\\p{Nd}\\.\\P{Nd}");
  });

  it("rejects out-of-range and repeated indices", () => {
    expect(() => createVectorizer({ vocabulary: { car: 5 } })).toThrow(
      ArtifactError
    );
    expect(() => createVectorizer({ vocabulary: { car: 0, bus: 0 } })).toThrow(
      ArtifactError
    );
  });

  it("loads an artifact from disk", async () => {
    const loaded = await loadVectorizer(fixture("vectorizer.json"));
    expect(loaded.dimension).toBe(3);
    expect(Array.from(loaded.vectorize("love dog"))).toEqual([0, 1, 1]);
  });

  it("fails on a missing or malformed artifact", async () => {
    await expect(loadVectorizer(fixture("missing.json"))).rejects.toBeInstanceOf(
      ArtifactError
    );
    await expect(
      loadVectorizer(fixture("broken-vectorizer.json"))
    ).rejects.toBeInstanceOf(ArtifactError);
  });
});
