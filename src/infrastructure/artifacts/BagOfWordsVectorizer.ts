/**
 * Bag-of-words vectorizer over a vocabulary fitted offline.
 *
 * Artifact shape (JSON):
 *   { "vocabulary": { "<term>": <index>, ... },
 *     "vocabulary_size"?: number, "ngram_range"?: [min, max],
 *     "binary"?: boolean, "lowercase"?: boolean, "token_pattern"?: string }
 *
 * Terms missing from the vocabulary contribute nothing. The output length is
 * the vocabulary size and never changes after construction.
 */
import type { FeatureVector, Vectorizer } from "@domain/model/ports";
import { z } from "zod";

import { ArtifactError } from "./ArtifactError";
import { parseArtifact, readJsonArtifact } from "./readArtifact";

export const VectorizerArtifactSchema = z.object({
  vocabulary: z.record(z.string(), z.number().int().nonnegative()),
  vocabulary_size: z.number().int().nonnegative().optional(),
  ngram_range: z
    .tuple([z.number().int().positive(), z.number().int().positive()])
    .default([1, 1]),
  binary: z.boolean().default(false),
  lowercase: z.boolean().default(true),
  token_pattern: z.string().nullable().optional(),
});

export type VectorizerArtifact = z.output<typeof VectorizerArtifactSchema>;

const DEFAULT_TOKEN_PATTERN = "[\\p{L}\\p{N}_]{2,}";

const WORD = "\\p{L}\\p{N}_";
const WORD_BOUNDARY = `(?:(?<![${WORD}])(?=[${WORD}])|(?<=[${WORD}])(?![${WORD}]))`;
const NOT_WORD_BOUNDARY = `(?:(?<=[${WORD}])(?=[${WORD}])|(?<![${WORD}])(?![${WORD}]))`;

/**
 * Rewrites the Unicode-aware escapes of a fitted pattern (\w, \W, \d, \D,
 * \b, \B) into explicit property classes. JavaScript keeps those escapes
 * ASCII-only even under the `u` flag.
 */
export function translateTokenPattern(pattern: string): string {
  const source = pattern.startsWith("(?u)") ? pattern.slice(4) : pattern;
  let out = "";
  let inClass = false;

  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];

    if (ch === "\\" && i + 1 < source.length) {
      const next = source[i + 1];
      i += 1;

      switch (next) {
        case "w":
          out += inClass ? WORD : `[${WORD}]`;
          break;
        case "W":
          // A negated class cannot nest inside a class without the `v` flag.
          out += inClass ? "\\W" : `[^${WORD}]`;
          break;
        case "d":
          out += "\\p{Nd}";
          break;
        case "D":
          out += "\\P{Nd}";
          break;
        case "b":
          out += inClass ? "\\x08" : WORD_BOUNDARY;
          break;
        case "B":
          out += inClass ? "\\B" : NOT_WORD_BOUNDARY;
          break;
        default:
          out += `\\${next}`;
      }
      continue;
    }

    if (ch === "[" && !inClass) {
      inClass = true;
    } else if (ch === "]" && inClass && !out.endsWith("[")) {
      inClass = false;
    }

    out += ch;
  }

  return out;
}

function compileTokenPattern(pattern: string | null | undefined): RegExp {
  const raw = pattern ? translateTokenPattern(pattern) : DEFAULT_TOKEN_PATTERN;

  try {
    return new RegExp(raw, "gu");
  } catch (err) {
    throw new ArtifactError("Vectorizer token pattern does not compile", {
      pattern: raw,
      cause: String(err),
    });
  }
}

export class BagOfWordsVectorizer implements Vectorizer {
  readonly dimension: number;
  private readonly vocabulary: ReadonlyMap<string, number>;
  private readonly tokenPattern: RegExp;
  private readonly minN: number;
  private readonly maxN: number;
  private readonly binary: boolean;
  private readonly lowercase: boolean;

  constructor(artifact: VectorizerArtifact) {
    const entries = Object.entries(artifact.vocabulary);
    const dimension = artifact.vocabulary_size ?? entries.length;
    const seen = new Set<number>();

    for (const [term, index] of entries) {
      if (index >= dimension || seen.has(index)) {
        throw new ArtifactError("Vectorizer vocabulary index out of range or repeated", {
          term,
          index,
          dimension,
        });
      }
      seen.add(index);
    }

    const [minN, maxN] = artifact.ngram_range;

    if (minN > maxN) {
      throw new ArtifactError("Vectorizer ngram_range is inverted", {
        ngramRange: artifact.ngram_range,
      });
    }

    this.dimension = dimension;
    this.vocabulary = new Map(entries);
    this.tokenPattern = compileTokenPattern(artifact.token_pattern);
    this.minN = minN;
    this.maxN = maxN;
    this.binary = artifact.binary;
    this.lowercase = artifact.lowercase;
  }

  private tokenize(text: string): string[] {
    const source = this.lowercase ? text.toLowerCase() : text;
    // matchAll works on a clone, so the shared pattern's lastIndex is untouched.
    return Array.from(source.matchAll(this.tokenPattern), (match) => match[0]);
  }

  vectorize(text: string): FeatureVector {
    const vector = new Float64Array(this.dimension);
    const tokens = this.tokenize(text);

    for (let n = this.minN; n <= this.maxN; n += 1) {
      for (let i = 0; i + n <= tokens.length; i += 1) {
        const index = this.vocabulary.get(tokens.slice(i, i + n).join(" "));

        if (index === undefined) {
          continue;
        }

        vector[index] = this.binary ? 1 : (vector[index] ?? 0) + 1;
      }
    }

    return vector;
  }

  transform(texts: readonly string[]): FeatureVector[] {
    return texts.map((text) => this.vectorize(text));
  }
}

export function createVectorizer(raw: unknown, source = "<inline>"): BagOfWordsVectorizer {
  return new BagOfWordsVectorizer(
    parseArtifact(VectorizerArtifactSchema, raw, source)
  );
}

export async function loadVectorizer(filePath: string): Promise<BagOfWordsVectorizer> {
  const artifact = await readJsonArtifact(VectorizerArtifactSchema, filePath);
  return new BagOfWordsVectorizer(artifact);
}
