/**
 * Inference-time text normalizer.
 *
 * Runs a fixed, ordered list of TextTransform stages:
 *   lowercase -> stopwords -> digits -> punctuation -> urls -> lemmatize
 *
 * normalize() is pure and total: any string (including "") yields a string,
 * and equal inputs always yield equal outputs.
 */
import type { TextTransform } from "./ports";
import {
  DigitRemovalTransform,
  LemmatizationTransform,
  LowercaseTransform,
  PunctuationRemovalTransform,
  StopwordRemovalTransform,
  UrlRemovalTransform,
} from "./transforms";

export class TextNormalizer {
  private readonly stages: readonly TextTransform[];

  constructor(stages: readonly TextTransform[]) {
    this.stages = Object.freeze([...stages]);
  }

  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  normalize(text: string): string {
    return this.stages.reduce((current, stage) => stage.apply(current), text);
  }
}

export function createDefaultNormalizer(): TextNormalizer {
  return new TextNormalizer([
    new LowercaseTransform(),
    new StopwordRemovalTransform(),
    new DigitRemovalTransform(),
    new PunctuationRemovalTransform(),
    new UrlRemovalTransform(),
    new LemmatizationTransform(),
  ]);
}
