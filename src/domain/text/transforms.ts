import lemmatizer from "wink-lemmatizer";

import type { Lemmatize, TextTransform } from "./ports";
import englishStopwords from "./stopwords.en.json";

// The 32 ASCII punctuation characters.
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;
// Decimal digits plus the other single-digit characters of Unicode 14:
// superscripts, subscripts, circled, parenthesized and full-stop digits.
// Multi-digit forms such as "⑩" and fractions such as "½" are kept.
const DIGIT =
  /[\p{Nd}\u00B2\u00B3\u00B9\u1369-\u1371\u19DA\u2070\u2074-\u2079\u2080-\u2089\u2460-\u2468\u2474-\u247C\u2488-\u2490\u24EA\u24F5-\u24FD\u24FF\u2776-\u277E\u2780-\u2788\u278A-\u2792\u{10A40}-\u{10A43}\u{10E60}-\u{10E68}\u{11052}-\u{1105A}\u{1F100}-\u{1F10A}]/gu;
const WHITESPACE_RUN = /\s+/g;
const URL = /https?:\/\/\S+|www\.\S+/g;

function tokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

export class LowercaseTransform implements TextTransform {
  readonly name = "lowercase";

  apply(text: string): string {
    return tokens(text)
      .map((token) => token.toLowerCase())
      .join(" ");
  }
}

export class StopwordRemovalTransform implements TextTransform {
  readonly name = "stopwords";
  private readonly stopwords: ReadonlySet<string>;

  constructor(stopwords: Iterable<string> = englishStopwords) {
    this.stopwords = new Set(stopwords);
  }

  apply(text: string): string {
    return tokens(text)
      .filter((token) => !this.stopwords.has(token))
      .join(" ");
  }
}

/** Removes digits inside tokens too: "covid19" becomes "covid". */
export class DigitRemovalTransform implements TextTransform {
  readonly name = "digits";

  apply(text: string): string {
    return text.replace(DIGIT, "");
  }
}

export class PunctuationRemovalTransform implements TextTransform {
  readonly name = "punctuation";

  apply(text: string): string {
    return text
      .replace(PUNCTUATION, " ")
      .replaceAll(".", "")
      .replace(WHITESPACE_RUN, " ")
      .trim();
  }
}

/** Deletes URLs outright; no space is put in their place. */
export class UrlRemovalTransform implements TextTransform {
  readonly name = "urls";

  apply(text: string): string {
    return text.replace(URL, "");
  }
}

export const nounLemmatizer: Lemmatize = (token) =>
  lemmatizer.lemmatizeNoun(token);

export class LemmatizationTransform implements TextTransform {
  readonly name = "lemmatize";

  constructor(private readonly lemmatize: Lemmatize = nounLemmatizer) {}

  apply(text: string): string {
    return tokens(text)
      .map((token) => this.lemmatize(token))
      .join(" ");
  }
}
