/**
 * A single normalization stage.
 *
 * Stages are total: any string in, a string out, no side effects. The
 * normalizer composes them in a fixed order, each consuming the previous
 * stage's output.
 */
export interface TextTransform {
  readonly name: string;
  apply(text: string): string;
}

/**
 * Base-form lookup used by the lemmatization stage. Must return the token
 * unchanged when it is already a base form.
 */
export type Lemmatize = (token: string) => string;
