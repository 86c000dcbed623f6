declare module "wink-lemmatizer" {
  interface WinkLemmatizer {
    lemmatizeNoun(word: string): string;
    lemmatizeVerb(word: string): string;
    lemmatizeAdjective(word: string): string;
  }

  const lemmatizer: WinkLemmatizer;
  export default lemmatizer;
}
