export type Tokenizer = (sentence: string) => string[];

/** Splits on runs of whitespace and drops empty tokens. */
export const whitespaceTokenizer: Tokenizer = (sentence) =>
  sentence.split(/\s+/).filter((token) => token.length > 0);
