/** Turns the text of one context into its tokens, in order and with repetition. */
export type Tokenizer = (text: string) => string[];

export const whitespaceTokenizer: Tokenizer = (text) => text.split(/\s+/).filter((t) => t.length > 0);

export interface SimpleTokenizerOptions {
  lowercase?: boolean;
  /** Tokens shorter than this are dropped. */
  minLength?: number;
  /** Characters removed from both ends of every token. */
  stripPunctuation?: boolean;
}

export function createSimpleTokenizer(opts: SimpleTokenizerOptions = {}): Tokenizer {
  const lowercase = opts.lowercase ?? true;
  const minLength = opts.minLength ?? 1;
  const strip = opts.stripPunctuation ?? true;
  return (text) => {
    const source = lowercase ? text.toLowerCase() : text;
    const out: string[] = [];
    for (const raw of source.split(/\s+/)) {
      const token = strip ? raw.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '') : raw;
      if (token.length >= minLength && token.length > 0) out.push(token);
    }
    return out;
  };
}

/** Token -> occurrence count for one context. */
export function countTokens(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);
  return counts;
}
