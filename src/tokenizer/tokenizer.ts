import { getEncoding, type TiktokenEncoding } from "js-tiktoken";

export type Tokenizer = {
  count(text: string): number;
};

export const DEFAULT_ENCODING: TiktokenEncoding = "cl100k_base";

export function createTiktokenTokenizer(encoding: TiktokenEncoding = DEFAULT_ENCODING): Tokenizer {
  const enc = getEncoding(encoding);
  return {
    count(text: string): number {
      if (!text) return 0;
      return enc.encode(text, [], []).length;
    }
  };
}
