import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";

export type TokenCounter = (text: string) => number;

export const DEFAULT_ENCODING: TiktokenEncoding = "cl100k_base";

// Prefix match, longest first, so "gpt-4o-mini" resolves before "gpt-4".
const MODEL_ENCODINGS: Array<[prefix: string, encoding: TiktokenEncoding]> = [
  ["gpt-4o", "o200k_base"],
  ["o1", "o200k_base"],
  ["o3", "o200k_base"],
  ["gpt-4", "cl100k_base"],
  ["gpt-3.5-turbo", "cl100k_base"],
  ["text-embedding-3", "cl100k_base"],
  ["text-davinci-003", "p50k_base"],
  ["davinci", "r50k_base"],
];

/** Falls back to cl100k_base for unknown models; chunk boundaries depend on this choice. */
export function encodingForModelName(model: string): TiktokenEncoding {
  const match = MODEL_ENCODINGS.find(([prefix]) => model.startsWith(prefix));
  return match ? match[1] : DEFAULT_ENCODING;
}

const encoders = new Map<TiktokenEncoding, Tiktoken>();

function encoderFor(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

export function createTokenCounter(model: string): TokenCounter {
  const encoder = encoderFor(encodingForModelName(model));
  return (text) => encoder.encode(text).length;
}
