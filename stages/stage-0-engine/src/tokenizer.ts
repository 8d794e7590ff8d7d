/**
 * Tokenizers for the context-window boundary.
 *
 * - tiktoken: real BPE counts for OpenAI-compatible engines.
 * - approximate: ~4 characters per token, for offline and scripted engines.
 *   Stateless: each id packs up to four UTF-8 bytes, so any instance decodes
 *   any other's ids and nothing accumulates between calls.
 */

import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import type { Tokenizer } from "./types.js";

const CHARS_PER_TOKEN = 4;
const BYTES_PER_TOKEN = 4;
const PIECE_RANGE = 2 ** 32;

/** Same chars/4 heuristic used when no real tokenizer is available. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

// 编码表加载较慢，按名称懒加载并复用
const encoders = new Map<TiktokenEncoding, Tiktoken>();

function getEncoder(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

export function createTiktokenTokenizer(
  encoding: TiktokenEncoding = "o200k_base"
): Tokenizer {
  return {
    // special-token text is counted as ordinary text instead of throwing
    encode: (text) => getEncoder(encoding).encode(text, [], []),
    decode: (tokens) => getEncoder(encoding).decode(tokens),
  };
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8");

/** id = (byteCount - 1) * 2^32 + bytes packed big-endian and zero-padded. */
function packPiece(bytes: Uint8Array): number {
  let packed = 0;
  for (let i = 0; i < BYTES_PER_TOKEN; i++) {
    packed = packed * 256 + (i < bytes.length ? bytes[i] : 0);
  }
  return (bytes.length - 1) * PIECE_RANGE + packed;
}

function unpackPiece(id: number): number[] {
  if (!Number.isInteger(id) || id < 0 || id >= BYTES_PER_TOKEN * PIECE_RANGE) {
    throw new Error(`Unknown token id: ${id}`);
  }
  const length = Math.floor(id / PIECE_RANGE) + 1;
  let packed = id % PIECE_RANGE;
  const bytes: number[] = [];
  for (let i = 0; i < BYTES_PER_TOKEN; i++) {
    bytes.unshift(packed % 256);
    packed = Math.floor(packed / 256);
  }
  return bytes.slice(0, length);
}

export function createApproximateTokenizer(): Tokenizer {
  return {
    encode(text: string): number[] {
      const bytes = utf8Encoder.encode(text);
      const tokens: number[] = [];
      for (let i = 0; i < bytes.length; i += BYTES_PER_TOKEN) {
        tokens.push(packPiece(bytes.subarray(i, i + BYTES_PER_TOKEN)));
      }
      return tokens;
    },

    decode(tokens: number[]): string {
      return utf8Decoder.decode(Uint8Array.from(tokens.flatMap(unpackPiece)));
    },
  };
}
