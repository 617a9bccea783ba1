/**
 * Stream Decoder
 * Turns a byte stream into text chunks without splitting multi-byte characters.
 */

import { StringDecoder } from 'node:string_decoder';
import type { Readable } from 'node:stream';

export type TextChunkHandler = (text: string) => void;

/**
 * Decodes one stream. An incomplete sequence at the end of a read is held back
 * until the next read completes it; whatever is left at the end is flushed
 * (as U+FFFD for invalid bytes).
 */
export class ChunkDecoder {
  private decoder: StringDecoder;

  constructor(encoding: BufferEncoding = 'utf8') {
    this.decoder = new StringDecoder(encoding);
  }

  write(chunk: Buffer | Uint8Array | string): string {
    if (typeof chunk === 'string') return chunk;
    return this.decoder.write(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  end(): string {
    return this.decoder.end();
  }
}

/**
 * Attach a decoding listener to a readable stream. Every non-empty decoded
 * chunk is handed to `onText` as soon as the read delivers it.
 * Returns a function that detaches the listener (unread output is dropped).
 */
export function attachDecodedListener(
  stream: Readable,
  onText: TextChunkHandler,
  options: { encoding?: BufferEncoding; onError?: (err: Error) => void } = {}
): () => void {
  const decoder = new ChunkDecoder(options.encoding);
  const onError = options.onError;

  const onData = (chunk: Buffer | string) => {
    const text = decoder.write(chunk);
    if (text) onText(text);
  };

  const onEnd = () => {
    const rest = decoder.end();
    if (rest) onText(rest);
  };

  stream.on('data', onData);
  stream.once('end', onEnd);
  if (onError) stream.on('error', onError);

  return () => {
    stream.off('data', onData);
    stream.off('end', onEnd);
    if (onError) stream.off('error', onError);
  };
}
