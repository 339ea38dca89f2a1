/**
 * Growable byte output used by the renderer and the printer buffer.
 */

const utf8 = new TextEncoder();

/** Concatenate byte chunks into one array. */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let length = 0;
  for (const chunk of chunks) length += chunk.length;
  const out = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Encode a string as UTF-8 bytes, verbatim. */
export function textBytes(text: string): Uint8Array {
  return utf8.encode(text);
}

export class ByteBuffer {
  private chunks: Uint8Array[] = [];
  private _length = 0;

  get length(): number {
    return this._length;
  }

  push(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    this.chunks.push(bytes);
    this._length += bytes.length;
  }

  pushText(text: string): void {
    this.push(textBytes(text));
  }

  /** Copy out everything pushed so far. */
  toBytes(): Uint8Array {
    return concatBytes(this.chunks);
  }

  clear(): void {
    this.chunks = [];
    this._length = 0;
  }
}
