const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** UTF-8 encode. */
export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

/** UTF-8 decode. */
export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

/**
 * Decode bytes one char per byte (latin1). Unlike UTF-8 decoding this never
 * replaces invalid sequences, so `fromBinaryString` restores the exact bytes.
 */
export function toBinaryString(data: Uint8Array): string {
  let out = "";
  const STEP = 8192;
  for (let i = 0; i < data.length; i += STEP) {
    out += String.fromCharCode(...data.subarray(i, i + STEP));
  }
  return out;
}

export function fromBinaryString(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    out[i] = text.charCodeAt(i) & 0xff;
  }
  return out;
}

export function indexOfSequence(
  buffer: Uint8Array,
  sequence: Uint8Array,
): number {
  outer: for (let i = 0; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}
