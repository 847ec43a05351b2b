/**
 * @fileoverview Byte-oriented I/O handlers for the BBC-X runtime.
 */

export interface IoHandlers {
  /** Next input byte, or undefined at end of input */
  read?: () => number | undefined;
  write?: (byte: number) => void;
  /** Uniform random number in [0, 1) for RND */
  random?: () => number;
}

/** Marker written when PIN or READ meets the end of input */
export const END_OF_DATA = 'DATA*';

export function resolveIoHandlers(io?: IoHandlers): Required<IoHandlers> {
  return {
    read: io?.read ?? ((): number | undefined => undefined),
    write:
      io?.write ??
      ((_byte: number): void => {
        /* noop */
      }),
    random: io?.random ?? Math.random,
  };
}

/** Writes each character's low byte */
export function writeText(io: Required<IoHandlers>, text: string): void {
  for (let i = 0; i < text.length; i += 1) {
    io.write(text.charCodeAt(i) & 0xff);
  }
}

/**
 * Serves bytes from a fixed buffer, then reports end of input.
 */
export function bufferInput(data: string | Uint8Array): () => number | undefined {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'latin1') : data;
  let position = 0;
  return () => {
    if (position >= bytes.length) {
      return undefined;
    }
    const byte = bytes[position];
    position += 1;
    return byte;
  };
}

/**
 * Collects written bytes for inspection.
 */
export function collectOutput(): { write: (byte: number) => void; text: () => string; bytes: () => Uint8Array } {
  const chunks: number[] = [];
  return {
    write: (byte: number): void => {
      chunks.push(byte & 0xff);
    },
    text: (): string => Buffer.from(chunks).toString('latin1'),
    bytes: (): Uint8Array => Uint8Array.from(chunks),
  };
}
