/**
 * Sequential reader over a {@link ByteSource}.
 */
import type { ByteSource } from './byte-source.js';
import { BsaFormatError, BsaIoError } from './errors.js';

/** Bytes read ahead while scanning for a string terminator. */
const ZSTRING_CHUNK_SIZE = 256;

/**
 * A fixed-size on-wire record and how to decode it from its bytes.
 */
export interface RecordLayout<T> {
  readonly size: number;
  decode(bytes: Buffer): T;
}

/**
 * Bytes of a length-prefixed string. `content` excludes the trailing terminator byte.
 */
export interface BStringBytes {
  readonly content: Buffer;
  readonly terminator: number;
}

export class BinaryCursor {
  private offset: number;
  private scopeDepth = 0;

  constructor(private readonly source: ByteSource, offset = 0) {
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  /** Number of scopes currently entered. */
  get depth(): number {
    return this.scopeDepth;
  }

  readBytes(length: number): Buffer {
    const bytes = this.source.read(this.offset, length);
    this.offset += length;
    return bytes;
  }

  readUint8(): number {
    return this.readBytes(1).readUInt8(0);
  }

  readUint32(): number {
    return this.readBytes(4).readUInt32LE(0);
  }

  readUint64(): bigint {
    return this.readBytes(8).readBigUInt64LE(0);
  }

  /**
   * Decodes one fixed-size record at the current position.
   * @param layout - Record size and decoder
   * @returns Decoded record
   */
  readRecord<T>(layout: RecordLayout<T>): T {
    return layout.decode(this.readBytes(layout.size));
  }

  /**
   * Reads a byte-length-prefixed string whose last counted byte is a terminator.
   * @throws {BsaFormatError} If the length byte is zero
   */
  readBString(): BStringBytes {
    const start = this.offset;
    const length = this.readUint8();
    if (length === 0) {
      throw new BsaFormatError(`Zero-length string prefix at offset ${start}`);
    }
    const bytes = this.readBytes(length);
    return { content: bytes.subarray(0, length - 1), terminator: bytes.readUInt8(length - 1) };
  }

  /**
   * Reads bytes up to and including a zero byte. The zero byte is not returned.
   * @returns String bytes without the terminator
   * @throws {BsaIoError} If the source ends before a zero byte
   */
  readZString(): Buffer {
    const start: number = this.offset;
    const chunks: Buffer[] = [];
    let scanned = 0;
    for (;;) {
      const available: number = this.source.size - (start + scanned);
      if (available <= 0) {
        throw new BsaIoError(`Unterminated string at offset ${start}`);
      }
      const chunk: Buffer = this.source.read(start + scanned, Math.min(ZSTRING_CHUNK_SIZE, available));
      const end: number = chunk.indexOf(0);
      if (end >= 0) {
        chunks.push(chunk.subarray(0, end));
        this.offset = start + scanned + end + 1;
        return Buffer.concat(chunks);
      }
      chunks.push(chunk);
      scanned += chunk.length;
    }
  }

  /**
   * Runs `body` as a nested region starting at the current position.
   * The scope is left even when `body` throws.
   */
  scope<T>(body: (start: number) => T): T {
    this.scopeDepth += 1;
    try {
      return body(this.offset);
    } finally {
      this.scopeDepth -= 1;
    }
  }
}
