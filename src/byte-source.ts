/**
 * Random-access byte sources an archive can be decoded from and extracted against.
 */
import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import { BsaIoError } from './errors.js';

/**
 * Seekable, synchronous view over archive bytes.
 */
export interface ByteSource {
  /** Total length in bytes. */
  readonly size: number;
  /**
   * Reads exactly `length` bytes at `offset`.
   * @throws {BsaIoError} If the range runs past the end or the read fails
   */
  read(offset: number, length: number): Buffer;
  close(): void;
}

function ensureInRange(source: ByteSource, offset: number, length: number): void {
  if (offset < 0 || length < 0 || offset + length > source.size) {
    throw new BsaIoError(`Unexpected end of archive: wanted ${length} bytes at offset ${offset}, size is ${source.size}`);
  }
}

/**
 * Archive bytes held in memory.
 */
export class BufferSource implements ByteSource {
  constructor(private readonly buffer: Buffer) {}

  get size(): number {
    return this.buffer.length;
  }

  read(offset: number, length: number): Buffer {
    ensureInRange(this, offset, length);
    return this.buffer.subarray(offset, offset + length);
  }

  close(): void {
    // nothing to release
  }
}

/**
 * Archive bytes read on demand through a file descriptor.
 */
export class FileSource implements ByteSource {
  private fd: number | null;
  readonly size: number;

  private constructor(fd: number, size: number, readonly filePath: string) {
    this.fd = fd;
    this.size = size;
  }

  /**
   * @throws {BsaIoError} If the file cannot be opened
   */
  static open(filePath: string): FileSource {
    let fd: number;
    try {
      fd = openSync(filePath, 'r');
    } catch (error) {
      throw new BsaIoError(`Cannot open archive ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    try {
      return new FileSource(fd, fstatSync(fd).size, filePath);
    } catch (error) {
      closeSync(fd);
      throw new BsaIoError(`Cannot stat archive ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }

  read(offset: number, length: number): Buffer {
    if (this.fd === null) {
      throw new BsaIoError(`Archive ${this.filePath} is closed`);
    }
    ensureInRange(this, offset, length);
    const buffer = Buffer.alloc(length);
    let filled = 0;
    try {
      while (filled < length) {
        const bytesRead = readSync(this.fd, buffer, filled, length - filled, offset + filled);
        if (bytesRead === 0) {
          break;
        }
        filled += bytesRead;
      }
    } catch (error) {
      throw new BsaIoError(`Read failed in ${this.filePath} at offset ${offset}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    if (filled < length) {
      throw new BsaIoError(`Unexpected end of archive ${this.filePath}: read ${filled} of ${length} bytes at offset ${offset}`);
    }
    return buffer;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}
