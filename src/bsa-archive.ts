/**
 * Decoded BSA archive with hash-indexed folders and files.
 */
import { readFile } from 'node:fs/promises';
import { inflateSync } from 'node:zlib';
import { BufferSource, FileSource, type ByteSource } from './byte-source.js';
import { decodeArchive } from './bsa-decoder.js';
import { BsaFormatError, BsaIoError } from './errors.js';
import type { HashIndexedMap } from './hash-indexed-map.js';
import { hashFilePath, hashFolderPath } from './hash.js';
import type { BsaHeader } from './types/bsa-header.js';
import type { BsaFile, BsaFolder, FolderListing } from './types/bsa-records.js';
import type { DecodeOptions } from './types/decode-options.js';
import { ArchiveFlags, FILE_SIZE_COMPRESSION_TOGGLE, FILE_SIZE_MASK } from './constants/archive-flags.js';

/** A file addressed either by its game path or by its raw hash. */
export type FileTarget = { readonly path: string } | { readonly hash: bigint };

export class BsaArchive {
  private constructor(
    readonly header: BsaHeader,
    readonly folders: HashIndexedMap<BsaFolder>,
    readonly files: HashIndexedMap<BsaFile>,
    readonly folderNames: readonly string[],
    readonly folderListings: readonly FolderListing[],
    readonly fileNames: readonly string[],
    readonly source: ByteSource
  ) {}

  /**
   * Decodes an archive from a byte source. The archive keeps the source for extraction.
   *
   * @throws {BsaError} If decoding fails; no archive is produced
   */
  static decode({ source, options }: { readonly source: ByteSource; readonly options?: DecodeOptions }): BsaArchive {
    const decoded = decodeArchive(source, options);
    return new BsaArchive(decoded.header, decoded.folders, decoded.files, decoded.folderNames, decoded.folderListings, decoded.fileNames, source);
  }

  static fromBuffer({ buffer, options }: { readonly buffer: Buffer; readonly options?: DecodeOptions }): BsaArchive {
    return BsaArchive.decode({ source: new BufferSource(buffer), options });
  }

  /**
   * Opens an archive on disk and decodes it, reading file data on demand.
   * Call {@link close} when done.
   */
  static open({ filePath, options }: { readonly filePath: string; readonly options?: DecodeOptions }): BsaArchive {
    const source = FileSource.open(filePath);
    try {
      return BsaArchive.decode({ source, options });
    } catch (error) {
      source.close();
      throw error;
    }
  }

  /**
   * Reads a whole archive into memory and decodes it.
   */
  static async read({ filePath, options }: { readonly filePath: string; readonly options?: DecodeOptions }): Promise<BsaArchive> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new BsaIoError(`Cannot read archive ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    return BsaArchive.fromBuffer({ buffer, options });
  }

  /**
   * Looks up a folder by game path, e.g. `meshes/armor`.
   * @param path - Folder path with either separator, any case
   * @returns Folder entry, or undefined if the archive has none
   */
  findFolder(path: string): BsaFolder | undefined {
    return this.folders.get(hashFolderPath(path));
  }

  /**
   * Looks up a file by game path. Only the file name takes part in the hash,
   * so equally named files in different folders share an entry.
   * @param path - File path or bare file name
   * @returns File entry, or undefined if the archive has none
   */
  findFile(path: string): BsaFile | undefined {
    return this.files.get(hashFilePath(path));
  }

  /**
   * Returns a file's content, inflated when the entry is compressed.
   *
   * @param target - Game path of the file, or its raw hash
   * @returns File bytes, or null if the archive has no such file
   * @throws {BsaIoError} If the data lies outside the archive
   * @throws {BsaFormatError} If the stored data cannot be unpacked
   */
  extractFile(target: FileTarget): Buffer | null {
    const hash: bigint = 'path' in target ? hashFilePath(target.path) : target.hash;
    const file = this.files.get(hash);
    if (!file) {
      return null;
    }

    const storedSize: number = file.size & FILE_SIZE_MASK;
    const data: Buffer = this.source.read(file.offset, storedSize);
    let start = 0;

    if ((this.header.archiveFlags & ArchiveFlags.EMBED_FILE_NAMES) !== 0) {
      if (storedSize === 0) {
        throw new BsaFormatError(`File at offset ${file.offset} is missing its embedded name`);
      }
      start = 1 + data.readUInt8(0);
      if (start > storedSize) {
        throw new BsaFormatError(`Embedded name of file at offset ${file.offset} runs past its data`);
      }
    }

    const compressedByDefault = (this.header.archiveFlags & ArchiveFlags.COMPRESSED_ARCHIVE) !== 0;
    const toggled = (file.size & FILE_SIZE_COMPRESSION_TOGGLE) !== 0;
    if (compressedByDefault === toggled) {
      return Buffer.from(data.subarray(start));
    }

    if (start + 4 > storedSize) {
      throw new BsaFormatError(`Compressed file at offset ${file.offset} is too short to hold its original size`);
    }
    const originalSize = data.readUInt32LE(start);
    let inflated: Buffer;
    try {
      inflated = inflateSync(data.subarray(start + 4));
    } catch (error) {
      throw new BsaFormatError(`Cannot inflate file at offset ${file.offset}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    if (inflated.length !== originalSize) {
      throw new BsaFormatError(`File at offset ${file.offset} inflated to ${inflated.length} bytes, expected ${originalSize}`);
    }
    return inflated;
  }

  close(): void {
    this.source.close();
  }
}
