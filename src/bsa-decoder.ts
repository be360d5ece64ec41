/**
 * Decoder for version 104 BSA archives.
 *
 * The archive is read front to back: header, folder record table, then one
 * block per folder holding the folder's name and its file records, then the
 * optional flat filename list. Folder names and folder records are linked
 * only by position, and the name's hash must equal the record's stored hash.
 */
import type { ByteSource } from './byte-source.js';
import { BinaryCursor, type RecordLayout } from './binary-cursor.js';
import { HashIndexedMap } from './hash-indexed-map.js';
import { formatHash, pathHash } from './hash.js';
import { BsaEncodingError, BsaFormatError, BsaUnsupportedVersionError } from './errors.js';
import type { BsaHeader } from './types/bsa-header.js';
import type { BsaFile, BsaFolder, FileRecord, FolderListing, FolderRecord } from './types/bsa-records.js';
import type { DecodeOptions } from './types/decode-options.js';
import {
  ArchiveFlags,
  BSA_MAGIC,
  BSA_VERSION,
  FILE_RECORD_SIZE,
  FOLDER_RECORD_SIZE,
  HEADER_SIZE,
} from './constants/archive-flags.js';

// Keep a leading U+FEFF: names are hashed from their decoded form.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const HEADER_LAYOUT: RecordLayout<BsaHeader> = {
  size: HEADER_SIZE,
  decode: (bytes: Buffer): BsaHeader => ({
    fileId: bytes.toString('latin1', 0, 4),
    version: bytes.readUInt32LE(0x04),
    folderRecordOffset: bytes.readUInt32LE(0x08),
    archiveFlags: bytes.readUInt32LE(0x0c),
    folderCount: bytes.readUInt32LE(0x10),
    fileCount: bytes.readUInt32LE(0x14),
    totalFolderNameLength: bytes.readUInt32LE(0x18),
    totalFileNameLength: bytes.readUInt32LE(0x1c),
    fileFlags: bytes.readUInt32LE(0x20),
  }),
};

const FOLDER_RECORD_LAYOUT: RecordLayout<FolderRecord> = {
  size: FOLDER_RECORD_SIZE,
  decode: (bytes: Buffer): FolderRecord => ({
    nameHash: bytes.readBigUInt64LE(0),
    fileCount: bytes.readUInt32LE(8),
    filesOffset: bytes.readUInt32LE(12),
  }),
};

const FILE_RECORD_LAYOUT: RecordLayout<FileRecord> = {
  size: FILE_RECORD_SIZE,
  decode: (bytes: Buffer): FileRecord => ({
    nameHash: bytes.readBigUInt64LE(0),
    size: bytes.readUInt32LE(8),
    offset: bytes.readUInt32LE(12),
  }),
};

/**
 * Everything the decoder recovers from an archive's tables.
 */
export interface DecodedArchive {
  readonly header: BsaHeader;
  readonly folders: HashIndexedMap<BsaFolder>;
  readonly files: HashIndexedMap<BsaFile>;
  /** Folder names in table order. */
  readonly folderNames: readonly string[];
  /** Each folder block with its file records, in table order. */
  readonly folderListings: readonly FolderListing[];
  /** Flat filename list; empty unless the archive includes file names. */
  readonly fileNames: readonly string[];
}

/**
 * Decodes UTF-8 name bytes.
 * @param bytes - Name bytes without terminator
 * @param offset - Position of the name, for error messages
 * @returns Decoded name
 * @throws {BsaEncodingError} If the bytes are not valid UTF-8
 */
function decodeName(bytes: Uint8Array, offset: number): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new BsaEncodingError(`Name at offset ${offset} is not valid UTF-8`, error);
  }
}

class V104Decoder {
  private readonly cursor: BinaryCursor;
  private readonly strict: boolean;
  private readonly warn: (message: string) => void;

  constructor(source: ByteSource, options: DecodeOptions) {
    this.cursor = new BinaryCursor(source);
    this.strict = options.strict ?? false;
    this.warn = options.onWarning ?? ((message: string) => console.warn(message));
  }

  decode(): DecodedArchive {
    const header: BsaHeader = this.readHeader();
    const folders = new HashIndexedMap<BsaFolder>();
    const files = new HashIndexedMap<BsaFile>();

    const records: FolderRecord[] = this.readFolderRecords(header, folders);
    const folderListings: FolderListing[] = this.readFolderBlocks(header, records, files);
    const folderNames: string[] = folderListings.map((listing: FolderListing) => listing.name);
    const fileNames: string[] = (header.archiveFlags & ArchiveFlags.INCLUDE_FILE_NAMES) !== 0
      ? this.readFileNames(header.fileCount)
      : [];

    return { header, folders, files, folderNames, folderListings, fileNames };
  }

  private readHeader(): BsaHeader {
    const header: BsaHeader = this.cursor.readRecord(HEADER_LAYOUT);
    if (header.fileId !== BSA_MAGIC) {
      throw new BsaFormatError(`Invalid BSA magic ${JSON.stringify(header.fileId)}`);
    }
    if (header.version !== BSA_VERSION) {
      throw new BsaUnsupportedVersionError(header.version);
    }
    if (header.folderRecordOffset !== HEADER_SIZE) {
      this.deviation(`Header declares folder records at offset ${header.folderRecordOffset}, reading them at ${HEADER_SIZE}`);
    }
    return header;
  }

  private readFolderRecords(header: BsaHeader, folders: HashIndexedMap<BsaFolder>): FolderRecord[] {
    const records: FolderRecord[] = [];
    for (let i = 0; i < header.folderCount; i++) {
      const record: FolderRecord = this.cursor.readRecord(FOLDER_RECORD_LAYOUT);
      folders.insert(record.nameHash, { count: record.fileCount, offset: record.filesOffset });
      records.push(record);
    }
    return records;
  }

  /**
   * Reads one block per folder record: the folder's name, then its file records.
   * @param header - Decoded archive header
   * @param records - Folder records in table order
   * @param files - Map receiving every file record
   * @returns Folder listings in table order
   * @throws {BsaFormatError} If a name does not hash to the record at its position
   */
  private readFolderBlocks(header: BsaHeader, records: readonly FolderRecord[], files: HashIndexedMap<BsaFile>): FolderListing[] {
    const checkOffsets: boolean = (header.archiveFlags & ArchiveFlags.INCLUDE_DIRECTORY_NAMES) !== 0;
    const listings: FolderListing[] = [];

    records.forEach((record: FolderRecord, index: number) => {
      this.cursor.scope((blockStart: number) => {
        if (checkOffsets && record.filesOffset - header.totalFileNameLength !== blockStart) {
          this.deviation(
            `Folder ${index} (${formatHash(record.nameHash)}) declares its block at ${record.filesOffset - header.totalFileNameLength}, found it at ${blockStart}`
          );
        }

        const name: string = this.readFolderName();
        const hash: bigint = pathHash(name, '');
        if (hash !== record.nameHash) {
          throw new BsaFormatError(
            `Folder name "${name}" hashes to ${formatHash(hash)} but folder record ${index} holds ${formatHash(record.nameHash)}`
          );
        }

        const fileRecords: FileRecord[] = [];
        for (let i = 0; i < record.fileCount; i++) {
          const file: FileRecord = this.cursor.readRecord(FILE_RECORD_LAYOUT);
          files.insert(file.nameHash, { size: file.size, offset: file.offset });
          fileRecords.push(file);
        }
        listings.push({ name, hash, offset: record.filesOffset, files: fileRecords });
      });
    });

    return listings;
  }

  private readFolderName(): string {
    const start: number = this.cursor.position;
    const { content, terminator } = this.cursor.readBString();
    if (terminator !== 0) {
      this.deviation(`String at offset ${start} ends with byte ${terminator} instead of a zero terminator`);
    }
    return decodeName(content, start);
  }

  private readFileNames(count: number): string[] {
    const names: string[] = [];
    for (let i = 0; i < count; i++) {
      const start: number = this.cursor.position;
      names.push(decodeName(this.cursor.readZString(), start));
    }
    return names;
  }

  private deviation(message: string): void {
    if (this.strict) {
      throw new BsaFormatError(message);
    }
    this.warn(message);
  }
}

/**
 * Decodes the tables of a version 104 archive.
 * Nothing is returned unless the whole decode succeeds.
 *
 * @param source - Archive bytes, read from offset 0
 * @param options - Strictness and warning sink
 * @returns Header, hash-indexed tables and names
 * @throws {BsaIoError} If the source ends early or cannot be read
 * @throws {BsaFormatError} If the tables do not correspond
 * @throws {BsaUnsupportedVersionError} If the header is not version 104
 * @throws {BsaEncodingError} If a name is not valid UTF-8
 */
export function decodeArchive(source: ByteSource, options: DecodeOptions = {}): DecodedArchive {
  return new V104Decoder(source, options).decode();
}
