/**
 * BSA Tools - Main entry point
 *
 * Decodes version 104 BSA archives into hash-indexed folder and file tables.
 */

export { BsaArchive, type FileTarget } from './bsa-archive.js';
export { decodeArchive, type DecodedArchive } from './bsa-decoder.js';
export { BinaryCursor, type RecordLayout, type BStringBytes } from './binary-cursor.js';
export { BufferSource, FileSource, type ByteSource } from './byte-source.js';
export { HashIndexedMap } from './hash-indexed-map.js';
export { rollingHash, pathHash, normalizePath, splitFileName, hashFolderPath, hashFilePath, formatHash } from './hash.js';
export { formatArchive } from './inspect.js';
export { BsaError, BsaIoError, BsaFormatError, BsaUnsupportedVersionError, BsaEncodingError } from './errors.js';
export { ArchiveFlags, FileFlags } from './constants/archive-flags.js';

export type { BsaHeader } from './types/bsa-header.js';
export type { BsaFolder, BsaFile, FolderRecord, FileRecord, FolderListing } from './types/bsa-records.js';
export type { DecodeOptions } from './types/decode-options.js';
