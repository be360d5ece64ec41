/**
 * Folder and file records of a BSA archive.
 */

/** Folder record as stored in the folder record table. */
export interface FolderRecord {
  readonly nameHash: bigint;
  readonly fileCount: number;
  readonly filesOffset: number;
}

/** File record as stored in a folder's file block. */
export interface FileRecord {
  readonly nameHash: bigint;
  readonly size: number;
  readonly offset: number;
}

/** Folder retained in the archive index. */
export interface BsaFolder {
  /** Number of files in the folder. */
  readonly count: number;
  /** Offset of the folder's file block plus the header's total file name length. */
  readonly offset: number;
}

/** File retained in the archive index. */
export interface BsaFile {
  /** Raw size field; the high bits carry flags. */
  readonly size: number;
  /** Absolute offset of the file data in the archive. */
  readonly offset: number;
}

/** A folder as laid out in its block: its name and its file records in table order. */
export interface FolderListing {
  readonly name: string;
  readonly hash: bigint;
  /** Offset stored in the folder record. */
  readonly offset: number;
  readonly files: readonly FileRecord[];
}
