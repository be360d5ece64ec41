/**
 * Fixed 36-byte header at the start of a BSA archive.
 */
export interface BsaHeader {
  readonly fileId: string;
  readonly version: number;
  /** Offset of the folder record table; 36 in every known archive. */
  readonly folderRecordOffset: number;
  readonly archiveFlags: number;
  readonly folderCount: number;
  readonly fileCount: number;
  /** Total length of all folder names, including their length and terminator bytes. */
  readonly totalFolderNameLength: number;
  /** Total length of the flat filename list, including terminators. */
  readonly totalFileNameLength: number;
  readonly fileFlags: number;
}
