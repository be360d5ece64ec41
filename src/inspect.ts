/**
 * Text rendering of a decoded archive.
 */
import type { BsaArchive } from './bsa-archive.js';
import { formatHash } from './hash.js';
import { ArchiveFlags, FileFlags, FILE_SIZE_MASK, describeFlags } from './constants/archive-flags.js';

/**
 * Renders the decoded tables of an archive, one line per record.
 * File records are indented under the folder whose block holds them.
 *
 * @param archive - Decoded archive
 * @returns Output lines without line breaks
 */
export function formatArchive(archive: BsaArchive): string[] {
  const { header } = archive;
  const lines: string[] = [
    `version: ${header.version}`,
    `archive flags: 0x${header.archiveFlags.toString(16)} [${describeFlags(header.archiveFlags, ArchiveFlags).join(', ')}]`,
    `file flags: 0x${header.fileFlags.toString(16)} [${describeFlags(header.fileFlags, FileFlags).join(', ')}]`,
    `folders: ${header.folderCount}`,
    `files: ${header.fileCount}`,
  ];

  for (const folder of archive.folderListings) {
    lines.push(`${formatHash(folder.hash)} ${folder.name} (${folder.files.length} files, offset ${folder.offset})`);
    for (const file of folder.files) {
      lines.push(`  ${formatHash(file.nameHash)} size=${file.size & FILE_SIZE_MASK} offset=${file.offset}`);
    }
  }

  if (archive.fileNames.length > 0) {
    lines.push('file names:');
  }
  for (const name of archive.fileNames) {
    lines.push(`  ${name}`);
  }

  return lines;
}
