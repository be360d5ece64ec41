/** Archive flags stored in the BSA header. */
export const ArchiveFlags = {
  INCLUDE_DIRECTORY_NAMES: 0x1,
  INCLUDE_FILE_NAMES: 0x2,
  COMPRESSED_ARCHIVE: 0x4,
  RETAIN_DIRECTORY_NAMES: 0x8,
  RETAIN_FILE_NAMES: 0x10,
  RETAIN_FILE_NAME_OFFSETS: 0x20,
  XBOX360_ARCHIVE: 0x40,
  RETAIN_STRINGS_DURING_STARTUP: 0x80,
  EMBED_FILE_NAMES: 0x100,
  XMEM_CODEC: 0x200,
} as const;

/** Content flags stored in the BSA header. */
export const FileFlags = {
  MESHES: 0x1,
  TEXTURES: 0x2,
  MENUS: 0x4,
  SOUNDS: 0x8,
  VOICES: 0x10,
  SHADERS: 0x20,
  TREES: 0x40,
  FONTS: 0x80,
  MISC: 0x100,
} as const;

/** Bit in a file record's size field that inverts the archive's default compression. */
export const FILE_SIZE_COMPRESSION_TOGGLE = 0x40000000;
export const FILE_SIZE_MASK = 0x3fffffff;

export const BSA_MAGIC = 'BSA\0';
export const BSA_VERSION = 104;
export const HEADER_SIZE = 36;
export const FOLDER_RECORD_SIZE = 16;
export const FILE_RECORD_SIZE = 16;

/**
 * Lists the names of the flags set in `value`.
 */
export function describeFlags(value: number, flags: Readonly<Record<string, number>>): string[] {
  return Object.entries(flags)
    .filter(([, bit]) => (value & bit) !== 0)
    .map(([name]) => name);
}
