/**
 * Path hashing used by BSA archives to index folders and files.
 *
 * The archive stores no names in its lookup tables, only these 64-bit hashes,
 * so the algorithm has to match the engine's bit for bit.
 */

const UINT32_MASK = 0xffffffffn;
const UINT64_MASK = 0xffffffffffffffffn;
/** Clears bytes 0, 1 and 3 of the low word, keeping the length byte and the high word. */
const EXTENSION_KEEP_MASK = 0xffffffff00ff0000n;

const encoder = new TextEncoder();

/** Extensions the engine scrambles with an extra index. */
const EXTENSION_INDEX: ReadonlyMap<string, number> = new Map([
  ['.nif', 1],
  ['.kf', 2],
  ['.dds', 3],
  ['.wav', 4],
]);

/**
 * Multiplicative 32-bit hash over raw bytes.
 * @param bytes - Bytes to hash
 * @returns Unsigned 32-bit hash
 */
export function rollingHash(bytes: Uint8Array): number {
  let hash = 0;
  for (const byte of bytes) {
    hash = (Math.imul(hash, 0x1003f) + byte) >>> 0;
  }
  return hash;
}

/**
 * Computes the archive hash of a name and an optional extension (with its leading dot).
 * Both are hashed as given; use {@link normalizePath} first for game paths.
 *
 * @param name - File or folder name without extension
 * @param ext - Extension including its dot, or an empty string
 * @returns Unsigned 64-bit hash
 */
export function pathHash(name: string, ext: string): bigint {
  const nameBytes: Uint8Array = encoder.encode(name);
  const extBytes: Uint8Array = encoder.encode(ext);
  const length: number = nameBytes.length;
  let hash = 0n;

  if (length > 0) {
    const last: number = nameBytes[length - 1] ?? 0;
    const secondLast: number = length >= 2 ? nameBytes[length - 2] ?? 0 : 0;
    const first: number = nameBytes[0] ?? 0;
    hash = BigInt((last | (secondLast << 8) | ((length & 0xff) << 16) | (first << 24)) >>> 0);

    if (length > 3) {
      hash += BigInt(rollingHash(nameBytes.subarray(1, length - 2))) << 32n;
    }
  }

  if (extBytes.length > 0) {
    hash = (hash + (BigInt(rollingHash(extBytes)) << 32n)) & UINT64_MASK;

    const index: number = EXTENSION_INDEX.get(ext) ?? 0;
    if (index !== 0) {
      const low: number = Number(hash & UINT32_MASK);
      const a = (((index & 0xfc) << 5) + ((low >>> 24) & 0xff)) & 0xff;
      const b = (((index & 0xfe) << 6) + (low & 0xff)) & 0xff;
      const c = ((index << 7) + ((low >>> 8) & 0xff)) & 0xff;

      hash &= EXTENSION_KEEP_MASK;
      hash += BigInt(((a << 24) | b | (c << 8)) >>> 0);
    }
  }

  return hash & UINT64_MASK;
}

/**
 * Lower-cases a game path and converts it to backslash separators, the form the engine hashes.
 * @param path - Path with either separator
 * @returns Normalized path without leading or trailing separators
 */
export function normalizePath(path: string): string {
  return path
    .toLowerCase()
    .replace(/\//g, '\\')
    .replace(/^\\+|\\+$/g, '');
}

/**
 * Splits a file name at its last dot. The extension keeps the dot.
 * @param fileName - File name without folder
 * @returns Name and extension, the extension empty when there is no dot
 */
export function splitFileName(fileName: string): { readonly name: string; readonly ext: string } {
  const dot = fileName.lastIndexOf('.');
  if (dot < 0) {
    return { name: fileName, ext: '' };
  }
  return { name: fileName.slice(0, dot), ext: fileName.slice(dot) };
}

/**
 * Hashes a folder path after normalizing it.
 * @param path - Folder path, e.g. `meshes/armor`
 * @returns Folder hash as stored in folder records
 */
export function hashFolderPath(path: string): bigint {
  return pathHash(normalizePath(path), '');
}

/**
 * Hashes the file name part of a path (everything after the last separator).
 * @param path - File path or bare file name
 * @returns File hash as stored in file records
 */
export function hashFilePath(path: string): bigint {
  const normalized: string = normalizePath(path);
  const fileName: string = normalized.slice(normalized.lastIndexOf('\\') + 1);
  const { name, ext } = splitFileName(fileName);
  return pathHash(name, ext);
}

export function formatHash(hash: bigint): string {
  return `0x${hash.toString(16).padStart(16, '0')}`;
}
