import test from 'node:test';
import assert from 'node:assert/strict';
import { decodeArchive, type DecodedArchive } from '../src/bsa-decoder.js';
import { BufferSource } from '../src/byte-source.js';
import { BsaEncodingError, BsaFormatError, BsaIoError, BsaUnsupportedVersionError } from '../src/errors.js';
import { pathHash } from '../src/hash.js';
import { ArchiveFlags } from '../src/constants/archive-flags.js';
import type { DecodeOptions } from '../src/types/decode-options.js';
import { buildArchive, buildMinimalArchive } from './helpers/archive-builder.js';

function decode(bytes: Buffer, options: DecodeOptions = {}): { archive: DecodedArchive; warnings: string[] } {
  const warnings: string[] = [];
  const archive = decodeArchive(new BufferSource(bytes), { onWarning: (message) => warnings.push(message), ...options });
  return { archive, warnings };
}

test('decodes a folder "meshes" holding "x.nif"', () => {
  const { archive, warnings } = decode(buildMinimalArchive().bytes);

  assert.equal(archive.header.version, 104);
  assert.equal(archive.header.folderCount, 1);
  assert.equal(archive.header.fileCount, 1);
  assert.deepEqual(archive.folders.lookupByName('meshes'), { count: 1, offset: 58 });
  assert.equal(archive.files.size, 1);
  assert.deepEqual(archive.files.get(pathHash('x', '.nif')), { size: 0, offset: 82 });
  assert.deepEqual(archive.folderNames, ['meshes']);
  assert.deepEqual(archive.fileNames, ['x.nif']);
  assert.deepEqual(warnings, []);
});

test('every folder name hashes to the record at its position', () => {
  const { archive, warnings } = decode(buildArchive([
    { name: 'meshes', files: [{ name: 'x.nif' }, { name: 'y.nif' }] },
    { name: 'textures\\sky', files: [{ name: 'sky.dds' }] },
    { name: 'sound', files: [] },
  ]).bytes);

  assert.deepEqual(archive.folderNames, ['meshes', 'textures\\sky', 'sound']);
  for (const name of archive.folderNames) {
    assert.ok(archive.folders.has(pathHash(name, '')), name);
  }
  const declared = [...archive.folders].reduce((sum, [, folder]) => sum + folder.count, 0);
  assert.equal(declared, 3);
  assert.equal(archive.files.size, declared);
  assert.ok(archive.files.has(pathHash('sky', '.dds')));
  assert.deepEqual(archive.fileNames, ['x.nif', 'y.nif', 'sky.dds']);
  assert.deepEqual(warnings, []);
});

test('keeps a leading U+FEFF in folder names', () => {
  const { archive } = decode(buildArchive([{ name: '\uFEFFmeshes', files: [] }]).bytes);

  assert.deepEqual(archive.folderNames, ['\uFEFFmeshes']);
  assert.deepEqual(archive.folders.get(0xe15c06b1ef096573n), { count: 0, offset: 52 });
});

test('keeps a leading U+FEFF in the filename list', () => {
  const { archive } = decode(buildArchive([{ name: 'meshes', files: [{ name: '\uFEFFx.nif' }] }]).bytes);

  assert.deepEqual(archive.fileNames, ['\uFEFFx.nif']);
});

test('lists each folder with its own file records in table order', () => {
  const { archive } = decode(buildArchive([
    { name: 'meshes', files: [{ name: 'x.nif' }] },
    { name: 'sound', files: [{ name: 'beep.wav' }] },
  ]).bytes);

  assert.deepEqual(archive.folderListings, [
    { name: 'meshes', hash: 0x322f3a9a6d066573n, offset: 83, files: [{ nameHash: 0x92cd45fd78018078n, size: 0, offset: 130 }] },
    { name: 'sound', hash: 0x006f1bc673056e64n, offset: 107, files: [{ nameHash: 0x9733d003e2046570n, size: 0, offset: 130 }] },
  ]);
});

test('skips the filename list when the archive does not include file names', () => {
  const built = buildMinimalArchive({ archiveFlags: ArchiveFlags.INCLUDE_DIRECTORY_NAMES });
  assert.equal(built.bytes.length, built.fileNameListOffset);

  const { archive } = decode(built.bytes);
  assert.deepEqual(archive.fileNames, []);
  assert.equal(archive.files.size, 1);
});

test('rejects a folder name that does not hash to its record', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes[36] ^= 0xff;

  assert.throws(() => decode(bytes), BsaFormatError);
});

test('rejects folder names stored in a different order than the records', () => {
  const built = buildArchive([
    { name: 'meshes', files: [] },
    { name: 'sound', files: [] },
  ]);
  const bytes = Buffer.from(built.bytes);
  built.bytes.copy(bytes, 36, 52, 68);
  built.bytes.copy(bytes, 52, 36, 52);

  assert.throws(() => decode(bytes), /Folder name "meshes" hashes to 0x322f3a9a6d066573 but folder record 0 holds/);
});

test('a truncated folder table fails with BsaIoError and yields no archive', () => {
  const bytes = buildMinimalArchive().bytes.subarray(0, 44);
  let result: DecodedArchive | undefined;

  assert.throws(() => {
    result = decodeArchive(new BufferSource(bytes));
  }, BsaIoError);
  assert.equal(result, undefined);
});

test('a truncated header fails with BsaIoError', () => {
  assert.throws(() => decode(Buffer.from('BSA\0', 'latin1')), BsaIoError);
});

test('rejects versions other than 104', () => {
  const bytes = buildMinimalArchive({ version: 103 }).bytes;

  assert.throws(() => decode(bytes), (error: unknown) => {
    assert.ok(error instanceof BsaUnsupportedVersionError);
    assert.equal(error.version, 103);
    return true;
  });
});

test('rejects a file without the BSA magic', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes.write('BTDX', 0, 'latin1');

  assert.throws(() => decode(bytes), /Invalid BSA magic "BTDX"/);
});

test('rejects a zero-length folder name', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes[52] = 0;

  assert.throws(() => decode(bytes), BsaFormatError);
});

test('warns about a non-zero folder name terminator', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes[59] = 0x21;

  const { archive, warnings } = decode(bytes);
  assert.deepEqual(archive.folderNames, ['meshes']);
  assert.deepEqual(warnings, ['String at offset 52 ends with byte 33 instead of a zero terminator']);
});

test('strict mode rejects a non-zero folder name terminator', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes[59] = 0x21;

  assert.throws(() => decode(bytes, { strict: true }), BsaFormatError);
});

test('warns when a folder block is not where its record places it', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes.writeUInt32LE(100, 48);

  const { archive, warnings } = decode(bytes);
  assert.deepEqual(archive.folders.lookupByName('meshes'), { count: 1, offset: 100 });
  assert.deepEqual(warnings, ['Folder 0 (0x322f3a9a6d066573) declares its block at 94, found it at 52']);
  assert.throws(() => decode(bytes, { strict: true }), BsaFormatError);
});

test('does not check block offsets when directory names are not included', () => {
  const bytes = buildMinimalArchive({ archiveFlags: ArchiveFlags.INCLUDE_FILE_NAMES }).bytes;
  bytes.writeUInt32LE(100, 48);

  assert.deepEqual(decode(bytes, { strict: true }).warnings, []);
});

test('warns when the folder records are declared at another offset', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes.writeUInt32LE(40, 0x08);

  assert.deepEqual(decode(bytes).warnings, ['Header declares folder records at offset 40, reading them at 36']);
});

test('rejects a folder name that is not valid UTF-8', () => {
  const bytes = buildMinimalArchive().bytes;
  bytes[53] = 0xff;

  assert.throws(() => decode(bytes), BsaEncodingError);
});

test('rejects a file name that is not valid UTF-8', () => {
  const built = buildMinimalArchive();
  built.bytes[built.fileNameListOffset] = 0xff;

  assert.throws(() => decode(built.bytes), BsaEncodingError);
});

test('a filename list cut short fails with BsaIoError', () => {
  const built = buildMinimalArchive();

  assert.throws(() => decode(built.bytes.subarray(0, built.fileNameListOffset + 3)), BsaIoError);
});
