#!/usr/bin/env node
/**
 * BSA Tools - CLI Interface
 *
 * Command-line interface for inspecting and extracting BSA archives.
 */

import { Command } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { BsaArchive } from './bsa-archive.js';
import { formatHash, hashFilePath, hashFolderPath } from './hash.js';
import { formatArchive } from './inspect.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

program
  .name('bsa-tools')
  .description('Decode and extract version 104 BSA archives')
  .version(version);

program
  .command('inspect')
  .description('Print the header, folders and files of an archive')
  .argument('<archive>', 'Path to the .bsa file')
  .option('--strict', 'Fail on format deviations instead of warning')
  .action((archivePath: string, options: { strict?: boolean }) => {
    try {
      const archive = BsaArchive.open({ filePath: resolve(archivePath), options: { strict: options.strict } });
      try {
        for (const line of formatArchive(archive)) {
          console.log(line);
        }
      } finally {
        archive.close();
      }
    } catch (error) {
      console.error('❌ Inspect failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('extract')
  .description('Write one file from an archive to disk')
  .argument('<archive>', 'Path to the .bsa file')
  .argument('<path>', 'Game path of the file inside the archive')
  .argument('<output-file>', 'Where the file is written')
  .option('--strict', 'Fail on format deviations instead of warning')
  .action(async (archivePath: string, filePath: string, outputFile: string, options: { strict?: boolean }) => {
    try {
      const archive = BsaArchive.open({ filePath: resolve(archivePath), options: { strict: options.strict } });
      let data: Buffer | null;
      try {
        data = archive.extractFile({ path: filePath });
      } finally {
        archive.close();
      }
      if (!data) {
        throw new Error(`No file ${filePath} in ${archivePath}`);
      }

      const target = resolve(outputFile);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, data);
      console.log(`✅ Wrote ${data.length} bytes to ${target}`);
    } catch (error) {
      console.error('❌ Extract failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('hash')
  .description('Print the archive hash of a folder or file path')
  .argument('<path>', 'Game path to hash')
  .option('--file', 'Hash the path as a file name instead of a folder')
  .action((path: string, options: { file?: boolean }) => {
    const hash = options.file ? hashFilePath(path) : hashFolderPath(path);
    console.log(formatHash(hash));
  });

program.parseAsync().catch((error: unknown) => {
  console.error('❌', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
