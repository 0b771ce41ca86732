/**
 * Asset Packer CLI
 *
 * Usage:
 *   asset-packer --input <dir> --output <file.gpak> [--level <0-9>]
 *   asset-packer --list <file.gpak>
 *
 * Options:
 *   --input   Source directory to pack
 *   --output  Archive file to write
 *   --level   DEFLATE level for compressible entries (default 6)
 *   --list    Print the index of an existing archive
 */

import { ArchiveBackend, DEFAULT_PACKER_CONFIG, type CompressionLevel } from '@gamepak/assets';
import { packDirectory } from './AssetPacker.js';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  input: string | undefined;
  output: string | undefined;
  list: string | undefined;
  level: CompressionLevel;
}

const LEVELS: readonly CompressionLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

class UsageError extends Error {}

function parseArgs(argv: string[]): CliArgs | 'help' {
  const args: CliArgs = {
    input: undefined,
    output: undefined,
    list: undefined,
    level: DEFAULT_PACKER_CONFIG.compressionLevel,
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
      case '-i':
        args.input = readArgValue(argv, ++i, '--input');
        break;
      case '--output':
      case '-o':
        args.output = readArgValue(argv, ++i, '--output');
        break;
      case '--list':
      case '-l':
        args.list = readArgValue(argv, ++i, '--list');
        break;
      case '--level': {
        const value = readArgValue(argv, ++i, '--level');
        const level = LEVELS.find((candidate) => String(candidate) === value);
        if (level === undefined) {
          throw new UsageError(`--level must be an integer from 0 to 9, got "${value}"`);
        }
        args.level = level;
        break;
      }
      case '--help':
      case '-h':
        return 'help';
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

function readArgValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function printUsage(): void {
  console.log(`
Asset Packer (@gamepak/tool-asset-packer)

Usage:
  asset-packer --input <dir> --output <file.gpak> [--level <0-9>]
  asset-packer --list <file.gpak>

Options:
  --input,  -i   Source directory to pack
  --output, -o   Archive file to write
  --level        DEFLATE level for compressible entries (default ${DEFAULT_PACKER_CONFIG.compressionLevel})
  --list,   -l   Print the index of an existing archive
  --help,   -h   Show this help message
  `.trim());
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function listArchive(file: string): Promise<void> {
  const backend = await ArchiveBackend.openFile(file);
  try {
    console.log(`Archive: ${file} | ${backend.entryCount} file(s)\n`);
    for (const entry of backend.entries()) {
      console.log(
        `  ${entry.path}  ${entry.compression}  ${formatSize(entry.storedLength)} / ${formatSize(entry.uncompressedLength)}`,
      );
    }
  } finally {
    await backend.close();
  }
}

async function pack(input: string, output: string, level: CompressionLevel): Promise<void> {
  console.log(`Packing ${input} -> ${output}`);
  const result = await packDirectory(input, output, { compressionLevel: level }, (entry) => {
    console.log(`Adding file ${entry.path} (${entry.compression})`);
  });
  console.log(
    `\nPacked ${result.entries.length} file(s): ` +
      `${formatSize(result.uncompressedBytes)} -> ${formatSize(result.storedBytes)} stored, ` +
      `${formatSize(result.archiveBytes)} archive`,
  );
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  let args: CliArgs | 'help';
  try {
    args = parseArgs(process.argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`Error: ${err.message}\n`);
    printUsage();
    return 1;
  }

  if (args === 'help') {
    printUsage();
    return 0;
  }

  if (args.list) {
    await listArchive(args.list);
    return 0;
  }

  if (!args.input || !args.output) {
    console.error('Error: --input and --output are required\n');
    printUsage();
    return 1;
  }

  await pack(args.input, args.output, args.level);
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  },
);
