/**
 * imgprobe CLI: report image headers
 *
 * Features:
 *  • Verbose report with comments, or one tab-separated line per file
 *  • JSON lines output
 *  • stdin input (use `-` as filename, or pipe with no arguments)
 *  • http:// and https:// arguments are fetched
 *  • GIF image counting always on
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { isHttpUrl, probeFile, probeUrl } from './node.js';
import { probeStream } from './node-stream.js';
import {
  getFormatName,
  getMetadataMimeType,
  physicalHeightInch,
  physicalWidthInch,
} from './metadata.js';
import type { DetectOptions, DetectionResult, ImageMetadata } from './types.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(moduleDir, '..', 'package.json');
  const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version: string };
  return pkg.version;
}

function formatInches(value: number | undefined): string | undefined {
  return value === undefined ? undefined : value.toFixed(2);
}

/**
 * Multi-line report, one labelled field per line. Fields the header does
 * not carry are left out.
 */
export function formatVerbose(name: string, m: ImageMetadata): string {
  const lines: string[] = [name];
  const widthInch = formatInches(physicalWidthInch(m));
  const heightInch = formatInches(physicalHeightInch(m));

  lines.push(`  Format      : ${getFormatName(m.format)}`);
  lines.push(`  MIME type   : ${getMetadataMimeType(m)}`);
  lines.push(`  Width       : ${m.width} px`);
  lines.push(`  Height      : ${m.height} px`);
  lines.push(`  Bits/pixel  : ${m.bitsPerPixel}`);
  lines.push(`  Progressive : ${m.progressive ? 'yes' : 'no'}`);
  lines.push(`  Images      : ${m.numberOfImages}`);
  if (m.physicalWidthDpi !== undefined && m.physicalWidthDpi > 0)
    lines.push(`  Width DPI   : ${m.physicalWidthDpi}`);
  if (m.physicalHeightDpi !== undefined && m.physicalHeightDpi > 0)
    lines.push(`  Height DPI  : ${m.physicalHeightDpi}`);
  if (widthInch)  lines.push(`  Width in.   : ${widthInch}`);
  if (heightInch) lines.push(`  Height in.  : ${heightInch}`);
  if (m.comments.length > 0) {
    lines.push(`  Comments    : ${m.comments.length}`);
    for (const comment of m.comments) {
      lines.push(`    ${comment}`);
    }
  }

  return lines.join('\n');
}

/**
 * Single tab-separated line: name, format, MIME type, width, height,
 * bits per pixel, images, DPI x/y, inches x/y, progressive. Unknown
 * values print as -1.
 */
export function formatCompact(name: string, m: ImageMetadata): string {
  return [
    name,
    getFormatName(m.format),
    getMetadataMimeType(m),
    m.width,
    m.height,
    m.bitsPerPixel,
    m.numberOfImages,
    m.physicalWidthDpi ?? -1,
    m.physicalHeightDpi ?? -1,
    physicalWidthInch(m) ?? -1,
    physicalHeightInch(m) ?? -1,
    m.progressive,
  ].join('\t');
}

export function formatJson(name: string, m: ImageMetadata): string {
  return JSON.stringify({
    file: name,
    mimeType: getMetadataMimeType(m),
    ...m,
  });
}

// ─── Help text ────────────────────────────────────────────────────────────────

const HELP = `
imgprobe [options] [file|url...]

Report format, dimensions, colour depth, resolution and comments of
JPEG, GIF, PNG, BMP, PCX, IFF, RAS, PBM, PGM, PPM and PSD images.

OPTIONS
  -c, --compact               One tab-separated line per file, no comments
      --json                  One JSON object per line
  -h, --help                  Show this help
  -v, --version               Show version

STDIN AND URLS
  Pass '-' as file argument (or pipe with no arguments) to read stdin.
  Arguments starting with http:// or https:// are downloaded until the
  header is read.
  Example:  cat photo.jpg | imgprobe -
            imgprobe https://example.com/photo.jpg
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

type OutputMode = 'verbose' | 'compact' | 'json';

const STDIN_NAME = '<stdin>';

export interface CliArgs {
  files: string[];
  mode: OutputMode;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseArgs(raw: string[]): CliArgs {
  const args: CliArgs = { files: [], mode: 'verbose', help: false, version: false };

  for (const a of raw) {
    switch (a) {
      case '-c': case '--compact': args.mode = 'compact'; break;
      case '--json':               args.mode = 'json'; break;
      case '-h': case '--help':    args.help = true; break;
      case '-v': case '--version': args.version = true; break;
      default:
        if (a.startsWith('-') && a !== '-') {
          throw new CliUsageError(`Unknown option: ${a}`);
        }
        args.files.push(a);
    }
  }

  return args;
}

// ─── Main ─────────────────────────────────────────────────────────────────────

export interface CliInput {
  stdin: AsyncIterable<Buffer | Uint8Array | string>;
  /** `true` when stdin is an interactive terminal rather than a pipe */
  stdinIsTTY: boolean;
}

function report(name: string, result: DetectionResult, mode: OutputMode): boolean {
  if (!result.ok) {
    console.error(`✗ ${name}: ${result.failure.message}`);
    return false;
  }
  const m = result.metadata;
  switch (mode) {
    case 'compact': console.log(formatCompact(name, m)); break;
    case 'json':    console.log(formatJson(name, m)); break;
    case 'verbose': console.log(formatVerbose(name, m)); break;
  }
  return true;
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function runCli(rawArgs: string[], input: CliInput): Promise<number> {
  let a: CliArgs;
  try {
    a = parseArgs(rawArgs);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  if (a.version && !a.help) {
    console.log(getVersion());
    return 0;
  }
  if (a.help || (a.files.length === 0 && input.stdinIsTTY)) {
    console.log(HELP);
    return 0;
  }

  const options: DetectOptions = { collectComments: a.mode !== 'compact', countImages: true };
  const files = a.files.length > 0 ? a.files : ['-'];
  let hasError = false;

  for (const f of files) {
    try {
      let result: DetectionResult;
      if (f === '-') {
        result = await probeStream(input.stdin, options);
      } else if (isHttpUrl(f)) {
        result = await probeUrl(f, options);
      } else {
        result = await probeFile(f, options);
      }
      if (!report(f === '-' ? STDIN_NAME : f, result, a.mode)) hasError = true;
    } catch (err) {
      hasError = true;
      console.error(`✗ ${f}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return hasError ? 1 : 0;
}
