import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { createServer } from 'http';
import type { Server } from 'http';
import { runCli, parseArgs } from '../../src/cli.js';
import type { CliInput } from '../../src/cli.js';
import {
  createBmpHeader,
  createGif,
  createGifComment,
  createGifImage,
  createGifScreen,
  createJfifSegment,
  createJpeg,
  createJpegFrame,
  createPngHeader,
  GIF_TRAILER,
} from '../helpers/create-test-headers.js';

function terminal(): CliInput {
  return { stdin: Readable.from([]), stdinIsTTY: true };
}

function piped(data: Uint8Array): CliInput {
  return { stdin: Readable.from([Buffer.from(data)]), stdinIsTTY: false };
}

describe('CLI', () => {
  let tmpDir: string;
  let bmpPath: string;
  let jpegPath: string;
  let pngPath: string;
  let unknownPath: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeAll(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'imgprobe-cli-'));
    bmpPath = join(tmpDir, 'plain.bmp');
    jpegPath = join(tmpDir, 'photo.jpg');
    pngPath = join(tmpDir, 'icon.png');
    unknownPath = join(tmpDir, 'notes.txt');
    writeFileSync(bmpPath, createBmpHeader());
    writeFileSync(jpegPath, createJpeg(createJfifSegment(1, 72, 72), createJpegFrame(0xffc0, 144, 72)));
    writeFileSync(pngPath, createPngHeader());
    writeFileSync(unknownPath, new Uint8Array([0x00, 0x00, 0x00]));
  });

  afterAll(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseArgs', () => {
    it('should collect files and the last output mode', () => {
      expect(parseArgs(['-c', 'a.png', '--json', '-', 'b.gif'])).toEqual({
        files: ['a.png', '-', 'b.gif'],
        mode: 'json',
        help: false,
        version: false,
      });
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    });
  });

  describe('compact output', () => {
    it('should print -1 for a missing resolution', async () => {
      expect(await runCli(['-c', bmpPath], terminal())).toBe(0);
      expect(log).toHaveBeenCalledWith(`${bmpPath}\tBMP\timage/bmp\t4\t3\t24\t1\t-1\t-1\t-1\t-1\tfalse`);
    });

    it('should print resolution and physical size', async () => {
      expect(await runCli(['--compact', jpegPath], terminal())).toBe(0);
      expect(log).toHaveBeenCalledWith(`${jpegPath}\tJPEG\timage/jpeg\t144\t72\t24\t1\t72\t72\t2\t1\tfalse`);
    });
  });

  describe('verbose output', () => {
    it('should report a piped image with its comments', async () => {
      const gif = createGif(createGifScreen(), createGifComment('hello'), createGifImage(), GIF_TRAILER);

      expect(await runCli([], piped(gif))).toBe(0);
      expect(log).toHaveBeenCalledWith(
        [
          '<stdin>',
          '  Format      : GIF',
          '  MIME type   : image/gif',
          '  Width       : 1 px',
          '  Height      : 1 px',
          '  Bits/pixel  : 1',
          '  Progressive : no',
          '  Images      : 1',
          '  Comments    : 1',
          '    hello',
        ].join('\n')
      );
    });

    it('should include resolution lines when known', async () => {
      expect(await runCli([jpegPath], terminal())).toBe(0);
      expect(log).toHaveBeenCalledWith(
        [
          jpegPath,
          '  Format      : JPEG',
          '  MIME type   : image/jpeg',
          '  Width       : 144 px',
          '  Height      : 72 px',
          '  Bits/pixel  : 24',
          '  Progressive : no',
          '  Images      : 1',
          '  Width DPI   : 72',
          '  Height DPI  : 72',
          '  Width in.   : 2.00',
          '  Height in.  : 1.00',
        ].join('\n')
      );
    });

    it('should read stdin for an explicit dash', async () => {
      expect(await runCli(['-'], piped(createPngHeader()))).toBe(0);
      expect(log).toHaveBeenCalledTimes(1);
      expect(log.mock.calls[0]?.[0]).toMatch(/^<stdin>\n {2}Format {6}: PNG\n/);
    });
  });

  describe('JSON output', () => {
    it('should print one object per file', async () => {
      expect(await runCli(['--json', pngPath], terminal())).toBe(0);

      const line = log.mock.calls[0]?.[0];
      expect(typeof line).toBe('string');
      expect(JSON.parse(String(line))).toEqual({
        file: pngPath,
        mimeType: 'image/png',
        format: 'png',
        width: 5,
        height: 7,
        bitsPerPixel: 24,
        progressive: false,
        numberOfImages: 1,
        comments: [],
      });
    });
  });

  describe('failures', () => {
    it('should report an unrecognised file and exit with 1', async () => {
      expect(await runCli([unknownPath], terminal())).toBe(1);
      expect(error).toHaveBeenCalledWith(
        `✗ ${unknownPath}: Unrecognized image format (magic bytes: 00 00)`
      );
      expect(log).not.toHaveBeenCalled();
    });

    it('should keep going after a missing file', async () => {
      const missing = join(tmpDir, 'missing.png');

      expect(await runCli(['-c', missing, bmpPath], terminal())).toBe(1);
      expect(error).toHaveBeenCalledTimes(1);
      expect(error.mock.calls[0]?.[0]).toMatch(/^✗ .*missing\.png: ENOENT/);
      expect(log).toHaveBeenCalledTimes(1);
    });

    it('should exit with 1 on an unknown option', async () => {
      expect(await runCli(['--bogus'], terminal())).toBe(1);
      expect(error).toHaveBeenCalledWith('Unknown option: --bogus');
    });
  });

  describe('URLs', () => {
    const jpeg = Buffer.from(
      createJpeg(createJfifSegment(1, 72, 72), createJpegFrame(0xffc0, 144, 72))
    );
    let server: Server;
    let baseUrl: string;

    beforeAll(async () => {
      server = createServer((req, res) => {
        if (req.url === '/photo.jpg') {
          res.writeHead(200, { 'Content-Type': 'image/jpeg' });
          res.end(jpeg);
        } else if (req.url === '/endless.jpg') {
          // Header first, then a body that never finishes
          res.writeHead(200, { 'Content-Type': 'image/jpeg' });
          res.write(jpeg);
        } else {
          res.writeHead(404);
          res.end();
        }
      });
      await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Test server is not listening on a TCP port');
      }
      baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
      server.closeAllConnections();
      await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('should fetch and report an image', async () => {
      const url = `${baseUrl}/photo.jpg`;

      expect(await runCli(['-c', url], terminal())).toBe(0);
      expect(log).toHaveBeenCalledWith(`${url}\tJPEG\timage/jpeg\t144\t72\t24\t1\t72\t72\t2\t1\tfalse`);
    });

    it('should stop downloading once the header is read', async () => {
      const url = `${baseUrl}/endless.jpg`;

      expect(await runCli(['-c', url], terminal())).toBe(0);
      expect(log).toHaveBeenCalledWith(`${url}\tJPEG\timage/jpeg\t144\t72\t24\t1\t72\t72\t2\t1\tfalse`);
    });

    it('should report an HTTP error status', async () => {
      const url = `${baseUrl}/missing.jpg`;

      expect(await runCli([url], terminal())).toBe(1);
      expect(error).toHaveBeenCalledWith(`✗ ${url}: HTTP 404 Not Found`);
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('help and version', () => {
    it('should print help for -h', async () => {
      expect(await runCli(['-h'], terminal())).toBe(0);
      expect(log.mock.calls[0]?.[0]).toMatch(/^imgprobe \[options\] \[file\|url\.\.\.\]/);
    });

    it('should print help when run without arguments at a terminal', async () => {
      expect(await runCli([], terminal())).toBe(0);
      expect(log.mock.calls[0]?.[0]).toMatch(/^imgprobe \[options\]/);
    });

    it('should print the package version', async () => {
      expect(await runCli(['-v'], terminal())).toBe(0);
      expect(log).toHaveBeenCalledWith('1.0.0');
    });
  });
});
