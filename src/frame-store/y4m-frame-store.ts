import createDebug from 'debug';
import { FileHandle, open } from 'fs/promises';
import * as path from 'path';
import { FrameStore, isStegoError, PixelFrame } from '../interfaces';
import {
  COPY_CHUNK_SIZE,
  NEWLINE_BYTE,
  Y4M_LINE_CHUNK_SIZE,
  Y4M_MAX_LINE_LENGTH,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { cloneFrame } from '../utils/frame';
import {
  assertFrameMatches,
  channelsFor,
  frameSizeOf,
  frameToPlanar,
  isFrameMarker,
  parseY4mHeader,
  planarToFrame,
  Y4mHeader,
} from './y4m';

const debug = createDebug('stegvid:y4m');

/**
 * Read one newline-terminated ASCII line starting at `start`
 */
async function readLineAt(
  handle: FileHandle,
  start: number,
  fileSize: number
): Promise<{ line: string; next: number }> {
  const chunks: Buffer[] = [];
  let position = start;

  while (position < fileSize && position - start < Y4M_MAX_LINE_LENGTH) {
    const chunk = Buffer.alloc(Math.min(Y4M_LINE_CHUNK_SIZE, fileSize - position));
    const { bytesRead } = await handle.read(chunk, 0, chunk.length, position);
    if (bytesRead === 0) {
      break;
    }

    const data = chunk.subarray(0, bytesRead);
    const end = data.indexOf(NEWLINE_BYTE);
    if (end !== -1) {
      chunks.push(data.subarray(0, end));
      return { line: Buffer.concat(chunks).toString('ascii'), next: position + end + 1 };
    }
    chunks.push(data);
    position += bytesRead;
  }

  throw ErrorFactory.INVALID_FORMAT(`Unterminated line at byte ${start}`);
}

/**
 * Walk the FRAME markers and return the byte offset of each frame's data
 */
async function indexFrames(
  handle: FileHandle,
  start: number,
  fileSize: number,
  frameSize: number
): Promise<number[]> {
  const offsets: number[] = [];
  let position = start;

  while (position < fileSize) {
    const { line, next } = await readLineAt(handle, position, fileSize);
    if (!isFrameMarker(line)) {
      throw ErrorFactory.INVALID_FORMAT(
        `Expected FRAME marker at byte ${position}, frame ${offsets.length}`
      );
    }
    if (next + frameSize > fileSize) {
      throw ErrorFactory.INVALID_FORMAT(
        `Frame ${offsets.length} is truncated: ${fileSize - next} of ${frameSize} bytes`
      );
    }
    offsets.push(next);
    position = next + frameSize;
  }

  return offsets;
}

/**
 * Copy bytes `[start, end)` of one file to the same positions in another
 */
async function copyRange(
  source: FileHandle,
  target: FileHandle,
  start: number,
  end: number
): Promise<void> {
  if (end <= start) {
    return;
  }

  const chunk = Buffer.alloc(Math.min(COPY_CHUNK_SIZE, end - start));
  let position = start;
  while (position < end) {
    const { bytesRead } = await source.read(chunk, 0, Math.min(chunk.length, end - position), position);
    if (bytesRead === 0) {
      throw ErrorFactory.IO(`Unexpected end of file at byte ${position}`);
    }
    await target.write(chunk, 0, bytesRead, position);
    position += bytesRead;
  }
}

/**
 * Wrap file system failures; StegoErrors pass through unchanged
 */
function asStegoError(err: unknown, message: string): Error {
  return isStegoError(err) ? err : ErrorFactory.IO(message, err);
}

/**
 * Frame store backed by a YUV4MPEG2 (.y4m) file.
 *
 * Only the stream header and the position of each frame are kept in
 * memory; frames are read from the file on demand. Written frames are held
 * until `save`, which copies every other byte of the source file as is.
 * Call `close` when done.
 *
 * Example usage:
 * ```typescript
 * const store = await Y4mFrameStore.open('input.y4m');
 * try {
 *   await new StegoEngine().embedInStore(store, 'OK');
 *   await store.save('output.y4m');
 * } finally {
 *   await store.close();
 * }
 * ```
 */
export class Y4mFrameStore implements FrameStore {
  readonly path: string;
  readonly header: Y4mHeader;
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly frameRate: number;
  private readonly handle: FileHandle;
  private readonly fileSize: number;
  private readonly frameSize: number;
  private readonly frameOffsets: number[];
  private readonly written = new Map<number, PixelFrame>();
  private closed = false;

  private constructor(
    filePath: string,
    handle: FileHandle,
    header: Y4mHeader,
    fileSize: number,
    frameOffsets: number[]
  ) {
    this.path = filePath;
    this.handle = handle;
    this.header = header;
    this.fileSize = fileSize;
    this.frameOffsets = frameOffsets;
    this.frameSize = frameSizeOf(header);
    this.width = header.width;
    this.height = header.height;
    this.channels = channelsFor(header.colorSpace);
    this.frameRate = header.frameRateNumerator / header.frameRateDenominator;
  }

  /**
   * Open a .y4m file and index its frames
   */
  static async open(filePath: string): Promise<Y4mFrameStore> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (err) {
      throw ErrorFactory.IO(`Failed to open ${filePath}`, err);
    }

    try {
      const { size } = await handle.stat();
      const { line, next } = await readLineAt(handle, 0, size);
      const header = parseY4mHeader(line);
      const offsets = await indexFrames(handle, next, size, frameSizeOf(header));

      debug(
        'opened %s: %d frame(s), %dx%d C%s',
        filePath,
        offsets.length,
        header.width,
        header.height,
        header.colorSpace
      );
      return new Y4mFrameStore(filePath, handle, header, size, offsets);
    } catch (err) {
      await handle.close();
      throw asStegoError(err, `Failed to read ${filePath}`);
    }
  }

  get frameCount(): number {
    return this.frameOffsets.length;
  }

  async readFrame(index: number): Promise<PixelFrame> {
    this.assertIndex(index);

    const written = this.written.get(index);
    if (written) {
      return cloneFrame(written);
    }

    const planar = Buffer.alloc(this.frameSize);
    try {
      await this.handle.read(planar, 0, this.frameSize, this.frameOffsets[index]);
    } catch (err) {
      throw ErrorFactory.IO(`Failed to read frame ${index} of ${this.path}`, err);
    }
    return planarToFrame(planar, this.header);
  }

  async writeFrame(index: number, frame: PixelFrame): Promise<void> {
    this.assertIndex(index);
    assertFrameMatches(frame, this.header, index);
    this.written.set(index, cloneFrame(frame));
  }

  /**
   * Write the video, with every written frame applied, to `outputPath`.
   * Saving to the store's own path rewrites only the written frames.
   */
  async save(outputPath: string): Promise<void> {
    this.assertOpen();
    const inPlace = path.resolve(outputPath) === path.resolve(this.path);

    let target: FileHandle;
    try {
      target = await open(outputPath, inPlace ? 'r+' : 'w');
    } catch (err) {
      throw ErrorFactory.IO(`Failed to open ${outputPath}`, err);
    }

    try {
      let cursor = 0;
      const written = Array.from(this.written.entries()).sort(([a], [b]) => a - b);
      for (const [index, frame] of written) {
        const offset = this.frameOffsets[index];
        if (!inPlace) {
          await copyRange(this.handle, target, cursor, offset);
        }
        const planar = frameToPlanar(frame, this.header, index);
        await target.write(planar, 0, planar.length, offset);
        cursor = offset + this.frameSize;
      }
      if (!inPlace) {
        await copyRange(this.handle, target, cursor, this.fileSize);
      }
    } catch (err) {
      throw asStegoError(err, `Failed to write ${outputPath}`);
    } finally {
      await target.close();
    }

    debug('saved %s with %d rewritten frame(s)', outputPath, this.written.size);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw ErrorFactory.IO(`${this.path} is closed`);
    }
  }

  private assertIndex(index: number): void {
    this.assertOpen();
    if (!Number.isInteger(index) || index < 0 || index >= this.frameOffsets.length) {
      throw ErrorFactory.INVALID_FRAME(
        `Frame index ${index} is out of range (0-${this.frameOffsets.length - 1})`
      );
    }
  }
}
