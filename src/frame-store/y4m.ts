import { PixelFrame } from '../interfaces';
import {
  NEWLINE_BYTE,
  Y4M_FRAME_MARKER,
  Y4M_SIGNATURE,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { validateFrame } from '../utils/frame';

/**
 * Colour spaces we can embed in: full-resolution planes only
 */
export type Y4mColorSpace = '444' | 'mono';

const CHANNELS_BY_COLOR_SPACE: Record<Y4mColorSpace, number> = {
  '444': 3,
  mono: 1,
};

/**
 * Stream header of a YUV4MPEG2 file
 */
export interface Y4mHeader {
  width: number;
  height: number;
  frameRateNumerator: number;
  frameRateDenominator: number;
  colorSpace: Y4mColorSpace;
  /**
   * Interlacing, aspect ratio and X- parameters, kept verbatim
   */
  extraParams: string[];
}

export interface Y4mVideo {
  header: Y4mHeader;
  frames: PixelFrame[];
}

export function channelsFor(colorSpace: Y4mColorSpace): number {
  return CHANNELS_BY_COLOR_SPACE[colorSpace];
}

function isColorSpace(value: string): value is Y4mColorSpace {
  return value === '444' || value === 'mono';
}

function parseDimension(tag: string, value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed <= 0) {
    throw ErrorFactory.INVALID_FORMAT(`Invalid ${tag} parameter "${value}"`);
  }
  return parsed;
}

function parseFrameRate(value: string): [number, number] {
  const match = /^(\d+):(\d+)$/.exec(value);
  if (!match || Number(match[1]) === 0 || Number(match[2]) === 0) {
    throw ErrorFactory.INVALID_FORMAT(`Invalid frame rate parameter "F${value}"`);
  }
  return [Number(match[1]), Number(match[2])];
}

function readLine(buffer: Buffer, start: number): { line: string; next: number } {
  const end = buffer.indexOf(NEWLINE_BYTE, start);
  if (end === -1) {
    throw ErrorFactory.INVALID_FORMAT(`Unterminated line at byte ${start}`);
  }
  return { line: buffer.toString('ascii', start, end), next: end + 1 };
}

/**
 * Parse the `YUV4MPEG2 ...` stream header line
 */
export function parseY4mHeader(line: string): Y4mHeader {
  const [signature, ...params] = line.split(' ').filter((token) => token.length > 0);
  if (signature !== Y4M_SIGNATURE) {
    throw ErrorFactory.INVALID_FORMAT('Missing YUV4MPEG2 signature');
  }

  let width: number | undefined;
  let height: number | undefined;
  let frameRate: [number, number] | undefined;
  let colorSpace: string | undefined;
  const extraParams: string[] = [];

  for (const param of params) {
    const value = param.slice(1);
    switch (param[0]) {
      case 'W':
        width = parseDimension('W', value);
        break;
      case 'H':
        height = parseDimension('H', value);
        break;
      case 'F':
        frameRate = parseFrameRate(value);
        break;
      case 'C':
        colorSpace = value;
        break;
      default:
        extraParams.push(param);
    }
  }

  if (width === undefined || height === undefined || frameRate === undefined) {
    throw ErrorFactory.INVALID_FORMAT('Stream header must declare W, H and F');
  }

  // No C parameter means 4:2:0, whose chroma planes are subsampled
  if (colorSpace === undefined || !isColorSpace(colorSpace)) {
    throw ErrorFactory.UNSUPPORTED_FORMAT(
      `Colour space ${colorSpace ?? '420 (default)'} is not supported, use C444 or Cmono`
    );
  }

  return {
    width,
    height,
    frameRateNumerator: frameRate[0],
    frameRateDenominator: frameRate[1],
    colorSpace,
    extraParams,
  };
}

export function serializeY4mHeader(header: Y4mHeader): string {
  return [
    Y4M_SIGNATURE,
    `W${header.width}`,
    `H${header.height}`,
    `F${header.frameRateNumerator}:${header.frameRateDenominator}`,
    `C${header.colorSpace}`,
    ...header.extraParams,
  ].join(' ');
}

/**
 * Bytes of planar sample data in one frame
 */
export function frameSizeOf(header: Y4mHeader): number {
  return header.width * header.height * channelsFor(header.colorSpace);
}

/**
 * Whether a line opens a frame: `FRAME`, optionally followed by parameters
 */
export function isFrameMarker(line: string): boolean {
  return line.split(' ')[0] === Y4M_FRAME_MARKER;
}

/**
 * Interleave one frame's planes into a PixelFrame
 */
export function planarToFrame(planar: Uint8Array, header: Y4mHeader): PixelFrame {
  const { width, height } = header;
  const channels = channelsFor(header.colorSpace);
  const planeSize = width * height;

  const data = new Uint8Array(planeSize * channels);
  for (let c = 0; c < channels; c++) {
    const plane = c * planeSize;
    for (let p = 0; p < planeSize; p++) {
      data[p * channels + c] = planar[plane + p];
    }
  }

  return { width, height, channels, data };
}

/**
 * Throw unless a frame has the dimensions the stream header declares
 */
export function assertFrameMatches(frame: PixelFrame, header: Y4mHeader, index: number): void {
  validateFrame(frame);
  if (
    frame.width !== header.width ||
    frame.height !== header.height ||
    frame.channels !== channelsFor(header.colorSpace)
  ) {
    throw ErrorFactory.INVALID_FRAME(
      `Frame ${index} does not match the ${header.width}x${header.height} C${header.colorSpace} header`
    );
  }
}

/**
 * Split a PixelFrame back into planes
 */
export function frameToPlanar(frame: PixelFrame, header: Y4mHeader, index: number): Buffer {
  assertFrameMatches(frame, header, index);

  const channels = channelsFor(header.colorSpace);
  const planeSize = header.width * header.height;
  const planar = Buffer.alloc(planeSize * channels);
  for (let c = 0; c < channels; c++) {
    for (let p = 0; p < planeSize; p++) {
      planar[c * planeSize + p] = frame.data[p * channels + c];
    }
  }
  return planar;
}

/**
 * Decode a YUV4MPEG2 buffer held in memory
 */
export function parseY4m(buffer: Buffer): Y4mVideo {
  const { line, next } = readLine(buffer, 0);
  const header = parseY4mHeader(line);
  const frameSize = frameSizeOf(header);

  const frames: PixelFrame[] = [];
  let offset = next;
  while (offset < buffer.length) {
    const frameLine = readLine(buffer, offset);
    if (!isFrameMarker(frameLine.line)) {
      throw ErrorFactory.INVALID_FORMAT(
        `Expected FRAME marker at byte ${offset}, frame ${frames.length}`
      );
    }

    const start = frameLine.next;
    if (start + frameSize > buffer.length) {
      throw ErrorFactory.INVALID_FORMAT(
        `Frame ${frames.length} is truncated: ${buffer.length - start} of ${frameSize} bytes`
      );
    }

    frames.push(planarToFrame(buffer.subarray(start, start + frameSize), header));
    offset = start + frameSize;
  }

  return { header, frames };
}

/**
 * Encode frames into a YUV4MPEG2 buffer
 */
export function serializeY4m(video: Y4mVideo): Buffer {
  const { header, frames } = video;
  const frameMarker = Buffer.from(`${Y4M_FRAME_MARKER}\n`, 'ascii');

  const chunks: Buffer[] = [Buffer.from(`${serializeY4mHeader(header)}\n`, 'ascii')];
  frames.forEach((frame, index) => {
    chunks.push(frameMarker, frameToPlanar(frame, header, index));
  });

  return Buffer.concat(chunks);
}
