import createDebug from 'debug';
import { PixelFrame, ResolvedStegoConfig, StegoConfig } from '../interfaces';
import { resolveStegoConfig } from '../utils/config';
import { ErrorFactory } from '../utils/error-factory';
import { CharacterCodec } from './character-codec';

const debug = createDebug('stegvid:codec');

/**
 * Stores the message length in the header frames at the start of a video.
 *
 * The length is split big-endian into `headerFrames` chunks of `bitDepth`
 * bits; frame 0 holds the most significant chunk. Each chunk is written
 * with the same LSB scheme as a character.
 */
export class LengthCodec {
  private readonly config: ResolvedStegoConfig;
  private readonly slotCodec: CharacterCodec;

  constructor(config: StegoConfig = {}) {
    this.config = resolveStegoConfig(config);
    this.slotCodec = new CharacterCodec(this.config);
  }

  get headerFrames(): number {
    return this.config.headerFrames;
  }

  /**
   * Largest length the header can represent
   */
  get maxLength(): number {
    return 2 ** (this.config.bitDepth * this.config.headerFrames) - 1;
  }

  /**
   * Throw unless `length` can be stored in the header
   */
  assertEncodable(length: number): void {
    if (!Number.isInteger(length) || length < 0) {
      throw ErrorFactory.LENGTH_OVERFLOW(`Length must be a non-negative integer, got ${length}`);
    }
    if (length > this.maxLength) {
      throw ErrorFactory.LENGTH_OVERFLOW(
        `Length ${length} exceeds the header maximum of ${this.maxLength}`
      );
    }
  }

  /**
   * Write `length` into the first `headerFrames` frames, in place
   */
  encodeLength(frames: PixelFrame[], length: number): PixelFrame[] {
    this.assertEncodable(length);
    const headers = this.headerSlice(frames);
    headers.forEach((frame) => this.slotCodec.assertCapacity(frame));

    const radix = this.slotCodec.maxValue + 1;
    let remaining = length;
    for (let i = headers.length - 1; i >= 0; i--) {
      this.slotCodec.encodeCharacter(headers[i], remaining % radix);
      remaining = Math.floor(remaining / radix);
    }

    debug('encoded length %d into %d header frame(s)', length, headers.length);
    return frames;
  }

  /**
   * Read the length stored in the first `headerFrames` frames
   */
  decodeLength(frames: PixelFrame[]): number {
    const radix = this.slotCodec.maxValue + 1;
    const length = this.headerSlice(frames).reduce(
      (value, frame) => value * radix + this.slotCodec.decodeCharacter(frame),
      0
    );

    debug('decoded length %d', length);
    return length;
  }

  private headerSlice(frames: PixelFrame[]): PixelFrame[] {
    const { headerFrames } = this.config;
    if (frames.length < headerFrames) {
      throw ErrorFactory.INSUFFICIENT_CAPACITY(
        `Length header needs ${headerFrames} frame(s), got ${frames.length}`
      );
    }
    return frames.slice(0, headerFrames);
  }
}
