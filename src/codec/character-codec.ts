import { PixelFrame, ResolvedStegoConfig, StegoConfig } from '../interfaces';
import { LSB_CLEAR_MASK, LSB_MASK } from '../utils/constants';
import { resolveStegoConfig } from '../utils/config';
import { ErrorFactory } from '../utils/error-factory';
import { sampleOffset, selectedSampleCount, validateFrame } from '../utils/frame';

/**
 * Hides one character per frame in the least significant bits of the
 * frame's first `bitDepth` selected samples.
 *
 * Bits are written most significant first: sample 0 carries bit
 * `bitDepth - 1` of the character code, the last sample carries bit 0.
 */
export class CharacterCodec {
  private readonly config: ResolvedStegoConfig;

  constructor(config: StegoConfig = {}) {
    this.config = resolveStegoConfig(config);
  }

  get bitDepth(): number {
    return this.config.bitDepth;
  }

  /**
   * Largest value that fits in one frame slot
   */
  get maxValue(): number {
    return 2 ** this.config.bitDepth - 1;
  }

  /**
   * Number of samples available for embedding in a frame
   */
  slotCapacity(frame: PixelFrame): number {
    validateFrame(frame);
    return selectedSampleCount(frame, this.config.channel);
  }

  /**
   * Throw unless the frame can hold one character
   */
  assertCapacity(frame: PixelFrame): void {
    const capacity = this.slotCapacity(frame);
    if (capacity < this.config.bitDepth) {
      throw ErrorFactory.INSUFFICIENT_CAPACITY(
        `Frame exposes ${capacity} sample(s), ${this.config.bitDepth} are needed`
      );
    }
  }

  /**
   * Write a character code into the frame, in place
   */
  encodeCharacter(frame: PixelFrame, charCode: number): PixelFrame {
    if (!Number.isInteger(charCode) || charCode < 0 || charCode > this.maxValue) {
      throw ErrorFactory.UNSUPPORTED_CHARACTER(
        `Character code ${charCode} does not fit in ${this.config.bitDepth} bits`
      );
    }
    this.assertCapacity(frame);

    const { bitDepth, channel } = this.config;
    for (let i = 0; i < bitDepth; i++) {
      const offset = sampleOffset(frame, channel, i);
      const bit = (charCode >> (bitDepth - 1 - i)) & LSB_MASK;
      frame.data[offset] = (frame.data[offset] & LSB_CLEAR_MASK) | bit;
    }

    return frame;
  }

  /**
   * Read the character code stored in a frame
   */
  decodeCharacter(frame: PixelFrame): number {
    this.assertCapacity(frame);

    const { bitDepth, channel } = this.config;
    let charCode = 0;
    for (let i = 0; i < bitDepth; i++) {
      const offset = sampleOffset(frame, channel, i);
      charCode = (charCode << 1) | (frame.data[offset] & LSB_MASK);
    }

    return charCode;
  }
}
