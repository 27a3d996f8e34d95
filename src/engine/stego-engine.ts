import createDebug from 'debug';
import { CharacterCodec } from '../codec/character-codec';
import { LengthCodec } from '../codec/length-codec';
import {
  FrameStore,
  PixelFrame,
  ResolvedStegoConfig,
  StegoConfig,
} from '../interfaces';
import { MAX_SINGLE_BYTE_CHAR_CODE } from '../utils/constants';
import { resolveStegoConfig } from '../utils/config';
import { ErrorFactory } from '../utils/error-factory';
import { cloneFrame } from '../utils/frame';

const debug = createDebug('stegvid:engine');

/**
 * A message to hide: latin1 text or raw bytes
 */
export type StegoMessage = string | Uint8Array;

/**
 * Hides a message in a sequence of frames and recovers it.
 *
 * Layout: the length header occupies frames `0..headerFrames-1`, then
 * character `k` is stored in frame `headerFrames + k`. Frames after the
 * message are never touched.
 *
 * Example usage:
 * ```typescript
 * const engine = new StegoEngine();
 * const stego = engine.embed(frames, 'OK');
 * engine.extract(stego); // 'OK'
 * ```
 *
 * The engine holds no state between calls; every failure is thrown as a
 * StegoError before any output is produced.
 */
export class StegoEngine {
  private readonly config: ResolvedStegoConfig;
  private readonly characterCodec: CharacterCodec;
  private readonly lengthCodec: LengthCodec;

  constructor(config: StegoConfig = {}) {
    this.config = resolveStegoConfig(config);
    this.characterCodec = new CharacterCodec(this.config);
    this.lengthCodec = new LengthCodec(this.config);
  }

  /**
   * Get the resolved configuration
   */
  public getConfig(): ResolvedStegoConfig {
    return { ...this.config };
  }

  /**
   * Maximum number of characters a video with `frameCount` frames can hold
   */
  public maxPayloadChars(frameCount: number): number {
    if (!Number.isInteger(frameCount) || frameCount < 0) {
      throw ErrorFactory.INVALID_FRAME(
        `Frame count must be a non-negative integer, got ${frameCount}`
      );
    }
    return Math.max(0, frameCount - this.config.headerFrames);
  }

  /**
   * Capacity of a store, from its frame count alone
   */
  public maxPayloadCharsForStore(store: FrameStore): number {
    return this.maxPayloadChars(store.frameCount);
  }

  /**
   * Hide a message in a frame sequence.
   *
   * Returns a sequence of the same length. Frames that carry the header or a
   * character are copies; every other frame is passed through as is. The
   * input frames are never modified.
   */
  public embed(frames: readonly PixelFrame[], message: StegoMessage): PixelFrame[] {
    const charCodes = this.prepareMessage(message, frames.length);
    const touched = this.encodeFrames(
      frames.slice(0, this.config.headerFrames + charCodes.length),
      charCodes
    );

    return frames.map((frame, index) => (index < touched.length ? touched[index] : frame));
  }

  /**
   * Hide a message in the frames of a store.
   *
   * Only the header and character frames are read, in index order. Every
   * one of them is encoded before the first `writeFrame` call, so a failure
   * leaves the store unchanged.
   */
  public async embedInStore(store: FrameStore, message: StegoMessage): Promise<void> {
    const charCodes = this.prepareMessage(message, store.frameCount);
    const count = this.config.headerFrames + charCodes.length;
    if (count > store.frameCount) {
      throw ErrorFactory.INSUFFICIENT_CAPACITY(
        `Length header needs ${this.config.headerFrames} frame(s), the store has ${store.frameCount}`
      );
    }

    const source: PixelFrame[] = [];
    for (let index = 0; index < count; index++) {
      source.push(await store.readFrame(index));
    }

    const encoded = this.encodeFrames(source, charCodes);
    for (let index = 0; index < encoded.length; index++) {
      await store.writeFrame(index, encoded[index]);
    }
  }

  /**
   * Recover a hidden message as latin1 text
   */
  public extract(frames: readonly PixelFrame[]): string {
    return toLatin1(this.extractBytes(frames));
  }

  /**
   * Recover a hidden message as raw character codes
   */
  public extractBytes(frames: readonly PixelFrame[]): Uint8Array {
    return this.decodeFrames(frames);
  }

  public async extractFromStore(store: FrameStore): Promise<string> {
    return toLatin1(await this.extractBytesFromStore(store));
  }

  /**
   * Recover a hidden message from a store, reading only the frames it uses
   */
  public async extractBytesFromStore(store: FrameStore): Promise<Uint8Array> {
    this.assertHeaderFrames(store.frameCount);

    const headers: PixelFrame[] = [];
    for (let index = 0; index < this.config.headerFrames; index++) {
      headers.push(await store.readFrame(index));
    }
    const length = this.decodeHeader(headers, store.frameCount);

    const result = new Uint8Array(length);
    for (let k = 0; k < length; k++) {
      result[k] = this.decodeByte(await store.readFrame(this.config.headerFrames + k), k);
    }

    debug('extracted %d character(s) from store', length);
    return result;
  }

  /**
   * Validate a message against the frame count and turn it into codes
   */
  private prepareMessage(message: StegoMessage, frameCount: number): number[] {
    const maxChars = this.maxPayloadChars(frameCount);
    if (message.length > maxChars) {
      throw ErrorFactory.MESSAGE_TOO_LONG(
        `Message has ${message.length} character(s), the video can hold ${maxChars}`
      );
    }

    const charCodes = toCharCodes(message);
    const limit = Math.min(MAX_SINGLE_BYTE_CHAR_CODE, this.characterCodec.maxValue);
    const badIndex = charCodes.findIndex((code) => code > limit);
    if (badIndex !== -1) {
      throw ErrorFactory.UNSUPPORTED_CHARACTER(
        `Character code ${charCodes[badIndex]} at position ${badIndex} exceeds ${limit}`
      );
    }

    this.lengthCodec.assertEncodable(charCodes.length);
    return charCodes;
  }

  /**
   * Copy the header and character frames and encode into the copies
   */
  private encodeFrames(source: readonly PixelFrame[], charCodes: number[]): PixelFrame[] {
    const { headerFrames } = this.config;
    const output = source.map(cloneFrame);
    output.forEach((frame) => this.characterCodec.assertCapacity(frame));

    this.lengthCodec.encodeLength(output, charCodes.length);
    charCodes.forEach((code, k) => {
      this.characterCodec.encodeCharacter(output[headerFrames + k], code);
    });

    debug('embedded %d character(s) in %d frame(s)', charCodes.length, output.length);
    return output;
  }

  private decodeFrames(frames: readonly PixelFrame[]): Uint8Array {
    this.assertHeaderFrames(frames.length);

    const { headerFrames } = this.config;
    const length = this.decodeHeader(frames.slice(0, headerFrames), frames.length);

    const result = new Uint8Array(length);
    for (let k = 0; k < length; k++) {
      result[k] = this.decodeByte(frames[headerFrames + k], k);
    }

    debug('extracted %d character(s)', length);
    return result;
  }

  private assertHeaderFrames(frameCount: number): void {
    if (frameCount === 0) {
      throw ErrorFactory.EMPTY_INPUT('No frames to extract a message from');
    }

    const { headerFrames } = this.config;
    if (frameCount < headerFrames) {
      throw ErrorFactory.CORRUPT_HEADER(
        `Length header needs ${headerFrames} frame(s), the video has ${frameCount}`
      );
    }
  }

  /**
   * Decode the length and check it against the frame count
   */
  private decodeHeader(headers: PixelFrame[], frameCount: number): number {
    const length = this.lengthCodec.decodeLength(headers);

    const maxChars = this.maxPayloadChars(frameCount);
    if (length > maxChars) {
      throw ErrorFactory.CORRUPT_HEADER(
        `Header claims ${length} character(s) but the video can hold ${maxChars}`
      );
    }
    return length;
  }

  private decodeByte(frame: PixelFrame, position: number): number {
    const code = this.characterCodec.decodeCharacter(frame);
    if (code > MAX_SINGLE_BYTE_CHAR_CODE) {
      throw ErrorFactory.UNSUPPORTED_CHARACTER(
        `Decoded character code ${code} at position ${position} is not a single byte`
      );
    }
    return code;
  }
}

function toCharCodes(message: StegoMessage): number[] {
  if (typeof message === 'string') {
    return Array.from({ length: message.length }, (_, i) => message.charCodeAt(i));
  }
  return Array.from(message);
}

function toLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('latin1');
}
