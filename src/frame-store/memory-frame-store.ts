import { FrameStore, PixelFrame } from '../interfaces';
import { DEFAULT_FRAME_RATE } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { cloneFrame, validateFrame } from '../utils/frame';

/**
 * Frame dimensions, used when a store starts out empty
 */
export type FrameShape = Pick<PixelFrame, 'width' | 'height' | 'channels'>;

/**
 * Frame store over frames held in memory.
 * Frames are copied on the way in and on the way out.
 */
export class MemoryFrameStore implements FrameStore {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly frameRate: number;
  private readonly frames: PixelFrame[];

  constructor(
    frames: readonly PixelFrame[],
    frameRate: number = DEFAULT_FRAME_RATE,
    shape?: FrameShape
  ) {
    if (!(frameRate > 0)) {
      throw ErrorFactory.INVALID_CONFIG(`Frame rate must be positive, got ${frameRate}`);
    }

    const reference = frames.length > 0 ? frames[0] : shape;
    this.width = reference?.width ?? 0;
    this.height = reference?.height ?? 0;
    this.channels = reference?.channels ?? 0;
    this.frameRate = frameRate;
    this.frames = frames.map((frame, index) => {
      this.assertShape(frame, index);
      return cloneFrame(frame);
    });
  }

  get frameCount(): number {
    return this.frames.length;
  }

  async readFrame(index: number): Promise<PixelFrame> {
    this.assertIndex(index);
    return cloneFrame(this.frames[index]);
  }

  async writeFrame(index: number, frame: PixelFrame): Promise<void> {
    this.assertIndex(index);
    this.assertShape(frame, index);
    this.frames[index] = cloneFrame(frame);
  }

  /**
   * Copy of every frame, in order
   */
  toFrames(): PixelFrame[] {
    return this.frames.map(cloneFrame);
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.frames.length) {
      throw ErrorFactory.INVALID_FRAME(
        `Frame index ${index} is out of range (0-${this.frames.length - 1})`
      );
    }
  }

  private assertShape(frame: PixelFrame, index: number): void {
    validateFrame(frame);
    if (
      frame.width !== this.width ||
      frame.height !== this.height ||
      frame.channels !== this.channels
    ) {
      throw ErrorFactory.INVALID_FRAME(
        `Frame ${index} is ${frame.width}x${frame.height}x${frame.channels}, ` +
          `the store holds ${this.width}x${this.height}x${this.channels} frames`
      );
    }
  }
}
