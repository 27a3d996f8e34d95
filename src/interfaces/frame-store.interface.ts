import { PixelFrame } from './pixel-frame.interface';

/**
 * Random access to the frames of a video
 *
 * Implementations own the decoding and encoding of the container. Every
 * frame shares the store's width, height and channel count. Frames are
 * fetched one at a time, so a store need not hold the whole video.
 */
export interface FrameStore {
  readonly frameCount: number;
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly frameRate: number;

  /**
   * Read a frame. The returned buffer is not shared with the store.
   * @param index Zero-based frame index
   */
  readFrame(index: number): Promise<PixelFrame>;

  /**
   * Replace a frame
   * @param index Zero-based frame index
   * @param frame Frame with the store's dimensions
   */
  writeFrame(index: number, frame: PixelFrame): Promise<void>;
}
