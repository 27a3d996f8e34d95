/**
 * A single decoded video frame
 *
 * Samples are interleaved row-major: pixel by pixel, and inside a pixel
 * channel by channel, so `data.length === width * height * channels`.
 */
export interface PixelFrame {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
}
