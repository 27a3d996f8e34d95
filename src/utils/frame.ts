import { ChannelSelection, PixelFrame } from '../interfaces';
import { ErrorFactory } from './error-factory';

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Check that a frame's dimensions are sane and match its buffer
 */
export function validateFrame(frame: PixelFrame): void {
  const { width, height, channels, data } = frame;

  if (!isPositiveInteger(width) || !isPositiveInteger(height) || !isPositiveInteger(channels)) {
    throw ErrorFactory.INVALID_FRAME(
      `Frame dimensions must be positive integers, got ${width}x${height}x${channels}`
    );
  }

  const expected = width * height * channels;
  if (data.length !== expected) {
    throw ErrorFactory.INVALID_FRAME(
      `Frame buffer holds ${data.length} samples, expected ${expected} for ${width}x${height}x${channels}`
    );
  }
}

/**
 * Copy a frame so the original buffer is left untouched
 */
export function cloneFrame(frame: PixelFrame): PixelFrame {
  return {
    width: frame.width,
    height: frame.height,
    channels: frame.channels,
    data: new Uint8Array(frame.data),
  };
}

/**
 * Number of samples a channel selection exposes in a frame
 */
export function selectedSampleCount(frame: PixelFrame, channel: ChannelSelection): number {
  if (channel === 'all') {
    return frame.data.length;
  }
  if (channel >= frame.channels) {
    throw ErrorFactory.INVALID_CONFIG(
      `Channel ${channel} is not present in a frame with ${frame.channels} channel(s)`
    );
  }
  return frame.width * frame.height;
}

/**
 * Buffer offset of the n-th selected sample
 */
export function sampleOffset(frame: PixelFrame, channel: ChannelSelection, n: number): number {
  return channel === 'all' ? n : n * frame.channels + channel;
}
