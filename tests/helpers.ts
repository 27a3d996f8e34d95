import { isStegoError, PixelFrame, StegoErrorType } from '../src';

/**
 * Build a frame whose samples come from `fill(index)`
 */
export function makeFrame(
  width: number,
  height: number,
  channels: number,
  fill: (index: number) => number = () => 0
): PixelFrame {
  const data = new Uint8Array(width * height * channels);
  for (let i = 0; i < data.length; i++) {
    data[i] = fill(i);
  }
  return { width, height, channels, data };
}

export function makeFrames(
  count: number,
  width: number,
  height: number,
  channels: number,
  fill: (frameIndex: number, sampleIndex: number) => number = () => 0
): PixelFrame[] {
  return Array.from({ length: count }, (_, f) =>
    makeFrame(width, height, channels, (i) => fill(f, i))
  );
}

/**
 * Least significant bits of the first `count` samples
 */
export function lsbs(frame: PixelFrame, count: number = 8): number[] {
  return Array.from(frame.data.slice(0, count), (sample) => sample & 1);
}

/**
 * Run `fn` and report the StegoError type it threw, if any
 */
export function errorTypeOf(fn: () => unknown): StegoErrorType | undefined {
  try {
    fn();
  } catch (err) {
    return isStegoError(err) ? err.type : undefined;
  }
  return undefined;
}

/**
 * Await `promise` and report the StegoError type it rejected with, if any
 */
export async function rejectionTypeOf(promise: Promise<unknown>): Promise<StegoErrorType | undefined> {
  try {
    await promise;
  } catch (err) {
    return isStegoError(err) ? err.type : undefined;
  }
  return undefined;
}

/**
 * Small seeded PRNG (mulberry32) returning integers in [0, bound)
 */
export function seededRandom(seed: number): (bound: number) => number {
  let state = seed >>> 0;
  return (bound: number) => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return Math.floor((((t ^ (t >>> 14)) >>> 0) / 4294967296) * bound);
  };
}
