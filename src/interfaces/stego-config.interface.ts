/**
 * Which samples of a frame carry hidden bits
 * - 'all': every sample, in interleaved order
 * - number: only the samples of that channel (e.g. 0 for Y in a 4:4:4 frame)
 */
export type ChannelSelection = 'all' | number;

/**
 * Configuration shared by the codecs and the engine
 */
export interface StegoConfig {
  /**
   * Bits stored per frame, one per sample LSB (1-16, default 8)
   */
  bitDepth?: number;

  /**
   * Samples used for embedding (default 'all')
   */
  channel?: ChannelSelection;

  /**
   * Frames reserved at the start of the video for the length header.
   * The header is big-endian, bitDepth bits per frame (default 1)
   */
  headerFrames?: number;
}

export type ResolvedStegoConfig = Required<StegoConfig>;
