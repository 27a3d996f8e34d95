import { ResolvedStegoConfig, StegoConfig } from '../interfaces';
import {
  DEFAULT_BIT_DEPTH,
  DEFAULT_HEADER_FRAMES,
  MAX_BIT_DEPTH,
  MAX_HEADER_BITS,
  MIN_BIT_DEPTH,
} from './constants';
import { ErrorFactory } from './error-factory';

export const DEFAULT_STEGO_CONFIG: Readonly<ResolvedStegoConfig> = {
  bitDepth: DEFAULT_BIT_DEPTH,
  channel: 'all',
  headerFrames: DEFAULT_HEADER_FRAMES,
};

/**
 * Merge a partial configuration over the defaults and validate it
 */
export function resolveStegoConfig(config: StegoConfig = {}): ResolvedStegoConfig {
  const resolved: ResolvedStegoConfig = {
    bitDepth: config.bitDepth ?? DEFAULT_STEGO_CONFIG.bitDepth,
    channel: config.channel ?? DEFAULT_STEGO_CONFIG.channel,
    headerFrames: config.headerFrames ?? DEFAULT_STEGO_CONFIG.headerFrames,
  };

  const { bitDepth, channel, headerFrames } = resolved;

  if (!Number.isInteger(bitDepth) || bitDepth < MIN_BIT_DEPTH || bitDepth > MAX_BIT_DEPTH) {
    throw ErrorFactory.INVALID_CONFIG(
      `bitDepth must be an integer between ${MIN_BIT_DEPTH} and ${MAX_BIT_DEPTH}, got ${bitDepth}`
    );
  }

  if (channel !== 'all' && (!Number.isInteger(channel) || channel < 0)) {
    throw ErrorFactory.INVALID_CONFIG(
      `channel must be 'all' or a non-negative integer, got ${channel}`
    );
  }

  if (!Number.isInteger(headerFrames) || headerFrames < 1) {
    throw ErrorFactory.INVALID_CONFIG(
      `headerFrames must be a positive integer, got ${headerFrames}`
    );
  }

  if (bitDepth * headerFrames > MAX_HEADER_BITS) {
    throw ErrorFactory.INVALID_CONFIG(
      `Length header of ${bitDepth * headerFrames} bits exceeds the ${MAX_HEADER_BITS} bit limit`
    );
  }

  return resolved;
}
