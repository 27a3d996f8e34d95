#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import createDebug from 'debug';
import * as path from 'path';
import { StegoEngine } from './engine/stego-engine';
import { Y4mFrameStore } from './frame-store/y4m-frame-store';
import { ChannelSelection, isStegoError, StegoConfig, StegoErrorType } from './interfaces';
import { Y4M_EXTENSION } from './utils/constants';
import { ErrorFactory } from './utils/error-factory';

const debug = createDebug('stegvid:cli');

// Exit codes: 1 for errors, 2 when detect finds an inconsistent header
const CORRUPT_HEADER_EXIT_CODE = 2;

interface StegoCliOptions {
  bitDepth?: number;
  channel?: ChannelSelection;
  headerFrames?: number;
}

interface HideCliOptions extends StegoCliOptions {
  message: string;
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number(value);
}

function parseChannel(value: string): ChannelSelection {
  return value === 'all' ? 'all' : parseInteger(value);
}

function withStegoOptions(command: Command): Command {
  return command
    .option('-b, --bit-depth <bits>', 'bits hidden per frame', parseInteger)
    .option('-c, --channel <channel>', "channel index to embed in, or 'all'", parseChannel)
    .option('--header-frames <frames>', 'frames reserved for the length header', parseInteger);
}

function toStegoConfig(options: StegoCliOptions): StegoConfig {
  return {
    bitDepth: options.bitDepth,
    channel: options.channel,
    headerFrames: options.headerFrames,
  };
}

function assertY4mPath(file: string): string {
  if (path.extname(file).toLowerCase() !== Y4M_EXTENSION) {
    throw ErrorFactory.UNSUPPORTED_FORMAT(
      `Only ${Y4M_EXTENSION} files are supported, got ${file}`
    );
  }
  return path.resolve(file);
}

/**
 * Open a .y4m store for the duration of `body`
 */
async function withStore(
  file: string,
  body: (store: Y4mFrameStore) => Promise<void>
): Promise<void> {
  const store = await Y4mFrameStore.open(file);
  try {
    await body(store);
  } finally {
    await store.close();
  }
}

/**
 * Run a command body, reporting failures on stderr with a non-zero exit code
 */
async function run(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    debug('command failed: %O', err);
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}

/**
 * Build the stegvid command line program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('stegvid')
    .description('Hide text in the pixel data of lossless YUV4MPEG2 videos.')
    .version('1.0.0');

  withStegoOptions(
    program
      .command('capacity')
      .description('Show how many characters a video can hide.')
      .argument('<input>', 'input .y4m video')
  ).action((input: string, options: StegoCliOptions) =>
    run(async () => {
      const engine = new StegoEngine(toStegoConfig(options));
      await withStore(assertY4mPath(input), async (store) => {
        console.log(`You can hide up to ${engine.maxPayloadCharsForStore(store)} characters.`);
      });
    })
  );

  withStegoOptions(
    program
      .command('hide')
      .description('Hide a message in a video.')
      .argument('<input>', 'input .y4m video')
      .argument('<output>', 'output .y4m video')
      .requiredOption('-m, --message <message>', 'message to hide')
  ).action((input: string, output: string, options: HideCliOptions) =>
    run(async () => {
      const engine = new StegoEngine(toStegoConfig(options));
      const outputPath = assertY4mPath(output);
      await withStore(assertY4mPath(input), async (store) => {
        await engine.embedInStore(store, options.message);
        await store.save(outputPath);
      });
      console.log(`Message successfully hidden in ${output}.`);
    })
  );

  withStegoOptions(
    program
      .command('detect')
      .description('Recover a message hidden in a video.')
      .argument('<input>', 'input .y4m video')
  ).action((input: string, options: StegoCliOptions) =>
    run(async () => {
      const engine = new StegoEngine(toStegoConfig(options));
      await withStore(assertY4mPath(input), async (store) => {
        let message: string;
        try {
          message = await engine.extractFromStore(store);
        } catch (err) {
          if (!isStegoError(err, StegoErrorType.CORRUPT_HEADER)) {
            throw err;
          }
          // No message, or the video changed after embedding
          console.log(`No message detected (${err.message}).`);
          process.exitCode = CORRUPT_HEADER_EXIT_CODE;
          return;
        }

        console.log(message ? `Detected message: ${message}` : 'No message detected.');
      });
    })
  );

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
