import { MemoryFrameStore, StegoEngine, StegoErrorType } from '../src';
import { errorTypeOf, lsbs, makeFrame, makeFrames, rejectionTypeOf, seededRandom } from './helpers';

const textured = (f: number, i: number): number => (i * 37 + f * 11) % 256;

describe('StegoEngine', () => {
  describe('maxPayloadChars', () => {
    it('reserves one frame for the length header', () => {
      const engine = new StegoEngine();

      expect(engine.maxPayloadChars(4)).toBe(3);
      expect(engine.maxPayloadChars(1)).toBe(0);
      expect(engine.maxPayloadChars(0)).toBe(0);
    });

    it('returns the same value on every call', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(5, 4, 4, 1);
      const before = engine.maxPayloadChars(frames.length);

      engine.embed(frames, 'abcd');

      expect(engine.maxPayloadChars(frames.length)).toBe(before);
      expect(engine.maxPayloadChars(frames.length)).toBe(4);
    });

    it('accounts for larger headers', () => {
      expect(new StegoEngine({ headerFrames: 2 }).maxPayloadChars(4)).toBe(2);
      expect(new StegoEngine({ headerFrames: 2 }).maxPayloadChars(1)).toBe(0);
    });

    it('rejects invalid frame counts', () => {
      expect(errorTypeOf(() => new StegoEngine().maxPayloadChars(-1))).toBe(StegoErrorType.INVALID_FRAME);
      expect(errorTypeOf(() => new StegoEngine().maxPayloadChars(2.5))).toBe(StegoErrorType.INVALID_FRAME);
    });
  });

  describe('embed', () => {
    it('writes the length, then one character per frame', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(4, 16, 16, 1);

      const result = engine.embed(frames, 'OK');

      expect(result).toHaveLength(4);
      expect(lsbs(result[0])).toEqual([0, 0, 0, 0, 0, 0, 1, 0]);
      expect(lsbs(result[1])).toEqual([0, 1, 0, 0, 1, 1, 1, 1]);
      expect(lsbs(result[2])).toEqual([0, 1, 0, 0, 1, 0, 1, 1]);
      expect(result[3]).toBe(frames[3]);
      expect(engine.extract(result)).toBe('OK');
    });

    it('leaves the input frames untouched', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(4, 16, 16, 1);

      engine.embed(frames, 'OK');

      frames.forEach((frame) => {
        expect(Array.from(frame.data).every((sample) => sample === 0)).toBe(true);
      });
    });

    it('changes no sample by more than one and passes later frames through', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(6, 8, 4, 3, textured);
      const message = 'Hi!';

      const result = engine.embed(frames, message);

      result.forEach((frame, index) => {
        frame.data.forEach((sample, offset) => {
          expect(Math.abs(sample - frames[index].data[offset])).toBeLessThanOrEqual(1);
        });
        if (index > message.length) {
          expect(frame).toBe(frames[index]);
        }
      });
    });

    it('round-trips text and bytes', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(20, 4, 4, 3, textured);

      expect(engine.extract(engine.embed(frames, 'Hello, world!'))).toBe('Hello, world!');
      expect(engine.extract(engine.embed(frames, 'ÿ\u0000é'))).toBe('ÿ\u0000é');

      const bytes = Uint8Array.from([0, 1, 127, 128, 254, 255]);
      expect(Array.from(engine.extractBytes(engine.embed(frames, bytes)))).toEqual(Array.from(bytes));
    });

    it('fills every payload frame', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(4, 4, 4, 1, textured);

      expect(engine.extract(engine.embed(frames, 'xyz'))).toBe('xyz');
    });

    it('fails when the message needs more frames than the video has', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(4, 4, 4, 1);

      expect(errorTypeOf(() => engine.embed(frames, 'abcd'))).toBe(StegoErrorType.MESSAGE_TOO_LONG);
      expect(errorTypeOf(() => engine.embed(frames.slice(0, 1), 'a'))).toBe(StegoErrorType.MESSAGE_TOO_LONG);
    });

    it('fails on characters outside the single-byte range', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(4, 4, 4, 1);

      expect(errorTypeOf(() => engine.embed(frames, 'aΩ'))).toBe(StegoErrorType.UNSUPPORTED_CHARACTER);
      expect(errorTypeOf(() => engine.embed(frames, '😀'))).toBe(
        StegoErrorType.UNSUPPORTED_CHARACTER
      );
      expect(Array.from(frames[0].data).every((sample) => sample === 0)).toBe(true);
    });

    it('fails when the length overflows the header', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(300, 1, 8, 1);

      expect(errorTypeOf(() => engine.embed(frames, 'a'.repeat(256)))).toBe(StegoErrorType.LENGTH_OVERFLOW);
      expect(engine.extract(engine.embed(frames, 'a'.repeat(255)))).toBe('a'.repeat(255));
    });

    it('fails on frames too small to hold a character', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(3, 2, 2, 1);

      expect(errorTypeOf(() => engine.embed(frames, 'a'))).toBe(StegoErrorType.INSUFFICIENT_CAPACITY);
    });

    it('fails when the video is shorter than the header', () => {
      const engine = new StegoEngine({ headerFrames: 2 });

      expect(errorTypeOf(() => engine.embed(makeFrames(1, 4, 4, 1), ''))).toBe(
        StegoErrorType.INSUFFICIENT_CAPACITY
      );
    });
  });

  describe('empty message', () => {
    it('only writes the header and extracts an empty string', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(3, 4, 4, 1, () => 0xff);

      const result = engine.embed(frames, '');

      expect(lsbs(result[0])).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
      expect(result[1]).toBe(frames[1]);
      expect(result[2]).toBe(frames[2]);
      expect(engine.extract(result)).toBe('');
    });
  });

  describe('extract', () => {
    it('fails on an empty frame sequence', () => {
      expect(errorTypeOf(() => new StegoEngine().extract([]))).toBe(StegoErrorType.EMPTY_INPUT);
    });

    it('reports a header longer than the video as corrupt', () => {
      const engine = new StegoEngine();
      const frames = makeFrames(3, 4, 4, 1, () => 0xff); // header decodes to 255

      expect(errorTypeOf(() => engine.extract(frames))).toBe(StegoErrorType.CORRUPT_HEADER);
    });

    it('reports a truncated video as corrupt', () => {
      const engine = new StegoEngine();
      const stego = engine.embed(makeFrames(6, 4, 4, 1), 'hello');

      expect(errorTypeOf(() => engine.extract(stego.slice(0, 4)))).toBe(StegoErrorType.CORRUPT_HEADER);
    });

    it('reports a video shorter than the header as corrupt', () => {
      const engine = new StegoEngine({ headerFrames: 2 });

      expect(errorTypeOf(() => engine.extract(makeFrames(1, 4, 4, 1)))).toBe(StegoErrorType.CORRUPT_HEADER);
    });
  });

  describe('configuration', () => {
    it('uses 8 bits, every channel and a single header frame by default', () => {
      expect(new StegoEngine().getConfig()).toEqual({ bitDepth: 8, channel: 'all', headerFrames: 1 });
    });

    it('rejects invalid settings', () => {
      expect(errorTypeOf(() => new StegoEngine({ bitDepth: 0 }))).toBe(StegoErrorType.INVALID_CONFIG);
      expect(errorTypeOf(() => new StegoEngine({ bitDepth: 17 }))).toBe(StegoErrorType.INVALID_CONFIG);
      expect(errorTypeOf(() => new StegoEngine({ headerFrames: 0 }))).toBe(StegoErrorType.INVALID_CONFIG);
      expect(errorTypeOf(() => new StegoEngine({ channel: -1 }))).toBe(StegoErrorType.INVALID_CONFIG);
      expect(errorTypeOf(() => new StegoEngine({ bitDepth: 16, headerFrames: 4 }))).toBe(
        StegoErrorType.INVALID_CONFIG
      );
    });

    it('round-trips with a smaller bit depth and a two-frame header', () => {
      const engine = new StegoEngine({ bitDepth: 4, headerFrames: 2 });
      const frames = makeFrames(6, 2, 2, 1, textured);
      const bytes = Uint8Array.from([1, 15, 7]);

      const result = engine.embed(frames, bytes);

      expect(lsbs(result[0], 4)).toEqual([0, 0, 0, 0]);
      expect(lsbs(result[1], 4)).toEqual([0, 0, 1, 1]);
      expect(Array.from(engine.extractBytes(result))).toEqual([1, 15, 7]);
      expect(result[5]).toBe(frames[5]);
      expect(errorTypeOf(() => engine.embed(frames, Uint8Array.from([16])))).toBe(
        StegoErrorType.UNSUPPORTED_CHARACTER
      );
    });

    it('embeds into one channel only', () => {
      const engine = new StegoEngine({ channel: 2 });
      const frames = makeFrames(3, 4, 4, 3, textured);

      const result = engine.embed(frames, 'go');

      expect(engine.extract(result)).toBe('go');
      result.forEach((frame, index) => {
        frame.data.forEach((sample, offset) => {
          if (offset % 3 !== 2) {
            expect(sample).toBe(frames[index].data[offset]);
          }
        });
      });
    });
  });

  describe('frame stores', () => {
    it('embeds into and extracts from a store', async () => {
      const engine = new StegoEngine();
      const frames = makeFrames(4, 16, 16, 1);
      const store = new MemoryFrameStore(frames);

      await engine.embedInStore(store, 'OK');

      expect(engine.maxPayloadCharsForStore(store)).toBe(3);
      expect(await engine.extractFromStore(store)).toBe('OK');
      expect(Array.from(await engine.extractBytesFromStore(store))).toEqual([0x4f, 0x4b]);
      expect(await store.readFrame(3)).toEqual(frames[3]);
    });

    it('reads and writes only the header and character frames', async () => {
      const engine = new StegoEngine();
      const store = new MemoryFrameStore(makeFrames(10, 4, 4, 1));
      const readSpy = jest.spyOn(store, 'readFrame');
      const writeSpy = jest.spyOn(store, 'writeFrame');

      await engine.embedInStore(store, 'OK');

      expect(readSpy.mock.calls.map(([index]) => index)).toEqual([0, 1, 2]);
      expect(writeSpy.mock.calls.map(([index]) => index)).toEqual([0, 1, 2]);

      readSpy.mockClear();
      expect(await engine.extractFromStore(store)).toBe('OK');
      expect(readSpy.mock.calls.map(([index]) => index)).toEqual([0, 1, 2]);
    });

    it('leaves the store unchanged when embedding fails', async () => {
      const engine = new StegoEngine();
      const frames = makeFrames(4, 4, 4, 1, textured);
      const store = new MemoryFrameStore(frames);

      expect(await rejectionTypeOf(engine.embedInStore(store, 'abĀ'))).toBe(
        StegoErrorType.UNSUPPORTED_CHARACTER
      );
      expect(await rejectionTypeOf(engine.embedInStore(store, 'abcd'))).toBe(StegoErrorType.MESSAGE_TOO_LONG);
      expect(store.toFrames()).toEqual(frames);
    });

    it('fails on an empty store', async () => {
      const store = new MemoryFrameStore([], 25, makeFrame(4, 4, 1));

      expect(await rejectionTypeOf(new StegoEngine().extractFromStore(store))).toBe(StegoErrorType.EMPTY_INPUT);
      expect(await rejectionTypeOf(new StegoEngine().embedInStore(store, ''))).toBe(
        StegoErrorType.INSUFFICIENT_CAPACITY
      );
    });

    it('reports a corrupt header in a store', async () => {
      const store = new MemoryFrameStore(makeFrames(3, 4, 4, 1, () => 0xff));

      expect(await rejectionTypeOf(new StegoEngine().extractFromStore(store))).toBe(
        StegoErrorType.CORRUPT_HEADER
      );
    });
  });

  describe('round trip over generated inputs', () => {
    it('recovers every message that fits, changing samples by at most one', () => {
      const engine = new StegoEngine();

      for (let seed = 1; seed <= 25; seed++) {
        const random = seededRandom(seed);
        const frameCount = 2 + random(12);
        const width = 4 + random(4);
        const height = 2 + random(3);
        const channels = 1 + random(3);
        const frames = makeFrames(frameCount, width, height, channels, () => random(256));
        const maxChars = engine.maxPayloadChars(frameCount);

        for (const length of [0, random(maxChars + 1), maxChars]) {
          const message = Uint8Array.from({ length }, () => random(256));

          const result = engine.embed(frames, message);

          expect(Array.from(engine.extractBytes(result))).toEqual(Array.from(message));
          result.forEach((frame, index) => {
            if (index > length) {
              expect(frame).toBe(frames[index]);
            }
            frame.data.forEach((sample, offset) => {
              expect(Math.abs(sample - frames[index].data[offset])).toBeLessThanOrEqual(1);
            });
          });
        }
      }
    });

    it('carries every byte value', () => {
      const engine = new StegoEngine({ headerFrames: 2 });
      const random = seededRandom(42);
      const frames = makeFrames(258, 1, 8, 1, () => random(256));
      const message = Uint8Array.from({ length: 256 }, (_, i) => i);

      const result = engine.embed(frames, message);

      expect(Array.from(engine.extractBytes(result))).toEqual(Array.from(message));
      expect(engine.extract(result)).toBe(Buffer.from(message).toString('latin1'));
    });
  });
});
