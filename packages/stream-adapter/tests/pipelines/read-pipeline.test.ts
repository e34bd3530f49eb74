import {
  decode,
  encode,
  ManualScheduler,
  MemoryBlockingStream,
  type MemoryBlockingStreamOptions,
  randomContent,
} from "@syncbridge/testing";
import { concat } from "@syncbridge/utils";
import { describe, expect, it } from "vitest";
import {
  AsyncStreamWrapper,
  type BlockingStream,
  InvalidReadRangeError,
  PrematureEofError,
  ReadAfterEofError,
} from "../../src/index.js";

/** Workers run on the default microtask scheduler. */
function setup(options: MemoryBlockingStreamOptions = {}) {
  const stream = new MemoryBlockingStream(options);
  const wrapper = new AsyncStreamWrapper(stream);
  return { stream, wrapper };
}

/** Workers run only when the test says so. */
function setupManual(options: MemoryBlockingStreamOptions = {}) {
  const stream = new MemoryBlockingStream(options);
  const scheduler = new ManualScheduler();
  const wrapper = new AsyncStreamWrapper(stream, { scheduler: scheduler.schedule });
  return { stream, scheduler, wrapper };
}

function rejectionOf(result: PromiseSettledResult<unknown>): unknown {
  if (result.status !== "rejected") {
    throw new Error(`Expected a rejection, got ${JSON.stringify(result)}`);
  }
  return result.reason;
}

describe("AsyncStreamWrapper reads", () => {
  describe("read (strict)", () => {
    it("rejects the read that runs into EOF and reports the counts", async () => {
      const { scheduler, wrapper } = setupManual({ input: "HELLOWORLD" });
      const first = new Uint8Array(5);
      const second = new Uint8Array(10);

      const pending = [wrapper.read(first, 5, 5), wrapper.read(second, 10, 10)];
      scheduler.runAll();
      const [a, b] = await Promise.allSettled(pending);

      expect(a).toEqual({ status: "fulfilled", value: 5 });
      expect(decode(first)).toBe("HELLO");
      const error = rejectionOf(b);
      expect(error).toBeInstanceOf(PrematureEofError);
      expect(error).toMatchObject({ bytesRead: 5, bytesRequested: 10 });
      expect(decode(second.subarray(0, 5))).toBe("WORLD");
    });

    it("rejects with 0 bytes read on an empty stream", async () => {
      const { wrapper } = setup();

      const [result] = await Promise.allSettled([wrapper.read(new Uint8Array(4), 4)]);

      expect(rejectionOf(result)).toMatchObject({
        name: "PrematureEofError",
        bytesRead: 0,
        bytesRequested: 4,
      });
    });

    it("treats EndOfStreamError from the stream as end-of-input", async () => {
      const { stream, wrapper } = setup({ input: "abc", eof: "throw" });

      const [result] = await Promise.allSettled([wrapper.read(new Uint8Array(5), 5)]);

      expect(rejectionOf(result)).toMatchObject({ bytesRead: 3, bytesRequested: 5 });
      expect(stream.readCount).toBe(2);
    });

    it("moves on to the next request after a premature EOF", async () => {
      const { stream, scheduler, wrapper } = setupManual({ input: "abc" });

      const pending = [wrapper.read(new Uint8Array(4), 4), wrapper.tryRead(new Uint8Array(2), 2)];
      scheduler.runAll();
      const [strict, truncating] = await Promise.allSettled(pending);

      expect(rejectionOf(strict)).toBeInstanceOf(PrematureEofError);
      expect(truncating).toEqual({ status: "fulfilled", value: 0 });
      expect(stream.journal).toEqual([
        { op: "read", requested: 4, returned: 3 },
        { op: "read", requested: 1, returned: 0 },
        { op: "read", requested: 2, returned: 0 },
      ]);
    });

    it("does not mark the stream exhausted after a premature EOF", async () => {
      const { stream, wrapper } = setup({ input: "ab" });

      await Promise.allSettled([wrapper.read(new Uint8Array(3), 3)]);
      expect(wrapper.isEof).toBe(false);

      stream.appendInput("cd");
      const buffer = new Uint8Array(2);
      await expect(wrapper.read(buffer, 2)).resolves.toBe(2);
      expect(decode(buffer)).toBe("cd");
    });
  });

  describe("tryRead (truncating)", () => {
    it("resolves with the short count instead of rejecting", async () => {
      const { scheduler, wrapper } = setupManual({ input: "HELLOWORLD" });
      const first = new Uint8Array(5);
      const second = new Uint8Array(10);

      const pending = [wrapper.tryRead(first, 5, 5), wrapper.tryRead(second, 10, 10)];
      scheduler.runAll();

      expect(await Promise.all(pending)).toEqual([5, 5]);
      expect(decode(first)).toBe("HELLO");
      expect(decode(second.subarray(0, 5))).toBe("WORLD");
    });

    it("resolves with 0 on an empty stream", async () => {
      const { wrapper } = setup();

      await expect(wrapper.tryRead(new Uint8Array(8), 8)).resolves.toBe(0);
    });

    it("answers minBytes = 0 without touching the stream", async () => {
      const { stream, wrapper } = setup({ input: "abc" });

      await expect(wrapper.tryRead(new Uint8Array(4), 0, 4)).resolves.toBe(0);
      expect(stream.readCount).toBe(0);
    });
  });

  describe("partial reads", () => {
    it("keeps reading until minBytes, and may return up to maxBytes", async () => {
      const { stream, wrapper } = setup({ input: "abcdefghij", readChunkSize: 2 });
      const buffer = new Uint8Array(8);

      const count = await wrapper.read(buffer, 3, 8);

      expect(count).toBe(4);
      expect(decode(buffer.subarray(0, count))).toBe("abcd");
      expect(stream.journal).toEqual([
        { op: "read", requested: 8, returned: 2 },
        { op: "read", requested: 6, returned: 2 },
      ]);
    });

    it("takes everything available up to maxBytes in one sub-read", async () => {
      const { wrapper } = setup({ input: "HELLOWORLD" });
      const buffer = new Uint8Array(16);

      await expect(wrapper.read(buffer, 1, 16)).resolves.toBe(10);
      expect(decode(buffer.subarray(0, 10))).toBe("HELLOWORLD");
    });

    it("serves concurrent reads as disjoint chunks, in issue order", async () => {
      const content = randomContent(30);
      const { scheduler, wrapper } = setupManual({ input: content, readChunkSize: 4 });
      const buffers = [new Uint8Array(10), new Uint8Array(10), new Uint8Array(10)];
      const order: number[] = [];

      const reads = buffers.map((buffer, index) =>
        wrapper.read(buffer, 10).then((count) => {
          order.push(index);
          return count;
        }),
      );
      expect(scheduler.pending).toBe(1);
      scheduler.runAll();

      expect(await Promise.all(reads)).toEqual([10, 10, 10]);
      expect(order).toEqual([0, 1, 2]);
      expect(Array.from(concat(...buffers))).toEqual(Array.from(content));
    });
  });

  describe("streams that throw at end-of-input", () => {
    /** Serves `content` once, then throws a plain Error on every read. */
    function throwingAtEnd(content: string): BlockingStream {
      let served = false;
      return {
        writeBlocking: () => {},
        flushBlocking: () => {},
        readSome(target) {
          if (served) throw new Error("eof");
          served = true;
          const bytes = encode(content);
          target.set(bytes);
          return bytes.length;
        },
      };
    }

    it("resolves tryRead() with the bytes read so far", async () => {
      const wrapper = new AsyncStreamWrapper(throwingAtEnd("abc"));
      const buffer = new Uint8Array(5);

      await expect(wrapper.tryRead(buffer, 5)).resolves.toBe(3);
      expect(decode(buffer.subarray(0, 3))).toBe("abc");
      await expect(wrapper.tryRead(new Uint8Array(1), 1)).resolves.toBe(0);
      expect(wrapper.readError).toBeUndefined();
    });

    it("rejects read() with the counts instead of an I/O error", async () => {
      const wrapper = new AsyncStreamWrapper(throwingAtEnd("abc"));

      const [result] = await Promise.allSettled([wrapper.read(new Uint8Array(5), 5)]);

      expect(rejectionOf(result)).toBeInstanceOf(PrematureEofError);
      expect(rejectionOf(result)).toMatchObject({ bytesRead: 3, bytesRequested: 5 });
    });
  });

  describe("after markEof", () => {
    it("answers without queueing or touching the stream", async () => {
      const { stream, scheduler, wrapper } = setupManual({ input: "abc" });
      wrapper.markEof();

      const [strict] = await Promise.allSettled([wrapper.read(new Uint8Array(2), 2)]);
      const truncated = await wrapper.tryRead(new Uint8Array(2), 2);

      expect(rejectionOf(strict)).toBeInstanceOf(ReadAfterEofError);
      expect(rejectionOf(strict)).toMatchObject({ bytesRequested: 2 });
      expect(truncated).toBe(0);
      expect(scheduler.pending).toBe(0);
      expect(stream.journal).toEqual([]);
      expect(wrapper.isEof).toBe(true);
    });
  });

  describe("argument checks", () => {
    it.each([
      { capacity: 4, minBytes: 5, maxBytes: 5 },
      { capacity: 4, minBytes: 3, maxBytes: 2 },
      { capacity: 4, minBytes: -1, maxBytes: 2 },
      { capacity: 4, minBytes: 1, maxBytes: 5 },
      { capacity: 4, minBytes: 0.5, maxBytes: 2 },
    ])("rejects min=$minBytes max=$maxBytes for $capacity bytes", async ({ capacity, minBytes, maxBytes }) => {
      const { scheduler, wrapper } = setupManual({ input: "abcdef" });

      const [result] = await Promise.allSettled([
        wrapper.read(new Uint8Array(capacity), minBytes, maxBytes),
      ]);

      expect(rejectionOf(result)).toBeInstanceOf(InvalidReadRangeError);
      expect(scheduler.pending).toBe(0);
    });

    it("defaults maxBytes to minBytes", async () => {
      const { wrapper } = setup({ input: "abcdef" });
      const buffer = new Uint8Array(6);

      await expect(wrapper.read(buffer, 2)).resolves.toBe(2);
      expect(decode(buffer.subarray(0, 2))).toBe("ab");
    });
  });
});
