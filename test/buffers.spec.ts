import { describe, expect, it } from "vitest";
import {
  ConfigBlob,
  createSimContext,
  PipelineConfigError,
  ScratchBufferPool,
  ScratchConflictError,
  ScratchStateError,
} from "../src";

describe("ConfigBlob", () => {
  it("is identified by its stage and stores little-endian words", () => {
    const blob = new ConfigBlob(3, 16);
    blob.allocateHost();
    blob.setWords([1, 0x01020304]);
    blob.setWord(3, -1);

    expect(blob.label).toBe("config[3]");
    expect(blob.wordCount).toBe(4);
    expect(Array.from(blob.hostBytes().subarray(0, 8))).toEqual([1, 0, 0, 0, 4, 3, 2, 1]);
    expect(blob.getWord(3)).toBe(0xffffffff);
  });

  it("rejects out-of-range writes and odd sizes", () => {
    const blob = new ConfigBlob(0, 8);
    blob.allocateHost();

    expect(() => blob.setWord(2, 1)).toThrow("config[0]: word 2 outside [0, 2)");
    expect(() => blob.write(new Uint8Array(4), 6)).toThrow(PipelineConfigError);
    expect(() => new ConfigBlob(1, 6)).toThrow(PipelineConfigError);
  });
});

describe("ScratchBufferPool", () => {
  it("allocates its regions once", () => {
    const context = createSimContext();
    const pool = new ScratchBufferPool([64, 32]);
    pool.init(context);

    expect(pool.regions().map((region) => region.byteSize)).toEqual([64, 32]);
    expect(pool.totalBytes).toBe(96);
    expect(context.allocatedBytes).toBe(96);
    expect(() => pool.init(context)).toThrow(ScratchStateError);
  });

  it("grants one lease at a time and traces it", () => {
    const context = createSimContext();
    const pool = new ScratchBufferPool([16]);
    pool.init(context);

    const lease = pool.acquire("stage0");
    expect(pool.holder).toBe("stage0");
    expect(() => pool.acquire("stage1")).toThrow(ScratchConflictError);
    lease.release();
    expect(() => lease.release()).toThrow(ScratchStateError);
    pool.acquire("stage1").release();

    expect(pool.leaseCount).toBe(2);
    expect(context.handles.trace.snapshot()).toEqual([
      { type: "scratch_acquire", seq: 1, owner: "stage0" },
      { type: "scratch_release", seq: 2, owner: "stage0" },
      { type: "scratch_acquire", seq: 3, owner: "stage1" },
      { type: "scratch_release", seq: 4, owner: "stage1" },
    ]);
  });

  it("needs init before use and valid region sizes", () => {
    expect(() => new ScratchBufferPool([])).toThrow(ScratchStateError);
    expect(() => new ScratchBufferPool([0])).toThrow(ScratchStateError);
    expect(() => new ScratchBufferPool([8]).acquire("s")).toThrow(
      "Scratch pool is not initialized",
    );
  });
});
