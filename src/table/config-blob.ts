import { PipelineConfigError } from "../engine/engine-errors";
import { BufferPair } from "./buffer-pair";

export const DEFAULT_CONFIG_BYTES = 64;

/**
 * Opaque, fixed-size parameter payload for one stage's kernel invocation.
 * Identified by the stage index it configures.
 */
export class ConfigBlob extends BufferPair {
  constructor(
    readonly stage: number,
    private readonly size: number = DEFAULT_CONFIG_BYTES,
  ) {
    super();
    if (!Number.isInteger(size) || size <= 0 || size % 4 !== 0) {
      throw new PipelineConfigError(
        `config[${stage}]: size must be a positive multiple of 4, got ${size}`,
      );
    }
  }

  get label(): string {
    return `config[${this.stage}]`;
  }

  get byteSize(): number {
    return this.size;
  }

  get wordCount(): number {
    return this.size / 4;
  }

  write(bytes: Uint8Array, offset = 0): void {
    const host = this.hostBytes();
    if (offset < 0 || offset + bytes.byteLength > host.byteLength) {
      throw new PipelineConfigError(
        `${this.label}: ${bytes.byteLength} bytes at offset ${offset} overflow ${host.byteLength}`,
      );
    }
    host.set(bytes, offset);
  }

  setWord(index: number, value: number): void {
    this.words().setUint32(this.wordOffset(index), value >>> 0, true);
  }

  getWord(index: number): number {
    return this.words().getUint32(this.wordOffset(index), true);
  }

  setWords(values: readonly number[], start = 0): void {
    values.forEach((value, i) => this.setWord(start + i, value));
  }

  private words(): DataView {
    const host = this.hostBytes();
    return new DataView(host.buffer, host.byteOffset, host.byteLength);
  }

  private wordOffset(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.wordCount) {
      throw new PipelineConfigError(
        `${this.label}: word ${index} outside [0, ${this.wordCount})`,
      );
    }
    return index * 4;
  }
}
