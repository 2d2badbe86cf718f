import type { DeviceBuffer, DeviceContext } from "../backend/types";
import { getConfig, isPowerOfTwo } from "../config";
import {
  DeviceAllocationError,
  OutOfMemoryError,
  PipelineConfigError,
} from "../engine/engine-errors";

/** Anything the transfer scheduler can move between host and device. */
export interface Transferable {
  readonly label: string;
  readonly byteSize: number;
  readonly sealed: boolean;
  hostBytes(): Uint8Array;
  deviceBuffer(): DeviceBuffer;
}

/**
 * A host buffer and a device buffer of the same fixed size. Subclasses decide
 * the size; once a buffer is allocated it is never resized.
 */
export abstract class BufferPair implements Transferable {
  private host: Uint8Array | null = null;
  private device: DeviceBuffer | null = null;

  abstract get label(): string;
  abstract get byteSize(): number;

  get sealed(): boolean {
    return false;
  }

  /** Alignment requested for the device buffer when none is given. */
  get deviceAlignment(): number {
    return getConfig().alignment;
  }

  get hasHost(): boolean {
    return this.host !== null;
  }

  get hasDevice(): boolean {
    return this.device !== null && !this.device.released;
  }

  allocateHost(limitBytes: number = getConfig().maxHostBytes): void {
    if (this.host) {
      throw new PipelineConfigError(`${this.label}: host buffer already allocated`);
    }
    const size = this.byteSize;
    if (size > limitBytes) {
      throw new OutOfMemoryError(
        `${this.label}: host buffer of ${size} bytes exceeds limit of ${limitBytes} bytes`,
      );
    }
    try {
      this.host = new Uint8Array(size);
    } catch (error) {
      throw new OutOfMemoryError(
        `${this.label}: cannot allocate ${size} host bytes`,
        { cause: error },
      );
    }
  }

  allocateDevice(context: DeviceContext, alignment: number = this.deviceAlignment): void {
    if (this.hasDevice) {
      throw new PipelineConfigError(`${this.label}: device buffer already allocated`);
    }
    if (!isPowerOfTwo(alignment)) {
      throw new DeviceAllocationError(
        `${this.label}: alignment must be a power of two, got ${alignment}`,
      );
    }
    try {
      this.device = context.allocate(this.byteSize, alignment);
    } catch (error) {
      if (error instanceof DeviceAllocationError) throw error;
      throw new DeviceAllocationError(
        `${this.label}: device ${context.name} rejected ${this.byteSize} bytes`,
        { cause: error },
      );
    }
  }

  hostBytes(): Uint8Array {
    if (!this.host) {
      throw new PipelineConfigError(`${this.label}: host buffer not allocated`);
    }
    return this.host;
  }

  deviceBuffer(): DeviceBuffer {
    if (!this.device || this.device.released) {
      throw new PipelineConfigError(`${this.label}: device buffer not allocated`);
    }
    return this.device;
  }

  release(): void {
    this.device?.release();
    this.device = null;
    this.host = null;
  }
}
