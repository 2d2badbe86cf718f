/**
 * Simulated accelerator backend.
 *
 * Runs transfers and kernel invocations asynchronously on timers, with a
 * bounded number of DMA channels and compute units. Data lands when an
 * operation completes, so a consumer that starts early observes stale bytes.
 * Faults can be injected by label to exercise failure handling.
 */
import { setTimeout as delay } from "node:timers/promises";

import {
  CancelledError,
  DependencyFailedError,
  DependencyViolationError,
  DeviceAllocationError,
  InvocationError,
  PipelineConfigError,
  TransferError,
} from "../../engine/engine-errors";
import {
  awaitDependencies,
  type CompletionHandle,
  HandleStore,
} from "../../engine/handles";
import type { ScratchLease } from "../../table/scratch-pool";
import { TableView } from "../../table/view";
import type {
  Backend,
  ContextOptions,
  DeviceBuffer,
  DeviceContext,
  InvocationRequest,
  TransferRequest,
} from "../types";
import { type KernelFn, type KernelRegistry, referenceKernels } from "./kernels";
import { Lane } from "./lanes";

export * from "./kernels";
export { Lane } from "./lanes";

export type SimOperation = {
  kind: "transfer" | "invoke";
  label: string;
  bytes: number;
};

/** Latency in ms: a constant, or a function of the operation. */
export type SimLatency = number | ((op: SimOperation) => number);

export type SimFaults = {
  /** Labels of transfers that fail once started. */
  transfers?: string[];
  /** Labels of invocations that fail once started. */
  invocations?: string[];
};

export type SimContextOptions = ContextOptions & {
  latency?: SimLatency;
  dmaChannels?: number;
  computeUnits?: number;
  kernels?: Record<string, KernelFn>;
  faults?: SimFaults;
};

const DEFAULT_MAX_DEVICE_BYTES = 1024 * 1024 * 1024;

type ErrorFactory = (message: string, cause?: unknown) => Error;

const transferError: ErrorFactory = (message, cause) =>
  new TransferError(message, { cause });
const invocationError: ErrorFactory = (message, cause) =>
  new InvocationError(message, { cause });

class SimDeviceBuffer implements DeviceBuffer {
  private isReleased = false;

  constructor(
    readonly id: number,
    readonly byteSize: number,
    readonly alignment: number,
    readonly bytes: Uint8Array,
    private readonly onRelease: (buffer: SimDeviceBuffer) => void,
  ) {}

  get released(): boolean {
    return this.isReleased;
  }

  release(): void {
    if (this.isReleased) return;
    this.isReleased = true;
    this.onRelease(this);
  }
}

export class SimDeviceContext implements DeviceContext {
  readonly name = "sim";
  readonly handles: HandleStore;
  readonly dma: Lane;
  readonly compute: Lane;
  private readonly maxDeviceBytes: number;
  private readonly latency: SimLatency;
  private readonly kernels: KernelRegistry;
  private readonly faults: { transfers: Set<string>; invocations: Set<string> };
  private readonly buffers = new Map<number, SimDeviceBuffer>();
  private readonly inflight = new Set<Promise<void>>();
  private nextBufferId = 1;
  private usedBytes = 0;
  private destroyed = false;

  constructor(options: SimContextOptions = {}) {
    this.handles = options.handles ?? new HandleStore();
    this.maxDeviceBytes = options.maxDeviceBytes ?? DEFAULT_MAX_DEVICE_BYTES;
    this.latency = options.latency ?? 0;
    this.dma = new Lane("dma", options.dmaChannels ?? 1);
    this.compute = new Lane("compute", options.computeUnits ?? 1);
    this.kernels = referenceKernels();
    for (const [name, kernel] of Object.entries(options.kernels ?? {})) {
      this.kernels.set(name, kernel);
    }
    this.faults = {
      transfers: new Set(options.faults?.transfers ?? []),
      invocations: new Set(options.faults?.invocations ?? []),
    };
  }

  get allocatedBytes(): number {
    return this.usedBytes;
  }

  // ==========================================================================
  // Memory
  // ==========================================================================

  allocate(byteSize: number, alignment: number): DeviceBuffer {
    this.ensureAlive();
    if (!Number.isInteger(byteSize) || byteSize <= 0) {
      throw new DeviceAllocationError(
        `Device allocation size must be a positive integer, got ${byteSize}`,
      );
    }
    if (this.usedBytes + byteSize > this.maxDeviceBytes) {
      throw new DeviceAllocationError(
        `Device ${this.name} out of memory: ${byteSize} bytes requested, ${this.maxDeviceBytes - this.usedBytes} available`,
      );
    }
    const buffer = new SimDeviceBuffer(
      this.nextBufferId++,
      byteSize,
      alignment,
      new Uint8Array(byteSize),
      (released) => {
        this.usedBytes -= released.byteSize;
        this.buffers.delete(released.id);
      },
    );
    this.usedBytes += byteSize;
    this.buffers.set(buffer.id, buffer);
    return buffer;
  }

  /** Device-side bytes of a buffer, for inspection in tests and kernels. */
  read(buffer: DeviceBuffer): Uint8Array {
    return this.resolve(buffer).bytes;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  transfer(
    request: TransferRequest,
    waitFor: readonly CompletionHandle[],
    signal?: AbortSignal,
  ): CompletionHandle {
    this.ensureAlive();
    const pairs = request.items.map((item) => {
      const device = this.resolve(item.device);
      if (item.host.byteLength !== device.byteSize) {
        throw new PipelineConfigError(
          `${item.label}: host buffer is ${item.host.byteLength} bytes, device buffer is ${device.byteSize}`,
        );
      }
      return { host: item.host, device };
    });
    const bytes = pairs.reduce((sum, pair) => sum + pair.host.byteLength, 0);
    const handle = this.handles.create("transfer", request.label, waitFor);

    this.track(
      this.execute({
        handle,
        lane: this.dma,
        signal,
        latencyMs: this.latencyFor({ kind: "transfer", label: request.label, bytes }),
        faulty: this.faults.transfers.has(request.label),
        fail: transferError,
        work: () => {
          for (const pair of pairs) {
            if (request.direction === "host-to-device") {
              pair.device.bytes.set(pair.host);
            } else {
              pair.host.set(pair.device.bytes);
            }
          }
        },
      }),
    );
    return handle;
  }

  invoke(
    request: InvocationRequest,
    waitFor: readonly CompletionHandle[],
    signal?: AbortSignal,
  ): CompletionHandle {
    this.ensureAlive();
    const config = this.resolve(request.config);
    const inputs = request.inputs.map(
      (input) => new TableView(input.layout, this.resolve(input.buffer).bytes),
    );
    const output = new TableView(
      request.output.layout,
      this.resolve(request.output.buffer).bytes,
    );
    const kernel = this.kernels.get(request.kernel);
    const bytes = request.inputs.reduce(
      (sum, input) => sum + input.buffer.byteSize,
      0,
    );
    const handle = this.handles.create("invoke", request.label, waitFor);

    this.track(
      this.execute({
        handle,
        lane: this.compute,
        signal,
        latencyMs: this.latencyFor({ kind: "invoke", label: request.label, bytes }),
        faulty: this.faults.invocations.has(request.label),
        fail: invocationError,
        lease: () => request.scratch?.acquire(request.label) ?? null,
        work: () => {
          if (!kernel) {
            throw new InvocationError(`Unknown kernel ${request.kernel}`);
          }
          kernel({
            label: request.label,
            config: config.bytes,
            inputs,
            output,
            scratch: (request.scratch?.regions() ?? []).map(
              (region) => this.resolve(region).bytes,
            ),
          });
        },
      }),
    );
    return handle;
  }

  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  destroy(): void {
    this.destroyed = true;
    for (const buffer of Array.from(this.buffers.values())) {
      buffer.release();
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async execute(op: {
    handle: CompletionHandle;
    lane: Lane;
    signal: AbortSignal | undefined;
    latencyMs: number;
    faulty: boolean;
    fail: ErrorFactory;
    lease?: () => ScratchLease | null;
    work: () => void;
  }): Promise<void> {
    const { handle } = op;
    const failedDep = await awaitDependencies(handle.waitFor);
    if (failedDep) {
      handle.fail(
        new DependencyFailedError(
          `${handle.label} not started: upstream ${failedDep.describe()} failed`,
        ),
      );
      return;
    }

    const release = await op.lane.acquire();
    try {
      if (op.signal?.aborted || this.destroyed) {
        handle.fail(new CancelledError(`${handle.label} cancelled`));
        return;
      }
      handle.markStarted();
      let lease: ScratchLease | null = null;
      try {
        lease = op.lease?.() ?? null;
        if (op.faulty) {
          throw op.fail(`Injected fault in ${handle.label}`);
        }
        if (op.latencyMs > 0) {
          await delay(op.latencyMs);
        }
        op.work();
      } catch (error) {
        lease?.release();
        handle.fail(
          error instanceof TransferError ||
            error instanceof InvocationError ||
            error instanceof DependencyViolationError
            ? error
            : op.fail(
                `${handle.label}: ${error instanceof Error ? error.message : String(error)}`,
                error,
              ),
        );
        return;
      }
      lease?.release();
      handle.signal();
    } finally {
      release();
    }
  }

  private track(pending: Promise<void>): void {
    this.inflight.add(pending);
    void pending.finally(() => this.inflight.delete(pending));
  }

  private latencyFor(op: SimOperation): number {
    const value = typeof this.latency === "function" ? this.latency(op) : this.latency;
    return Math.max(0, value);
  }

  private resolve(buffer: DeviceBuffer): SimDeviceBuffer {
    const owned = this.buffers.get(buffer.id);
    if (!owned || owned !== buffer) {
      throw new PipelineConfigError(
        `Buffer #${buffer.id} is not a live allocation of device ${this.name}`,
      );
    }
    return owned;
  }

  private ensureAlive(): void {
    if (this.destroyed) {
      throw new PipelineConfigError(`Device ${this.name} has been destroyed`);
    }
  }
}

export function createSimContext(options: SimContextOptions = {}): SimDeviceContext {
  return new SimDeviceContext(options);
}

export const simBackend: Backend = {
  name: "sim",
  createContext: (options?: ContextOptions) => createSimContext(options),
};
