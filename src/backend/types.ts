import type { CompletionHandle, HandleStore } from "../engine/handles";
import type { TableLayout } from "../table/layout";
import type { ScratchBufferPool } from "../table/scratch-pool";

export type TransferDirection = "host-to-device" | "device-to-host";

/** A device-resident allocation. Contents are only reachable through the device. */
export type DeviceBuffer = {
  readonly id: number;
  readonly byteSize: number;
  readonly alignment: number;
  readonly released: boolean;
  release(): void;
};

export type TransferItem = {
  label: string;
  host: Uint8Array;
  device: DeviceBuffer;
};

export type TransferRequest = {
  label: string;
  direction: TransferDirection;
  items: TransferItem[];
};

/** A table bound to an invocation: its device buffer plus the layout to read it. */
export type BoundTable = {
  label: string;
  buffer: DeviceBuffer;
  layout: TableLayout;
};

export type InvocationRequest = {
  label: string;
  kernel: string;
  config: DeviceBuffer;
  inputs: BoundTable[];
  output: BoundTable;
  scratch: ScratchBufferPool | null;
};

/**
 * The device/transport capability the pipeline core consumes. Every operation
 * is issued immediately and returns a one-shot handle; the device must not
 * start it before every handle in `waitFor` has signaled, and must not start
 * it at all once `signal` is aborted.
 */
export interface DeviceContext {
  readonly name: string;
  readonly handles: HandleStore;
  allocate(byteSize: number, alignment: number): DeviceBuffer;
  transfer(
    request: TransferRequest,
    waitFor: readonly CompletionHandle[],
    signal?: AbortSignal,
  ): CompletionHandle;
  invoke(
    request: InvocationRequest,
    waitFor: readonly CompletionHandle[],
    signal?: AbortSignal,
  ): CompletionHandle;
  /** Resolves once every operation issued so far has settled. */
  idle(): Promise<void>;
  destroy(): void;
}

export type ContextOptions = {
  handles?: HandleStore;
  maxDeviceBytes?: number;
};

export type Backend = {
  name: string;
  createContext(options?: ContextOptions): DeviceContext;
};
