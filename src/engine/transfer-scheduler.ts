import type { DeviceContext, TransferDirection } from "../backend/types";
import type { Transferable } from "../table/buffer-pair";
import { PipelineConfigError, TableSealedError } from "./engine-errors";
import type { CompletionHandle } from "./handles";

function defaultLabel(direction: TransferDirection, items: readonly Transferable[]): string {
  const arrow = direction === "host-to-device" ? "h2d" : "d2h";
  return `${arrow}(${items.map((item) => item.label).join(",")})`;
}

/**
 * Batches tables and config blobs into single asynchronous transfers.
 *
 * Either pass the batch to `enqueue` directly, or accumulate it with `add`
 * and flush it with `hostToDevice` / `deviceToHost`.
 */
export class TransferScheduler {
  private pending: Transferable[] = [];

  constructor(
    private readonly context: DeviceContext,
    private readonly signal?: AbortSignal,
  ) {}

  add(item: Transferable): this {
    this.pending.push(item);
    return this;
  }

  hostToDevice(waitFor: readonly CompletionHandle[] = [], label?: string): CompletionHandle {
    return this.flush("host-to-device", waitFor, label);
  }

  deviceToHost(waitFor: readonly CompletionHandle[] = [], label?: string): CompletionHandle {
    return this.flush("device-to-host", waitFor, label);
  }

  /**
   * Issue one transfer carrying every item. It starts once all of `waitFor`
   * have signaled; the returned handle signals when every item has landed.
   */
  enqueue(
    items: readonly Transferable[],
    direction: TransferDirection,
    waitFor: readonly CompletionHandle[] = [],
    label: string = defaultLabel(direction, items),
  ): CompletionHandle {
    if (items.length === 0) {
      throw new PipelineConfigError(`Transfer ${label} has no items`);
    }
    const seen = new Set<Transferable>();
    for (const item of items) {
      if (seen.has(item)) {
        throw new PipelineConfigError(`Transfer ${label} lists ${item.label} twice`);
      }
      seen.add(item);
      if (direction === "device-to-host" && item.sealed) {
        throw new TableSealedError(`${item.label} is sealed; cannot read back into it`);
      }
    }

    return this.context.transfer(
      {
        label,
        direction,
        items: items.map((item) => ({
          label: item.label,
          host: item.hostBytes(),
          device: item.deviceBuffer(),
        })),
      },
      waitFor,
      this.signal,
    );
  }

  private flush(
    direction: TransferDirection,
    waitFor: readonly CompletionHandle[],
    label: string | undefined,
  ): CompletionHandle {
    const items = this.pending;
    this.pending = [];
    return this.enqueue(items, direction, waitFor, label);
  }
}
