import type { DeviceBuffer, DeviceContext } from "../backend/types";
import { getConfig } from "../config";
import {
  ScratchConflictError,
  ScratchStateError,
} from "../engine/engine-errors";
import type { TraceRecorder } from "../engine/trace";

/**
 * Proof of exclusive write access to the scratch pool. Released exactly once.
 */
export class ScratchLease {
  private active = true;

  constructor(
    private readonly pool: ScratchBufferPool,
    readonly owner: string,
  ) {}

  get held(): boolean {
    return this.active;
  }

  release(): void {
    if (!this.active) {
      throw new ScratchStateError(`Scratch lease of ${this.owner} already released`);
    }
    this.active = false;
    this.pool.onRelease(this);
  }
}

/**
 * Device working memory shared by every stage of a run. Allocated once by
 * `init`, then handed out to one writer at a time through leases.
 */
export class ScratchBufferPool {
  private buffers: DeviceBuffer[] | null = null;
  private lease: ScratchLease | null = null;
  private trace: TraceRecorder | null = null;
  private acquisitions = 0;

  constructor(readonly regionSizes: readonly number[]) {
    if (regionSizes.length === 0) {
      throw new ScratchStateError("Scratch pool needs at least one region");
    }
    for (const size of regionSizes) {
      if (!Number.isInteger(size) || size <= 0) {
        throw new ScratchStateError(
          `Scratch region size must be a positive integer, got ${size}`,
        );
      }
    }
  }

  get initialized(): boolean {
    return this.buffers !== null;
  }

  get holder(): string | null {
    return this.lease?.owner ?? null;
  }

  /** Number of leases granted so far. */
  get leaseCount(): number {
    return this.acquisitions;
  }

  get totalBytes(): number {
    return this.regionSizes.reduce((sum, size) => sum + size, 0);
  }

  init(context: DeviceContext, alignment: number = getConfig().alignment): void {
    if (this.buffers) {
      throw new ScratchStateError("Scratch pool is already initialized");
    }
    this.buffers = this.regionSizes.map((size) =>
      context.allocate(size, alignment),
    );
    this.trace = context.handles.trace;
  }

  regions(): readonly DeviceBuffer[] {
    if (!this.buffers) {
      throw new ScratchStateError("Scratch pool is not initialized");
    }
    return this.buffers;
  }

  acquire(owner: string): ScratchLease {
    this.regions();
    if (this.lease) {
      throw new ScratchConflictError(
        `${owner} tried to write the scratch pool while ${this.lease.owner} holds it`,
      );
    }
    this.lease = new ScratchLease(this, owner);
    this.acquisitions++;
    this.trace?.record({ type: "scratch_acquire", owner });
    return this.lease;
  }

  release(): void {
    for (const buffer of this.buffers ?? []) {
      buffer.release();
    }
    this.buffers = null;
    this.lease = null;
  }

  /** @internal */
  onRelease(lease: ScratchLease): void {
    if (this.lease !== lease) return;
    this.lease = null;
    this.trace?.record({ type: "scratch_release", owner: lease.owner });
  }
}
