import type { DeviceContext } from "../backend/types";
import type { ConfigBlob } from "../table/config-blob";
import type { ScratchBufferPool } from "../table/scratch-pool";
import type { Table } from "../table/table";
import { PipelineConfigError, StageStateError } from "./engine-errors";
import type { CompletionHandle } from "./handles";

export type StageState =
  | "unconfigured"
  | "bound"
  | "queued"
  | "running"
  | "completed"
  | "failed";

export type StageBinding = {
  inputs: readonly Table[];
  output: Table;
  config: ConfigBlob;
  scratch: ScratchBufferPool | null;
};

/**
 * Binds one accelerator invocation to its buffers and issues it. Pure
 * binder/invoker: it never looks at buffer contents. Single-shot; build a new
 * executor to run the same kernel again.
 */
export class StageExecutor {
  private binding: StageBinding | null = null;
  private issued: CompletionHandle | null = null;

  constructor(
    private readonly context: DeviceContext,
    readonly kernel: string,
    readonly label: string,
  ) {}

  get state(): StageState {
    if (!this.binding) return "unconfigured";
    const handle = this.issued;
    if (!handle) return "bound";
    switch (handle.status) {
      case "signaled":
        return "completed";
      case "failed":
        return "failed";
      default:
        return handle.startedAt === null ? "queued" : "running";
    }
  }

  get handle(): CompletionHandle | null {
    return this.issued;
  }

  get bound(): StageBinding | null {
    return this.binding;
  }

  setup(
    inputs: readonly Table[],
    output: Table,
    config: ConfigBlob,
    scratch: ScratchBufferPool | null = null,
  ): this {
    if (this.binding) {
      throw new StageStateError(`Stage ${this.label} is already bound`);
    }
    if (inputs.length === 0) {
      throw new PipelineConfigError(`Stage ${this.label} needs at least one input`);
    }
    if (inputs.includes(output)) {
      throw new PipelineConfigError(
        `Stage ${this.label} reads and writes ${output.name}`,
      );
    }
    // Resolve eagerly so a missing allocation fails here, not mid-run.
    for (const item of [...inputs, output, config]) {
      item.deviceBuffer();
    }
    if (scratch && !scratch.initialized) {
      throw new PipelineConfigError(
        `Stage ${this.label}: scratch pool is not initialized`,
      );
    }
    this.binding = { inputs: inputs.slice(), output, config, scratch };
    return this;
  }

  run(waitFor: readonly CompletionHandle[] = [], signal?: AbortSignal): CompletionHandle {
    const binding = this.binding;
    if (!binding) {
      throw new StageStateError(`Stage ${this.label} must be set up before run`);
    }
    if (this.issued) {
      throw new StageStateError(
        `Stage ${this.label} already ran; set up a new executor to run it again`,
      );
    }
    this.issued = this.context.invoke(
      {
        label: this.label,
        kernel: this.kernel,
        config: binding.config.deviceBuffer(),
        inputs: binding.inputs.map((table) => ({
          label: table.name,
          buffer: table.deviceBuffer(),
          layout: table.layout,
        })),
        output: {
          label: binding.output.name,
          buffer: binding.output.deviceBuffer(),
          layout: binding.output.layout,
        },
        scratch: binding.scratch,
      },
      waitFor,
      signal,
    );
    return this.issued;
  }
}
