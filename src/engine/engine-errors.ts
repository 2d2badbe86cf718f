// ============================================================================
// Construction-time errors
// ============================================================================

export class AllocationError extends Error {
  name = "AllocationError";
}

export class OutOfMemoryError extends AllocationError {
  name = "OutOfMemoryError";
}

export class DeviceAllocationError extends AllocationError {
  name = "DeviceAllocationError";
}

export class IOError extends Error {
  name = "IOError";
}

export class TableLayoutError extends Error {
  name = "TableLayoutError";
}

export class TableSealedError extends Error {
  name = "TableSealedError";
}

export class ScratchStateError extends Error {
  name = "ScratchStateError";
}

export class ConfigError extends Error {
  name = "ConfigError";
}

export class PipelineConfigError extends Error {
  name = "PipelineConfigError";
}

// ============================================================================
// Asynchronous operation errors
// ============================================================================

export class TransferError extends Error {
  name = "TransferError";
}

export class InvocationError extends Error {
  name = "InvocationError";
}

/** An upstream handle in `waitFor` failed, so the operation never started. */
export class DependencyFailedError extends Error {
  name = "DependencyFailedError";
}

/** The run was aborted before the operation started. */
export class CancelledError extends Error {
  name = "CancelledError";
}

export class DependencyViolationError extends Error {
  name = "DependencyViolationError";
}

export class ScratchConflictError extends DependencyViolationError {
  name = "ScratchConflictError";
}

// ============================================================================
// State errors
// ============================================================================

export class HandleStateError extends Error {
  name = "HandleStateError";
}

export class StageStateError extends Error {
  name = "StageStateError";
}

export class PipelineBusyError extends Error {
  name = "PipelineBusyError";
}

export class PipelineStateError extends Error {
  name = "PipelineStateError";
}

/**
 * The single pipeline-level failure surfaced by `run()`. `node` names the
 * operation whose failure aborted the chain; the original error is `cause`.
 */
export class PipelineError extends Error {
  name = "PipelineError";
  readonly node: string;

  constructor(node: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Pipeline failed at ${node}: ${detail}`, { cause });
    this.node = node;
  }
}
