export {
  createContext,
  getBackend,
  listBackends,
  registerBackend,
} from "../backend/registry";
export type {
  Backend,
  BoundTable,
  ContextOptions,
  DeviceBuffer,
  DeviceContext,
  InvocationRequest,
  TransferDirection,
  TransferItem,
  TransferRequest,
} from "../backend/types";
export * from "./engine-errors";
export {
  awaitDependencies,
  barrier,
  type Clock,
  CompletionHandle,
  defaultClock,
  type HandleId,
  type HandleKind,
  type HandleOutcome,
  type HandleState,
  HandleStore,
} from "./handles";
export {
  type OrchestratorOptions,
  PipelineOrchestrator,
  type PipelineResult,
} from "./orchestrator";
export {
  buildPipelinePlan,
  type HostNode,
  type HostStepDecl,
  type HostStepFn,
  type PipelineDecl,
  type PipelinePlan,
  type PlanNode,
  type PlanNodeSummary,
  type ProgramStep,
  SCRATCH_RESOURCE,
  type StageDecl,
  type StageNode,
  summarizePlan,
  type TransferNode,
  transitiveReduction,
} from "./planner";
export {
  buildProfile,
  formatProfile,
  isProfilingEnabled,
  type PipelineProfile,
  type ProfileEntry,
} from "./profiler";
export { type StageBinding, StageExecutor, type StageState } from "./stage-executor";
export { type TraceEvent, type TraceEventInput, TraceRecorder } from "./trace";
export { TransferScheduler } from "./transfer-scheduler";
