export * from "./engine";
export {
  createSimContext,
  encodeFilterConfig,
  encodeJoinConfig,
  type FilterConfig,
  type FilterOp,
  filterKernel,
  hashJoinKernel,
  type JoinConfig,
  type KernelFn,
  type KernelInvocation,
  type KernelRegistry,
  type Projection,
  referenceKernels,
  simBackend,
  type SimContextOptions,
  SimDeviceContext,
  type SimFaults,
  type SimLatency,
  type SimOperation,
} from "./backend/sim";
export {
  DEFAULT_CONFIG,
  getConfig,
  type LogLevel,
  resetConfig,
  resolveConfig,
  setConfig,
  type TableflowConfig,
  type TransferPolicy,
} from "./config";
export { createLogger, type Logger } from "./logger";
export * from "./post";
export * from "./table";
