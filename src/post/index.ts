export {
  type AggregateOp,
  type AggregateSpec,
  type GroupAggregateOptions,
  groupAggregate,
} from "./group-by";
export { PostProcessor, type PostStep } from "./post-processor";
export { type SortKey, sortTable } from "./sort";
