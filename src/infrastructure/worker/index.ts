export { IngestionLoop } from './ingestion-loop.js';
export type {
  IngestionState,
  IngestionOutcome,
  IngestionStatus,
  IngestionStatusSource,
  IngestionDeps,
  SubscriptionFactory,
} from './ingestion-loop.js';
export { superviseIngestion } from './supervisor.js';
export type { FailurePolicy, SupervisorOptions } from './supervisor.js';
