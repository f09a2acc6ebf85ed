export {
  ResponseAggregator,
  NO_ACTION_MESSAGE,
  type CommandResponse,
  type CommandStatus,
  type CommandOutcome,
} from './response-aggregator.js';
export {
  CommandPipeline,
  createCommandPipeline,
  type CommandRequest,
  type PipelineEvent,
  type PipelineOptions,
  type PipelineResponse,
  type TraceStep,
} from './command-pipeline.js';
