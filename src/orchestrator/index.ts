// pattern: Functional Core

export { createOrchestrator, type Orchestrator, type OrchestratorDeps, type RunOptions } from './orchestrator.ts';
export { createEventSequencer, type EventSequencer } from './events.ts';
export {
  ChatRequestSchema,
  OrchestratorError,
  type ChatRequest,
  type ChatRequestInput,
  type ChatResult,
  type ErrorKind,
  type Stage,
  type StreamEvent,
  type StreamEventBody,
  type TokenUsage,
} from './types.ts';
