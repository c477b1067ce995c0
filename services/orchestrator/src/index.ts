export { createApp, type AppDependencies } from './app';
export { loadConfig, type OrchestratorConfig, type CollaboratorName } from './config';
export { createCollaborators, ServiceClient, ServiceClientError } from './clients';
export type { Collaborators, CollaboratorSet } from './clients';
export { ExecutionNotFoundError, WorkflowInfrastructureError, WorkflowValidationError } from './errors';
export { WorkflowCatalog, WORKFLOW_IDS, DEFAULT_WORKFLOW_DEFINITIONS } from './workflow/catalog';
export { MemoryExecutionStore, RedisExecutionStore, type ExecutionStore } from './workflow/executionStore';
export { WorkflowExecutor, type ExecuteRequest, type ExecutionResult } from './workflow/executor';
export { createPipelineRegistry, DEFAULT_PIPELINES } from './workflow/pipelines';
export { definePipeline, PipelineRegistry, type PipelineDefinition, type PipelineStep } from './workflow/runtime';
export { ExecutionStatusReporter, computeProgress } from './workflow/statusReporter';
export { EventTriggerService, mapEventToWorkflow } from './workflow/triggers';
export type { WorkflowDefinition, WorkflowExecutionContext } from './workflow/types';
