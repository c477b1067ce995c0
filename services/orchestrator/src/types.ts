import type { CollaboratorSet } from './clients';
import type { OrchestratorConfig } from './config';
import type { OrchestratorMetrics } from './metrics';
import type { WorkflowCatalog } from './workflow/catalog';
import type { ExecutionStore } from './workflow/executionStore';
import type { WorkflowExecutor } from './workflow/executor';
import type { ExecutionStatusReporter } from './workflow/statusReporter';
import type { EventTriggerService } from './workflow/triggers';
import type { WorkflowEventPublisher } from './workflow/workflowEvents';

export interface ReadinessState {
  store: boolean;
  events: boolean;
}

export interface AppContext {
  config: OrchestratorConfig;
  metrics: OrchestratorMetrics;
  readiness: ReadinessState;
  catalog: WorkflowCatalog;
  store: ExecutionStore;
  collaborators: CollaboratorSet;
  events: WorkflowEventPublisher;
  executor: WorkflowExecutor;
  statusReporter: ExecutionStatusReporter;
  triggers: EventTriggerService;
}
