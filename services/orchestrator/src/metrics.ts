import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface OrchestratorMetrics {
  register: Registry;
  workflowExecutions: Counter<'workflow' | 'status'>;
  workflowDuration: Histogram<'workflow' | 'status'>;
  downstreamCalls: Counter<'service' | 'outcome'>;
  eventsPublished: Counter<'event' | 'outcome'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): OrchestratorMetrics => {
  const register = new Registry();

  const workflowExecutions = new Counter({
    name: 'orchestrator_workflow_executions_total',
    help: 'Workflow executions by terminal status',
    registers: [register],
    labelNames: ['workflow', 'status'] as const
  });

  const workflowDuration = new Histogram({
    name: 'orchestrator_workflow_duration_seconds',
    help: 'Wall-clock duration of workflow executions',
    registers: [register],
    labelNames: ['workflow', 'status'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30]
  });

  const downstreamCalls = new Counter({
    name: 'orchestrator_downstream_calls_total',
    help: 'Calls made to downstream collaborators by outcome',
    registers: [register],
    labelNames: ['service', 'outcome'] as const
  });

  const eventsPublished = new Counter({
    name: 'orchestrator_events_published_total',
    help: 'Workflow lifecycle events handed to the event publisher',
    registers: [register],
    labelNames: ['event', 'outcome'] as const
  });

  const readinessGauge = new Gauge({
    name: 'orchestrator_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    workflowExecutions,
    workflowDuration,
    downstreamCalls,
    eventsPublished,
    readinessGauge
  };
};
