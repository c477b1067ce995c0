import { WORKFLOW_IDS } from './catalog';
import type { ExecuteRequest, ExecutionResult } from './executor';

/** Closed table of inbound event types that start a workflow. */
export const EVENT_WORKFLOW_MAP: Readonly<Record<string, string>> = Object.freeze({
  payment_requested: WORKFLOW_IDS.payment,
  user_registration: WORKFLOW_IDS.onboarding,
  treasury_operation_requested: WORKFLOW_IDS.treasury
});

export function mapEventToWorkflow(eventType: string): string | null {
  return Object.prototype.hasOwnProperty.call(EVENT_WORKFLOW_MAP, eventType) ? EVENT_WORKFLOW_MAP[eventType] : null;
}

export interface EventTriggerRequest {
  eventType: string;
  source: string;
  eventData: Record<string, unknown>;
  headers?: Record<string, string>;
  correlationId?: string;
}

export interface EventTriggerResponse {
  triggerResult: 'TRIGGERED' | 'IGNORED';
  triggeredWorkflows: string[];
  message: string;
  processedAt: string;
}

export interface WorkflowRunner {
  execute(request: ExecuteRequest, signal?: AbortSignal): Promise<ExecutionResult>;
}

export class EventTriggerService {
  constructor(
    private readonly runner: WorkflowRunner,
    private readonly now: () => Date = () => new Date()
  ) {}

  async handle(request: EventTriggerRequest, signal?: AbortSignal): Promise<EventTriggerResponse> {
    const workflowId = mapEventToWorkflow(request.eventType);
    if (!workflowId) {
      return {
        triggerResult: 'IGNORED',
        triggeredWorkflows: [],
        message: `No workflow mapped for event type: ${request.eventType}`,
        processedAt: this.now().toISOString()
      };
    }

    const context: Record<string, string> = { ...(request.headers ?? {}) };
    if (request.correlationId) {
      context.correlationId = request.correlationId;
    }

    const result = await this.runner.execute(
      {
        workflowId,
        inputs: request.eventData,
        triggeredBy: request.source,
        context,
        correlationId: request.correlationId
      },
      signal
    );

    return {
      triggerResult: 'TRIGGERED',
      triggeredWorkflows: [result.executionId],
      message: `Triggered ${workflowId} (${result.status})`,
      processedAt: this.now().toISOString()
    };
  }
}
