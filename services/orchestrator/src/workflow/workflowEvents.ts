import type { WorkflowEventInput } from '@orchestra/event-bus';
import type { FastifyBaseLogger } from 'fastify';

import type { OrchestratorMetrics } from '../metrics';

export interface WorkflowEventPublisherOptions {
  publish: (event: WorkflowEventInput) => Promise<unknown>;
  logger: FastifyBaseLogger;
  metrics?: OrchestratorMetrics;
}

/**
 * Fire-and-forget emission of workflow lifecycle events. Publishing never blocks or
 * fails the workflow that raised the event; failures are counted and logged.
 */
export class WorkflowEventPublisher {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly options: WorkflowEventPublisherOptions) {}

  publish(
    workflowId: string,
    executionId: string,
    eventType: string,
    data: Record<string, unknown> = {},
    correlationId?: string
  ): void {
    const task = this.options
      .publish({ eventType, workflowId, executionId, data, correlationId })
      .then(
        () => {
          this.options.metrics?.eventsPublished.inc({ event: eventType, outcome: 'published' });
        },
        (error: unknown) => {
          this.options.metrics?.eventsPublished.inc({ event: eventType, outcome: 'failed' });
          this.options.logger.error({ err: error, eventType, workflowId, executionId }, 'Failed to publish workflow event');
        }
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /** Resolves once every publish started so far has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
