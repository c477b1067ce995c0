import { z } from 'zod';

import { WORKFLOW_IDS } from '../catalog';
import { ok } from '../result';
import { definePipeline } from '../runtime';

export const treasuryOperationSchema = z
  .object({
    operationId: z.string().min(1).optional(),
    operationType: z.string().optional(),
    amount: z.number().optional()
  })
  .passthrough();

export type TreasuryOperationInput = z.infer<typeof treasuryOperationSchema>;

interface TreasuryState {
  operationId: string | null;
}

// TODO: replace the placeholder step with signature-gated calls to the treasury collaborator once its operation contract is settled.
export const treasuryPipeline = definePipeline<TreasuryOperationInput, TreasuryState>({
  workflowId: WORKFLOW_IDS.treasury,
  inputKey: 'treasuryOperation',
  inputSchema: treasuryOperationSchema,
  createState: () => ({ operationId: null }),
  steps: [
    {
      name: 'record-operation',
      label: 'Record treasury operation',
      fatal: true,
      async run({ input, state, executionId }) {
        state.operationId = input.operationId ?? executionId;
        return ok({ results: { operationId: state.operationId }, message: 'Treasury workflow executed' });
      }
    }
  ],
  finalize: (input, state) => ({
    eventType: 'treasury_operation_completed',
    data: {
      operationId: state.operationId,
      operationType: input.operationType ?? null
    }
  })
});
