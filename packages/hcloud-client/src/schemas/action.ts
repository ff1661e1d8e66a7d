import { z } from 'zod';

export const ACTION_STATUSES = ['running', 'success', 'error'] as const;

export type ActionStatus = (typeof ACTION_STATUSES)[number];

export const actionSchema = z
  .object({
    id: z.number().int(),
    command: z.string(),
    status: z.enum(ACTION_STATUSES),
    progress: z.number().min(0).max(100),
    started: z.string(),
    finished: z.string().nullable(),
    resources: z.array(z.object({ id: z.number().int(), type: z.string() }).passthrough()),
    error: z.object({ code: z.string(), message: z.string() }).nullable()
  })
  .passthrough();

export type Action = z.infer<typeof actionSchema>;

export const actionEnvelopeSchema = z.object({ action: actionSchema });

export const actionListEnvelopeSchema = z.object({ actions: z.array(actionSchema) });

export function isTerminal(action: Pick<Action, 'status'>): boolean {
  return action.status !== 'running';
}
