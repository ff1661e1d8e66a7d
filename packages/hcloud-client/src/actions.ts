import { setTimeout as delay } from 'node:timers/promises';
import { ActionFailedError, ActionPollTimeoutError, TransportError } from './errors';
import { isTerminal } from './schemas/action';
import type { Action } from './schemas/action';
import type { RequestOptions } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_POLL_TIMEOUT_MS = 10 * 60_000;

/** Anything that can re-read an action by id: the global actions client or a resource's actions(). */
export interface ActionRetriever {
  retrieve(actionId: number, options?: RequestOptions): Promise<Action>;
}

export interface WaitForActionOptions {
  intervalMs?: number;
  /** Deadline for the whole wait, measured from the first call. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Throw `ActionFailedError` when the action ends in `error` instead of returning it. */
  rejectOnError?: boolean;
  onProgress?: (action: Action) => void;
}

function abortedError(actionId: number): TransportError {
  return new TransportError(`waiting for action ${actionId} was aborted`, {
    reason: 'aborted',
    method: 'GET',
    path: `/actions/${actionId}`
  });
}

function settle(action: Action, rejectOnError: boolean): Action {
  if (rejectOnError && action.status === 'error') {
    throw new ActionFailedError(action);
  }
  return action;
}

/**
 * Re-reads an action until it leaves `running`. Each poll is one ordinary
 * API call; its errors propagate unchanged. The returned action is terminal.
 */
export async function waitForAction(
  retriever: ActionRetriever,
  actionOrId: Action | number,
  options: WaitForActionOptions = {}
): Promise<Action> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const rejectOnError = options.rejectOnError ?? false;
  const { signal, onProgress } = options;
  const actionId = typeof actionOrId === 'number' ? actionOrId : actionOrId.id;

  if (typeof actionOrId !== 'number') {
    onProgress?.(actionOrId);
    if (isTerminal(actionOrId)) {
      return settle(actionOrId, rejectOnError);
    }
  }

  const deadline = Date.now() + timeoutMs;
  let current: Action | null = typeof actionOrId === 'number' ? null : actionOrId;

  for (;;) {
    if (current !== null) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ActionPollTimeoutError(current, timeoutMs);
      }
      try {
        await delay(Math.min(intervalMs, remaining), undefined, { signal });
      } catch (err) {
        if (signal?.aborted) {
          throw abortedError(actionId);
        }
        throw err;
      }
    }
    if (signal?.aborted) {
      throw abortedError(actionId);
    }

    current = await retriever.retrieve(actionId, { signal });
    onProgress?.(current);
    if (isTerminal(current)) {
      return settle(current, rejectOnError);
    }
  }
}

/**
 * Waits for several actions concurrently; they share one deadline since every
 * wait starts together. The first failure cancels the remaining waits.
 */
export async function waitForActions(
  retriever: ActionRetriever,
  actions: readonly (Action | number)[],
  options: WaitForActionOptions = {}
): Promise<Action[]> {
  const controller = new AbortController();
  const external = options.signal;
  const forwardAbort = () => controller.abort(external?.reason);
  if (external?.aborted) {
    controller.abort(external.reason);
  } else {
    external?.addEventListener('abort', forwardAbort, { once: true });
  }

  try {
    return await Promise.all(
      actions.map((action) => waitForAction(retriever, action, { ...options, signal: controller.signal }))
    );
  } catch (err) {
    controller.abort();
    throw err;
  } finally {
    external?.removeEventListener('abort', forwardAbort);
  }
}
