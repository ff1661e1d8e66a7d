import assert from 'node:assert/strict';
import { test } from 'node:test';
import { waitForAction, waitForActions } from '../actions';
import type { ActionRetriever } from '../actions';
import { ActionFailedError, ActionPollTimeoutError, ServerUnavailableError, TransportError } from '../errors';
import type { Action, ActionStatus } from '../schemas/action';

function makeAction(id: number, status: ActionStatus, progress = status === 'running' ? 0 : 100): Action {
  return {
    id,
    command: 'start_server',
    status,
    progress,
    started: '2024-01-01T00:00:00+00:00',
    finished: status === 'running' ? null : '2024-01-01T00:00:05+00:00',
    resources: [{ id: 42, type: 'server' }],
    error: status === 'error' ? { code: 'action_failed', message: 'Action failed' } : null
  };
}

/** Answers each retrieve with the next snapshot, repeating the last one. */
function scriptedRetriever(snapshots: Action[]): ActionRetriever & { calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    async retrieve(actionId) {
      calls.push(actionId);
      return snapshots[Math.min(calls.length - 1, snapshots.length - 1)];
    }
  };
}

test('returns a finished action without polling', async () => {
  const retriever = scriptedRetriever([]);
  const done = makeAction(1, 'success');
  const result = await waitForAction(retriever, done);
  assert.equal(result, done);
  assert.equal(retriever.calls.length, 0);
});

test('polls until the action leaves running', async () => {
  const retriever = scriptedRetriever([makeAction(1, 'running', 50), makeAction(1, 'success')]);
  const seen: number[] = [];
  const result = await waitForAction(retriever, makeAction(1, 'running'), {
    intervalMs: 5,
    onProgress: (action) => seen.push(action.progress)
  });
  assert.equal(result.status, 'success');
  assert.deepEqual(retriever.calls, [1, 1]);
  assert.deepEqual(seen, [0, 50, 100]);
});

test('accepts an action id and retrieves it first', async () => {
  const retriever = scriptedRetriever([makeAction(9, 'success')]);
  const result = await waitForAction(retriever, 9, { intervalMs: 5 });
  assert.equal(result.id, 9);
  assert.deepEqual(retriever.calls, [9]);
});

test('returns failed actions unless asked to reject', async () => {
  const failed = makeAction(3, 'error');
  const result = await waitForAction(scriptedRetriever([failed]), 3, { intervalMs: 5 });
  assert.equal(result.status, 'error');

  await assert.rejects(waitForAction(scriptedRetriever([failed]), 3, { intervalMs: 5, rejectOnError: true }), (err) => {
    assert.ok(err instanceof ActionFailedError);
    assert.equal(err.action.id, 3);
    assert.equal(err.message, 'action 3 (start_server) failed with action_failed: Action failed');
    return true;
  });
});

test('gives up once the deadline passes', async () => {
  const retriever = scriptedRetriever([makeAction(4, 'running', 10)]);
  await assert.rejects(waitForAction(retriever, makeAction(4, 'running'), { intervalMs: 5, timeoutMs: 30 }), (err) => {
    assert.ok(err instanceof ActionPollTimeoutError);
    assert.equal(err.timeoutMs, 30);
    assert.equal(err.action.status, 'running');
    return true;
  });
  assert.ok(retriever.calls.length >= 1);
});

test('stops when the signal aborts', async () => {
  const controller = new AbortController();
  const retriever = scriptedRetriever([makeAction(5, 'running')]);
  setTimeout(() => controller.abort(), 10);
  await assert.rejects(
    waitForAction(retriever, makeAction(5, 'running'), { intervalMs: 1_000, signal: controller.signal }),
    (err) => {
      assert.ok(err instanceof TransportError);
      assert.equal(err.reason, 'aborted');
      assert.equal(err.path, '/actions/5');
      return true;
    }
  );
  assert.equal(retriever.calls.length, 0);
});

test('does not call out with an already aborted signal', async () => {
  const controller = new AbortController();
  controller.abort();
  const retriever = scriptedRetriever([makeAction(6, 'success')]);
  await assert.rejects(waitForAction(retriever, 6, { signal: controller.signal }), TransportError);
  assert.equal(retriever.calls.length, 0);
});

test('propagates retrieve errors unchanged', async () => {
  const failure = new ServerUnavailableError('service unavailable', { statusCode: 503, method: 'GET', path: '/actions/7' });
  const retriever: ActionRetriever = {
    async retrieve() {
      throw failure;
    }
  };
  await assert.rejects(waitForAction(retriever, 7, { intervalMs: 5 }), (err) => err === failure);
});

test('waits for several actions in order', async () => {
  const retriever: ActionRetriever = {
    async retrieve(actionId) {
      return makeAction(actionId, 'success');
    }
  };
  const results = await waitForActions(retriever, [makeAction(10, 'running'), 11, makeAction(12, 'success')], {
    intervalMs: 5
  });
  assert.deepEqual(
    results.map((action) => [action.id, action.status]),
    [
      [10, 'success'],
      [11, 'success'],
      [12, 'success']
    ]
  );
});

test('a failed wait cancels the other waits', async () => {
  const polls = new Map<number, number>();
  const retriever: ActionRetriever = {
    async retrieve(actionId) {
      polls.set(actionId, (polls.get(actionId) ?? 0) + 1);
      return makeAction(actionId, actionId === 1 ? 'error' : 'running');
    }
  };

  await assert.rejects(waitForActions(retriever, [1, 2], { intervalMs: 10, rejectOnError: true }), ActionFailedError);
  const pollsAtFailure = polls.get(2);
  assert.equal(pollsAtFailure, 1);

  await new Promise((resolve) => setTimeout(resolve, 100));
  assert.equal(polls.get(2), pollsAtFailure);
});

test('the caller signal aborts every wait', async () => {
  const controller = new AbortController();
  const retriever = scriptedRetriever([makeAction(20, 'running')]);
  setTimeout(() => controller.abort(), 10);
  await assert.rejects(
    waitForActions(retriever, [makeAction(20, 'running'), makeAction(21, 'running')], {
      intervalMs: 1_000,
      signal: controller.signal
    }),
    (err) => {
      assert.ok(err instanceof TransportError);
      assert.equal(err.reason, 'aborted');
      return true;
    }
  );
  assert.equal(retriever.calls.length, 0);
});
