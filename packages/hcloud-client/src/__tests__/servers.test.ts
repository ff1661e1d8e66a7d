import assert from 'node:assert/strict';
import { after, before, beforeEach, test } from 'node:test';
import { HcloudApiError, NotFoundError, ValidationError } from '../errors';
import { HcloudClient } from '../hcloudClient';
import { FakeHcloudApi, TEST_TOKEN } from './support/fakeApi';

const api = new FakeHcloudApi();
let client: HcloudClient;

before(async () => {
  const baseUrl = await api.start();
  client = new HcloudClient({ token: TEST_TOKEN, baseUrl });
});

after(async () => {
  await api.stop();
});

beforeEach(() => {
  api.reset();
});

test('creates a server and returns its actions and root password', async () => {
  const result = await client.servers.create({
    name: 'web-1',
    serverType: 'cx22',
    image: 'ubuntu-24.04',
    labels: { env: 'test' }
  });

  assert.equal(result.server.id, 1);
  assert.equal(result.server.name, 'web-1');
  assert.equal(result.server.status, 'initializing');
  assert.deepEqual(result.server.labels, { env: 'test' });
  assert.equal(result.action.command, 'create_server');
  assert.equal(result.action.status, 'running');
  assert.deepEqual(
    result.nextActions.map((action) => action.command),
    ['start_server']
  );
  assert.equal(result.rootPassword, 'test-root-password');

  const [recorded] = api.requestsTo('POST', '/servers');
  assert.deepEqual(recorded.body, { name: 'web-1', server_type: 'cx22', image: 'ubuntu-24.04', labels: { env: 'test' } });
});

test('maps nested create options to the wire format', async () => {
  const result = await client.servers.create({
    name: 'db-1',
    serverType: 'cx32',
    image: 'debian-12',
    sshKeys: ['deploy'],
    firewalls: [7],
    startAfterCreate: false,
    publicNet: { enableIpv4: true, enableIpv6: false }
  });
  assert.equal(result.rootPassword, null);
  assert.deepEqual(result.nextActions, []);

  const [recorded] = api.requestsTo('POST', '/servers');
  assert.deepEqual(recorded.body, {
    name: 'db-1',
    server_type: 'cx32',
    image: 'debian-12',
    ssh_keys: ['deploy'],
    start_after_create: false,
    firewalls: [{ firewall: 7 }],
    public_net: { enable_ipv4: true, enable_ipv6: false }
  });
});

test('missing required fields surface as a validation error', async () => {
  await assert.rejects(client.servers.create({ name: '', serverType: 'cx22', image: 'ubuntu-24.04' }), (err) => {
    assert.ok(err instanceof ValidationError);
    assert.equal(err.statusCode, 422);
    assert.equal(err.code, 'invalid_input');
    assert.deepEqual(err.fields, [{ name: 'name', messages: ['Missing data for required field.'] }]);
    return true;
  });
});

test('a duplicate name is a plain API error', async () => {
  api.seedServer('web-1');
  await assert.rejects(client.servers.create({ name: 'web-1', serverType: 'cx22', image: 'ubuntu-24.04' }), (err) => {
    assert.ok(err instanceof HcloudApiError);
    assert.ok(!(err instanceof ValidationError));
    assert.equal(err.statusCode, 409);
    assert.equal(err.code, 'uniqueness_error');
    return true;
  });
});

test('retrieves, updates and deletes a server', async () => {
  const seeded = api.seedServer('web-1', { env: 'test' });
  const id = Number(seeded.id);

  const server = await client.servers.retrieve(id);
  assert.equal(server.name, 'web-1');
  assert.equal(server.public_net?.ipv4?.ip, `203.0.113.${id}`);

  const updated = await client.servers.update(id, { labels: { env: 'prod' } });
  assert.deepEqual(updated.labels, { env: 'prod' });
  assert.equal(updated.name, 'web-1');
  assert.deepEqual(api.requestsTo('PUT', `/servers/${id}`)[0].body, { labels: { env: 'prod' } });

  const action = await client.servers.delete(id);
  assert.equal(action.command, 'delete_server');
  assert.deepEqual(action.resources, [{ id, type: 'server' }]);

  await assert.rejects(client.servers.retrieve(id), (err) => {
    assert.ok(err instanceof NotFoundError);
    assert.equal(err.path, `/servers/${id}`);
    assert.equal(err.method, 'GET');
    return true;
  });
});

test('unknown fields in responses are preserved', async () => {
  api.respondOnce({
    status: 200,
    body: {
      server: {
        id: 5,
        name: 'web-5',
        status: 'running',
        created: '2024-01-01T00:00:00+00:00',
        server_type: { id: 1, name: 'cx22' },
        labels: {},
        future_field: 'kept'
      }
    }
  });
  const server = await client.servers.retrieve(5);
  assert.equal(server.future_field, 'kept');
});

test('runs server commands', async () => {
  const id = Number(api.seedServer('web-1').id);

  const powerOff = await client.servers.actions().powerOff(id);
  assert.equal(powerOff.command, 'poweroff');
  assert.equal((await client.servers.retrieve(id)).status, 'off');
  const [recorded] = api.requestsTo('POST', `/servers/${id}/actions/poweroff`);
  assert.equal(recorded.body, undefined);

  const powerOn = await client.servers.actions().powerOn(id);
  assert.equal(powerOn.command, 'start_server');

  const rebuild = await client.servers.actions().rebuild(id, { image: 'ubuntu-24.04' });
  assert.equal(rebuild.action.command, 'rebuild');
  assert.equal(rebuild.rootPassword, 'test-root-password');

  await client.servers.actions().changeType(id, { serverType: 'cx32', upgradeDisk: true });
  assert.deepEqual(api.requestsTo('POST', `/servers/${id}/actions/change_type`)[0].body, {
    server_type: 'cx32',
    upgrade_disk: true
  });

  await client.servers.actions().changeDnsPtr(id, { ip: '203.0.113.1', dnsPtr: null });
  assert.deepEqual(api.requestsTo('POST', `/servers/${id}/actions/change_dns_ptr`)[0].body, {
    ip: '203.0.113.1',
    dns_ptr: null
  });
});

test('commands on a missing server are not found', async () => {
  await assert.rejects(client.servers.actions().reboot(404), NotFoundError);
});

test('lists the actions of one server and filters global actions', async () => {
  const { server } = await client.servers.create({ name: 'web-1', serverType: 'cx22', image: 'ubuntu-24.04' });
  await client.volumes.create({ name: 'data', size: 10 });

  const forServer = await client.servers.actions().listFor(server.id);
  assert.deepEqual(
    forServer.items.map((action) => action.command),
    ['create_server', 'start_server']
  );

  const running = await client.actions.list({ status: 'running', sort: 'id:asc' });
  assert.equal(running.items.length, 3);
  const [recorded] = api.requestsTo('GET', '/actions');
  assert.deepEqual(recorded.query.getAll('status'), ['running']);
  assert.deepEqual(recorded.query.getAll('sort'), ['id:asc']);

  const byId = await client.actions.list({ id: [forServer.items[0].id] });
  assert.deepEqual(
    byId.items.map((action) => action.command),
    ['create_server']
  );
});

test('waits for a server action through the global actions endpoint', async () => {
  api.actionPolls = 2;
  const { action } = await client.servers.create({ name: 'web-1', serverType: 'cx22', image: 'ubuntu-24.04' });
  const progress: number[] = [];

  const finished = await client.waitForAction(action, { intervalMs: 10, onProgress: (entry) => progress.push(entry.progress) });

  assert.equal(finished.status, 'success');
  assert.equal(finished.progress, 100);
  assert.deepEqual(progress, [0, 50, 100]);
  assert.equal(api.requestsTo('GET', `/actions/${action.id}`).length, 2);
});

test('resource scoped action clients also serve as retrievers', async () => {
  const { action } = await client.servers.create({ name: 'web-1', serverType: 'cx22', image: 'ubuntu-24.04' });
  const retrieved = await client.servers.actions().retrieve(action.id);
  assert.equal(retrieved.status, 'success');
  assert.equal(api.requestsTo('GET', `/servers/actions/${action.id}`).length, 1);
});

test('failed actions can reject', async () => {
  api.actionOutcome = 'error';
  const { action } = await client.servers.create({ name: 'web-1', serverType: 'cx22', image: 'ubuntu-24.04' });
  await assert.rejects(client.waitForAction(action, { intervalMs: 10, rejectOnError: true }), {
    name: 'ActionFailedError',
    message: `action ${action.id} (create_server) failed with action_failed: Action failed`
  });
});

test('waits for several actions', async () => {
  const { action, nextActions } = await client.servers.create({ name: 'web-1', serverType: 'cx22', image: 'ubuntu-24.04' });
  const finished = await client.waitForActions([action, ...nextActions], { intervalMs: 10 });
  assert.deepEqual(
    finished.map((entry) => [entry.command, entry.status]),
    [
      ['create_server', 'success'],
      ['start_server', 'success']
    ]
  );
});
