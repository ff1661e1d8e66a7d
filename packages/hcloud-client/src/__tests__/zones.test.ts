import assert from 'node:assert/strict';
import { after, before, beforeEach, test } from 'node:test';
import { NotFoundError, ValidationError } from '../errors';
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

test('creates a zone and looks it up by id or name', async () => {
  const { zone, action } = await client.zones.create({ name: 'example.com', mode: 'primary', ttl: 7200, labels: { team: 'dns' } });
  assert.equal(zone.name, 'example.com');
  assert.equal(zone.ttl, 7200);
  assert.equal(action.command, 'create_zone');
  assert.deepEqual(api.requestsTo('POST', '/zones')[0].body, {
    name: 'example.com',
    mode: 'primary',
    ttl: 7200,
    labels: { team: 'dns' }
  });

  assert.equal((await client.zones.retrieve(zone.id)).name, 'example.com');
  assert.equal((await client.zones.retrieve('example.com')).id, zone.id);
});

test('secondary zones send their primary nameservers in wire format', async () => {
  await client.zones.create({
    name: 'example.org',
    mode: 'secondary',
    primaryNameservers: [{ address: '198.51.100.53', port: 53, tsigAlgorithm: 'hmac-sha256', tsigKey: 'test-secret' }]
  });
  assert.deepEqual(api.requestsTo('POST', '/zones')[0].body, {
    name: 'example.org',
    mode: 'secondary',
    primary_nameservers: [{ address: '198.51.100.53', port: 53, tsig_algorithm: 'hmac-sha256', tsig_key: 'test-secret' }]
  });
});

test('a TTL below the API minimum is rejected by the API', async () => {
  await assert.rejects(client.zones.create({ name: 'example.com', mode: 'primary', ttl: 30 }), (err) => {
    assert.ok(err instanceof ValidationError);
    assert.equal(err.statusCode, 422);
    assert.deepEqual(err.fields, [{ name: 'ttl', messages: ['must be greater than or equal to 60'] }]);
    return true;
  });
  assert.equal(api.requests.length, 1);
});

test('changes the zone TTL and labels', async () => {
  const zoneId = Number(api.seedZone('example.com').id);
  const action = await client.zones.actions().changeTtl(zoneId, 600);
  assert.equal(action.command, 'change_ttl');
  assert.equal((await client.zones.retrieve(zoneId)).ttl, 600);

  const updated = await client.zones.update(zoneId, { labels: { owner: 'ops' } });
  assert.deepEqual(updated.labels, { owner: 'ops' });
});

test('filters zones by mode', async () => {
  api.seedZone('example.com');
  await client.zones.create({ name: 'example.net', mode: 'secondary', primaryNameservers: [{ address: '198.51.100.53' }] });
  const page = await client.zones.list({ mode: 'secondary' });
  assert.deepEqual(
    page.items.map((zone) => zone.name),
    ['example.net']
  );
});

test('manages RRSets by name and type', async () => {
  const zoneId = Number(api.seedZone('example.com').id);
  const rrsets = client.zones.rrsets(zoneId);

  const created = await rrsets.create({ name: 'www', type: 'A', ttl: 300, records: [{ value: '203.0.113.10' }] });
  assert.equal(created.rrset.id, 'www/A');
  assert.equal(created.rrset.zone, zoneId);
  assert.equal(created.action.command, 'create_rrset');

  await rrsets.actions().addRecords('www', 'A', [{ value: '203.0.113.11', comment: 'second web node' }]);
  let current = await rrsets.retrieve('www', 'A');
  assert.deepEqual(
    current.records.map((record) => record.value),
    ['203.0.113.10', '203.0.113.11']
  );

  await rrsets.actions().removeRecords('www', 'A', [{ value: '203.0.113.10' }]);
  current = await rrsets.retrieve('www', 'A');
  assert.deepEqual(current.records, [{ value: '203.0.113.11', comment: 'second web node' }]);

  await rrsets.actions().setRecords('www', 'A', [{ value: '203.0.113.20' }]);
  await rrsets.actions().changeTtl('www', 'A', null);
  current = await rrsets.retrieve('www', 'A');
  assert.deepEqual(current.records, [{ value: '203.0.113.20' }]);
  assert.equal(current.ttl, null);

  assert.deepEqual(
    api.requests.filter((entry) => entry.method === 'POST').map((entry) => entry.path),
    [
      `/zones/${zoneId}/rrsets`,
      `/zones/${zoneId}/rrsets/www/A/actions/add_records`,
      `/zones/${zoneId}/rrsets/www/A/actions/remove_records`,
      `/zones/${zoneId}/rrsets/www/A/actions/set_records`,
      `/zones/${zoneId}/rrsets/www/A/actions/change_ttl`
    ]
  );
});

test('encodes the zone apex name', async () => {
  const zoneId = Number(api.seedZone('example.com').id);
  const rrsets = client.zones.rrsets(zoneId);
  await rrsets.create({ name: '@', type: 'TXT', records: [{ value: '"v=spf1 -all"' }] });
  const apex = await rrsets.retrieve('@', 'TXT');
  assert.equal(apex.ttl, null);
  assert.equal(api.requestsTo('GET', `/zones/${zoneId}/rrsets/%40/TXT`).length, 1);
});

test('lists RRSets filtered by type', async () => {
  const zoneId = Number(api.seedZone('example.com').id);
  const rrsets = client.zones.rrsets(zoneId);
  await rrsets.create({ name: 'www', type: 'A', records: [{ value: '203.0.113.10' }] });
  await rrsets.create({ name: 'www', type: 'AAAA', records: [{ value: '2001:db8::10' }] });
  await rrsets.create({ name: 'mail', type: 'MX', records: [{ value: '10 mail.example.com.' }] });

  const page = await rrsets.list({ type: ['A', 'AAAA'] });
  assert.deepEqual(
    page.items.map((rrset) => rrset.id),
    ['www/A', 'www/AAAA']
  );
  assert.equal(page.pagination?.total_entries, 2);
  const listed = api.requestsTo('GET', `/zones/${zoneId}/rrsets`)[0];
  assert.deepEqual(listed.query.getAll('type'), ['A', 'AAAA']);

  await assert.rejects(rrsets.list({ perPage: 500 }), ValidationError);
});

test('exports the zone file', async () => {
  const zoneId = Number(api.seedZone('example.com').id);
  const rrsets = client.zones.rrsets(zoneId);
  await rrsets.create({ name: 'www', type: 'A', ttl: 300, records: [{ value: '203.0.113.10' }] });
  await rrsets.create({ name: '@', type: 'TXT', records: [{ value: '"v=spf1 -all"' }] });

  const zonefile = await client.zones.exportZonefile(zoneId);
  assert.equal(
    zonefile,
    ['$ORIGIN example.com.', '$TTL 3600', 'www 300 IN A 203.0.113.10', '@ 3600 IN TXT "v=spf1 -all"', ''].join('\n')
  );
});

test('deleting an RRSet and a zone returns actions', async () => {
  const zoneId = Number(api.seedZone('example.com').id);
  const rrsets = client.zones.rrsets(zoneId);
  await rrsets.create({ name: 'www', type: 'A', records: [{ value: '203.0.113.10' }] });

  const removed = await rrsets.delete('www', 'A');
  assert.equal(removed.command, 'delete_rrset');
  await assert.rejects(rrsets.retrieve('www', 'A'), NotFoundError);

  const deleted = await client.zones.delete(zoneId);
  assert.equal(deleted.command, 'delete_zone');
  const finished = await client.zones.actions().retrieve(deleted.id);
  assert.equal(finished.status, 'success');
  assert.equal(api.requestsTo('GET', `/zones/actions/${deleted.id}`).length, 1);
  await assert.rejects(client.zones.retrieve(zoneId), NotFoundError);
});

test('RRSet actions are read through the zone actions endpoint', async () => {
  const zoneId = Number(api.seedZone('example.com').id);
  const rrsets = client.zones.rrsets(zoneId);
  const { action } = await rrsets.create({ name: 'www', type: 'A', records: [{ value: '203.0.113.10' }] });
  const finished = await client.waitForAction(action, { intervalMs: 10 });
  assert.equal(finished.status, 'success');
  const viaRRSets = await rrsets.actions().retrieve(action.id);
  assert.equal(viaRRSets.id, action.id);
  assert.equal(api.requestsTo('GET', `/zones/actions/${action.id}`).length, 1);
});
