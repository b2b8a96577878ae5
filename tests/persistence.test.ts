import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

import type { DispositionSnapshot } from '../src/disposition/types';
import type { PersistenceGateway } from '../src/persistence/types';
import type { Queryable } from '../src/persistence/pgGateway';

const AT = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

class FakeDb implements Queryable {
  public queries: Array<{ text: string; values: unknown[] }> = [];
  public fail: Error | null = null;
  public rows: unknown[] = [];

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    this.queries.push({ text, values });
    if (this.fail) {
      throw this.fail;
    }
    return { rows: this.rows };
  }
}

function snapshot(overrides: Partial<DispositionSnapshot> = {}): DispositionSnapshot {
  return {
    disposition: 'ACCEPTABLE_PROMISE_TO_PAY',
    connectionStatus: 'CONNECTED',
    history: [{ timestamp: '2024-01-02T03:04:45.000Z', disposition: 'ACCEPTABLE_PROMISE_TO_PAY' }],
    transcript: [{ speaker: 'customer', text: 'I promise to pay on friday', timestamp: '2024-01-02T03:04:45.000Z' }],
    callDurationSeconds: 40.4,
    ...overrides,
  };
}

test('dispositions map to interaction outcomes', async () => {
  const { outcomeForDisposition } = await import('../src/persistence/outcome');

  assert.equal(outcomeForDisposition('USER_CLAIMED_PAYMENT'), 'PAYMENT_MADE');
  assert.equal(outcomeForDisposition('AGREE_TO_PAY'), 'PAYMENT_PROMISED');
  assert.equal(outcomeForDisposition('RAISE_DISPUTE_WITH_DETAIL'), 'DISPUTE_CLAIM');
  assert.equal(outcomeForDisposition('CUSTOMER_HANGUP'), 'HUNG_UP');
  assert.equal(outcomeForDisposition('FAILED'), 'INVALID_NUMBER');
  assert.equal(outcomeForDisposition(null), 'WILL_CALL_BACK');
});

test('completion flags follow the disposition label', async () => {
  const { completionFlags } = await import('../src/persistence/outcome');

  assert.deepEqual(completionFlags('ACCEPTABLE_PROMISE_TO_PAY'), {
    paymentDiscussed: true,
    disputeRaised: false,
    followUpRequired: true,
  });
  assert.deepEqual(completionFlags('RAISE_DISPUTE_WITH_DETAIL'), {
    paymentDiscussed: false,
    disputeRaised: true,
    followUpRequired: false,
  });
  assert.deepEqual(completionFlags('USER_BUSY_NOW'), {
    paymentDiscussed: false,
    disputeRaised: false,
    followUpRequired: true,
  });
  assert.deepEqual(completionFlags(null), {
    paymentDiscussed: false,
    disputeRaised: false,
    followUpRequired: false,
  });
});

test('completion and failure notes are line oriented', async () => {
  const { completionNotes, failureNotes } = await import('../src/persistence/outcome');

  assert.equal(
    completionNotes(snapshot(), 40, AT),
    [
      'DISPOSITION: Acceptable Promise To Pay',
      'CONNECTION_STATUS: CONNECTED',
      'CALL_DURATION: 40 seconds',
      'DISPOSITION_TIME: 2024-01-02T03:04:05.000Z',
    ].join('\n'),
  );
  assert.equal(
    failureNotes('Busy', null, AT),
    ['DISPOSITION: Busy', 'CONNECTION_STATUS: NOT_CONNECTED', 'SIP_STATUS: Unknown', 'FAILED_AT: 2024-01-02T03:04:05.000Z'].join('\n'),
  );
});

test('completed calls update the interaction row', async () => {
  const { PgPersistenceGateway } = await import('../src/persistence/pgGateway');
  const db = new FakeDb();
  const gateway = new PgPersistenceGateway(db, () => AT);
  const current = snapshot();

  await gateway.recordCallCompleted('call-1', current, current.transcript, current.callDurationSeconds, 'https://storage.test/a.mp4');

  assert.equal(db.queries.length, 1);
  const { values } = db.queries[0];
  assert.equal(values[0], 'call-1');
  assert.equal(values[1], 'PAYMENT_PROMISED');
  assert.equal(values[2], 40);
  assert.equal(values[3], JSON.stringify(current.transcript));
  assert.equal(values[4], 'https://storage.test/a.mp4');
  assert.deepEqual(values.slice(7), [true, false, true]);
  assert.deepEqual(JSON.parse(String(values[6])), {
    completed_at: '2024-01-02T03:04:05.000Z',
    final_disposition: 'Acceptable Promise To Pay',
    connection_status: 'CONNECTED',
    disposition_history: current.history,
    duration_seconds: 40,
  });
});

test('failed calls map the label to an outcome', async () => {
  const { PgPersistenceGateway } = await import('../src/persistence/pgGateway');
  const db = new FakeDb();
  const gateway = new PgPersistenceGateway(db, () => AT);

  await gateway.recordCallFailed('call-1', 'Busy', '486 Busy Here');
  await gateway.recordCallFailed('call-2', 'No Answer', null);
  await gateway.recordCallFailed('call-3', 'Failed', 'shutdown');

  assert.deepEqual(
    db.queries.map((query) => [query.values[0], query.values[1]]),
    [
      ['call-1', 'BUSY'],
      ['call-2', 'NO_ANSWER'],
      ['call-3', 'INVALID_NUMBER'],
    ],
  );
  assert.deepEqual(JSON.parse(String(db.queries[0].values[3])), {
    failed_at: '2024-01-02T03:04:05.000Z',
    failure_reason: 'Busy',
    sip_status: '486 Busy Here',
  });
});

test('recording rows store lower case status', async () => {
  const { PgRecordingStore } = await import('../src/persistence/pgGateway');
  const db = new FakeDb();
  const store = new PgRecordingStore(db);

  await store.insert({
    egressId: 'EG_1',
    roomName: 'room-1',
    callId: 'call-1',
    status: 'RECORDING',
    startedAt: AT,
    completedAt: null,
    filePath: null,
    fileUrl: null,
    fileSize: null,
    durationSeconds: null,
    format: 'mp4',
  });

  assert.deepEqual(db.queries[0].values, ['call-1', 'EG_1', 'room-1', 'recording', AT, 'mp4']);
});

test('recording rows are read back for a call', async () => {
  const { PgRecordingStore } = await import('../src/persistence/pgGateway');
  const db = new FakeDb();
  const store = new PgRecordingStore(db);

  assert.equal(await store.findByCallId('call-1'), null);

  db.rows = [
    {
      call_id: 'call-1',
      egress_id: 'EG_1',
      room_name: 'room-1',
      status: 'completed',
      started_at: AT,
      completed_at: AT,
      file_path: '/recordings/2024/01/02/call-1_EG_1.mp4',
      file_url: null,
      file_size: '2048',
      duration_seconds: 12.5,
      format: 'mp4',
    },
  ];

  assert.deepEqual(await store.findByCallId('call-1'), {
    egressId: 'EG_1',
    roomName: 'room-1',
    callId: 'call-1',
    status: 'COMPLETED',
    startedAt: AT,
    completedAt: AT,
    filePath: '/recordings/2024/01/02/call-1_EG_1.mp4',
    fileUrl: null,
    fileSize: 2048,
    durationSeconds: 12.5,
    format: 'mp4',
  });
  assert.deepEqual(db.queries[1].values, ['call-1']);
});

test('best effort persistence swallows write failures', async () => {
  const { BestEffortPersistence, BestEffortRecordingStore } = await import('../src/persistence/bestEffort');
  const { PgPersistenceGateway, PgRecordingStore } = await import('../src/persistence/pgGateway');
  const db = new FakeDb();
  db.fail = new Error('connection refused');
  const gateway: PersistenceGateway = new BestEffortPersistence(new PgPersistenceGateway(db, () => AT));
  const store = new BestEffortRecordingStore(new PgRecordingStore(db));

  await gateway.recordCallStarted('call-1', 'room-1', '+15550100');
  await gateway.recordCallConnected('call-1');
  await gateway.recordCallFailed('call-1', 'Failed', null);
  await store.update({
    egressId: 'EG_1',
    roomName: 'room-1',
    callId: 'call-1',
    status: 'FAILED',
    startedAt: AT,
    completedAt: AT,
    filePath: null,
    fileUrl: null,
    fileSize: null,
    durationSeconds: null,
    format: 'mp4',
  });

  assert.equal(await store.findByCallId('call-1'), null);
  assert.equal(db.queries.length, 5);
});

test('schema is applied from the sql file', async () => {
  const { ensureSchema } = await import('../src/persistence/pgGateway');
  const db = new FakeDb();

  await ensureSchema(db);

  assert.equal(db.queries.length, 1);
  assert.match(db.queries[0].text, /CREATE TABLE IF NOT EXISTS call_recordings/);
});
