import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

function fakeClock(startMs: number) {
  let nowMs = startMs;
  return {
    now: () => nowMs,
    advance: (ms: number) => {
      nowMs += ms;
    },
  };
}

async function createTracker(clock: ReturnType<typeof fakeClock>) {
  const { loadDispositionRules } = await import('../src/disposition/rules');
  const { DispositionTracker } = await import('../src/disposition/tracker');
  return new DispositionTracker({ rules: loadDispositionRules(), now: clock.now });
}

test('tracker classifies using time since creation', async () => {
  const clock = fakeClock(Date.UTC(2024, 0, 2, 3, 4, 5));
  const tracker = await createTracker(clock);

  tracker.setConnectionStatus(true);
  clock.advance(40_000);
  tracker.addTranscriptItem('customer', 'I already paid it yesterday');

  assert.equal(tracker.updateDisposition(), 'USER_CLAIMED_PAYMENT_WITH_DATE');

  const snapshot = tracker.getFinalDisposition();
  assert.equal(snapshot.disposition, 'USER_CLAIMED_PAYMENT_WITH_DATE');
  assert.equal(snapshot.connectionStatus, 'CONNECTED');
  assert.equal(snapshot.callDurationSeconds, 40);
  assert.deepEqual(snapshot.transcript, [
    { speaker: 'customer', text: 'I already paid it yesterday', timestamp: '2024-01-02T03:04:45.000Z' },
  ]);
  assert.deepEqual(snapshot.history, [
    { timestamp: '2024-01-02T03:04:45.000Z', disposition: 'USER_CLAIMED_PAYMENT_WITH_DATE' },
  ]);
  assert.equal(tracker.getConnectedAt()?.toISOString(), '2024-01-02T03:04:05.000Z');
});

test('every update is appended to history, repeats included', async () => {
  const clock = fakeClock(0);
  const tracker = await createTracker(clock);
  tracker.setConnectionStatus(true);
  clock.advance(30_000);

  tracker.addTranscriptItem('customer', 'hello there');
  tracker.updateDisposition();
  tracker.updateDisposition();
  tracker.updateDisposition('DO_NOT_CALL');

  assert.deepEqual(
    tracker.getFinalDisposition().history.map((event) => event.disposition),
    ['PAYMENT_DUE_REMINDER', 'PAYMENT_DUE_REMINDER', 'DO_NOT_CALL'],
  );
});

test('dial failures record a not connected disposition', async () => {
  const clock = fakeClock(0);
  const tracker = await createTracker(clock);

  tracker.setConnectionStatus(false);
  assert.equal(tracker.updateDisposition('BUSY'), 'BUSY');
  assert.equal(tracker.getConnectedAt(), undefined);

  const snapshot = tracker.getFinalDisposition();
  assert.equal(snapshot.connectionStatus, 'NOT_CONNECTED');
  assert.equal(snapshot.disposition, 'BUSY');
});

test('connection status can only be set once', async () => {
  const { DispositionContractError } = await import('../src/disposition/tracker');
  const tracker = await createTracker(fakeClock(0));

  tracker.setConnectionStatus(true);
  assert.throws(() => tracker.setConnectionStatus(false), DispositionContractError);
  assert.equal(tracker.getConnectionStatus(), 'CONNECTED');
});

test('forcing a disposition that contradicts the connection status throws', async () => {
  const { DispositionContractError } = await import('../src/disposition/tracker');
  const tracker = await createTracker(fakeClock(0));

  tracker.setConnectionStatus(true);
  assert.throws(() => tracker.updateDisposition('NO_ANSWER'), DispositionContractError);
  assert.equal(tracker.getCurrentDisposition(), null);
  assert.deepEqual(tracker.getFinalDisposition().history, []);
});

test('a connected-only disposition blocks a later not connected status', async () => {
  const { DispositionContractError } = await import('../src/disposition/tracker');
  const tracker = await createTracker(fakeClock(0));

  tracker.updateDisposition('DO_NOT_CALL');
  assert.throws(() => tracker.setConnectionStatus(false), DispositionContractError);
  assert.equal(tracker.getConnectionStatus(), null);
});

test('snapshots are copies', async () => {
  const tracker = await createTracker(fakeClock(0));
  tracker.addTranscriptItem('agent', 'Hello');

  const snapshot = tracker.getFinalDisposition();
  snapshot.transcript.length = 0;

  assert.equal(tracker.getTranscript().length, 1);
});
