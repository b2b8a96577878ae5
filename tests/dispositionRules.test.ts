import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

function baseRules() {
  return {
    contractVersion: 'v1',
    datePatterns: ['\\btomorrow\\b'],
    rules: [
      { name: 'late', priority: 20, anyKeywords: ['Later'], disposition: 'USER_BUSY_NOW' },
      { name: 'early', priority: 10, allKeywords: ['PAID'], disposition: 'USER_CLAIMED_PAYMENT' },
    ],
    fallback: 'GENERAL',
    dialFailure: [{ anyKeywords: ['Busy'], disposition: 'BUSY' }],
  };
}

test('default rule file compiles in priority order', async () => {
  const { loadDispositionRules } = await import('../src/disposition/rules');
  const rules = loadDispositionRules();

  assert.deepEqual(
    rules.rules.map((rule) => rule.name),
    [
      'human_handoff',
      'busy_now',
      'payment_claim',
      'refusal',
      'promise',
      'dispute',
      'maintain_balance',
      'delay_reason',
      'general',
    ],
  );
  assert.equal(rules.shortCallSeconds, 10);
  assert.equal(rules.fallback, 'PAYMENT_DUE_REMINDER');
  assert.equal(rules.datePatterns.length, 4);
});

test('compile sorts by priority, lowercases keywords and defaults the short call threshold', async () => {
  const { compileDispositionRules } = await import('../src/disposition/rules');
  const rules = compileDispositionRules(baseRules());

  assert.deepEqual(
    rules.rules.map((rule) => [rule.name, rule.anyKeywords, rule.allKeywords]),
    [
      ['early', [], ['paid']],
      ['late', ['later'], []],
    ],
  );
  assert.deepEqual(rules.dialFailure, [{ anyKeywords: ['busy'], disposition: 'BUSY' }]);
  assert.equal(rules.shortCallSeconds, 10);
  assert.equal(rules.datePatterns[0].test('Pay TOMORROW'), true);
});

test('classifier rules must produce connected dispositions', async () => {
  const { compileDispositionRules, DispositionRulesError } = await import('../src/disposition/rules');
  const input = baseRules();
  input.rules[0].disposition = 'NO_ANSWER';

  assert.throws(
    () => compileDispositionRules(input),
    (error: unknown) =>
      error instanceof DispositionRulesError &&
      error.message === 'Invalid disposition rules: rules.0.disposition: NO_ANSWER is not a connected-call disposition',
  );
});

test('dial failure rules must produce not connected dispositions', async () => {
  const { compileDispositionRules, DispositionRulesError } = await import('../src/disposition/rules');
  const input = baseRules();
  input.dialFailure[0].disposition = 'GENERAL';

  assert.throws(() => compileDispositionRules(input), DispositionRulesError);
});

test('rules without a condition and broken patterns are rejected', async () => {
  const { compileDispositionRules, DispositionRulesError } = await import('../src/disposition/rules');

  const noCondition = {
    ...baseRules(),
    rules: [{ name: 'empty', priority: 1, disposition: 'GENERAL' }],
  };
  assert.throws(() => compileDispositionRules(noCondition), DispositionRulesError);

  const badPattern = { ...baseRules(), datePatterns: ['(unclosed'] };
  assert.throws(() => compileDispositionRules(badPattern), DispositionRulesError);
});

test('unknown disposition names are rejected', async () => {
  const { compileDispositionRules, DispositionRulesError } = await import('../src/disposition/rules');

  assert.throws(
    () => compileDispositionRules({ ...baseRules(), fallback: 'MAYBE_LATER' }),
    DispositionRulesError,
  );
});

test('a missing rule file is reported with its path', async () => {
  const { loadDispositionRules, DispositionRulesError } = await import('../src/disposition/rules');

  assert.throws(
    () => loadDispositionRules('config/does-not-exist.json'),
    (error: unknown) => error instanceof DispositionRulesError && error.message.startsWith('Cannot read disposition rules at '),
  );
});
