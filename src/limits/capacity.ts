import { env } from '../env';
import { log } from '../log';
import { getRedisClient } from '../redis/client';

const LUA_CAPACITY_SCRIPT = `
local globalKey = KEYS[1]

local callId = ARGV[1]
local globalCap = tonumber(ARGV[2])
local ttlSeconds = tonumber(ARGV[3])

if redis.call('SISMEMBER', globalKey, callId) == 1 then
  redis.call('EXPIRE', globalKey, ttlSeconds)
  return 'OK'
end

local globalCount = redis.call('SCARD', globalKey)
if globalCount >= globalCap then
  return 'global_at_capacity'
end

redis.call('SADD', globalKey, callId)
redis.call('EXPIRE', globalKey, ttlSeconds)
return 'OK'
`;

export type CapacityFailureReason = 'global_at_capacity';

/** The slice of the ioredis client admission control uses. */
export interface CapacityRedis {
  evalsha(sha: string, numKeys: number, ...args: string[]): Promise<unknown>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  script(subcommand: 'LOAD', script: string): Promise<unknown>;
  srem(key: string, ...members: string[]): Promise<number>;
}

export interface CapacityParams {
  callId: string;
  requestId?: string;
  redis?: CapacityRedis;
  globalCap?: number;
  ttlSeconds?: number;
}

export interface ReleaseParams {
  callId: string;
  requestId?: string;
  redis?: CapacityRedis;
}

export type AcquireResult = { ok: true } | { ok: false; reason: CapacityFailureReason };

let scriptSha: string | null = null;

export function buildCapacityKeys(prefix: string = env.CAP_PREFIX): { globalActiveKey: string } {
  return { globalActiveKey: `${prefix}:global:active` };
}

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

async function evalCapacityScript(redis: CapacityRedis, keys: string[], args: string[]): Promise<unknown> {
  const numKeys = keys.length;

  if (scriptSha) {
    try {
      return await redis.evalsha(scriptSha, numKeys, ...keys, ...args);
    } catch (error) {
      if (!isNoScriptError(error)) {
        throw error;
      }
    }
  }

  try {
    const loadedSha = String(await redis.script('LOAD', LUA_CAPACITY_SCRIPT));
    scriptSha = loadedSha;
    return await redis.evalsha(loadedSha, numKeys, ...keys, ...args);
  } catch (error) {
    log.warn({ err: error, event: 'capacity_script_load_failed' }, 'capacity script load failed, using eval');
    return redis.eval(LUA_CAPACITY_SCRIPT, numKeys, ...keys, ...args);
  }
}

export async function tryAcquire(params: CapacityParams): Promise<AcquireResult> {
  const redis = params.redis ?? getRedisClient();
  const keys = buildCapacityKeys();
  const args = [
    params.callId,
    (params.globalCap ?? env.GLOBAL_CONCURRENCY_CAP).toString(),
    (params.ttlSeconds ?? env.CAPACITY_TTL_SECONDS).toString(),
  ];

  let result: unknown;
  try {
    result = await evalCapacityScript(redis, [keys.globalActiveKey], args);
  } catch (error) {
    log.error(
      { err: error, event: 'capacity_eval_failed', call_id: params.callId, requestId: params.requestId },
      'capacity evaluation failed',
    );
    throw error;
  }

  if (result === 'OK') {
    log.info({ event: 'capacity_acquired', call_id: params.callId, requestId: params.requestId }, 'capacity acquired');
    return { ok: true };
  }

  if (result === 'global_at_capacity') {
    log.warn(
      { event: 'capacity_denied', reason: result, call_id: params.callId, requestId: params.requestId },
      'capacity denied',
    );
    return { ok: false, reason: result };
  }

  log.error(
    { event: 'capacity_unknown_result', result, call_id: params.callId, requestId: params.requestId },
    'capacity returned unknown result',
  );
  return { ok: false, reason: 'global_at_capacity' };
}

export async function release(params: ReleaseParams): Promise<void> {
  const redis = params.redis ?? getRedisClient();
  const keys = buildCapacityKeys();

  try {
    const removed = await redis.srem(keys.globalActiveKey, params.callId);
    log.info(
      { event: 'capacity_released', call_id: params.callId, removed, requestId: params.requestId },
      'capacity released',
    );
  } catch (error) {
    log.error(
      { event: 'capacity_release_failed', err: error, call_id: params.callId, requestId: params.requestId },
      'capacity release failed',
    );
  }
}

/** Test hook: forget the cached script sha. */
export function resetCapacityScriptCache(): void {
  scriptSha = null;
}
