const defaults: Record<string, string> = {
  PORT: '3000',
  LIVEKIT_URL: 'http://localhost:7880',
  LIVEKIT_API_KEY: 'test-key',
  LIVEKIT_API_SECRET: 'test-secret',
  SIP_OUTBOUND_TRUNK_ID: 'ST_test',
  SESSION_BRIDGE_TOKEN: 'test-token',
  REDIS_URL: 'redis://localhost:6379',
  GLOBAL_CONCURRENCY_CAP: '30',
  CAPACITY_TTL_SECONDS: '600',
  CAP_PREFIX: 'cap',
  RECORDING_BASE_DIR: '/tmp/recordings',
  ARTIFACTS_DIR: '/tmp/call-artifacts',
  LOG_LEVEL: 'silent',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
