import { describe, it, expect, afterEach } from '@jest/globals';
import { envManifest, manifestByName } from '@/config/env.manifest';
import {
  aiProviderConfig,
  environmentKeys,
  getEnvironment,
  resetEnvironmentForTests,
} from '@/config/environment';

describe('environment manifest', () => {
  it('documents exactly the variables the schema reads', () => {
    expect(envManifest.map((entry) => entry.name).sort()).toEqual([...environmentKeys].sort());
  });

  it('marks store credentials as required secrets', () => {
    const byName = manifestByName();

    expect(byName.DB_PASSWORD).toMatchObject({ required: true, secret: true });
    expect(byName.DEFAULT_TEXT_MODEL?.default).toBe('gpt-4o-mini');
  });
});

describe('environment', () => {
  const originalEnv = process.env;

  afterEach(() => {
    process.env = originalEnv;
    resetEnvironmentForTests();
  });

  it('applies defaults and coerces numbers and flags', () => {
    process.env = { ...originalEnv, PORT: '9090', DB_SSL: '1' };
    resetEnvironmentForTests();

    const env = getEnvironment();

    expect(env.PORT).toBe(9090);
    expect(env.DB_PORT).toBe(5432);
    expect(env.DB_SSL).toBe(true);
  });

  it('passes only configured provider keys to the gateway config', () => {
    process.env = {
      ...originalEnv,
      ANTHROPIC_API_KEY: 'test-secret',
      OPENAI_API_KEY: '',
      DEFAULT_TEXT_MODEL: 'claude-3-haiku-20240307',
    };
    delete process.env.GOOGLE_GENAI_API_KEY;
    resetEnvironmentForTests();

    expect(aiProviderConfig.get()).toEqual({
      defaultModel: 'claude-3-haiku-20240307',
      credentials: { anthropicApiKey: 'test-secret' },
    });
  });
});
