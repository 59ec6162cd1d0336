import path from 'path';
import { describe, expect, it } from 'vitest';
import { ContactPrecedence } from '../../models/merge-policy.model';
import { parseEnv } from '../config';
import { ConfigManager } from '../config.manager';

describe('parseEnv', () => {
  it('applies defaults for an empty environment', () => {
    expect(parseEnv({})).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      STORE_DRIVER: 'memory',
      DB_SSL: false,
      REMOTE_TIMEOUT_MS: 15000,
      BASELINE_CSV_PATH: 'data/fbo-baseline.csv',
      BASELINE_DATASET_VERSION: 1,
      BASELINE_DATASET_DATE: new Date('2024-04-01T00:00:00Z'),
      CONTACT_PRECEDENCE: ContactPrecedence.LATEST_UPDATE,
      LOG_LEVEL: 'info',
    });
  });

  it('coerces numeric and boolean strings', () => {
    const env = parseEnv({
      PORT: '8080',
      DB_SSL: 'true',
      BASELINE_DATASET_VERSION: '3',
      BASELINE_DATASET_DATE: '2024-09-01',
    });

    expect(env.PORT).toBe(8080);
    expect(env.DB_SSL).toBe(true);
    expect(env.BASELINE_DATASET_VERSION).toBe(3);
    expect(env.BASELINE_DATASET_DATE).toEqual(new Date('2024-09-01T00:00:00Z'));
  });

  it('rejects an unparseable dataset date', () => {
    expect(() => parseEnv({ BASELINE_DATASET_DATE: 'last spring' })).toThrow(
      'Missing or invalid environment variables: BASELINE_DATASET_DATE',
    );
  });

  it('requires connection settings for the postgres driver', () => {
    expect(() => parseEnv({ STORE_DRIVER: 'postgres', DB_HOST: 'localhost' })).toThrow(
      'Missing or invalid environment variables: DB_NAME, DB_USER, DB_PASSWORD',
    );
  });

  it('rejects an invalid remote store URL', () => {
    expect(() => parseEnv({ REMOTE_STORE_URL: 'not a url' })).toThrow(
      'Missing or invalid environment variables: REMOTE_STORE_URL',
    );
  });
});

describe('ConfigManager', () => {
  it('groups settings and resolves the baseline path', () => {
    const settings = ConfigManager.fromConfig(
      parseEnv({ REMOTE_STORE_URL: 'https://fbo.example/api', CONTACT_PRECEDENCE: 'INCOMING_WINS' }),
    );

    expect(settings.remote).toEqual({ baseUrl: 'https://fbo.example/api', apiKey: undefined, timeoutMs: 15000 });
    expect(settings.sync.contactPrecedence).toBe(ContactPrecedence.INCOMING_WINS);
    expect(settings.baseline.csvPath).toBe(path.resolve('data/fbo-baseline.csv'));
    expect(() => settings.validate()).not.toThrow();
  });

  it('rejects an API key without a remote URL', () => {
    const settings = ConfigManager.fromConfig(parseEnv({ REMOTE_STORE_API_KEY: 'test-secret' }));

    expect(() => settings.validate()).toThrow(
      'Configuration validation failed: REMOTE_STORE_API_KEY is set but REMOTE_STORE_URL is not',
    );
  });
});
