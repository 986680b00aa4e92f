import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadClientOptions, parseClientOptions } from './config';
import { MAX_PERMISSIONS } from './handshake';
import { ValidationError } from './errors';

describe('parseClientOptions', () => {
  it('fills in defaults', () => {
    expect(parseClientOptions({ host: ' localhost ', port: 7777, password: 'test-secret' })).toEqual({
      host: 'localhost',
      port: 7777,
      password: 'test-secret',
      permissions: MAX_PERMISSIONS,
      kickPower: 255,
      suppressCommandResponses: false,
      subscribeConsole: false,
      subscribeLogs: false,
      handshakeTimeout: 5000,
      reconnectLimit: 10,
      reconnectDelay: 0,
    });
  });

  it.each([
    ['port', { port: 0 }],
    ['port', { port: 7777.5 }],
    ['kickPower', { kickPower: 256 }],
    ['permissions', { permissions: -1n }],
    ['password', { password: '' }],
    ['host', { host: '   ' }],
    ['handshakeTimeout', { handshakeTimeout: 2 ** 31 }],
    ['reconnectDelay', { reconnectDelay: 2 ** 31 }],
  ])('rejects an invalid %s', (field, override) => {
    const input = { host: 'localhost', port: 7777, password: 'test-secret', ...override };
    expect(() => parseClientOptions(input)).toThrow(ValidationError);
    expect(() => parseClientOptions(input)).toThrow(`Invalid client options: ${field}:`);
  });

  it('limits the username to 255 UTF-8 bytes', () => {
    const base = { host: 'localhost', port: 7777, password: 'test-secret' };
    expect(parseClientOptions({ ...base, username: 'a'.repeat(255) }).username).toHaveLength(255);
    expect(() => parseClientOptions({ ...base, username: 'é'.repeat(128) })).toThrow(
      'Invalid client options: username: must not exceed 255 UTF-8 bytes',
    );
  });
});

describe('loadClientOptions', () => {
  const fixtureKeys = [
    'QUERY_HOST',
    'QUERY_PORT',
    'QUERY_PASSWORD',
    'QUERY_SUBSCRIBE_CONSOLE',
    'QUERY_RECONNECT_DELAY',
  ];
  const saved = new Map(fixtureKeys.map((key) => [key, process.env[key]]));

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('reads every QUERY_* variable', () => {
    expect(
      loadClientOptions({
        env: {
          QUERY_HOST: 'game.local',
          QUERY_PORT: '7777',
          QUERY_PASSWORD: 'test-secret',
          QUERY_PERMISSIONS: '5',
          QUERY_KICK_POWER: '10',
          QUERY_USERNAME: 'bot',
          QUERY_SUPPRESS_RESPONSES: '0',
          QUERY_SUBSCRIBE_CONSOLE: '1',
          QUERY_SUBSCRIBE_LOGS: 'true',
          QUERY_HANDSHAKE_TIMEOUT: '2000',
          QUERY_RECONNECT_LIMIT: '3',
          QUERY_RECONNECT_DELAY: '100',
        },
      }),
    ).toEqual({
      host: 'game.local',
      port: 7777,
      password: 'test-secret',
      permissions: 5n,
      kickPower: 10,
      username: 'bot',
      suppressCommandResponses: false,
      subscribeConsole: true,
      subscribeLogs: true,
      handshakeTimeout: 2000,
      reconnectLimit: 3,
      reconnectDelay: 100,
    });
  });

  it('requires the password', () => {
    expect(() => loadClientOptions({ env: { QUERY_HOST: 'game.local', QUERY_PORT: '7777' } })).toThrow(
      /^Invalid environment: QUERY_PASSWORD:/,
    );
  });

  it('rejects a non-numeric port', () => {
    expect(() =>
      loadClientOptions({
        env: { QUERY_HOST: 'game.local', QUERY_PORT: 'abc', QUERY_PASSWORD: 'test-secret' },
      }),
    ).toThrow('Invalid environment: QUERY_PORT: must be a non-negative integer');
  });

  it('rejects an unknown flag value', () => {
    expect(() =>
      loadClientOptions({
        env: {
          QUERY_HOST: 'game.local',
          QUERY_PORT: '7777',
          QUERY_PASSWORD: 'test-secret',
          QUERY_SUBSCRIBE_LOGS: 'yes',
        },
      }),
    ).toThrow(ValidationError);
  });

  it('loads a .env file into the process environment', () => {
    for (const key of fixtureKeys) {
      delete process.env[key];
    }

    const options = loadClientOptions({ dotenvPath: join(__dirname, '__fixtures__', 'query.env') });

    expect(options).toMatchObject({
      host: '10.0.0.5',
      port: 7778,
      password: 'test-secret',
      subscribeConsole: true,
      subscribeLogs: false,
      reconnectDelay: 250,
      reconnectLimit: 10,
    });
    expect(process.env.QUERY_HOST).toBe('10.0.0.5');
  });
});
