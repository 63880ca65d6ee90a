import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { doctorReport, readEnv, resolveSettings, settingsFromEnv } from '../src/config.js';
import { loadEnvFiles, parseEnvLine } from '../src/env.js';
import { ConfigurationError } from '../src/errors.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError && Array.isArray(e.details?.issues)) return e.details.issues.map(String);
    throw e;
  }
  throw new Error('expected a ConfigurationError');
}

describe('readEnv', () => {
  it('treats blank values as unset and coerces the timeout', () => {
    const env = readEnv({
      TICKTICK_ACCESS_TOKEN: '',
      TICKTICK_USERNAME: 'user@example.com',
      TICKTICK_HOST: '  ',
      TICKTICK_TIMEOUT_MS: '5000',
    });

    expect(env.TICKTICK_ACCESS_TOKEN).toBeUndefined();
    expect(env.TICKTICK_USERNAME).toBe('user@example.com');
    expect(env.TICKTICK_HOST).toBeUndefined();
    expect(env.TICKTICK_TIMEOUT_MS).toBe(5000);
  });

  it('names the offending variables', () => {
    const issues = issuesOf(() => readEnv({ TICKTICK_HOST: 'example.com', TICKTICK_TIMEOUT_MS: 'soon' }));
    expect(issues.map((i) => i.split(':')[0])).toEqual(['TICKTICK_HOST', 'TICKTICK_TIMEOUT_MS']);
  });
});

describe('resolveSettings', () => {
  it('fills in defaults', () => {
    expect(resolveSettings({ accessToken: 'test-token', username: 'u', password: 'test-secret' })).toEqual({
      accessToken: 'test-token',
      username: 'u',
      password: 'test-secret',
      timeoutMs: 30_000,
      host: 'ticktick.com',
    });
  });

  it('reports every problem in one error', () => {
    const issues = issuesOf(() => resolveSettings({ username: 'u', deviceId: 'XYZ', timeoutMs: -1 }));

    expect(issues.map((i) => i.split(':')[0])).toEqual(['accessToken', 'password', 'deviceId', 'timeoutMs']);
    expect(issues[2]).toBe('deviceId: must be 24 lowercase hex characters');
  });

  it('maps environment variables onto settings', () => {
    const settings = settingsFromEnv(
      readEnv({
        TICKTICK_ACCESS_TOKEN: 'test-token',
        TICKTICK_USERNAME: 'u',
        TICKTICK_PASSWORD: 'test-secret',
        TICKTICK_HOST: 'dida365.com',
      }),
    );
    expect(resolveSettings(settings)).toMatchObject({ accessToken: 'test-token', host: 'dida365.com' });
  });
});

describe('doctorReport', () => {
  it('lists everything missing from an empty environment', () => {
    const report = doctorReport(readEnv({}));
    expect(report.host).toBe('ticktick.com');
    expect(report.missing).toEqual([
      'TICKTICK_ACCESS_TOKEN',
      'TICKTICK_CLIENT_ID',
      'TICKTICK_CLIENT_SECRET',
      'TICKTICK_USERNAME',
      'TICKTICK_PASSWORD',
    ]);
  });

  it('is satisfied by a token and credentials', () => {
    const report = doctorReport(
      readEnv({
        TICKTICK_ACCESS_TOKEN: 'test-token',
        TICKTICK_USERNAME: 'u',
        TICKTICK_PASSWORD: 'test-secret',
        TICKTICK_DEVICE_ID: 'a1b2c3d4e5f6a1b2c3d4e5f6',
      }),
    );
    expect(report.missing).toEqual([]);
    expect(report.notes).toEqual(['Session API: accounts with two-factor authentication cannot log in.']);
  });
});

describe('dotenv files', () => {
  it('parses single lines', () => {
    expect(parseEnvLine('TICKTICK_HOST=dida365.com')).toEqual({ key: 'TICKTICK_HOST', value: 'dida365.com' });
    expect(parseEnvLine('export TICKTICK_USERNAME="a b"')).toEqual({ key: 'TICKTICK_USERNAME', value: 'a b' });
    expect(parseEnvLine("TICKTICK_PASSWORD='x=y'")).toEqual({ key: 'TICKTICK_PASSWORD', value: 'x=y' });
    expect(parseEnvLine('TICKTICK_ACCESS_TOKEN=')).toEqual({ key: 'TICKTICK_ACCESS_TOKEN', value: '' });
    expect(parseEnvLine('# comment')).toBeUndefined();
    expect(parseEnvLine('   ')).toBeUndefined();
    expect(parseEnvLine('=value')).toBeUndefined();
    expect(parseEnvLine('no equals sign')).toBeUndefined();
  });

  it('loads files in order without overriding set variables', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'ticktick-env-'));
    await writeFile(
      path.join(dir, '.env'),
      ['# local account', 'TICKTICK_USERNAME=file-user', 'export TICKTICK_HOST="dida365.com"', 'TICKTICK_PASSWORD=from-file'].join('\n'),
    );
    await writeFile(path.join(dir, '.env.local'), 'TICKTICK_USERNAME=local-user\r\nTICKTICK_TIMEOUT_MS=5000\r\n');
    const env: NodeJS.ProcessEnv = { TICKTICK_PASSWORD: 'test-secret' };

    const { loaded } = loadEnvFiles(['.env', '.env.local', '.env.missing'], dir, env);

    expect(loaded).toEqual(['.env', '.env.local']);
    expect(env).toEqual({
      TICKTICK_USERNAME: 'file-user',
      TICKTICK_HOST: 'dida365.com',
      TICKTICK_PASSWORD: 'test-secret',
      TICKTICK_TIMEOUT_MS: '5000',
    });
  });
});
