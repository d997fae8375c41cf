import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from '../src/config';

const cwd = path.resolve('/srv/icetime');

describe('loadConfig', () => {
  it('should require the league base URL', () => {
    expect(() => loadConfig({}, cwd)).toThrow(
      'Missing required environment variable: LEAGUE_BASE_URL'
    );
  });

  it('should apply defaults', () => {
    const config = loadConfig({ LEAGUE_BASE_URL: 'https://league.example.test' }, cwd);

    expect(config).toEqual({
      baseUrl: 'https://league.example.test',
      venueFilter: 'Amherst Stadium',
      monitorDays: 7,
      cronPattern: '30 1,12,16 * * *',
      timezone: 'America/Halifax',
      storagePath: path.join(cwd, 'data', 'snapshot.json'),
      exportPath: path.join(cwd, 'data', 'schedule.json'),
      requestTimeoutMs: 30000,
      userAgent: 'Mozilla/5.0 (compatible; IceTimeMonitor/1.0)',
      testMode: false,
      duplicatePolicy: 'first',
      notifyOnFirstRun: false,
      runOnce: false,
    });
  });

  it('should read overrides', () => {
    const config = loadConfig(
      {
        LEAGUE_BASE_URL: 'https://league.example.test',
        VENUE_FILTER: ' Springhill Arena ',
        MONITOR_DAYS: '14',
        STORAGE_PATH: 'state/last.json',
        TELEGRAM_BOT_TOKEN: 'test-token',
        TELEGRAM_CHAT_ID: 'test-chat',
        TEST_MODE: 'yes',
        DUPLICATE_POLICY: 'LAST',
        NOTIFY_ON_FIRST_RUN: '1',
      },
      cwd
    );

    expect(config.venueFilter).toBe('Springhill Arena');
    expect(config.monitorDays).toBe(14);
    expect(config.storagePath).toBe(path.join(cwd, 'state', 'last.json'));
    expect(config.telegram).toEqual({ botToken: 'test-token', chatId: 'test-chat' });
    expect(config.testMode).toBe(true);
    expect(config.duplicatePolicy).toBe('last');
    expect(config.notifyOnFirstRun).toBe(true);
  });

  it('should reject invalid numbers and policies', () => {
    const base = { LEAGUE_BASE_URL: 'https://league.example.test' };

    expect(() => loadConfig({ ...base, MONITOR_DAYS: 'week' }, cwd)).toThrow(
      'Invalid MONITOR_DAYS: expected a positive integer, got "week"'
    );
    expect(() => loadConfig({ ...base, DUPLICATE_POLICY: 'random' }, cwd)).toThrow(
      'Invalid DUPLICATE_POLICY'
    );
  });

  it('should reject an unknown time zone', () => {
    const base = { LEAGUE_BASE_URL: 'https://league.example.test' };

    expect(() => loadConfig({ ...base, TZ: 'Mars/Olympus_Mons' }, cwd)).toThrow(
      'Invalid TZ: unknown time zone "Mars/Olympus_Mons"'
    );
    expect(loadConfig({ ...base, TZ: 'UTC' }, cwd).timezone).toBe('UTC');
  });

  it('should reject half-configured Telegram settings', () => {
    expect(() =>
      loadConfig({ LEAGUE_BASE_URL: 'https://league.example.test', TELEGRAM_CHAT_ID: 'test-chat' }, cwd)
    ).toThrow('TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together');
  });
});
