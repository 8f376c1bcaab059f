import { describe, expect, it } from 'vitest';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  it('applies defaults to numeric variables left empty', () => {
    const config = loadConfig({
      PORT: '',
      MIN_VOLUME: '',
      CHECK_INTERVAL_MINUTES: '',
      MAX_ALERTS_PER_SCAN: '',
    });

    expect(config.port).toBe(8000);
    expect(config.thresholds.minVolume).toBe(300000);
    expect(config.bot.checkIntervalMinutes).toBe(10);
    expect(config.bot.maxAlertsPerScan).toBe(10);
  });

  it('reads numeric variables that are set', () => {
    const config = loadConfig({ PORT: '9100', MIN_SAFETY_SCORE: '65', CHECK_INTERVAL_MINUTES: '5' });

    expect(config.port).toBe(9100);
    expect(config.thresholds.minSafetyScore).toBe(65);
    expect(config.bot.checkIntervalMinutes).toBe(5);
  });

  it('treats empty flags as their defaults and trims trailing slashes', () => {
    const config = loadConfig({
      BOT_ENABLED: '',
      TELEGRAM_COMMANDS_ENABLED: 'TRUE',
      DEXSCREENER_API_URL: 'https://dex.test/latest/dex/',
    });

    expect(config.bot.enabled).toBe(false);
    expect(config.telegramCommandsEnabled).toBe(true);
    expect(config.dexScreenerApiUrl).toBe('https://dex.test/latest/dex');
  });
});
