import { describe, it, expect } from 'vitest';
import { DEFAULT_AVATAR_NAME, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      operationMode: 'my_alliance',
      discord: {
        webhookUrl: null,
        customersWebhookUrl: null,
        disableBranding: false,
        mentions: null,
        avatarName: DEFAULT_AVATAR_NAME,
      },
      hoursUntilStaleStatus: 24,
      contractSyncGraceMinutes: 30,
      statisticsMaxDays: 90,
      adminApiKey: null,
      supabase: null,
      axiom: null,
    });
  });

  it('should read every setting', () => {
    const config = loadConfig({
      FREIGHT_OPERATION_MODE: 'corp_public',
      FREIGHT_DISCORD_WEBHOOK_URL: 'https://discord.test/a',
      FREIGHT_DISCORD_CUSTOMERS_WEBHOOK_URL: 'https://discord.test/b',
      FREIGHT_DISCORD_DISABLE_BRANDING: 'yes',
      FREIGHT_DISCORD_MENTIONS: '@here',
      FREIGHT_DISCORD_AVATAR_NAME: 'Red Frog',
      FREIGHT_HOURS_UNTIL_STALE_STATUS: '12',
      FREIGHT_CONTRACT_SYNC_GRACE_MINUTES: '45',
      FREIGHT_STATISTICS_MAX_DAYS: '30',
      FREIGHT_ADMIN_API_KEY: 'test-secret',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
      AXIOM_API_KEY: 'test-axiom-key',
      AXIOM_DATASET: 'freight',
    });

    expect(config).toEqual({
      operationMode: 'corp_public',
      discord: {
        webhookUrl: 'https://discord.test/a',
        customersWebhookUrl: 'https://discord.test/b',
        disableBranding: true,
        mentions: '@here',
        avatarName: 'Red Frog',
      },
      hoursUntilStaleStatus: 12,
      contractSyncGraceMinutes: 45,
      statisticsMaxDays: 30,
      adminApiKey: 'test-secret',
      supabase: { url: 'http://localhost:54321', serviceRoleKey: 'test-service-key' },
      axiom: { apiKey: 'test-axiom-key', dataset: 'freight' },
    });
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ FREIGHT_DISCORD_WEBHOOK_URL: '  ', FREIGHT_STATISTICS_MAX_DAYS: '' });

    expect(config.discord.webhookUrl).toBeNull();
    expect(config.statisticsMaxDays).toBe(90);
  });

  it('should need both Supabase settings', () => {
    expect(loadConfig({ SUPABASE_URL: 'http://localhost:54321' }).supabase).toBeNull();
  });

  it('should reject an unknown operation mode', () => {
    expect(() => loadConfig({ FREIGHT_OPERATION_MODE: 'everyone' })).toThrow(
      'Invalid FREIGHT_OPERATION_MODE: "everyone"'
    );
  });

  it('should reject unsupported mentions', () => {
    expect(() => loadConfig({ FREIGHT_DISCORD_MENTIONS: '@pilots' })).toThrow(
      'Invalid FREIGHT_DISCORD_MENTIONS: "@pilots". Use @here or @everyone'
    );
  });

  it('should reject negative or non-numeric numbers', () => {
    expect(() => loadConfig({ FREIGHT_HOURS_UNTIL_STALE_STATUS: '-1' })).toThrow(
      'Invalid FREIGHT_HOURS_UNTIL_STALE_STATUS: "-1". Must be a non-negative number'
    );
    expect(() => loadConfig({ FREIGHT_STATISTICS_MAX_DAYS: 'ninety' })).toThrow(
      'Invalid FREIGHT_STATISTICS_MAX_DAYS: "ninety"'
    );
  });

  it('should reject unreadable booleans', () => {
    expect(() => loadConfig({ FREIGHT_DISCORD_DISABLE_BRANDING: 'maybe' })).toThrow(
      'Invalid FREIGHT_DISCORD_DISABLE_BRANDING: "maybe". Must be true or false'
    );
  });
});
