/**
 * Application configuration, read once from the environment.
 */

import { isOperationMode, type OperationMode } from './types/models.js';

export type DiscordMention = '@here' | '@everyone';

export interface AppConfig {
  operationMode: OperationMode;
  discord: {
    /** Operator audience. Notifications are off when null. */
    webhookUrl: string | null;
    /** Customer audience. Notifications are off when null. */
    customersWebhookUrl: string | null;
    disableBranding: boolean;
    mentions: DiscordMention | null;
    avatarName: string;
  };
  hoursUntilStaleStatus: number;
  contractSyncGraceMinutes: number;
  /** Statistics cover contracts completed within this many days. */
  statisticsMaxDays: number;
  /** Bearer key for mutating HTTP routes. Those routes reject everything when null. */
  adminApiKey: string | null;
  supabase: { url: string; serviceRoleKey: string } | null;
  axiom: { apiKey: string; dataset: string } | null;
}

export const DEFAULT_AVATAR_NAME = 'Alliance Freight';

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const mode = env.FREIGHT_OPERATION_MODE ?? 'my_alliance';
  if (!isOperationMode(mode)) {
    throw new Error(`Invalid FREIGHT_OPERATION_MODE: "${mode}"`);
  }

  const mentions = optional(env.FREIGHT_DISCORD_MENTIONS);
  if (mentions !== null && mentions !== '@here' && mentions !== '@everyone') {
    throw new Error(`Invalid FREIGHT_DISCORD_MENTIONS: "${mentions}". Use @here or @everyone`);
  }

  const supabaseUrl = optional(env.SUPABASE_URL);
  const supabaseKey = optional(env.SUPABASE_SERVICE_ROLE_KEY);
  const axiomKey = optional(env.AXIOM_API_KEY);
  const axiomDataset = optional(env.AXIOM_DATASET);

  return {
    operationMode: mode,
    discord: {
      webhookUrl: optional(env.FREIGHT_DISCORD_WEBHOOK_URL),
      customersWebhookUrl: optional(env.FREIGHT_DISCORD_CUSTOMERS_WEBHOOK_URL),
      disableBranding: parseBoolean('FREIGHT_DISCORD_DISABLE_BRANDING', env.FREIGHT_DISCORD_DISABLE_BRANDING),
      mentions,
      avatarName: optional(env.FREIGHT_DISCORD_AVATAR_NAME) ?? DEFAULT_AVATAR_NAME,
    },
    hoursUntilStaleStatus: parseNumber('FREIGHT_HOURS_UNTIL_STALE_STATUS', env.FREIGHT_HOURS_UNTIL_STALE_STATUS, 24),
    contractSyncGraceMinutes: parseNumber(
      'FREIGHT_CONTRACT_SYNC_GRACE_MINUTES',
      env.FREIGHT_CONTRACT_SYNC_GRACE_MINUTES,
      30
    ),
    statisticsMaxDays: parseNumber('FREIGHT_STATISTICS_MAX_DAYS', env.FREIGHT_STATISTICS_MAX_DAYS, 90),
    adminApiKey: optional(env.FREIGHT_ADMIN_API_KEY),
    supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceRoleKey: supabaseKey } : null,
    axiom: axiomKey && axiomDataset ? { apiKey: axiomKey, dataset: axiomDataset } : null,
  };
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parseNumber(name: string, value: string | undefined, fallback: number): number {
  const raw = optional(value);
  if (raw === null) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: "${raw}". Must be a non-negative number`);
  }
  return parsed;
}

function parseBoolean(name: string, value: string | undefined): boolean {
  const raw = optional(value)?.toLowerCase();
  if (raw === undefined) return false;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`Invalid ${name}: "${raw}". Must be true or false`);
}
