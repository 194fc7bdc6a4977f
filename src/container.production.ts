/**
 * Production container: Supabase repositories, ESI over HTTPS and Discord webhooks.
 */

import { loadConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import {
  AxiomLogProvider,
  ConsoleLogProvider,
  DiscordWebhookProvider,
  EsiClient,
  SupabaseTokenProvider,
  type ILogProvider,
} from './providers/index.js';
import { SupabaseContractHandlerRepository } from './repositories/SupabaseContractHandlerRepository.js';
import { SupabaseContractRepository } from './repositories/SupabaseContractRepository.js';
import { SupabaseCustomerNotificationRepository } from './repositories/SupabaseCustomerNotificationRepository.js';
import { SupabaseEveEntityRepository } from './repositories/SupabaseEveEntityRepository.js';
import { SupabaseLocationRepository } from './repositories/SupabaseLocationRepository.js';
import { SupabasePricingRepository } from './repositories/SupabasePricingRepository.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig();
  if (!config.supabase) {
    throw new Error('Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY');
  }

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  // Axiom logging when configured, console otherwise.
  const logProvider: ILogProvider = config.axiom
    ? new AxiomLogProvider({ apiToken: config.axiom.apiKey, dataset: config.axiom.dataset })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });

  cached = createContainer({
    handlerRepo: new SupabaseContractHandlerRepository(db),
    contractRepo: new SupabaseContractRepository(db),
    pricingRepo: new SupabasePricingRepository(db),
    locationRepo: new SupabaseLocationRepository(db),
    entityRepo: new SupabaseEveEntityRepository(db),
    customerNotificationRepo: new SupabaseCustomerNotificationRepository(db),
    esi: new EsiClient({ log: logProvider }),
    tokens: new SupabaseTokenProvider(db),
    webhook: new DiscordWebhookProvider(),
    logProvider,
    config,
  });

  return cached;
}
