/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, repositories are the Supabase implementations; tests pass mocks.
 */

import type { AppConfig } from './config.js';
import { FreightJobs } from './jobs/FreightJobs.js';
import { TaskQueue } from './jobs/TaskQueue.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import type { Middleware } from './middleware/pipeline.js';
import type { IEsiClient } from './providers/IEsiClient.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ITokenProvider } from './providers/ITokenProvider.js';
import type { IWebhookProvider } from './providers/IWebhookProvider.js';
import type { IContractHandlerRepository } from './repositories/IContractHandlerRepository.js';
import type { IContractRepository } from './repositories/IContractRepository.js';
import type { ICustomerNotificationRepository } from './repositories/ICustomerNotificationRepository.js';
import type { IEveEntityRepository } from './repositories/IEveEntityRepository.js';
import type { ILocationRepository } from './repositories/ILocationRepository.js';
import type { IPricingRepository } from './repositories/IPricingRepository.js';
import { CalculatorService } from './services/CalculatorService.js';
import { ContractService } from './services/ContractService.js';
import { ContractStore } from './services/ContractStore.js';
import { ContractSyncService } from './services/ContractSyncService.js';
import { EntityResolverService } from './services/EntityResolverService.js';
import { HandlerService } from './services/HandlerService.js';
import { LocationService } from './services/LocationService.js';
import { NotificationService, type NotificationServiceOptions } from './services/NotificationService.js';
import { PricingService } from './services/PricingService.js';
import { StatisticsService } from './services/StatisticsService.js';

export interface Container {
  config: AppConfig;
  handlerService: HandlerService;
  pricingService: PricingService;
  calculatorService: CalculatorService;
  contractService: ContractService;
  statisticsService: StatisticsService;
  locationService: LocationService;
  syncService: ContractSyncService;
  notificationService: NotificationService;
  queue: TaskQueue;
  jobs: FreightJobs;
  logProvider: ILogProvider;
  authenticate: Middleware;
  logging: Middleware;
}

export interface ContainerDeps {
  handlerRepo: IContractHandlerRepository;
  contractRepo: IContractRepository;
  pricingRepo: IPricingRepository;
  locationRepo: ILocationRepository;
  entityRepo: IEveEntityRepository;
  customerNotificationRepo: ICustomerNotificationRepository;
  esi: IEsiClient;
  tokens: ITokenProvider;
  webhook: IWebhookProvider;
  logProvider: ILogProvider;
  config: AppConfig;
  /** Overrides for notification pacing, mainly for tests. */
  notificationOptions?: NotificationServiceOptions;
}

export function createContainer(deps: ContainerDeps): Container {
  const { config, logProvider: log } = deps;

  const queue = new TaskQueue(log);
  const resolver = new EntityResolverService(deps.esi, deps.locationRepo, deps.entityRepo, log);
  const store = new ContractStore(deps.contractRepo, log);

  const pricingService = new PricingService(
    deps.pricingRepo,
    deps.contractRepo,
    deps.handlerRepo,
    deps.locationRepo,
    queue,
    log
  );
  const notificationService = new NotificationService(
    deps.contractRepo,
    deps.customerNotificationRepo,
    deps.handlerRepo,
    deps.entityRepo,
    deps.locationRepo,
    deps.webhook,
    config,
    log,
    deps.notificationOptions
  );
  const syncService = new ContractSyncService(
    deps.handlerRepo,
    deps.tokens,
    deps.esi,
    resolver,
    store,
    pricingService,
    notificationService,
    config,
    log
  );
  const handlerService = new HandlerService(
    deps.handlerRepo,
    deps.contractRepo,
    deps.customerNotificationRepo,
    resolver,
    config
  );
  const calculatorService = new CalculatorService(pricingService, deps.handlerRepo, deps.locationRepo);
  const contractService = new ContractService(deps.contractRepo, deps.entityRepo, deps.locationRepo);
  const statisticsService = new StatisticsService(
    deps.contractRepo,
    deps.pricingRepo,
    deps.entityRepo,
    deps.locationRepo,
    config
  );
  const locationService = new LocationService(deps.handlerRepo, deps.tokens, resolver);

  const jobs = new FreightJobs(queue, syncService, pricingService, notificationService);

  return {
    config,
    handlerService,
    pricingService,
    calculatorService,
    contractService,
    statisticsService,
    locationService,
    syncService,
    notificationService,
    queue,
    jobs,
    logProvider: log,
    authenticate: createAuthMiddleware(config.adminApiKey),
    logging: createLoggingMiddleware(log),
  };
}
