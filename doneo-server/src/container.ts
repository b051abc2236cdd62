import { Config } from './infrastructure/config/Config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { SystemClock } from './infrastructure/common/SystemClock';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { FileSystemProjectRepository } from './infrastructure/repositories/FileSystemProjectRepository';
import { FileSystemAuditLogRepository } from './infrastructure/repositories/FileSystemAuditLogRepository';
import { MembershipAuthorizer } from './infrastructure/auth/MembershipAuthorizer';
import { ProjectService } from './application/services/ProjectService';
import { ProjectChatService } from './application/services/ProjectChatService';
import { ILogger } from './domain/common/ILogger';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { IClock } from './domain/common/IClock';
import { IEventBus } from './domain/events/IEventBus';
import { IProjectRepository } from './domain/repositories/IProjectRepository';
import { IAuditLogRepository } from './domain/repositories/IAuditLogRepository';
import { IAuthorizer } from './domain/services/IAuthorizer';

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  idGenerator: IIdGenerator;
  clock: IClock;
  eventBus: IEventBus;
  authorizer: IAuthorizer;

  // Repositories
  projectRepo: IProjectRepository;
  auditRepo: IAuditLogRepository;

  // Services
  projectService: ProjectService;
  chatService: ProjectChatService;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Create and wire up all dependencies.
 */
export function createContainer(config: Config = new Config()): Container {
  // 1. Infrastructure - Core
  const logger = new ConsoleLogger(config.log.level, { service: 'doneo-server' }, config.log.format);
  const clock = new SystemClock();
  const idGenerator = new TimestampIdGenerator(clock);
  const eventBus = new InMemoryEventBus(logger);
  const authorizer = new MembershipAuthorizer();

  // 2. Repositories
  const projectRepo = new FileSystemProjectRepository(config.dataDir, idGenerator, clock, logger);
  const auditRepo = new FileSystemAuditLogRepository(config.dataDir, logger);

  // 3. Services
  const projectService = new ProjectService(projectRepo, auditRepo, eventBus, authorizer, clock);
  const chatService = new ProjectChatService(
    projectRepo,
    auditRepo,
    eventBus,
    idGenerator,
    clock,
    authorizer,
    logger.child({ component: 'chat' }),
    { maxImageBytes: config.maxImageBytes }
  );

  return {
    config,
    logger,
    idGenerator,
    clock,
    eventBus,
    authorizer,
    projectRepo,
    auditRepo,
    projectService,
    chatService,

    async initialize() {
      logger.info('Initializing container...');

      await projectRepo.initialize();
      await auditRepo.initialize();

      logger.info('Container initialized');
    },

    async shutdown() {
      logger.info('Shutting down container...');
      eventBus.removeAllListeners();
      logger.info('Container shutdown complete');
    }
  };
}
