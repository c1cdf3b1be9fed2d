/**
 * Delivery System - composition root
 *
 * Wires configuration, storage, the external collaborators, the coordinator and
 * the scheduler. Collaborators that need credentials are only built when a
 * command actually needs them.
 */

import { DatabaseConnectionManager } from '../db/config/connection';
import { loadCatalogDocument } from '../db/catalog/catalog-loader';
import { MigrationManager } from '../db/migrations/migration-manager';
import { DeliveryHistoryRepository } from '../db/repositories/delivery-history.repository';
import { ProblemRepository } from '../db/repositories/problem.repository';
import { RunLockRepository } from '../db/repositories/run-lock.repository';
import { SubscriberRepository } from '../db/repositories/subscriber.repository';
import type { CatalogUpsertResult } from '../db/types/repository';
import { Coordinator } from '../delivery/coordinator';
import { ContentPipeline } from '../delivery/pipeline/content-pipeline';
import { SubscriptionService } from '../delivery/subscription-service';
import type { Embellisher, MessageSender, SolutionGenerator } from '../delivery/types';
import { OpenAICompatibleClient } from '../generation/clients/openai-compatible-client';
import { LlmEmbellisher } from '../generation/embellishers/llm-embellisher';
import { TemplateEmbellisher } from '../generation/embellishers/template-embellisher';
import type { LLMClient } from '../generation/interface';
import { LlmSolutionGenerator } from '../generation/solution-generator';
import { ConfigManager, DeliveryConfig } from './config';
import { toErrorMessage } from './error-handling';
import { Logger, createModuleLogger } from './logging/logger';
import { EmailSender } from './notification';
import { TriggerScheduler } from './scheduler';

/** Lease slack beyond the run timeout */
const RUN_LOCK_MARGIN_MS = 5 * 60 * 1000;

export interface DeliverySystemOptions {
  configManager: ConfigManager;
  /** Replacements for the collaborators otherwise built from configuration */
  generator?: SolutionGenerator;
  embellisher?: Embellisher;
  sender?: MessageSender;
  logger?: Logger;
}

export interface ComponentHealth {
  healthy: boolean;
  message?: string;
}

export interface SystemHealth {
  healthy: boolean;
  components: Record<string, ComponentHealth>;
}

export class DeliverySystem {
  public readonly config: Readonly<DeliveryConfig>;
  public readonly connection: DatabaseConnectionManager;
  public readonly directory: SubscriberRepository;
  public readonly catalog: ProblemRepository;
  public readonly history: DeliveryHistoryRepository;
  public readonly runLock: RunLockRepository;

  private configManager: ConfigManager;
  private logger: Logger;
  private llmClient: LLMClient | null = null;
  private generator: SolutionGenerator | null;
  private embellisher: Embellisher | null;
  private sender: MessageSender | null;
  private ownedEmailSender: EmailSender | null = null;
  private coordinator: Coordinator | null = null;
  private initialized = false;

  constructor(options: DeliverySystemOptions) {
    this.configManager = options.configManager;
    this.config = options.configManager.getConfig();
    this.logger = options.logger ?? createModuleLogger('system');
    this.generator = options.generator ?? null;
    this.embellisher = options.embellisher ?? null;
    this.sender = options.sender ?? null;

    this.connection = new DatabaseConnectionManager({
      filename: this.config.database.path,
      logger: this.logger.createSubLogger('db')
    });
    this.directory = new SubscriberRepository(this.connection);
    this.catalog = new ProblemRepository(this.connection);
    this.history = new DeliveryHistoryRepository(this.connection);
    this.runLock = new RunLockRepository(this.connection);
  }

  /**
   * Open storage and bring the schema up to date
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    const applied = await new MigrationManager(this.connection).migrate();
    this.initialized = true;
    this.logger.debug('Storage ready', { database: this.config.database.path, migrationsApplied: applied.length }, 'initialize');
  }

  /**
   * Load a catalog document into the problem table
   */
  async loadCatalog(file: string = this.config.catalog.file): Promise<CatalogUpsertResult> {
    await this.initialize();
    const problems = loadCatalogDocument(file);
    return this.catalog.upsertMany(problems);
  }

  /**
   * Subscriber administration. Courtesy mail is only sent when SMTP is configured.
   */
  getSubscriptionService(): SubscriptionService {
    const emailConfigured = this.configManager.validate({ email: true }).length === 0;
    return new SubscriptionService({
      directory: this.directory,
      history: this.history,
      catalog: this.catalog,
      sender: this.sender ?? (emailConfigured ? this.getSender() : null),
      languages: this.config.languages
    });
  }

  getCoordinator(): Coordinator {
    if (!this.coordinator) {
      const pipeline = new ContentPipeline({
        generator: this.getGenerator(),
        embellisher: this.getEmbellisher(),
        sender: this.getSender(),
        timezone: this.config.scheduler.timezone,
        embellishmentFailurePolicy: this.config.delivery.embellishmentFailurePolicy
      });

      this.coordinator = new Coordinator({
        directory: this.directory,
        catalog: this.catalog,
        history: this.history,
        pipeline,
        concurrency: this.config.delivery.concurrency,
        runTimeoutMs: this.config.delivery.runTimeoutMs,
        selectionPolicy: this.config.delivery.selectionPolicy
      });
    }
    return this.coordinator;
  }

  createScheduler(): TriggerScheduler {
    return new TriggerScheduler({
      executor: this.getCoordinator(),
      schedule: {
        hour: this.config.scheduler.hour,
        minute: this.config.scheduler.minute,
        timezone: this.config.scheduler.timezone
      },
      catchUpPolicy: this.config.scheduler.catchUpPolicy,
      runLock: this.runLock,
      runLockTtlMs: this.config.delivery.runTimeoutMs + RUN_LOCK_MARGIN_MS
    });
  }

  /**
   * Probe every collaborator. Read-only: nothing is written to the delivery history.
   */
  async getHealth(): Promise<SystemHealth> {
    const components: Record<string, ComponentHealth> = {};

    const probe = async (name: string, check: () => Promise<ComponentHealth>): Promise<void> => {
      try {
        components[name] = await check();
      } catch (error) {
        components[name] = { healthy: false, message: toErrorMessage(error) };
      }
    };

    await probe('storage', async () => {
      await this.initialize();
      return { healthy: await this.connection.healthCheck(), message: this.config.database.path };
    });
    await probe('subscriberDirectory', async () => {
      const healthy = await this.directory.healthCheck();
      return { healthy, message: healthy ? `${await this.directory.countActive()} active subscribers` : undefined };
    });
    await probe('problemCatalog', async () => {
      const healthy = await this.catalog.healthCheck();
      return { healthy, message: healthy ? `${await this.catalog.count()} problems` : undefined };
    });
    await probe('deliveryHistory', async () => ({ healthy: await this.history.healthCheck() }));
    await probe('generation', async () => ({
      healthy: await this.getGenerator().healthCheck(),
      message: `${this.config.generation.model} at ${this.config.generation.baseUrl}`
    }));
    await probe('email', async () => ({
      healthy: await this.getSender().healthCheck(),
      message: `${this.config.email.host}:${this.config.email.port}`
    }));

    return {
      healthy: Object.values(components).every(component => component.healthy),
      components
    };
  }

  async shutdown(): Promise<void> {
    this.ownedEmailSender?.close();
    this.ownedEmailSender = null;
    await this.connection.close();
    this.initialized = false;
  }

  private getLlmClient(): LLMClient {
    if (!this.llmClient) {
      this.configManager.assertValid({ generation: true });
      const generation = this.config.generation;
      this.llmClient = new OpenAICompatibleClient({
        apiKey: generation.apiKey ?? '',
        baseUrl: generation.baseUrl,
        model: generation.model,
        timeoutMs: generation.timeoutMs,
        defaultMaxTokens: generation.maxTokens,
        defaultTemperature: generation.temperature
      });
    }
    return this.llmClient;
  }

  private getGenerator(): SolutionGenerator {
    if (!this.generator) {
      this.generator = new LlmSolutionGenerator({
        client: this.getLlmClient(),
        maxTokens: this.config.generation.maxTokens,
        temperature: this.config.generation.temperature
      });
    }
    return this.generator;
  }

  private getEmbellisher(): Embellisher {
    if (!this.embellisher) {
      this.embellisher = this.config.delivery.embellisher === 'llm'
        ? new LlmEmbellisher({ client: this.getLlmClient() })
        : new TemplateEmbellisher();
    }
    return this.embellisher;
  }

  private getSender(): MessageSender {
    if (!this.sender) {
      this.configManager.assertValid({ email: true });
      const email = this.config.email;
      const sender = new EmailSender({
        from: this.configManager.getSenderAddress() ?? '',
        smtp: {
          host: email.host,
          port: email.port,
          secure: email.secure,
          user: email.user,
          password: email.password
        }
      });
      this.ownedEmailSender = sender;
      this.sender = sender;
    }
    return this.sender;
  }
}
