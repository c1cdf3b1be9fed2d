/**
 * Daily problem delivery: public API
 */

export * from './delivery/types';
export { Coordinator, reportError, summarizeEntries } from './delivery/coordinator';
export type { ContentProducer, CoordinatorOptions } from './delivery/coordinator';
export { ContentPipeline } from './delivery/pipeline/content-pipeline';
export type { ContentPipelineOptions } from './delivery/pipeline/content-pipeline';
export { composeDeliveryMessage, composeSubject, formatDeliveryDate } from './delivery/pipeline/message-composer';
export { selectProblem, eligibleProblems } from './delivery/selection';
export { runBounded } from './delivery/worker-pool';
export { SubscriptionService } from './delivery/subscription-service';

export * from './db/types';
export * from './db/types/repository';
export { DatabaseConnectionManager, MEMORY_DATABASE } from './db/config/connection';
export { MigrationManager } from './db/migrations/migration-manager';
export { SubscriberRepository } from './db/repositories/subscriber.repository';
export { ProblemRepository } from './db/repositories/problem.repository';
export { DeliveryHistoryRepository } from './db/repositories/delivery-history.repository';
export { loadCatalogDocument, parseCatalogDocument, slugify } from './db/catalog/catalog-loader';

export { OpenAICompatibleClient } from './generation/clients/openai-compatible-client';
export { LlmSolutionGenerator } from './generation/solution-generator';
export { TemplateEmbellisher } from './generation/embellishers/template-embellisher';
export { LlmEmbellisher } from './generation/embellishers/llm-embellisher';
export * from './generation/interface';

export * from './system/error-handling';
export { ConfigManager } from './system/config';
export type { DeliveryConfig, ConfigRequirements } from './system/config';
export { KNOWN_LANGUAGES, LANGUAGE_PROFILES, isKnownLanguage } from './system/config/languages';
export type { Language } from './system/config/languages';
export { Logger, LogLevel, createModuleLogger, setLogLevel } from './system/logging/logger';
export { EmailSender } from './system/notification';
export { TriggerScheduler, computeNextFireTime } from './system/scheduler';
export type { TriggerOutcome, SchedulerStatus, DailySchedule } from './system/scheduler';
export { DeliverySystem } from './system/system';
