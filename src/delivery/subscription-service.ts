/**
 * Subscriber administration: subscribe, unsubscribe, preferences and statistics.
 */

import type { DeliveryTotals, Difficulty, DifficultyPreference, Subscriber, SubscriberDeliveryStats } from '../db/types';
import { isDifficultyPreference } from '../db/types';
import type {
  DeliveryHistory,
  ProblemCatalog,
  SubscribeResult,
  SubscriberDirectory,
  SubscriberPreferences
} from '../db/types/repository';
import { KNOWN_LANGUAGES, Language, isKnownLanguage } from '../system/config/languages';
import { InvalidInputError, toError } from '../system/error-handling';
import { Logger, createModuleLogger } from '../system/logging/logger';
import { composeUnsubscribeMessage, composeWelcomeMessage } from './pipeline/message-composer';
import type { MessageSender, OutgoingMessage } from './types';

export interface SubscriptionServiceOptions {
  directory: SubscriberDirectory;
  history: DeliveryHistory;
  catalog: ProblemCatalog;
  /** Without a sender no welcome or confirmation message is sent */
  sender?: MessageSender | null;
  languages?: readonly Language[];
  logger?: Logger;
}

export interface SubscriptionOutcome extends SubscribeResult {
  /** Whether the welcome message went out */
  notified: boolean;
}

export interface PreferenceInput {
  language?: string;
  difficulty?: string;
}

export interface SubscriberStatsReport {
  subscriber: Subscriber;
  stats: SubscriberDeliveryStats;
}

export interface SystemStats {
  subscribers: { active: number; total: number };
  problems: { total: number; byDifficulty: Record<Difficulty, number> };
  deliveries: DeliveryTotals;
}

export class SubscriptionService {
  private directory: SubscriberDirectory;
  private history: DeliveryHistory;
  private catalog: ProblemCatalog;
  private sender: MessageSender | null;
  private languages: readonly Language[];
  private logger: Logger;

  constructor(options: SubscriptionServiceOptions) {
    this.directory = options.directory;
    this.history = options.history;
    this.catalog = options.catalog;
    this.sender = options.sender ?? null;
    this.languages = options.languages ?? KNOWN_LANGUAGES;
    this.logger = options.logger ?? createModuleLogger('subscriptions');
  }

  /**
   * Create a subscription, reactivate an inactive one, or update an active one
   */
  async subscribe(identity: string, language: string, difficulty: string): Promise<SubscriptionOutcome> {
    const email = this.normalizeIdentity(identity);
    const preferredLanguage = this.parseLanguage(language);
    const preferredDifficulty = parseDifficulty(difficulty);

    const result = await this.directory.subscribe(email, preferredLanguage, preferredDifficulty);
    this.logger.info('Subscriber saved', { identity: email, status: result.status }, 'subscribe');

    const notified = await this.notify(composeWelcomeMessage(email, preferredLanguage, preferredDifficulty));
    return { ...result, notified };
  }

  /**
   * Deactivate a subscriber. History is kept. Returns false when nothing changed.
   */
  async unsubscribe(identity: string): Promise<boolean> {
    const email = this.normalizeIdentity(identity);
    const changed = await this.directory.deactivate(email);
    if (!changed) {
      this.logger.info('Unsubscribe ignored, no active subscription', { identity: email }, 'unsubscribe');
      return false;
    }

    this.logger.info('Subscriber deactivated', { identity: email }, 'unsubscribe');
    await this.notify(composeUnsubscribeMessage(email));
    return true;
  }

  async updatePreferences(identity: string, input: PreferenceInput): Promise<Subscriber> {
    const email = this.normalizeIdentity(identity);
    if (input.language === undefined && input.difficulty === undefined) {
      throw new InvalidInputError('Nothing to update: give a language, a difficulty or both');
    }

    const preferences: SubscriberPreferences = {};
    if (input.language !== undefined) {
      preferences.language = this.parseLanguage(input.language);
    }
    if (input.difficulty !== undefined) {
      preferences.difficulty = parseDifficulty(input.difficulty);
    }

    const updated = await this.directory.updatePreferences(email, preferences);
    if (!updated) {
      throw new InvalidInputError(`Unknown subscriber: ${email}`, { identity: email });
    }
    this.logger.info('Preferences updated', { identity: email, ...preferences }, 'updatePreferences');
    return updated;
  }

  async getSubscriberStats(identity: string): Promise<SubscriberStatsReport> {
    const email = this.normalizeIdentity(identity);
    const subscriber = await this.directory.findByIdentity(email);
    if (!subscriber) {
      throw new InvalidInputError(`Unknown subscriber: ${email}`, { identity: email });
    }
    return { subscriber, stats: await this.history.getSubscriberStats(email) };
  }

  async getSystemStats(): Promise<SystemStats> {
    const [active, total, problemCount, byDifficulty, deliveries] = await Promise.all([
      this.directory.countActive(),
      this.directory.countAll(),
      this.catalog.count(),
      this.catalog.countByDifficulty(),
      this.history.getTotals()
    ]);

    return {
      subscribers: { active, total },
      problems: { total: problemCount, byDifficulty },
      deliveries
    };
  }

  /**
   * Send a courtesy message. A failure is logged, never raised.
   */
  private async notify(message: OutgoingMessage): Promise<boolean> {
    if (!this.sender) {
      return false;
    }
    try {
      await this.sender.send(message);
      return true;
    } catch (error) {
      this.logger.warn('Courtesy message not sent', {
        to: message.to,
        subject: message.subject,
        error: toError(error).message
      }, 'notify');
      return false;
    }
  }

  private normalizeIdentity(identity: string): string {
    const email = identity.trim().toLowerCase();
    if (!email.includes('@')) {
      throw new InvalidInputError(`Invalid email address: "${identity}"`, { identity });
    }
    return email;
  }

  private parseLanguage(value: string): Language {
    const language = value.trim().toLowerCase();
    if (!isKnownLanguage(language) || !this.languages.includes(language)) {
      throw new InvalidInputError(
        `Unsupported language "${value}"; choose one of ${this.languages.join(', ')}`,
        { language: value }
      );
    }
    return language;
  }
}

function parseDifficulty(value: string): DifficultyPreference {
  const difficulty = value.trim().toLowerCase();
  if (!isDifficultyPreference(difficulty)) {
    throw new InvalidInputError(`Unknown difficulty "${value}"; choose easy, medium, hard or any`, { difficulty: value });
  }
  return difficulty;
}
