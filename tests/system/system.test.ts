import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Language } from '../../src/system/config/languages';
import type { ProblemPayload, Solution, SolutionGenerator } from '../../src/delivery/types';
import { ConfigManager } from '../../src/system/config';
import { ConfigurationError } from '../../src/system/error-handling';
import { DeliverySystem } from '../../src/system/system';
import { FakeEmbellisher, FakeGenerator, FakeSender, makeSolution, silentLogger } from '../helpers/fakes';

const CATALOG_FILE = path.resolve(__dirname, '../../data/problems.json');

describe('DeliverySystem', () => {
  let sender: FakeSender;
  let system: DeliverySystem;

  beforeEach(() => {
    sender = new FakeSender();
    system = new DeliverySystem({
      configManager: new ConfigManager({ env: { DATABASE_PATH: ':memory:' } }),
      generator: new FakeGenerator(),
      embellisher: new FakeEmbellisher(),
      sender,
      logger: silentLogger()
    });
  });

  afterEach(async () => {
    await system.shutdown();
  });

  it('should load the catalog idempotently', async () => {
    expect(await system.loadCatalog(CATALOG_FILE)).toEqual({ inserted: 5, updated: 0, total: 5 });
    expect(await system.loadCatalog(CATALOG_FILE)).toEqual({ inserted: 0, updated: 5, total: 5 });
  });

  it('should deliver each subscriber a new problem per run', async () => {
    await system.loadCatalog(CATALOG_FILE);
    const subscriptions = system.getSubscriptionService();
    expect((await subscriptions.subscribe('ada@example.com', 'python', 'easy')).notified).toBe(true);
    await subscriptions.subscribe('bob@example.com', 'go', 'hard');
    sender.sent = [];

    const coordinator = system.getCoordinator();
    const first = await coordinator.runOnce(new Date('2024-03-01T09:00:00.000Z'));

    expect(first.entries.map(entry => [entry.subscriberId, entry.status, entry.problemId])).toEqual([
      ['ada@example.com', 'success', 'two-sum'],
      ['bob@example.com', 'success', 'trapping-rain-water']
    ]);
    expect(sender.sent.find(message => message.to === 'ada@example.com')?.subject).toBe(
      '🟢 Daily Coding Challenge: Two Sum (2024-03-01)'
    );

    const second = await coordinator.runOnce(new Date('2024-03-02T09:00:00.000Z'));

    expect(second.entries.map(entry => [entry.subscriberId, entry.status, entry.problemId])).toEqual([
      ['ada@example.com', 'success', 'valid-parentheses'],
      ['bob@example.com', 'no-content-available', null]
    ]);
    expect((await system.history.getSubscriberStats('ada@example.com')).totalDelivered).toBe(2);
  });

  it('should report component health', async () => {
    await system.loadCatalog(CATALOG_FILE);

    const health = await system.getHealth();

    expect(health.healthy).toBe(true);
    expect(Object.keys(health.components)).toEqual([
      'storage',
      'subscriberDirectory',
      'problemCatalog',
      'deliveryHistory',
      'generation',
      'email'
    ]);
    expect(health.components.problemCatalog).toEqual({ healthy: true, message: '5 problems' });
    expect(health.components.subscriberDirectory).toEqual({ healthy: true, message: '0 active subscribers' });
  });

  it('should report an unhealthy collaborator', async () => {
    sender.healthy = false;

    const health = await system.getHealth();

    expect(health.healthy).toBe(false);
    expect(health.components.email.healthy).toBe(false);
  });

  it('should require generation credentials only when content is produced', async () => {
    const bare = new DeliverySystem({
      configManager: new ConfigManager({ env: { DATABASE_PATH: ':memory:' } }),
      logger: silentLogger()
    });
    try {
      await bare.initialize();
      const outcome = await bare.getSubscriptionService().subscribe('ada@example.com', 'python', 'any');

      expect(outcome.notified).toBe(false);
      expect(() => bare.getCoordinator()).toThrow(ConfigurationError);
      expect(() => bare.getCoordinator()).toThrow('generation.apiKey: GENERATION_API_KEY is required');
    } finally {
      await bare.shutdown();
    }
  });

  describe('two processes on one database file', () => {
    let directory: string;
    let other: DeliverySystem;

    const onFile = (generator: SolutionGenerator): DeliverySystem => new DeliverySystem({
      configManager: new ConfigManager({ env: { DATABASE_PATH: path.join(directory, 'delivery.db') } }),
      generator,
      embellisher: new FakeEmbellisher(),
      sender,
      logger: silentLogger()
    });

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'daily-problems-'));
    });

    afterEach(async () => {
      await system.shutdown();
      await other.shutdown();
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should let only one of two overlapping runs deliver', async () => {
      let open: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        open = resolve;
      });
      let markStarted: () => void = () => undefined;
      const generating = new Promise<void>(resolve => {
        markStarted = resolve;
      });
      const gated: SolutionGenerator = {
        generate: async (_problem: ProblemPayload, language: Language): Promise<Solution> => {
          markStarted();
          await gate;
          return makeSolution(language);
        },
        healthCheck: async () => true
      };

      await system.shutdown();
      system = onFile(gated);
      other = onFile(new FakeGenerator());
      await system.loadCatalog(CATALOG_FILE);
      await other.initialize();
      await system.getSubscriptionService().subscribe('ada@example.com', 'python', 'easy');
      sender.sent = [];

      const first = system.createScheduler().triggerNow();
      await generating;
      const second = await other.createScheduler().triggerNow();
      open();
      const firstOutcome = await first;

      expect(second).toEqual({ status: 'skipped', reason: 'run-in-progress' });
      expect(firstOutcome.status).toBe('completed');
      expect(sender.sent.map(message => message.to)).toEqual(['ada@example.com']);
      expect(await system.runLock.holder()).toBeNull();
      expect(await other.history.getTotals()).toEqual({ successful: 1, failed: 0 });
    });
  });
});
