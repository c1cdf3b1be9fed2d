import { SubscriptionService } from '../../src/delivery/subscription-service';
import { InvalidInputError } from '../../src/system/error-handling';
import {
  FakeSender,
  InMemoryCatalog,
  InMemoryDirectory,
  InMemoryHistory,
  makeProblem,
  makeSubscriber,
  silentLogger
} from '../helpers/fakes';

describe('SubscriptionService', () => {
  let directory: InMemoryDirectory;
  let history: InMemoryHistory;
  let sender: FakeSender;
  let service: SubscriptionService;

  beforeEach(() => {
    directory = new InMemoryDirectory();
    history = new InMemoryHistory();
    sender = new FakeSender();
    service = new SubscriptionService({
      directory,
      history,
      catalog: new InMemoryCatalog([makeProblem('two-sum', 'easy'), makeProblem('merge-intervals', 'medium')]),
      sender,
      languages: ['python', 'java', 'go'],
      logger: silentLogger()
    });
  });

  describe('subscribe', () => {
    it('should normalize input and send a welcome message', async () => {
      const result = await service.subscribe('  Ada@Example.com ', 'Java', 'EASY');

      expect(result.status).toBe('created');
      expect(result.notified).toBe(true);
      expect(result.subscriber).toEqual(expect.objectContaining({
        identity: 'ada@example.com',
        language: 'java',
        difficulty: 'easy',
        active: true
      }));
      expect(sender.sent.map(message => [message.to, message.subject])).toEqual([
        ['ada@example.com', 'Welcome to Daily Coding Challenges']
      ]);
    });

    it('should reactivate an inactive subscriber', async () => {
      directory = new InMemoryDirectory([makeSubscriber('ada@example.com', { active: false })]);
      service = new SubscriptionService({ directory, history, catalog: new InMemoryCatalog(), logger: silentLogger() });

      const result = await service.subscribe('ada@example.com', 'python', 'any');

      expect(result.status).toBe('reactivated');
      expect(result.notified).toBe(false);
    });

    it('should reject an address without @', async () => {
      await expect(service.subscribe('not-an-address', 'python', 'any')).rejects.toThrow('Invalid email address: "not-an-address"');
    });

    it('should reject a language outside the configured set', async () => {
      await expect(service.subscribe('ada@example.com', 'rust', 'any'))
        .rejects.toThrow('Unsupported language "rust"; choose one of python, java, go');
      await expect(service.subscribe('ada@example.com', 'cobol', 'any')).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('should reject an unknown difficulty', async () => {
      await expect(service.subscribe('ada@example.com', 'python', 'extreme'))
        .rejects.toThrow('Unknown difficulty "extreme"; choose easy, medium, hard or any');
    });

    it('should still subscribe when the welcome message fails', async () => {
      sender.failFor.add('ada@example.com');
      const result = await service.subscribe('ada@example.com', 'python', 'any');

      expect(result.status).toBe('created');
      expect(result.notified).toBe(false);
      expect(await directory.findByIdentity('ada@example.com')).not.toBeNull();
    });
  });

  describe('unsubscribe', () => {
    it('should deactivate and confirm', async () => {
      await service.subscribe('ada@example.com', 'python', 'any');

      expect(await service.unsubscribe('ADA@example.com')).toBe(true);
      expect((await directory.findByIdentity('ada@example.com'))?.active).toBe(false);
      expect(sender.sent[1].subject).toBe('Unsubscribed from Daily Coding Challenges');
    });

    it('should report false for an unknown address without sending', async () => {
      expect(await service.unsubscribe('nobody@example.com')).toBe(false);
      expect(sender.sent).toHaveLength(0);
    });
  });

  describe('updatePreferences', () => {
    beforeEach(async () => {
      await service.subscribe('ada@example.com', 'python', 'easy');
    });

    it('should change only what is given', async () => {
      const updated = await service.updatePreferences('ada@example.com', { difficulty: 'hard' });
      expect(updated.language).toBe('python');
      expect(updated.difficulty).toBe('hard');
    });

    it('should require at least one preference', async () => {
      await expect(service.updatePreferences('ada@example.com', {}))
        .rejects.toThrow('Nothing to update: give a language, a difficulty or both');
    });

    it('should reject an unknown subscriber', async () => {
      await expect(service.updatePreferences('bob@example.com', { language: 'go' }))
        .rejects.toThrow('Unknown subscriber: bob@example.com');
    });
  });

  describe('statistics', () => {
    it('should report subscriber statistics', async () => {
      await service.subscribe('ada@example.com', 'python', 'any');
      await history.record({
        subscriber_id: 'ada@example.com',
        problem_id: 'two-sum',
        run_id: 'run-1',
        attempted_at: new Date('2024-03-01T09:00:00.000Z'),
        outcome: 'success',
        stage: null,
        reason: null,
        degraded: false,
        language: 'python'
      });

      const report = await service.getSubscriberStats('ada@example.com');
      expect(report.subscriber.identity).toBe('ada@example.com');
      expect(report.stats.totalDelivered).toBe(1);
      expect(report.stats.lastDeliveredAt).toEqual(new Date('2024-03-01T09:00:00.000Z'));
    });

    it('should reject statistics for an unknown subscriber', async () => {
      await expect(service.getSubscriberStats('bob@example.com')).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('should summarize the system', async () => {
      await service.subscribe('ada@example.com', 'python', 'any');
      await service.subscribe('bob@example.com', 'go', 'medium');
      await service.unsubscribe('bob@example.com');

      expect(await service.getSystemStats()).toEqual({
        subscribers: { active: 1, total: 2 },
        problems: { total: 2, byDifficulty: { easy: 1, medium: 1, hard: 0 } },
        deliveries: { successful: 0, failed: 0 }
      });
    });
  });
});
