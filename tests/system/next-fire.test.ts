import { computeNextFireTime, computePreviousFireTime, toCronExpression, validateSchedule } from '../../src/system/scheduler/next-fire';

describe('daily schedule', () => {
  it('should build a daily cron expression', () => {
    expect(toCronExpression({ hour: 9, minute: 5, timezone: 'UTC' })).toBe('5 9 * * *');
  });

  describe('computeNextFireTime', () => {
    it('should return the same day when the time is still ahead', () => {
      const next = computeNextFireTime({ hour: 9, minute: 0, timezone: 'UTC' }, new Date('2024-03-01T08:00:00.000Z'));
      expect(next).toEqual(new Date('2024-03-01T09:00:00.000Z'));
    });

    it('should be strictly after the reference time', () => {
      const next = computeNextFireTime({ hour: 9, minute: 0, timezone: 'UTC' }, new Date('2024-03-01T09:00:00.000Z'));
      expect(next).toEqual(new Date('2024-03-02T09:00:00.000Z'));
    });

    it('should honor the timezone', () => {
      const schedule = { hour: 9, minute: 0, timezone: 'America/New_York' };
      expect(computeNextFireTime(schedule, new Date('2024-03-01T00:00:00.000Z'))).toEqual(new Date('2024-03-01T14:00:00.000Z'));
      expect(computeNextFireTime(schedule, new Date('2024-03-10T12:00:00.000Z'))).toEqual(new Date('2024-03-10T13:00:00.000Z'));
    });
  });

  describe('computePreviousFireTime', () => {
    const schedule = { hour: 9, minute: 0, timezone: 'UTC' };

    it('should return the slot a slightly late tick belongs to', () => {
      expect(computePreviousFireTime(schedule, new Date('2024-03-02T09:00:00.200Z'))).toEqual(new Date('2024-03-02T09:00:00.000Z'));
    });

    it('should include a tick exactly on its slot', () => {
      expect(computePreviousFireTime(schedule, new Date('2024-03-02T09:00:00.000Z'))).toEqual(new Date('2024-03-02T09:00:00.000Z'));
    });

    it('should fall back to the previous day before the time of day', () => {
      expect(computePreviousFireTime(schedule, new Date('2024-03-02T08:59:59.000Z'))).toEqual(new Date('2024-03-01T09:00:00.000Z'));
    });
  });

  describe('validateSchedule', () => {
    it('should accept a valid schedule', () => {
      expect(validateSchedule({ hour: 23, minute: 59, timezone: 'Asia/Tokyo' })).toEqual([]);
    });

    it('should list every problem', () => {
      expect(validateSchedule({ hour: 24, minute: 7.5, timezone: 'Nowhere/Special' })).toEqual([
        'scheduler hour must be an integer between 0 and 23 (got 24)',
        'scheduler minute must be an integer between 0 and 59 (got 7.5)',
        'scheduler timezone is not a valid IANA timezone: "Nowhere/Special"'
      ]);
    });
  });
});
