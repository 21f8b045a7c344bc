import { describe, it, expect, beforeEach } from '@jest/globals';
import { StreakService, nextStreak } from '../../../../src/modules/streak/streak.service.js';
import { InMemoryTrackerStorage } from '../../../../src/modules/storage/storage/in-memory-tracker-storage.js';
import { FIXED_NOW } from '../../../helpers/fixtures.js';

const DAY_MS = 86_400_000;

describe('nextStreak', () => {
  it('should start at 1 without a previous publication', () => {
    expect(nextStreak({ currentStreak: 0, lastPublishDate: null }, '2024-10-15')).toBe(1);
  });

  it('should keep the streak on the same day', () => {
    expect(nextStreak({ currentStreak: 4, lastPublishDate: '2024-10-15' }, '2024-10-15')).toBe(4);
  });

  it('should never return 0 on the same day', () => {
    expect(nextStreak({ currentStreak: 0, lastPublishDate: '2024-10-15' }, '2024-10-15')).toBe(1);
  });

  it('should extend the streak on the next day', () => {
    expect(nextStreak({ currentStreak: 4, lastPublishDate: '2024-10-14' }, '2024-10-15')).toBe(5);
    expect(nextStreak({ currentStreak: 9, lastPublishDate: '2024-09-30' }, '2024-10-01')).toBe(10);
  });

  it('should reset after a missed day', () => {
    expect(nextStreak({ currentStreak: 4, lastPublishDate: '2024-10-13' }, '2024-10-15')).toBe(1);
  });

  it('should reset the streak when the last publication lies after today', () => {
    expect(nextStreak({ currentStreak: 3, lastPublishDate: '2024-10-16' }, '2024-10-15')).toBe(1);
  });
});

describe('StreakService', () => {
  let storage: InMemoryTrackerStorage;
  let service: StreakService;

  beforeEach(() => {
    storage = new InMemoryTrackerStorage();
    service = new StreakService({ storage, timeZone: 'Asia/Jakarta' });
  });

  it('should follow publications across days', async () => {
    await expect(service.recordPublication(FIXED_NOW)).resolves.toBe(1);
    await expect(service.recordPublication(new Date(FIXED_NOW.getTime() + 3_600_000))).resolves.toBe(1);
    await expect(service.recordPublication(new Date(FIXED_NOW.getTime() + DAY_MS))).resolves.toBe(2);
    await expect(service.recordPublication(new Date(FIXED_NOW.getTime() + 4 * DAY_MS))).resolves.toBe(1);

    await expect(service.getStreak()).resolves.toEqual({
      currentStreak: 1,
      lastPublishDate: '2024-10-19',
    });
  });

  it('should use the configured time zone for day boundaries', async () => {
    // 23:30 and 00:30 the next day in Jakarta
    await service.recordPublication(new Date('2024-10-14T16:30:00.000Z'));
    await expect(service.recordPublication(new Date('2024-10-14T17:30:00.000Z'))).resolves.toBe(2);

    await expect(service.getStreak()).resolves.toEqual({
      currentStreak: 2,
      lastPublishDate: '2024-10-15',
    });
  });

  it('should restart from today when the stored date is ahead of it', async () => {
    await storage.setStreak({ currentStreak: 5, lastPublishDate: '2024-10-20' });

    await expect(service.recordPublication(FIXED_NOW)).resolves.toBe(1);
    await expect(service.getStreak()).resolves.toEqual({
      currentStreak: 1,
      lastPublishDate: '2024-10-15',
    });
  });
});
