import { Logger } from '../../common/logger.js';
import { daysBetween, toDateKey } from '../../common/utils/calendar.util.js';
import type { TrackerStorage } from '../storage/interfaces/tracker-storage.interface.js';
import type { StreakInfo } from '../storage/interfaces/tracker-state.interface.js';

/**
 * Next streak value for a publication on `today`:
 * - no previous publication: 1
 * - already published today: unchanged (at least 1)
 * - published yesterday: +1
 * - anything else, a last publication after today included: back to 1
 */
export function nextStreak(current: StreakInfo, today: string): number {
  if (current.lastPublishDate === null) {
    return 1;
  }

  const delta = daysBetween(current.lastPublishDate, today);

  if (delta === 0) {
    return Math.max(current.currentStreak, 1);
  }
  if (delta === 1) {
    return current.currentStreak + 1;
  }
  return 1;
}

/**
 * Calendar based publishing streak
 */
export class StreakService {
  private readonly logger = new Logger(StreakService.name);
  private readonly storage: TrackerStorage;
  private readonly timeZone: string;

  constructor(params: { storage: TrackerStorage; timeZone: string }) {
    this.storage = params.storage;
    this.timeZone = params.timeZone;
  }

  /**
   * Account for a newly detected article and return the updated streak
   */
  public async recordPublication(now: Date): Promise<number> {
    const today = toDateKey(now, this.timeZone);
    const current = await this.storage.getStreak();
    const streak = nextStreak(current, today);

    if (current.lastPublishDate === null) {
      this.logger.log(`First article ever! Streak: ${streak}`);
    } else {
      const delta = daysBetween(current.lastPublishDate, today);
      if (delta === 0) {
        this.logger.debug(`Same day publish. Streak unchanged: ${streak}`);
      } else if (delta === 1) {
        this.logger.log(`Consecutive day! Streak: ${streak} 🔥`);
      } else if (delta < 0) {
        this.logger.warn(
          `Last publish date ${current.lastPublishDate} is after today (${today}). Streak reset to: ${streak}`,
        );
      } else {
        this.logger.log(`Missed ${delta - 1} day(s). Streak reset to: ${streak}`);
      }
    }

    await this.storage.setStreak({ currentStreak: streak, lastPublishDate: today });
    return streak;
  }

  public async getStreak(): Promise<StreakInfo> {
    return this.storage.getStreak();
  }
}
