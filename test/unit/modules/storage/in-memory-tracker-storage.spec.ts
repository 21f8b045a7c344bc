import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemoryTrackerStorage } from '../../../../src/modules/storage/storage/in-memory-tracker-storage.js';
import { createTrackedArticle } from '../../../helpers/fixtures.js';

describe('InMemoryTrackerStorage', () => {
  let storage: InMemoryTrackerStorage;

  beforeEach(async () => {
    storage = new InMemoryTrackerStorage();
    await storage.init();
  });

  describe('insertArticle', () => {
    it('should record the article and count it for the day', async () => {
      const article = createTrackedArticle('first', '2024-10-15T03:00:00.000Z');

      await expect(storage.insertArticle(article, '2024-10-15')).resolves.toBe(true);

      await expect(storage.hasArticle(article.url)).resolves.toBe(true);
      await expect(storage.getDailyStats('2024-10-15')).resolves.toEqual({
        date: '2024-10-15',
        articleCount: 1,
        earnedCents: 415,
      });
    });

    it('should ignore a URL it already knows', async () => {
      const article = createTrackedArticle('first', '2024-10-15T03:00:00.000Z');
      await storage.insertArticle(article, '2024-10-15');

      await expect(
        storage.insertArticle({ ...article, earningCents: 999 }, '2024-10-16'),
      ).resolves.toBe(false);

      await expect(storage.getDailyStats('2024-10-16')).resolves.toBeNull();
      await expect(storage.getTotals()).resolves.toEqual({ articleCount: 1, earnedCents: 415 });
    });
  });

  describe('getDailyStatsRange', () => {
    it('should return recorded days in range, oldest first', async () => {
      await storage.insertArticle(createTrackedArticle('c', '2024-10-20T00:00:00.000Z'), '2024-10-20');
      await storage.insertArticle(createTrackedArticle('a', '2024-10-01T00:00:00.000Z'), '2024-10-01');
      await storage.insertArticle(createTrackedArticle('b', '2024-10-10T00:00:00.000Z'), '2024-10-10');
      await storage.insertArticle(createTrackedArticle('d', '2024-09-30T00:00:00.000Z'), '2024-09-30');

      const rows = await storage.getDailyStatsRange('2024-10-01', '2024-10-20');

      expect(rows.map(row => row.date)).toEqual(['2024-10-01', '2024-10-10', '2024-10-20']);
    });
  });

  describe('getRecentArticles', () => {
    beforeEach(async () => {
      await storage.insertArticle(createTrackedArticle('old', '2024-10-14T01:00:00.000Z'), '2024-10-14');
      await storage.insertArticle(createTrackedArticle('new', '2024-10-15T01:00:00.000Z'), '2024-10-15');
      await storage.insertArticle(createTrackedArticle('newer', '2024-10-15T01:00:00.000Z'), '2024-10-15');
    });

    it('should list newest first, later inserts winning ties', async () => {
      const articles = await storage.getRecentArticles(10);

      expect(articles.map(article => article.title)).toEqual(['newer', 'new', 'old']);
    });

    it('should page with limit and offset', async () => {
      const articles = await storage.getRecentArticles(1, 1);

      expect(articles.map(article => article.title)).toEqual(['new']);
    });

    it('should return copies', async () => {
      const [article] = await storage.getRecentArticles(1);
      if (article) {
        article.title = 'changed';
      }

      const [again] = await storage.getRecentArticles(1);
      expect(again?.title).toBe('newer');
    });
  });

  describe('streak', () => {
    it('should start with no streak', async () => {
      await expect(storage.getStreak()).resolves.toEqual({
        currentStreak: 0,
        lastPublishDate: null,
      });
    });

    it('should store the streak', async () => {
      await storage.setStreak({ currentStreak: 4, lastPublishDate: '2024-10-15' });

      await expect(storage.getStreak()).resolves.toEqual({
        currentStreak: 4,
        lastPublishDate: '2024-10-15',
      });
    });
  });
});
