import { describe, it, expect } from '@jest/globals';
import { TrackerStorageFactory } from '../../../../src/modules/storage/storage/tracker-storage.factory.js';
import { InMemoryTrackerStorage } from '../../../../src/modules/storage/storage/in-memory-tracker-storage.js';

describe('TrackerStorageFactory', () => {
  it('should create in-memory storage by default', () => {
    expect(TrackerStorageFactory.create()).toBeInstanceOf(InMemoryTrackerStorage);
    expect(TrackerStorageFactory.create({ type: 'memory' })).toBeInstanceOf(InMemoryTrackerStorage);
  });

  it('should fall back to memory when redis has no URL', () => {
    expect(TrackerStorageFactory.create({ type: 'redis' })).toBeInstanceOf(InMemoryTrackerStorage);
  });
});
