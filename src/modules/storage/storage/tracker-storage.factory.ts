import type { StorageConfig } from '../../../config/tracker-config.interface.js';
import type { TrackerStorage } from '../interfaces/tracker-storage.interface.js';
import { InMemoryTrackerStorage } from './in-memory-tracker-storage.js';
import { RedisTrackerStorage } from './redis-tracker-storage.js';
import { Logger } from '../../../common/logger.js';

/**
 * Factory for creating the appropriate TrackerStorage based on configuration
 */
export class TrackerStorageFactory {
  private static readonly logger = new Logger('TrackerStorageFactory');

  public static create(config?: StorageConfig): TrackerStorage {
    const type = config?.type ?? 'memory';

    switch (type) {
      case 'redis':
        if (!config?.url) {
          this.logger.warn('Redis URL not provided, falling back to memory storage');
          return new InMemoryTrackerStorage();
        }
        this.logger.log(`Using Redis tracker storage: ${config.url}`);
        return new RedisTrackerStorage(config.url);

      case 'memory':
      default:
        this.logger.log('Using in-memory tracker storage');
        return new InMemoryTrackerStorage();
    }
  }
}
