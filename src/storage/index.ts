import { IMessageStore } from '../core/interfaces.js';
import { StorageConfig } from '../core/types.js';
import { Logger } from '../utils/Logger.js';
import { InMemoryMessageStore } from './InMemoryMessageStore.js';

/**
 * Builds the message store selected by the storage config.
 */
export function createMessageStore(config: StorageConfig, logger: Logger): IMessageStore {
  switch (config.type) {
    case 'memory':
      return new InMemoryMessageStore(logger, { maxPageSize: config.maxPageSize });
    default: {
      const backend: never = config.type;
      throw new Error(`Unsupported storage backend: ${String(backend)}`);
    }
  }
}

export { InMemoryMessageStore };
