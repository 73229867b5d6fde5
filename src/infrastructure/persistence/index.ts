export { FileRolloutStore, HISTORY_FILE } from './file-store';
export { InMemoryRolloutStore } from './memory-store';
export { createRolloutStore } from './store-factory';
