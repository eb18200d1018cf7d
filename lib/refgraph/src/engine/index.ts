export { PersistenceEngine } from './persistence-engine';
export { Repository } from './repository';
export { HookManager } from './hook-manager';
