export { createPersistence } from './create-persistence';
export type { PersistenceDefinition, PersistenceOperator, ProviderRegistry } from './operator-types';
