export { createInMemoryMessageRepository, type InMemoryMessageRepositoryDeps } from './messageRepositoryAdapter';
export { createInMemoryMessageStore, seedApplication, type InMemoryMessageStore } from './store';
