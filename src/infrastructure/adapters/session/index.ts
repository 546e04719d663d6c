export { InMemorySessionStore } from './in-memory-session-store';
export { SessionStoreModule } from './session-store.module';
