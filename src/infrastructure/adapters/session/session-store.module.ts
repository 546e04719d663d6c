import { Module } from '@nestjs/common';
import { SESSION_STORE } from '@application/ports/outbound';
import { InMemorySessionStore } from './in-memory-session-store';

/**
 * Binds the session store port. The store lives as long as the process,
 * so every module importing this one shares the same sessions.
 */
@Module({
  providers: [
    InMemorySessionStore,
    {
      provide: SESSION_STORE,
      useExisting: InMemorySessionStore,
    },
  ],
  exports: [SESSION_STORE],
})
export class SessionStoreModule {}
