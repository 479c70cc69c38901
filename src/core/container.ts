/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token maps to a
 * concrete implementation, so when the orchestrator says "I need the
 * DatasetStore", the container hands back the ChunkedFileStore built here.
 *
 * How tsyringe works:
 *   - `reflect-metadata` must be imported first; it lets the decorators
 *     (@inject, @injectable) record constructor parameters at runtime.
 *   - `useValue` registers a pre-built instance (logger, HTTP client, store).
 *   - `useFactory` builds a value on first resolve from other registrations.
 *   - `registerSingleton` constructs the class once and caches it. The
 *     scheduler must be a singleton: the server starts it and the admin
 *     routes report on that same instance.
 *
 * Tests override any token by registering again after importing this
 * module; tsyringe resolves the last registration.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { TOKENS } from './types';
import { config } from './config';
import { logger } from './logger';

import { createAdapterRegistry } from '@application/adapters/registry';
import { DividendSimulator } from '@application/services/DividendSimulator';
import { type OrchestratorOptions, UpdateOrchestrator } from '@application/services/UpdateOrchestrator';
import { UpdateScheduler } from '@application/services/UpdateScheduler';
import { createHttpClient, type HttpClient } from '@infrastructure/http/httpClient';
import { ChunkedFileStore } from '@infrastructure/storage/ChunkedFileStore';

container.register(TOKENS.Logger, { useValue: logger });

container.register(TOKENS.HttpClient, {
  useValue: createHttpClient({ timeoutMs: config.update.fetchTimeoutMs }),
});

container.register(TOKENS.DatasetStore, {
  useValue: new ChunkedFileStore({
    rootDir: config.store.dataDir,
    maxSegmentBytes: config.store.maxSegmentBytes,
    defaultFormat: config.store.format,
  }),
});

container.register(TOKENS.AdapterRegistry, {
  useFactory: (c) => createAdapterRegistry(c.resolve<HttpClient>(TOKENS.HttpClient)),
});

container.register<OrchestratorOptions>(TOKENS.OrchestratorOptions, {
  useValue: {
    freshnessWindowMs: config.update.freshnessWindowMs,
    runTimeoutMs: config.update.runTimeoutMs,
    format: config.store.format,
  },
});

container.registerSingleton(TOKENS.UpdateOrchestrator, UpdateOrchestrator);
container.registerSingleton(TOKENS.UpdateScheduler, UpdateScheduler);
container.registerSingleton(TOKENS.DividendSimulator, DividendSimulator);

export { container };
