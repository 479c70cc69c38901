/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * In our DI system (tsyringe), every injectable dependency needs a unique
 * identifier so the container knows "when someone asks for X, give them Y."
 *
 * Think of these tokens as **name badges at a conference**. When the
 * orchestrator says "I need the DatasetStore", it holds up the
 * TOKENS.DatasetStore badge, and the container matches it to the registered
 * implementation (ChunkedFileStore).
 *
 * Symbols rather than strings: no accidental collision with a random "Logger"
 * string elsewhere, and they stay out of JSON.stringify output.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Logger: Symbol.for('Logger'),
  HttpClient: Symbol.for('HttpClient'),

  // Storage — the data lake contract
  DatasetStore: Symbol.for('DatasetStore'),

  // Adapters — one per upstream source
  AdapterRegistry: Symbol.for('AdapterRegistry'),

  // Services — application-level orchestrators
  OrchestratorOptions: Symbol.for('OrchestratorOptions'),
  UpdateOrchestrator: Symbol.for('UpdateOrchestrator'),
  UpdateScheduler: Symbol.for('UpdateScheduler'),
  DividendSimulator: Symbol.for('DividendSimulator'),
} as const;
