/**
 * Adapter Composition
 * Layer: Application (adapters)
 *
 * Sources differ only in two places: how the raw payload is fetched and how
 * it is turned into FundRecords. So an adapter is not a subclass of anything:
 * it is those two functions plus a name, glued into IDataSourceAdapter here.
 *
 *   const adapter = defineAdapter({ name, fetch, parse }, { http });
 *
 * `run()` hops through the event loop between fetch and parse. Parsing is
 * synchronous; without the hop, a source whose response lands first would
 * parse its whole payload before any sibling fetch callbacks get a turn.
 */
import type { IDataSourceAdapter, ParseResult } from '@domain/interfaces/IDataSourceAdapter';
import type { HttpClient } from '@infrastructure/http/httpClient';

export interface AdapterContext {
  http: HttpClient;
}

export interface AdapterDefinition<TRaw> {
  name: string;
  fetch(context: AdapterContext): Promise<TRaw>;
  parse(raw: TRaw): ParseResult;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function defineAdapter<TRaw>(
  definition: AdapterDefinition<TRaw>,
  context: AdapterContext,
): IDataSourceAdapter<TRaw> {
  return {
    identity: () => definition.name,
    fetch: () => definition.fetch(context),
    parse: (raw) => definition.parse(raw),
    async run() {
      const raw = await definition.fetch(context);
      await yieldToEventLoop();
      return definition.parse(raw);
    },
  };
}
