/**
 * Adapter Registry
 *
 * The fixed list of sources the orchestrator updates. Adding a provider
 * means writing its `{ name, fetch, parse }` definition and listing it here.
 */
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { HttpClient } from '@infrastructure/http/httpClient';

import { defineAdapter } from './defineAdapter';
import { alphaArchitectSource } from './sources/alphaArchitect';
import { goldmanSachsSource } from './sources/goldmanSachs';
import { isharesSource } from './sources/ishares';

export function createAdapterRegistry(http: HttpClient): IDataSourceAdapter[] {
  const context = { http };
  return [
    defineAdapter(isharesSource, context),
    defineAdapter(goldmanSachsSource, context),
    defineAdapter(alphaArchitectSource, context),
  ];
}
