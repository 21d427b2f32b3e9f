/**
 * Source handler registry
 * Handlers register themselves by source type when their module loads
 */

import { SourceConfig } from '../../config/types';
import { RawRecord } from '../../state/types';

export interface DiscoverRequest {
  query: string;
  location: string;
  limit: number;
  signal?: AbortSignal;
}

// Source handler interface
export interface SourceHandler {
  discover(source: SourceConfig, request: DiscoverRequest): AsyncGenerator<RawRecord>;
}

export type SourceHandlers = ReadonlyMap<string, SourceHandler>;

const sourceHandlers = new Map<string, SourceHandler>();

export function registerSourceHandler(type: SourceConfig['type'], handler: SourceHandler): void {
  sourceHandlers.set(type, handler);
}

export function registeredSourceHandlers(): SourceHandlers {
  return sourceHandlers;
}
