/**
 * Foursquare Places discovery source
 * Map search producer; records are tagged map_search
 */

import { z } from 'zod';
import { SourceHandler, DiscoverRequest, registerSourceHandler } from '../registry';
import { SourceConfig } from '../../../config/types';
import { MAP_SEARCH, RawRecord } from '../../../state/types';
import { logger } from '../../../lib/logger';
import { FetchFn, fetchJson } from './http';

const PLACES_API_BASE = 'https://places-api.foursquare.com';
const PLACES_API_VERSION = '2025-06-17';
// Foursquare caps page size at 50
const MAX_PAGE_SIZE = 50;

const locationSchema = z
  .object({
    formatted_address: z.string().optional(),
    address: z.string().optional(),
    locality: z.string().optional(),
    region: z.string().optional(),
    postcode: z.string().optional(),
    country: z.string().optional(),
  })
  .passthrough();

const placeSchema = z
  .object({
    fsq_id: z.string().optional(),
    fsq_place_id: z.string().optional(),
    name: z.string().optional(),
    location: locationSchema.optional(),
    tel: z.string().optional(),
    website: z.string().optional(),
    email: z.string().optional(),
    contact: z.object({ phone: z.string().optional(), website: z.string().optional() }).partial().optional(),
    categories: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
    rating: z.number().optional(),
    distance: z.number().optional(),
  })
  .passthrough();

const searchResponseSchema = z.object({ results: z.array(placeSchema).default([]) });

export type FoursquarePlace = z.infer<typeof placeSchema>;

function formatAddress(location: z.infer<typeof locationSchema> | undefined): string | undefined {
  if (!location) return undefined;
  if (location.formatted_address) return location.formatted_address;
  const parts = [location.address, location.locality, location.region, location.postcode, location.country];
  const joined = parts.filter((part): part is string => Boolean(part)).join(', ');
  return joined || undefined;
}

// Foursquare rates 0-10; leads carry 0-5
export function placeToRecord(place: FoursquarePlace): RawRecord {
  return {
    name: place.name,
    address: formatAddress(place.location),
    phone: place.tel ?? place.contact?.phone,
    website: place.website ?? place.contact?.website,
    email: place.email,
    category: place.categories?.[0]?.name,
    rating: place.rating === undefined ? undefined : Math.round((place.rating / 2) * 10) / 10,
    sourceProvider: MAP_SEARCH,
    fsqId: place.fsq_place_id ?? place.fsq_id,
    distance: place.distance,
  };
}

export interface FoursquareOptions {
  apiKey?: string;
  fetch?: FetchFn;
}

export function createFoursquareHandler(options: FoursquareOptions = {}): SourceHandler {
  const fetchFn = options.fetch ?? fetch;

  return {
    async *discover(source: SourceConfig, request: DiscoverRequest): AsyncGenerator<RawRecord> {
      const apiKey = options.apiKey ?? process.env.FOURSQUARE_API_KEY ?? '';
      if (!apiKey) {
        throw new Error('FOURSQUARE_API_KEY not set');
      }

      const params = new URLSearchParams({
        query: request.query,
        near: request.location,
        radius: String(Math.min(source.radius, 100000)),
        limit: String(Math.min(request.limit, MAX_PAGE_SIZE)),
      });
      const url = `${source.baseUrl ?? PLACES_API_BASE}/places/search?${params.toString()}`;

      logger.info(`Searching Foursquare: ${request.query} near ${request.location}`);

      const data = await fetchJson(
        fetchFn,
        'foursquare',
        url,
        {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Authorization: `Bearer ${apiKey}`,
            'X-Places-Api-Version': PLACES_API_VERSION,
          },
        },
        searchResponseSchema,
        source.timeoutMs,
        request.signal
      );

      logger.info(`Found ${data.results.length} places on Foursquare`);
      for (const place of data.results.slice(0, request.limit)) {
        yield placeToRecord(place);
      }
    },
  };
}

registerSourceHandler('foursquare', createFoursquareHandler());
