/**
 * OpenStreetMap discovery source
 * Geocodes the location with Nominatim, pulls named amenity/shop nodes from Overpass,
 * and keeps one representative per 150 m cluster. Records are tagged cluster_search.
 */

import { z } from 'zod';
import { SourceHandler, DiscoverRequest, registerSourceHandler } from '../registry';
import { SourceConfig } from '../../../config/types';
import { CLUSTER_SEARCH, RawRecord } from '../../../state/types';
import { logger } from '../../../lib/logger';
import { FetchFn, USER_AGENT, fetchJson } from './http';

const OVERPASS_URL = 'https://overpass-api.de/api/interpreter';
const NOMINATIM_URL = 'https://nominatim.openstreetmap.org/search';
const CLUSTER_THRESHOLD_M = 150;

const geocodeSchema = z.array(z.object({ lat: z.coerce.number(), lon: z.coerce.number() }).passthrough());

const elementSchema = z
  .object({
    id: z.number().optional(),
    lat: z.number().optional(),
    lon: z.number().optional(),
    tags: z.record(z.string()).optional(),
  })
  .passthrough();

const overpassResponseSchema = z.object({ elements: z.array(elementSchema).default([]) });

export type OverpassElement = z.infer<typeof elementSchema>;

export interface OsmBusiness {
  record: RawRecord;
  lat?: number;
  lon?: number;
}

export function haversineMeters(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const R = 6371000;
  const toRad = (deg: number): number => (deg * Math.PI) / 180;
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);
  const a = Math.sin(dLat / 2) ** 2 + Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * R * Math.asin(Math.sqrt(a));
}

export function buildOverpassQuery(lat: number, lon: number, radius: number, query: string): string {
  // Keyword filter on the category tags; an empty query takes every amenity and shop
  const filter = query.trim() ? `~"${query.trim().replace(/["\\]/g, '')}",i` : '';
  return `[out:json][timeout:25];
(
  node(around:${radius},${lat},${lon})["amenity"${filter}]["name"];
  node(around:${radius},${lat},${lon})["shop"${filter}]["name"];
  node(around:${radius},${lat},${lon})["office"${filter}]["name"];
);
out body;`;
}

export function elementToBusiness(element: OverpassElement, cityFallback: string): OsmBusiness | null {
  const tags = element.tags ?? {};
  if (!tags.name) return null;

  const parts = [
    tags['addr:housenumber'],
    tags['addr:street'],
    tags['addr:city'] ?? cityFallback,
    tags['addr:state'],
    tags['addr:postcode'],
    tags['addr:country'],
  ];

  return {
    record: {
      name: tags.name,
      address: parts.filter((part): part is string => Boolean(part)).join(', '),
      phone: tags.phone ?? tags['contact:phone'],
      website: tags.website ?? tags['contact:website'],
      email: tags.email ?? tags['contact:email'],
      category: tags.amenity ?? tags.shop ?? tags.office,
      sourceProvider: CLUSTER_SEARCH,
      osmId: element.id,
      established: tags.start_date,
    },
    lat: element.lat,
    lon: element.lon,
  };
}

function contactScore(business: OsmBusiness): number {
  const { record } = business;
  return [record.address, record.phone, record.website, record.email, record.category].filter(Boolean).length;
}

// Nodes within the threshold of a cluster's first member join that cluster
export function clusterBusinesses(businesses: OsmBusiness[], thresholdM = CLUSTER_THRESHOLD_M): OsmBusiness[][] {
  const clusters: OsmBusiness[][] = [];

  for (const business of businesses) {
    const { lat, lon } = business;
    const home =
      lat === undefined || lon === undefined
        ? undefined
        : clusters.find((cluster) => {
            const rep = cluster[0];
            return (
              rep.lat !== undefined &&
              rep.lon !== undefined &&
              haversineMeters(lat, lon, rep.lat, rep.lon) <= thresholdM
            );
          });

    if (home) {
      home.push(business);
    } else {
      clusters.push([business]);
    }
  }

  return clusters;
}

export function representative(cluster: OsmBusiness[]): OsmBusiness {
  return cluster.reduce((best, candidate) => (contactScore(candidate) > contactScore(best) ? candidate : best));
}

export interface OverpassOptions {
  fetch?: FetchFn;
}

export function createOverpassHandler(options: OverpassOptions = {}): SourceHandler {
  const fetchFn = options.fetch ?? fetch;

  return {
    async *discover(source: SourceConfig, request: DiscoverRequest): AsyncGenerator<RawRecord> {
      const geoParams = new URLSearchParams({ q: request.location, format: 'json', limit: '1' });
      const places = await fetchJson(
        fetchFn,
        'nominatim',
        `${NOMINATIM_URL}?${geoParams.toString()}`,
        { method: 'GET', headers: { 'User-Agent': USER_AGENT } },
        geocodeSchema,
        source.timeoutMs,
        request.signal
      );

      const center = places[0];
      if (!center) {
        logger.warn(`Could not geocode location: ${request.location}`);
        return;
      }

      logger.info(`Searching OpenStreetMap: ${request.query} around ${request.location}`, {
        lat: center.lat,
        lon: center.lon,
        radius: source.radius,
      });

      const data = await fetchJson(
        fetchFn,
        'overpass',
        source.baseUrl ?? OVERPASS_URL,
        {
          method: 'POST',
          headers: { 'User-Agent': USER_AGENT, 'Content-Type': 'text/plain' },
          body: buildOverpassQuery(center.lat, center.lon, source.radius, request.query),
        },
        overpassResponseSchema,
        source.timeoutMs,
        request.signal
      );

      const businesses = data.elements
        .map((element) => elementToBusiness(element, request.location))
        .filter((business): business is OsmBusiness => business !== null);
      const clusters = clusterBusinesses(businesses);

      logger.info(`Found ${businesses.length} named nodes in ${clusters.length} clusters`);
      for (const cluster of clusters.slice(0, request.limit)) {
        yield representative(cluster).record;
      }
    },
  };
}

registerSourceHandler('overpass', createOverpassHandler());
