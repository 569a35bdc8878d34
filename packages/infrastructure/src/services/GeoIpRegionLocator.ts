/**
 * @fileoverview GeoIP region lookup
 *
 * Implements the domain's RegionLocator with ip-api.com: the visitor's
 * address resolves to a region name, which is matched case-insensitively
 * against the `regions` table. Local and private addresses, lookup failures
 * and unknown region names all resolve to no region.
 *
 * @module @chatrouter/infrastructure/services/GeoIpRegionLocator
 */

import { z } from 'zod';

import { createLogger, toError, type DatabaseClient, type ServiceLogger } from '@chatrouter/core';
import type { RegionLocator } from '@chatrouter/domain';

export interface GeoIpRegionLocatorOptions {
  /** Lookups are skipped entirely when false (default: true) */
  enabled?: boolean;
  /** Per-lookup timeout (default: 3000 ms) */
  timeoutMs?: number;
  /** Lookup endpoint; the address is appended as a path segment */
  baseUrl?: string;
  logger?: ServiceLogger;
}

const IpApiResponseSchema = z.object({
  status: z.string().optional(),
  regionName: z.string().optional(),
  countryCode: z.string().optional(),
});

/**
 * Loopback, RFC 1918 and IPv6 local addresses
 */
export function isPrivateAddress(ip: string): boolean {
  if (ip === '::1' || ip === 'localhost' || ip.startsWith('127.')) {
    return true;
  }
  if (ip.startsWith('10.') || ip.startsWith('192.168.')) {
    return true;
  }
  if (ip.startsWith('172.')) {
    const second = parseInt(ip.split('.')[1] ?? '0', 10);
    if (second >= 16 && second <= 31) {
      return true;
    }
  }
  const lower = ip.toLowerCase();
  return lower.startsWith('fc') || lower.startsWith('fd') || lower.startsWith('fe80:');
}

export class GeoIpRegionLocator implements RegionLocator {
  private readonly enabled: boolean;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly db: DatabaseClient,
    options: GeoIpRegionLocatorOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.baseUrl = options.baseUrl ?? 'http://ip-api.com/json';
    this.logger = options.logger ?? createLogger({ name: 'geoip-region-locator' });
  }

  async locate(clientIp: string | null): Promise<number | null> {
    if (!this.enabled || clientIp === null || clientIp === '' || isPrivateAddress(clientIp)) {
      return null;
    }

    const regionName = await this.lookupRegionName(clientIp);
    if (regionName === null) {
      return null;
    }

    const result = await this.db.query<{ id: number }>(
      'SELECT id FROM regions WHERE LOWER(name) = LOWER($1) ORDER BY id LIMIT 1',
      [regionName]
    );
    const regionId = result.rows[0]?.id ?? null;
    if (regionId === null) {
      this.logger.debug({ regionName }, 'GeoIP region not configured');
    }
    return regionId;
  }

  private async lookupRegionName(ip: string): Promise<string | null> {
    const url = `${this.baseUrl}/${encodeURIComponent(ip)}?fields=status,regionName,countryCode`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        this.logger.warn({ statusCode: response.status }, 'GeoIP lookup rejected');
        return null;
      }
      const parsed = IpApiResponseSchema.safeParse(await response.json());
      if (!parsed.success || parsed.data.status === 'fail') {
        return null;
      }
      const name = parsed.data.regionName?.trim() ?? '';
      return name === '' ? null : name;
    } catch (error) {
      this.logger.warn({ err: toError(error) }, 'GeoIP lookup failed');
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
