/**
 * Asset API client
 *
 * Read-only access to the asset data server: asset scan, time-series windows and
 * latest readings.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import type { AssetPilotConfig } from '../core/config.js';
import { AssetApiError } from '../core/errors.js';

export const AssetSchema = z.object({
  id: z.number().optional(),
  key: z.string(),
  name: z.string(),
  location: z.string(),
  classification: z.string(),
});

export const TimeseriesResponseSchema = z.object({
  asset_id: z.string(),
  data: z.array(z.record(z.record(z.number()))).default([]),
});

export const LastValueResponseSchema = z.object({
  asset_id: z.string().optional(),
  data: z.record(z.number()).default({}),
  timestamp: z.number().optional(),
});

export type Asset = z.infer<typeof AssetSchema>;
export type TimeseriesResponse = z.infer<typeof TimeseriesResponseSchema>;
export type LastValueResponse = z.infer<typeof LastValueResponseSchema>;

export interface TimeRange {
  /** Unix seconds. */
  start: number;
  /** Unix seconds. */
  end: number;
}

export interface AssetApiOptions {
  baseUrl: string;
  timeoutMs: number;
  endpoints: {
    scan: string;
    timeseries: string;
    lastvalue: string;
  };
}

export class AssetApiClient {
  constructor(private readonly options: AssetApiOptions) {}

  static fromConfig(config: AssetPilotConfig): AssetApiClient {
    return new AssetApiClient({
      baseUrl: config.api.baseUrl,
      timeoutMs: config.api.timeoutMs,
      endpoints: config.api.endpoints,
    });
  }

  async listAssets(): Promise<Asset[]> {
    const body = await this.getJson(this.options.endpoints.scan, {}, 'assets');
    return z.array(AssetSchema).parse(body);
  }

  async getTimeseries(assetKey: string, range?: TimeRange): Promise<TimeseriesResponse> {
    const params: Record<string, string> = { asset_key: assetKey };
    if (range) {
      params.start_date = String(range.start);
      params.end_date = String(range.end);
    }
    const body = await this.getJson(this.options.endpoints.timeseries, params, 'timeseries');
    return TimeseriesResponseSchema.parse(body);
  }

  async getLastValue(assetKey: string): Promise<LastValueResponse | null> {
    const body = await this.getJson(
      this.options.endpoints.lastvalue,
      { asset_key: assetKey },
      'last value'
    );
    if (body === null || body === undefined) {
      return null;
    }
    return LastValueResponseSchema.parse(body);
  }

  private async getJson(
    path: string,
    params: Record<string, string>,
    label: string
  ): Promise<unknown> {
    // Endpoints are appended to the base so a path prefix on the base survives.
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, '')}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url.toString(), {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    if (!response.ok) {
      throw new AssetApiError(`Error fetching ${label}: HTTP ${response.status}`, response.status);
    }
    return response.json();
  }
}
