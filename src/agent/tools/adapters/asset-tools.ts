/**
 * Asset Tools Adapter
 *
 * Tools the model can call to look at assets and their measurements. HTTP status
 * failures come back as observation text so the model can react to them; transport
 * failures reject and are reported by the dispatcher.
 */

import { z } from 'zod';

import type { TimeRange } from '../../../assets/client.js';
import { summarizeSeries } from '../../../assets/statistics.js';
import { AssetApiError } from '../../../core/errors.js';
import type { ToolContext, ToolDefinition } from '../types.js';

const DAY_SECONDS = 24 * 60 * 60;
const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Unix seconds for midnight UTC of a `YYYY-MM-DD` day, or null when the text is not a real
 * calendar day (`2024-13-01`, `2024-02-30`).
 */
function parseCalendarDay(text: string): number | null {
  if (!ISO_DAY.test(text)) return null;
  const ms = Date.parse(`${text}T00:00:00Z`);
  if (Number.isNaN(ms) || new Date(ms).toISOString().slice(0, 10) !== text) return null;
  return Math.floor(ms / 1000);
}

const DateInputSchema = z
  .union([
    z.number().int().nonnegative(),
    z.string().refine((text) => parseCalendarDay(text) !== null, 'expected a valid YYYY-MM-DD date'),
  ])
  .optional();

type DateInput = z.infer<typeof DateInputSchema>;

async function httpErrorsAsText(
  run: () => Promise<string>,
  render: (error: AssetApiError) => string
): Promise<string> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof AssetApiError) {
      return render(error);
    }
    throw error;
  }
}

function toUnixSeconds(input: DateInput, fallback: number): number {
  if (input === undefined) return fallback;
  if (typeof input === 'number') return input;
  const seconds = parseCalendarDay(input);
  if (seconds === null) {
    throw new Error(`Invalid date ${input}, expected YYYY-MM-DD`);
  }
  return seconds;
}

/**
 * Resolve the requested window; defaults to the 24 hours before `now`.
 */
export function resolveTimeRange(start: DateInput, end: DateInput, now: Date): TimeRange {
  const nowSeconds = Math.floor(now.getTime() / 1000);
  return {
    start: toUnixSeconds(start, nowSeconds - DAY_SECONDS),
    end: toUnixSeconds(end, nowSeconds),
  };
}

function formatTimestamp(unixSeconds: number): string {
  return `${new Date(unixSeconds * 1000).toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}

function formatNumber(value: number): string {
  return value.toFixed(2);
}

export function createGetDataTool(maxListed: number): ToolDefinition {
  return {
    name: 'get_data',
    description:
      'Get list of all available assets/machines/sensors. Use this when user asks about available data or assets. Takes no arguments.',
    category: 'assets',
    schema: z.object({}),
    execute: (_input, ctx: ToolContext) =>
      httpErrorsAsText(
        async () => {
          const assets = await ctx.assets.listAssets();
          const total = assets.length;
          const shown = assets.slice(0, maxListed);
          const lines = [
            total > maxListed
              ? `Found ${total} available assets (showing first ${maxListed}):`
              : `Found ${total} available assets:`,
            ...shown.map(
              (asset) =>
                `- ${asset.key}: ${asset.name} at ${asset.location} (Type: ${asset.classification})`
            ),
          ];
          if (total > maxListed) {
            lines.push(
              '',
              `Metadata: ${total - maxListed} additional assets available. Use get_timeseries with a specific asset_key to access data.`
            );
          }
          return lines.join('\n');
        },
        (error) => `Error fetching assets: HTTP ${error.status}`
      ),
  };
}

const TimeseriesInputSchema = z.object({
  asset_key: z.string().min(1).describe("REQUIRED - unique identifier for the asset (e.g. 'ABC123')"),
  start_date: DateInputSchema.describe(
    'OPTIONAL - start as Unix seconds or YYYY-MM-DD (defaults to 24 hours ago)'
  ),
  end_date: DateInputSchema.describe('OPTIONAL - end as Unix seconds or YYYY-MM-DD (defaults to now)'),
});

export const getTimeseriesTool: ToolDefinition<typeof TimeseriesInputSchema> = {
  name: 'get_timeseries',
  description:
    'Get time series data for a specific asset. Use this when user asks for data from a specific asset.',
  category: 'assets',
  schema: TimeseriesInputSchema,
  execute: (input, ctx) =>
    httpErrorsAsText(
      async () => {
        const range = resolveTimeRange(input.start_date, input.end_date, ctx.now?.() ?? new Date());
        const response = await ctx.assets.getTimeseries(input.asset_key, range);
        if (response.data.length === 0) {
          return `No data found for asset ${input.asset_key}`;
        }
        const lines = [
          `Retrieved ${response.data.length} measurement types for asset ${input.asset_key}:`,
        ];
        for (const measurement of response.data) {
          for (const [type, points] of Object.entries(measurement)) {
            lines.push(`- ${type}: ${Object.keys(points).length} data points`);
          }
        }
        return lines.join('\n');
      },
      (error) => `Error fetching timeseries: HTTP ${error.status}`
    ),
};

const StatisticsInputSchema = z.object({
  asset_key: z.string().min(1).describe('REQUIRED - unique identifier for the asset'),
  measurement_type: z
    .string()
    .optional()
    .describe("OPTIONAL - specific measurement to analyze (e.g. 'temperature', 'pressure')"),
});

export const getStatisticsTool: ToolDefinition<typeof StatisticsInputSchema> = {
  name: 'get_statistics',
  description: 'Get statistical analysis (count, mean, min, max, std dev) of time series data for an asset.',
  category: 'analysis',
  schema: StatisticsInputSchema,
  execute: (input, ctx) =>
    httpErrorsAsText(
      async () => {
        const response = await ctx.assets.getTimeseries(input.asset_key);
        if (response.data.length === 0) {
          return `No data available for asset ${input.asset_key}`;
        }

        const sections: string[] = [];
        for (const measurement of response.data) {
          for (const [type, points] of Object.entries(measurement)) {
            if (input.measurement_type && type !== input.measurement_type) continue;
            const summary = summarizeSeries(Object.values(points));
            if (!summary) continue;
            sections.push(
              [
                `${type}:`,
                `  - Count: ${summary.count}`,
                `  - Mean: ${formatNumber(summary.mean)}`,
                `  - Min: ${formatNumber(summary.min)}`,
                `  - Max: ${formatNumber(summary.max)}`,
                `  - Std Dev: ${formatNumber(summary.stdDev)}`,
              ].join('\n')
            );
          }
        }

        if (sections.length === 0) {
          return input.measurement_type
            ? `No ${input.measurement_type} measurements found for asset ${input.asset_key}`
            : `No data available for asset ${input.asset_key}`;
        }
        return [`Statistical analysis for asset ${input.asset_key}:`, ...sections].join('\n\n');
      },
      (error) => `Error fetching data for statistics: HTTP ${error.status}`
    ),
};

const LastValueInputSchema = z.object({
  asset_key: z.string().min(1).describe("REQUIRED - unique identifier for the asset (e.g. 'ABC123')"),
});

export const getLastValueTool: ToolDefinition<typeof LastValueInputSchema> = {
  name: 'get_last_value',
  description:
    'Get the most recent data point for a specific asset. Use this when user asks for current values or latest readings.',
  category: 'assets',
  schema: LastValueInputSchema,
  execute: (input, ctx) =>
    httpErrorsAsText(
      async () => {
        const latest = await ctx.assets.getLastValue(input.asset_key);
        if (!latest) {
          return `No recent data found for asset ${input.asset_key}`;
        }
        const entries = Object.entries(latest.data);
        if (entries.length === 0) {
          return `No measurement data found for asset ${input.asset_key}`;
        }
        const lines = [
          `Latest values for asset ${latest.asset_id ?? input.asset_key}:`,
          ...entries.map(([type, value]) => `- ${type}: ${value}`),
        ];
        if (latest.timestamp !== undefined) {
          lines.push('', `Timestamp: ${formatTimestamp(latest.timestamp)}`);
        }
        return lines.join('\n');
      },
      (error) => `Error fetching last value: HTTP ${error.status}`
    ),
};

export function createAssetTools(options: { maxListed: number }): ToolDefinition[] {
  return [createGetDataTool(options.maxListed), getTimeseriesTool, getStatisticsTool, getLastValueTool];
}
