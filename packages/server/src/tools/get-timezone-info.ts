import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { loadUpstreamConfig } from '../config.js';
import { UpstreamPayloadError, describeError } from '../http/errors.js';
import { fetchJson, parsePayload } from '../http/fetch-json.js';
import { MCP_ATTRIBUTES, addSpanEvent, setSpanAttributes } from '../telemetry/index.js';
import { failure, respond, success, type ToolEnvelope } from './envelope.js';
import { toTitleCase } from './text.js';
import {
  SUPPORTED_CITIES,
  dayOfYear,
  formatWallClock,
  isoWeekNumber,
  lookupCity,
  wallClockAt,
  wallClockFromIso,
  weekdayName,
  type CityTimezone,
} from './timezones.js';

export const name = 'get_timezone_info';

export const description =
  'Get the current local time, UTC offset, day of week, day of year and ISO week number for a major city ' +
  '(e.g. "London", "New York", "Tokyo").';

export const inputSchema = {
  city: z.string().describe('City name (e.g., "London", "New York", "Tokyo")'),
};

export const REQUEST_TIMEOUT_MS = 5_000;

export const FALLBACK_NOTE = 'Using calculated time (WorldTimeAPI unavailable)';

const worldTimeSchema = z.object({
  datetime: z.string(),
  timezone: z.string().optional(),
  utc_offset: z.string(),
  day_of_year: z.number().int(),
  week_number: z.number().int(),
});

type LocalTimeFields = {
  timezone: string;
  current_time: string;
  utc_offset: string;
  day_of_week: string;
  day_of_year: number;
  week_number: number;
};

export type TimezoneInfo = LocalTimeFields & {
  city: string;
  note?: string;
};

type WorldTimeLookup = { ok: true; fields: LocalTimeFields } | { ok: false; reason: string };

/**
 * Tier 1: the authoritative time from WorldTimeAPI. Every failure is reported
 * as a reason, never thrown, so the caller can move on to tier 2.
 */
async function lookupWorldTime(entry: CityTimezone): Promise<WorldTimeLookup> {
  try {
    const url = new URL(`${loadUpstreamConfig().worldTimeBaseUrl}/timezone/${entry.timezone}`);
    const payload = await fetchJson(url, { timeoutMs: REQUEST_TIMEOUT_MS });
    const data = parsePayload(worldTimeSchema, payload, url.host);

    const wall = wallClockFromIso(data.datetime);
    if (!wall) {
      throw new UpstreamPayloadError(`Unparseable datetime '${data.datetime}'`, url.host);
    }

    return {
      ok: true,
      fields: {
        timezone: data.timezone ?? entry.timezone,
        current_time: formatWallClock(wall),
        utc_offset: data.utc_offset,
        day_of_week: weekdayName(wall),
        day_of_year: data.day_of_year,
        week_number: data.week_number,
      },
    };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

/**
 * Tier 2: current UTC plus the table's fixed offset. Pure computation on
 * values validated at startup; it has no failure path.
 */
export function calculateLocalTime(entry: CityTimezone, now: Date): LocalTimeFields {
  const wall = wallClockAt(now, entry.offsetMinutes);
  return {
    timezone: entry.timezone,
    current_time: formatWallClock(wall),
    utc_offset: entry.offset,
    day_of_week: weekdayName(wall),
    day_of_year: dayOfYear(wall),
    week_number: isoWeekNumber(wall),
  };
}

export async function getTimezoneInfo({ city }: { city: string }): Promise<ToolEnvelope<TimezoneInfo>> {
  const entry = lookupCity(city);
  if (!entry) {
    return failure(`City '${city}' not found in database. Supported cities: ${SUPPORTED_CITIES.join(', ')}`);
  }

  const displayName = toTitleCase(city.trim());
  const primary = await lookupWorldTime(entry);

  if (primary.ok) {
    setSpanAttributes({ [MCP_ATTRIBUTES.TOOL_FALLBACK]: false });
    return success({ city: displayName, ...primary.fields });
  }

  console.warn(`[Tool] ${name} using calculated time for ${entry.timezone}: ${primary.reason}`);
  setSpanAttributes({ [MCP_ATTRIBUTES.TOOL_FALLBACK]: true });
  addSpanEvent('timezone.fallback', { timezone: entry.timezone, reason: primary.reason });

  return success({
    city: displayName,
    ...calculateLocalTime(entry, new Date()),
    note: FALLBACK_NOTE,
  });
}

export async function handler(args: { city: string }) {
  return respond(name, () => getTimezoneInfo(args));
}

export function register(server: McpServer): void {
  server.registerTool(name, { description, inputSchema }, handler);
}
