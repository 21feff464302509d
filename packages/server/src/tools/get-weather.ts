import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { loadUpstreamConfig, readCredential } from '../config.js';
import { NetworkError, UpstreamHttpError, describeError } from '../http/errors.js';
import { fetchJson, parsePayload } from '../http/fetch-json.js';
import { failure, respond, success, type ToolEnvelope } from './envelope.js';
import { toTitleCase } from './text.js';

export const name = 'get_weather';

export const description =
  'Retrieve current weather conditions for a city or location. ' +
  'Accepts a city name, ZIP code or "City,Country" (e.g. "London,UK").';

export const inputSchema = {
  location: z.string().describe('City name, ZIP code, or "City,Country" format (e.g., "Paris,FR")'),
};

export const REQUEST_TIMEOUT_MS = 10_000;

const weatherResponseSchema = z.object({
  name: z.string(),
  sys: z.object({ country: z.string() }),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(z.object({ description: z.string() })).min(1),
  wind: z.object({ speed: z.number() }),
});

export type WeatherReport = {
  location: string;
  country: string;
  temperature: string;
  feels_like: string;
  description: string;
  humidity: string;
  wind_speed: string;
};

export async function getWeather({ location }: { location: string }): Promise<ToolEnvelope<WeatherReport>> {
  const apiKey = readCredential('OPENWEATHER_API_KEY');
  if (!apiKey) {
    return failure('OpenWeather API key not configured. Please add OPENWEATHER_API_KEY to .env file');
  }

  const url = new URL(`${loadUpstreamConfig().openWeatherBaseUrl}/weather`);
  url.searchParams.set('q', location);
  url.searchParams.set('appid', apiKey);
  url.searchParams.set('units', 'metric');

  try {
    const payload = await fetchJson(url, { timeoutMs: REQUEST_TIMEOUT_MS });
    const data = parsePayload(weatherResponseSchema, payload, url.host);

    return success({
      location: data.name,
      country: data.sys.country,
      temperature: `${data.main.temp}°C`,
      feels_like: `${data.main.feels_like}°C`,
      description: toTitleCase(data.weather[0].description),
      humidity: `${data.main.humidity}%`,
      wind_speed: `${data.wind.speed} m/s`,
    });
  } catch (error) {
    if (error instanceof UpstreamHttpError) {
      if (error.status === 404) {
        return failure(`Location '${location}' not found`);
      }
      console.warn(`[Tool] ${name} upstream error: ${error.message}`);
      return failure(`API error: ${error.message}`);
    }
    if (error instanceof NetworkError) {
      console.warn(`[Tool] ${name} network error: ${error.message}`);
      return failure(`Network error: ${error.message}`);
    }
    console.error(`[Tool] ${name} failed:`, error);
    return failure(`Unexpected error: ${describeError(error)}`);
  }
}

export async function handler(args: { location: string }) {
  return respond(name, () => getWeather(args));
}

export function register(server: McpServer): void {
  server.registerTool(name, { description, inputSchema }, handler);
}
