import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { loadUpstreamConfig, readCredential } from '../config.js';
import { NetworkError, UpstreamHttpError, describeError } from '../http/errors.js';
import { fetchJson, parsePayload } from '../http/fetch-json.js';
import { failure, respond, success, type ToolEnvelope } from './envelope.js';

export const name = 'convert_currency';

export const description =
  'Convert an amount between currencies using live exchange rates. Currency codes are ISO 4217 (e.g. "USD", "EUR", "GBP").';

export const inputSchema = {
  amount: z.number().describe('Amount to convert'),
  from_currency: z.string().describe('Source currency code (e.g., "USD")'),
  to_currency: z.string().describe('Target currency code (e.g., "EUR")'),
};

export const REQUEST_TIMEOUT_MS = 10_000;

const errorPayloadSchema = z.object({
  result: z.literal('error'),
  'error-type': z.string().optional(),
});

const pairResponseSchema = z.union([
  errorPayloadSchema,
  z.object({
    result: z.literal('success'),
    conversion_rate: z.number(),
    conversion_result: z.number(),
    time_last_update_utc: z.string().optional(),
  }),
]);

export type CurrencyConversion = {
  amount: number;
  from_currency: string;
  to_currency: string;
  conversion_rate: number;
  converted_amount: number;
  formatted: string;
  last_updated: string;
};

interface ConvertCurrencyArgs {
  amount: number;
  from_currency: string;
  to_currency: string;
}

function apiErrorMessage(errorType: string | undefined): string {
  return `Currency conversion error: ${errorType ?? 'Unknown error'}`;
}

export async function convertCurrency(args: ConvertCurrencyArgs): Promise<ToolEnvelope<CurrencyConversion>> {
  const apiKey = readCredential('EXCHANGERATE_API_KEY');
  if (!apiKey) {
    return failure('ExchangeRate API key not configured. Please add EXCHANGERATE_API_KEY to .env file');
  }

  const { amount } = args;
  const from = args.from_currency.toUpperCase();
  const to = args.to_currency.toUpperCase();

  const path = [apiKey, 'pair', from, to, String(amount)].map(encodeURIComponent).join('/');
  const url = new URL(`${loadUpstreamConfig().exchangeRateBaseUrl}/${path}`);

  try {
    const payload = await fetchJson(url, { timeoutMs: REQUEST_TIMEOUT_MS });
    const data = parsePayload(pairResponseSchema, payload, url.host);

    if (data.result === 'error') {
      return failure(apiErrorMessage(data['error-type']));
    }

    return success({
      amount,
      from_currency: from,
      to_currency: to,
      conversion_rate: data.conversion_rate,
      converted_amount: data.conversion_result,
      formatted: `${amount} ${from} = ${data.conversion_result.toFixed(2)} ${to}`,
      last_updated: data.time_last_update_utc ?? 'N/A',
    });
  } catch (error) {
    if (error instanceof UpstreamHttpError) {
      // Bad keys and unsupported codes come back as 4xx with an error payload
      const errorPayload = errorPayloadSchema.safeParse(error.body);
      if (errorPayload.success) {
        return failure(apiErrorMessage(errorPayload.data['error-type']));
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

export async function handler(args: ConvertCurrencyArgs) {
  return respond(name, () => convertCurrency(args));
}

export function register(server: McpServer): void {
  server.registerTool(name, { description, inputSchema }, handler);
}
