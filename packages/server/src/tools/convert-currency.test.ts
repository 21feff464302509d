import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { convertCurrency } from './convert-currency.js';

function jsonResponse(body: unknown, init?: ResponseInit): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

const usdToEur = {
  result: 'success',
  base_code: 'USD',
  target_code: 'EUR',
  conversion_rate: 0.923456,
  conversion_result: 92.3456,
  time_last_update_utc: 'Mon, 19 Oct 2026 00:00:01 +0000',
};

describe('convertCurrency', () => {
  beforeEach(() => {
    vi.stubEnv('EXCHANGERATE_API_KEY', 'test-secret');
    vi.stubEnv('EXCHANGERATE_BASE_URL', '');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports a configuration error without calling the API when the key is missing', async () => {
    vi.stubEnv('EXCHANGERATE_API_KEY', undefined);
    const fetchSpy = vi.spyOn(globalThis, 'fetch');

    const envelope = await convertCurrency({ amount: 100, from_currency: 'USD', to_currency: 'EUR' });

    expect(envelope).toEqual({
      error: 'ExchangeRate API key not configured. Please add EXCHANGERATE_API_KEY to .env file',
      status: 'error',
    });
    expect(fetchSpy).toHaveBeenCalledTimes(0);
  });

  it('returns the rate, converted amount and a two-decimal summary', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse(usdToEur));

    const envelope = await convertCurrency({ amount: 100, from_currency: 'usd', to_currency: 'eur' });

    expect(envelope).toEqual({
      amount: 100,
      from_currency: 'USD',
      to_currency: 'EUR',
      conversion_rate: 0.923456,
      converted_amount: 92.3456,
      formatted: '100 USD = 92.35 EUR',
      last_updated: 'Mon, 19 Oct 2026 00:00:01 +0000',
      status: 'success',
    });
  });

  it('is unaffected by an invalid server port setting', async () => {
    vi.stubEnv('PORT', 'eighty');
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse(usdToEur));

    const envelope = await convertCurrency({ amount: 100, from_currency: 'USD', to_currency: 'EUR' });

    expect(envelope).toMatchObject({ converted_amount: 92.3456, status: 'success' });
  });

  it('embeds the key, upper-cased codes and amount in the path', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse(usdToEur));

    await convertCurrency({ amount: 12.5, from_currency: 'gbp', to_currency: 'jpy' });

    expect(String(fetchSpy.mock.calls[0][0])).toBe('https://v6.exchangerate-api.com/v6/test-secret/pair/GBP/JPY/12.5');
  });

  it('uses a sentinel when the update time is missing', async () => {
    const { time_last_update_utc: _omitted, ...withoutTimestamp } = usdToEur;
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse(withoutTimestamp));

    const envelope = await convertCurrency({ amount: 100, from_currency: 'USD', to_currency: 'EUR' });

    expect(envelope).toMatchObject({ status: 'success', last_updated: 'N/A' });
  });

  it('surfaces an error payload sent with a 200', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ result: 'error', 'error-type': 'unsupported-code' }));

    expect(await convertCurrency({ amount: 1, from_currency: 'USD', to_currency: 'XYZ' })).toEqual({
      error: 'Currency conversion error: unsupported-code',
      status: 'error',
    });
  });

  it('surfaces an error payload sent with a 4xx', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ result: 'error', 'error-type': 'invalid-key' }, { status: 403, statusText: 'Forbidden' })
    );

    expect(await convertCurrency({ amount: 1, from_currency: 'USD', to_currency: 'EUR' })).toEqual({
      error: 'Currency conversion error: invalid-key',
      status: 'error',
    });
  });

  it('falls back to a generic message when the error type is absent', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ result: 'error' }));

    expect(await convertCurrency({ amount: 1, from_currency: 'USD', to_currency: 'EUR' })).toEqual({
      error: 'Currency conversion error: Unknown error',
      status: 'error',
    });
  });

  it('passes other HTTP errors through without leaking the key', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('upstream exploded', { status: 500, statusText: 'Internal Server Error' })
    );

    expect(await convertCurrency({ amount: 1, from_currency: 'USD', to_currency: 'EUR' })).toEqual({
      error: 'API error: 500 Internal Server Error from v6.exchangerate-api.com',
      status: 'error',
    });
  });

  it('reports transport failures as network errors', async () => {
    const cause = Object.assign(new Error('getaddrinfo ENOTFOUND v6.exchangerate-api.com'), { code: 'ENOTFOUND' });
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed', { cause }));

    expect(await convertCurrency({ amount: 1, from_currency: 'USD', to_currency: 'EUR' })).toEqual({
      error: 'Network error: fetch failed (ENOTFOUND) for v6.exchangerate-api.com',
      status: 'error',
    });
  });
});
