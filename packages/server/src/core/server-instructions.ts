/**
 * Sent to the client during initialization; clients typically add it to the model's system prompt.
 */
export const SERVER_INSTRUCTIONS = `
Utility tools: weather, arithmetic, currency, local time and unit conversion.

## Tools
- get_weather: current conditions for a city, ZIP code or "City,Country" (metric units)
- calculate: add, subtract, multiply or divide two numbers
- convert_currency: live conversion between ISO 4217 currency codes
- get_timezone_info: local time, UTC offset, weekday, day of year and ISO week for 20 major cities
- convert_units: length, weight and temperature conversion

## Results
- Every tool returns JSON with "status": "success" or "error"
- Errors carry an "error" message; invalid input errors list the accepted values
- "Network error" means the upstream API was unreachable and the call can be retried

## Constraints
- get_weather and convert_currency need API keys on the server; without them they return a configuration error
- get_timezone_info falls back to a calculated time (with a "note" field) when WorldTimeAPI is down;
  that fallback uses standard-time offsets and ignores daylight saving
`.trim();
