import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { failure, respond, success, type ToolEnvelope } from './envelope.js';
import { roundTo } from './text.js';
import {
  CATEGORIES,
  LENGTH_UNITS,
  TEMPERATURE_UNITS,
  WEIGHT_UNITS,
  convertByFactor,
  convertTemperature,
  isTemperatureUnit,
  isUnitCategory,
} from './units.js';

export const name = 'convert_units';

export const description =
  'Convert between common units of measurement. Categories: length (m, km, miles, ft, in, yd, cm, mm), ' +
  'weight (kg, g, lbs, oz, tons) and temperature (celsius, fahrenheit, kelvin).';

export const inputSchema = {
  value: z.number().describe('Numeric value to convert'),
  from_unit: z.string().describe('Source unit, e.g. "km" or "celsius"'),
  to_unit: z.string().describe('Target unit, e.g. "miles" or "fahrenheit"'),
  category: z.string().describe('Unit category: "length", "weight" or "temperature"'),
};

export type UnitConversion = {
  value: number;
  from_unit: string;
  to_unit: string;
  category: string;
  result: number;
  formatted: string;
};

interface ConvertUnitsArgs {
  value: number;
  from_unit: string;
  to_unit: string;
  category: string;
}

type Conversion = { ok: true; value: number } | { ok: false; error: string };

function convert(value: number, fromUnit: string, toUnit: string, category: string): Conversion {
  if (!isUnitCategory(category)) {
    return { ok: false, error: `Invalid category '${category}'. Use: ${CATEGORIES.join(', ')}` };
  }

  switch (category) {
    case 'length':
    case 'weight': {
      const table = category === 'length' ? LENGTH_UNITS : WEIGHT_UNITS;
      const result = convertByFactor(table, value, fromUnit, toUnit);
      if (result === undefined) {
        return { ok: false, error: `Invalid ${category} units. Supported: ${Object.keys(table).join(', ')}` };
      }
      return { ok: true, value: result };
    }
    case 'temperature':
      if (!isTemperatureUnit(fromUnit) || !isTemperatureUnit(toUnit)) {
        return { ok: false, error: `Invalid temperature units. Supported: ${TEMPERATURE_UNITS.join(', ')}` };
      }
      return { ok: true, value: convertTemperature(value, fromUnit, toUnit) };
  }
}

export function convertUnits(args: ConvertUnitsArgs): ToolEnvelope<UnitConversion> {
  const category = args.category.toLowerCase();
  const fromUnit = args.from_unit.toLowerCase();
  const toUnit = args.to_unit.toLowerCase();

  const conversion = convert(args.value, fromUnit, toUnit, category);
  if (!conversion.ok) {
    return failure(conversion.error);
  }

  const result = roundTo(conversion.value, 4);
  return success({
    value: args.value,
    from_unit: fromUnit,
    to_unit: toUnit,
    category,
    result,
    formatted: `${args.value} ${fromUnit} = ${result} ${toUnit}`,
  });
}

export async function handler(args: ConvertUnitsArgs) {
  return respond(name, async () => convertUnits(args));
}

export function register(server: McpServer): void {
  server.registerTool(name, { description, inputSchema }, handler);
}
