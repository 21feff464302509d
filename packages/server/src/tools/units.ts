/**
 * Conversion factors to the base unit of each category:
 * meters for length, kilograms for weight.
 */
export const LENGTH_UNITS: Readonly<Record<string, number>> = Object.freeze({
  meters: 1,
  m: 1,
  kilometers: 1000,
  km: 1000,
  miles: 1609.34,
  feet: 0.3048,
  ft: 0.3048,
  inches: 0.0254,
  in: 0.0254,
  yards: 0.9144,
  yd: 0.9144,
  centimeters: 0.01,
  cm: 0.01,
  millimeters: 0.001,
  mm: 0.001,
});

export const WEIGHT_UNITS: Readonly<Record<string, number>> = Object.freeze({
  kilograms: 1,
  kg: 1,
  grams: 0.001,
  g: 0.001,
  pounds: 0.453592,
  lbs: 0.453592,
  ounces: 0.0283495,
  oz: 0.0283495,
  tons: 1000,
  tonnes: 1000,
});

export const TEMPERATURE_UNITS = ['celsius', 'fahrenheit', 'kelvin'] as const;

export type TemperatureUnit = (typeof TEMPERATURE_UNITS)[number];

export const CATEGORIES = ['length', 'weight', 'temperature'] as const;

export type UnitCategory = (typeof CATEGORIES)[number];

type TemperatureConversion = `${TemperatureUnit}->${TemperatureUnit}`;

const identity = (value: number): number => value;

const TEMPERATURE_FORMULAS: Record<TemperatureConversion, (value: number) => number> = {
  'celsius->celsius': identity,
  'fahrenheit->fahrenheit': identity,
  'kelvin->kelvin': identity,
  'celsius->fahrenheit': (c) => (c * 9) / 5 + 32,
  'fahrenheit->celsius': (f) => ((f - 32) * 5) / 9,
  'celsius->kelvin': (c) => c + 273.15,
  'kelvin->celsius': (k) => k - 273.15,
  'fahrenheit->kelvin': (f) => ((f - 32) * 5) / 9 + 273.15,
  'kelvin->fahrenheit': (k) => ((k - 273.15) * 9) / 5 + 32,
};

export function isTemperatureUnit(unit: string): unit is TemperatureUnit {
  return TEMPERATURE_UNITS.some((candidate) => candidate === unit);
}

export function isUnitCategory(category: string): category is UnitCategory {
  return CATEGORIES.some((candidate) => candidate === category);
}

export function convertTemperature(value: number, from: TemperatureUnit, to: TemperatureUnit): number {
  return TEMPERATURE_FORMULAS[`${from}->${to}`](value);
}

/**
 * Routes through the base unit: value × factor(from) / factor(to).
 * Returns undefined when either unit is missing from the table.
 */
export function convertByFactor(
  table: Readonly<Record<string, number>>,
  value: number,
  from: string,
  to: string
): number | undefined {
  if (!Object.hasOwn(table, from) || !Object.hasOwn(table, to)) {
    return undefined;
  }
  return (value * table[from]) / table[to];
}
