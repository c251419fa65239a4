/**
 * Temperature Utility Functions
 *
 * Validity and unit conversion shared by the sensor scanner, the CPU temperature
 * state machine and the thermal zone readers.
 */

export const MIN_VALID_TEMP_C = 0;
export const MAX_VALID_TEMP_C = 120;
export const MIN_VALID_TJMAX_C = 60;
export const MAX_VALID_TJMAX_C = 130;

const KELVIN_OFFSET = 273.15;

/**
 * A reading is usable when finite and within [0, 120] °C.
 * Out-of-range values are treated as absent, never clamped.
 */
export function validTemperature(raw: number | null | undefined): number | null {
  if (raw === null || raw === undefined || !Number.isFinite(raw)) {
    return null;
  }
  if (raw < MIN_VALID_TEMP_C || raw > MAX_VALID_TEMP_C) {
    return null;
  }
  return raw;
}

export function validTjMax(raw: number | null | undefined): number | null {
  if (raw === null || raw === undefined || !Number.isFinite(raw)) {
    return null;
  }
  if (raw < MIN_VALID_TJMAX_C || raw > MAX_VALID_TJMAX_C) {
    return null;
  }
  return raw;
}

export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Accept numbers and numeric strings as reported by CIM queries.
 */
export function toNumeric(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Convert a thermal zone reading to Celsius.
 *
 * - raw > 1000: tenths of Kelvin (2732 = 0.05 °C)
 * - raw > 170: Kelvin
 * - otherwise already Celsius
 *
 * Returns null when the input is not numeric or the result is outside [0, 120].
 */
export function convertRawTemperature(raw: unknown): number | null {
  const numeric = toNumeric(raw);
  if (numeric === null) {
    return null;
  }

  let celsius: number;
  if (numeric > 1000) {
    celsius = numeric / 10 - KELVIN_OFFSET;
  } else if (numeric > 170) {
    celsius = numeric - KELVIN_OFFSET;
  } else {
    celsius = numeric;
  }

  return validTemperature(celsius);
}

/**
 * Render a raw sensor value the way the debug listing shows it.
 */
export function formatRawValue(raw: number | null): string | null {
  if (raw === null) return null;
  if (Number.isNaN(raw)) return 'NaN';
  if (raw === Infinity) return '+Infinity';
  if (raw === -Infinity) return '-Infinity';
  return String(Math.round(raw * 1000) / 1000);
}
