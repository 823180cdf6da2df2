import { MILLISECONDS_PER_HOUR } from '../utils/dateUtils';

export interface SampleDataOptions {
  /** First timestamp (defaults to 2024-01-15T00:00:00Z) */
  start?: Date;
  /** Number of hourly records (defaults to 72) */
  hours?: number;
  /** Centre of the simulated production values in MWh (defaults to 1200) */
  baseValue?: number;
  /** Source of uniform randomness in [0, 1) (defaults to Math.random) */
  random?: () => number;
}

export interface SampleRecord {
  start_time: string;
  value: number;
}

export const DEMO_VARIABLE_ID = '124';

const DEFAULT_START = Date.UTC(2024, 0, 15, 0, 0, 0);
const NOISE_LOW = -100;
const NOISE_HIGH = 150;

/**
 * Generate hourly hydro production records in the API's shape.
 * Each value is baseValue + uniform(-100, 150), rounded to 2 decimals.
 */
export function generateSampleData(options: SampleDataOptions = {}): SampleRecord[] {
  const {
    start = new Date(DEFAULT_START),
    hours = 72,
    baseValue = 1200,
    random = Math.random,
  } = options;

  return Array.from({ length: hours }, (_, i) => {
    const noise = NOISE_LOW + random() * (NOISE_HIGH - NOISE_LOW);
    const timestamp = new Date(start.getTime() + i * MILLISECONDS_PER_HOUR);
    return {
      // "2024-01-15T00:00:00Z" rather than toISOString's ".000Z"
      start_time: timestamp.toISOString().replace(/\.\d{3}Z$/, 'Z'),
      value: Math.round((baseValue + noise) * 100) / 100,
    };
  });
}
