/**
 * Air Quality Index from particulate concentrations.
 *
 * Only PM2.5 and PM10 feed the index. CO, NO2 and O3 are accepted so callers can
 * pass a whole reading, but they do not contribute to the result.
 */

export interface PollutantReading {
  pm25?: number | null;
  pm10?: number | null;
  co?: number | null;
  no2?: number | null;
  o3?: number | null;
}

export interface AqiBracket {
  concentrationLow: number;
  /** Inclusive upper bound. */
  concentrationHigh: number;
  indexLow: number;
  indexHigh: number;
}

/** Catch-all above the last closed bracket: indexLow + slope * (c - offset). */
export interface OpenAqiBracket {
  indexLow: number;
  offset: number;
  slope: number;
}

export interface AqiBreakpointTable {
  brackets: readonly AqiBracket[];
  open: OpenAqiBracket;
}

export const PM25_BREAKPOINTS: AqiBreakpointTable = {
  brackets: [
    { concentrationLow: 0, concentrationHigh: 12, indexLow: 0, indexHigh: 50 },
    { concentrationLow: 12, concentrationHigh: 35.4, indexLow: 50, indexHigh: 100 },
    { concentrationLow: 35.4, concentrationHigh: 55.4, indexLow: 100, indexHigh: 150 },
    { concentrationLow: 55.4, concentrationHigh: 150.4, indexLow: 150, indexHigh: 200 },
  ],
  // Keeps the fixed 150.5..250 span rather than an open-ended formula.
  open: { indexLow: 200, offset: 150.5, slope: 100 / (250 - 150.5) },
};

export const PM10_BREAKPOINTS: AqiBreakpointTable = {
  brackets: [
    { concentrationLow: 0, concentrationHigh: 54, indexLow: 0, indexHigh: 50 },
    { concentrationLow: 54, concentrationHigh: 154, indexLow: 50, indexHigh: 100 },
    { concentrationLow: 154, concentrationHigh: 254, indexLow: 100, indexHigh: 150 },
  ],
  // Keeps the fixed 255..354 span.
  open: { indexLow: 150, offset: 255, slope: 50 / (354 - 255) },
};

/** Sub-index of a single pollutant concentration within its breakpoint table. */
export function subIndex(concentration: number, table: AqiBreakpointTable): number {
  for (const b of table.brackets) {
    if (concentration <= b.concentrationHigh) {
      // Ratio first: at the upper bound it is exactly 1, so the index lands on indexHigh.
      const ratio = (concentration - b.concentrationLow) / (b.concentrationHigh - b.concentrationLow);
      return b.indexLow + (b.indexHigh - b.indexLow) * ratio;
    }
  }
  const { indexLow, offset, slope } = table.open;
  return indexLow + slope * (concentration - offset);
}

/** AQI of a reading: floor of the largest present sub-index, 0 when nothing was measured. */
export function calculateAqi(reading: PollutantReading): number {
  const subIndices: number[] = [];

  if (reading.pm25 != null) {
    subIndices.push(subIndex(reading.pm25, PM25_BREAKPOINTS));
  }
  if (reading.pm10 != null) {
    subIndices.push(subIndex(reading.pm10, PM10_BREAKPOINTS));
  }

  return subIndices.length > 0 ? Math.floor(Math.max(...subIndices)) : 0;
}

export const AQI_STATUSES = [
  'good',
  'moderate',
  'unhealthy_sensitive',
  'unhealthy',
  'very_unhealthy',
  'hazardous',
] as const;

export type AqiStatus = (typeof AQI_STATUSES)[number];

export type AqiStatusScale = 'six-band' | 'five-band';

export function aqiStatus(aqi: number): AqiStatus {
  if (aqi <= 50) return 'good';
  if (aqi <= 100) return 'moderate';
  if (aqi <= 150) return 'unhealthy_sensitive';
  if (aqi <= 200) return 'unhealthy';
  if (aqi <= 300) return 'very_unhealthy';
  return 'hazardous';
}

/**
 * Five-band table, selectable for prediction quality levels:
 * anything above 200 is very_unhealthy and hazardous is never reported.
 */
export function fiveBandAqiStatus(aqi: number): AqiStatus {
  if (aqi <= 50) return 'good';
  if (aqi <= 100) return 'moderate';
  if (aqi <= 150) return 'unhealthy_sensitive';
  if (aqi <= 200) return 'unhealthy';
  return 'very_unhealthy';
}

export function aqiStatusFor(aqi: number, scale: AqiStatusScale): AqiStatus {
  return scale === 'five-band' ? fiveBandAqiStatus(aqi) : aqiStatus(aqi);
}

/** Ordinal severity, 0 (good) through 5 (hazardous). */
export function aqiSeverityRank(status: AqiStatus): number {
  return AQI_STATUSES.indexOf(status);
}
