import { DataError } from "../lib/errors.js";
import { formatCount } from "./format.js";

export type PopulationPoint = {
  year: number;
  population: number;
};

export type HistoricalSeries = {
  country: string;
  points: readonly PopulationPoint[];
};

export type GrowthModel = {
  /** Continuous growth rate per period, the slope of ln(population) over time. */
  r: number;
  /** Population at the first observed year. */
  p0: number;
  /** Logistic carrying capacity. */
  k: number;
};

export type ForecastCheckpoint = {
  year: number;
  exponential: string;
  logistic: string;
};

export type ForecastOptions = {
  horizon: number;
  checkpointYears: readonly number[];
  carryingCapacityMultiplier: number;
};

export type PopulationForecast = {
  model: GrowthModel;
  exponential: PopulationPoint[];
  logistic: PopulationPoint[];
  table: ForecastCheckpoint[];
  summary: string;
};

export const DEFAULT_FORECAST_OPTIONS: ForecastOptions = {
  horizon: 50,
  checkpointYears: [2030, 2040, 2050, 2060, 2071],
  carryingCapacityMultiplier: 3,
};

function assertFittable(series: HistoricalSeries): void {
  const { country, points } = series;
  if (points.length < 2) {
    throw new DataError(
      `${country}: at least 2 historical points are needed to fit a growth rate, got ${points.length}`,
      country
    );
  }
  points.forEach((point, idx) => {
    if (!Number.isFinite(point.population) || point.population <= 0) {
      throw new DataError(
        `${country}: population for ${point.year} must be a positive number, got ${point.population}`,
        country,
        point.year
      );
    }
    if (idx > 0 && point.year <= points[idx - 1].year) {
      throw new DataError(
        `${country}: historical years must be strictly increasing (${points[idx - 1].year} then ${point.year})`,
        country,
        point.year
      );
    }
  });
}

/**
 * Least-squares slope of ln(population) against periods since the first
 * observation, i.e. r in p(t) = p0 * e^(r*t).
 */
export function fitGrowthRate(series: HistoricalSeries): number {
  assertFittable(series);
  const { points } = series;
  const n = points.length;
  const t = points.map((point) => point.year - points[0].year);
  const y = points.map((point) => Math.log(point.population));

  const meanT = t.reduce((sum, value) => sum + value, 0) / n;
  const meanY = y.reduce((sum, value) => sum + value, 0) / n;
  let num = 0;
  let den = 0;
  for (let i = 0; i < n; i++) {
    num += (t[i] - meanT) * (y[i] - meanY);
    den += (t[i] - meanT) ** 2;
  }
  return num / den;
}

/**
 * `t` is measured from `referenceYear` (the first historical year), not from
 * `startYear`.
 */
export function projectExponential(
  p0: number,
  r: number,
  referenceYear: number,
  startYear: number,
  horizon: number
): PopulationPoint[] {
  return Array.from({ length: Math.max(0, horizon) }, (_, h) => {
    const year = startYear + h;
    return { year, population: p0 * Math.exp(r * (year - referenceYear)) };
  });
}

/**
 * Forward-Euler steps of dp/dt = r*p*(1 - p/k) with a step of one period.
 * Each value is emitted after its update, so the point labelled `startYear`
 * is already one step ahead of `pLast`.
 */
export function projectLogistic(
  pLast: number,
  r: number,
  k: number,
  startYear: number,
  horizon: number
): PopulationPoint[] {
  const out: PopulationPoint[] = [];
  let p = pLast;
  for (let h = 0; h < horizon; h++) {
    p += r * p * (1 - p / k);
    out.push({ year: startYear + h, population: p });
  }
  return out;
}

// Heuristic multiplier, not a fitted parameter.
export function carryingCapacity(
  series: HistoricalSeries,
  multiplier = DEFAULT_FORECAST_OPTIONS.carryingCapacityMultiplier
): number {
  return (
    Math.max(...series.points.map((point) => point.population)) * multiplier
  );
}

export function buildForecastTable(
  exponential: readonly PopulationPoint[],
  logistic: readonly PopulationPoint[],
  checkpointYears: readonly number[]
): ForecastCheckpoint[] {
  if (exponential.length === 0) return [];
  const startYear = exponential[0].year;
  const length = Math.min(exponential.length, logistic.length);

  return [...checkpointYears]
    .sort((a, b) => a - b)
    .filter((year) => year >= startYear && year - startYear < length)
    .map((year) => {
      const idx = year - startYear;
      return {
        year,
        exponential: formatCount(exponential[idx].population),
        logistic: formatCount(logistic[idx].population),
      };
    });
}

export function summarize(
  table: readonly ForecastCheckpoint[],
  fallback: { year: number; exponential: number; logistic: number },
  horizon = DEFAULT_FORECAST_OPTIONS.horizon
): string {
  const last = table.length > 0 ? table[table.length - 1] : null;
  const year = last ? last.year : fallback.year;
  const exponential = last
    ? last.exponential
    : formatCount(fallback.exponential);
  const logistic = last ? last.logistic : formatCount(fallback.logistic);

  return (
    `Over the ${horizon}-year horizon through ${year}, the exponential model ` +
    `projects the population to reach about ${exponential} people, while the ` +
    `logistic model, which accounts for carrying capacity, estimates about ` +
    `${logistic} people. The gap between them reads as an optimistic versus ` +
    `a realistic scenario for each country.`
  );
}

export function forecastPopulation(
  series: HistoricalSeries,
  options: ForecastOptions = DEFAULT_FORECAST_OPTIONS
): PopulationForecast {
  const r = fitGrowthRate(series);
  const first = series.points[0];
  const last = series.points[series.points.length - 1];
  const k = carryingCapacity(series, options.carryingCapacityMultiplier);

  const exponential = projectExponential(
    first.population,
    r,
    first.year,
    last.year,
    options.horizon
  );
  const logistic = projectLogistic(
    last.population,
    r,
    k,
    last.year,
    options.horizon
  );
  const table = buildForecastTable(
    exponential,
    logistic,
    options.checkpointYears
  );

  const finalExp = exponential[exponential.length - 1];
  const finalLog = logistic[logistic.length - 1];
  const summary = summarize(
    table,
    {
      year: finalExp ? finalExp.year : last.year,
      exponential: finalExp ? finalExp.population : last.population,
      logistic: finalLog ? finalLog.population : last.population,
    },
    options.horizon
  );

  return {
    model: { r, p0: first.population, k },
    exponential,
    logistic,
    table,
    summary,
  };
}
