import type { AppConfig } from "../lib/config.js";
import { toHistoricalSeries, type Dataset } from "../lib/dataset.js";
import {
  forecastPopulation,
  type ForecastCheckpoint,
  type ForecastOptions,
  type GrowthModel,
  type PopulationPoint,
} from "./forecast.js";
import {
  formatArea,
  formatCount,
  formatDensity,
  formatFixed,
  formatPercent,
} from "./format.js";

export type CountryStats = {
  Rank: string;
  Capital: string;
  Continent: string;
  Area: string;
  Density: string;
  "Growth Rate": string;
  "World Share": string;
};

export type CountryContext = {
  country: string;
  stats: CountryStats;
  growthRate: string;
  populationHistory: Array<{ year: number; population: string }>;
  forecastTable: ForecastCheckpoint[];
  forecastSummary: string;
  model: GrowthModel;
  series: {
    historical: PopulationPoint[];
    exponential: PopulationPoint[];
    logistic: PopulationPoint[];
  };
};

export function forecastOptionsFromConfig(
  config: Pick<
    AppConfig,
    "FORECAST_HORIZON" | "CHECKPOINT_YEARS" | "CARRYING_CAPACITY_MULTIPLIER"
  >
): ForecastOptions {
  return {
    horizon: config.FORECAST_HORIZON,
    checkpointYears: config.CHECKPOINT_YEARS,
    carryingCapacityMultiplier: config.CARRYING_CAPACITY_MULTIPLIER,
  };
}

/**
 * Everything the page needs for one country. Unknown names fall back to the
 * dataset's default country.
 */
export function prepareCountryContext(
  dataset: Dataset,
  countryName: string | undefined,
  options?: ForecastOptions
): CountryContext {
  const record = dataset.resolve(countryName);
  const series = toHistoricalSeries(record);
  const forecast = forecastPopulation(series, options);

  return {
    country: record.name,
    stats: {
      Rank: String(Math.trunc(record.rank)),
      Capital: record.capital,
      Continent: record.continent,
      Area: formatArea(record.areaKm2),
      Density: formatDensity(record.densityPerKm2),
      "Growth Rate": formatFixed(record.growthRate, 4),
      "World Share": formatPercent(record.worldPopulationPercentage),
    },
    growthRate: formatFixed(forecast.model.r, 4),
    populationHistory: [...series.points].reverse().map((point) => ({
      year: point.year,
      population: formatCount(point.population),
    })),
    forecastTable: forecast.table,
    forecastSummary: forecast.summary,
    model: forecast.model,
    series: {
      historical: series.points.map((point) => ({ ...point })),
      exponential: forecast.exponential,
      logistic: forecast.logistic,
    },
  };
}
