import path from "path";

export type AppConfig = {
  PORT: string;
  FRONTEND_ORIGIN: string;
  DATASET_PATH: string;
  DEFAULT_COUNTRY: string;
  FORECAST_HORIZON: number;
  CHECKPOINT_YEARS: number[];
  CARRYING_CAPACITY_MULTIPLIER: number;
};

const DEFAULT_CHECKPOINT_YEARS = [2030, 2040, 2050, 2060, 2071];

// Resolved from the compiled or source file, both of which sit two levels below backend/.
const defaultDatasetPath = path.resolve(
  __dirname,
  "..",
  "..",
  "data",
  "world_population.csv"
);

function positiveInteger(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw && Number.isInteger(value) && value > 0 ? value : fallback;
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw && Number.isFinite(value) && value > 0 ? value : fallback;
}

function yearList(raw: string | undefined, fallback: number[]): number[] {
  if (!raw) return fallback;
  const years = raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map(Number);
  if (years.length === 0 || years.some((year) => !Number.isInteger(year))) {
    return fallback;
  }
  return years;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    PORT: env.PORT || "4000",
    FRONTEND_ORIGIN: env.FRONTEND_ORIGIN || "*",
    DATASET_PATH: env.DATASET_PATH
      ? path.resolve(env.DATASET_PATH)
      : defaultDatasetPath,
    DEFAULT_COUNTRY: env.DEFAULT_COUNTRY || "Indonesia",
    FORECAST_HORIZON: positiveInteger(env.FORECAST_HORIZON, 50),
    CHECKPOINT_YEARS: yearList(env.CHECKPOINT_YEARS, DEFAULT_CHECKPOINT_YEARS),
    CARRYING_CAPACITY_MULTIPLIER: positiveNumber(
      env.CARRYING_CAPACITY_MULTIPLIER,
      3
    ),
  };
}
