import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import type { AppConfig } from "./config.js";
import type {
  HistoricalSeries,
  PopulationPoint,
} from "../services/forecast.js";

export const CENSUS_YEARS = [
  1970, 1980, 1990, 2000, 2010, 2015, 2020, 2022,
] as const;

export type CountryRecord = {
  rank: number;
  code: string;
  name: string;
  capital: string;
  continent: string;
  /** Census populations in CENSUS_YEARS order. */
  history: readonly PopulationPoint[];
  areaKm2: number;
  densityPerKm2: number;
  growthRate: number;
  worldPopulationPercentage: number;
};

export type Dataset = {
  readonly defaultCountry: string;
  /** Case-sensitive exact match. */
  find(name: string): CountryRecord | undefined;
  /** Unknown or missing names resolve to the default country. */
  resolve(name?: string): CountryRecord;
  /** Sorted, de-duplicated country names. */
  countries(): readonly string[];
};

type CsvRow = Record<string, string>;

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === "string")
  );
}

function numberCell(row: CsvRow, column: string): number {
  const raw = (row[column] ?? "").trim();
  // Blank cells read as NaN, not 0.
  return raw === "" ? Number.NaN : Number(raw);
}

function toCountryRecord(row: CsvRow): CountryRecord {
  return {
    rank: numberCell(row, "Rank"),
    code: row["CCA3"] ?? "",
    name: row["Country/Territory"] ?? "",
    capital: row["Capital"] ?? "",
    continent: row["Continent"] ?? "",
    history: CENSUS_YEARS.map((year) => ({
      year,
      population: numberCell(row, `${year} Population`),
    })),
    areaKm2: numberCell(row, "Area (km²)"),
    densityPerKm2: numberCell(row, "Density (per km²)"),
    growthRate: numberCell(row, "Growth Rate"),
    worldPopulationPercentage: numberCell(row, "World Population Percentage"),
  };
}

export function parseDataset(csvText: string): CountryRecord[] {
  const rows: unknown = parse(csvText, {
    bom: true,
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!Array.isArray(rows)) {
    throw new Error("Dataset CSV did not parse into rows");
  }
  return rows
    .filter(isCsvRow)
    .map(toCountryRecord)
    .filter((record) => record.name !== "");
}

export function toHistoricalSeries(record: CountryRecord): HistoricalSeries {
  return {
    country: record.name,
    points: record.history,
  };
}

export function createDataset(
  records: readonly CountryRecord[],
  defaultCountry: string
): Dataset {
  const byName = new Map<string, CountryRecord>();
  for (const record of records) {
    // The first row wins when a name repeats.
    if (!byName.has(record.name)) {
      byName.set(
        record.name,
        Object.freeze({
          ...record,
          history: Object.freeze(
            record.history.map((point) => Object.freeze({ ...point }))
          ),
        })
      );
    }
  }

  const found = byName.get(defaultCountry);
  if (!found) {
    throw new Error(
      `Default country "${defaultCountry}" is not present in the dataset`
    );
  }
  const fallback: CountryRecord = found;

  const names = Object.freeze([...byName.keys()].sort());

  return Object.freeze({
    defaultCountry,
    find: (name: string) => byName.get(name),
    resolve: (name?: string) =>
      (name !== undefined ? byName.get(name) : undefined) ?? fallback,
    countries: () => names,
  });
}

let snapshot: Promise<Dataset> | null = null;
let ready: Dataset | null = null;

/**
 * Loads the CSV once per process; later calls share the first load.
 */
export function initDataset(
  config: Pick<AppConfig, "DATASET_PATH" | "DEFAULT_COUNTRY">
): Promise<Dataset> {
  if (!snapshot) {
    snapshot = loaded(config).catch((err: unknown) => {
      snapshot = null;
      throw err;
    });
  }
  return snapshot;
}

async function loaded(
  config: Pick<AppConfig, "DATASET_PATH" | "DEFAULT_COUNTRY">
): Promise<Dataset> {
  console.log(`[Dataset] Loading ${config.DATASET_PATH}`);
  const csvText = await readFile(config.DATASET_PATH, "utf8");
  const records = parseDataset(csvText);
  const dataset = createDataset(records, config.DEFAULT_COUNTRY);
  console.log(
    `[Dataset] Loaded ${dataset.countries().length} countries, default: ${dataset.defaultCountry}`
  );
  ready = dataset;
  return dataset;
}

export function getDataset(): Dataset {
  if (!ready) {
    throw new Error("Dataset has not been initialised; call initDataset first");
  }
  return ready;
}
