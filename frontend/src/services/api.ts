// The Vite dev server proxies /api to the backend.
const API_BASE = "/api";

export type PopulationPoint = { year: number; population: number };

export type ForecastCheckpoint = {
  year: number;
  exponential: string;
  logistic: string;
};

export type CountryForecast = {
  requestedCountry: string;
  country: string;
  stats: Record<string, string>;
  growthRate: string;
  populationHistory: Array<{ year: number; population: string }>;
  forecastTable: ForecastCheckpoint[];
  forecastSummary: string;
  model: { r: number; p0: number; k: number };
  series: {
    historical: PopulationPoint[];
    exponential: PopulationPoint[];
    logistic: PopulationPoint[];
  };
};

async function errorDetails(res: Response): Promise<string> {
  try {
    const body: unknown = await res.json();
    if (
      typeof body === "object" &&
      body !== null &&
      "details" in body &&
      typeof body.details === "string"
    ) {
      return body.details;
    }
  } catch (err) {
    console.warn("Error body was not JSON:", err);
  }
  return `status ${res.status}`;
}

export async function fetchCountries(): Promise<{
  countries: string[];
  defaultCountry: string;
}> {
  const res = await fetch(`${API_BASE}/countries`);
  if (!res.ok) {
    throw new Error(`Country list request failed: ${await errorDetails(res)}`);
  }
  return res.json();
}

/**
 * Exponential and logistic forecast for one country. Unknown names come back
 * as the backend's default country.
 */
export async function fetchForecast(country: string): Promise<CountryForecast> {
  const params = new URLSearchParams();
  params.set("country", country);
  const res = await fetch(`${API_BASE}/forecast?${params.toString()}`);
  if (!res.ok) {
    throw new Error(`Forecast request failed: ${await errorDetails(res)}`);
  }
  return res.json();
}
