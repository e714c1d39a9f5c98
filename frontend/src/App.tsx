import React, { useEffect, useState } from "react";
import {
  fetchCountries,
  fetchForecast,
  type CountryForecast,
} from "./services/api.js";
import { ForecastChart } from "./components/ForecastChart.js";
import { ForecastReport } from "./components/ForecastReport.js";

function messageOf(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback;
}

export function App() {
  const [countries, setCountries] = useState<string[]>([]);
  const [selected, setSelected] = useState<string>("");
  const [forecast, setForecast] = useState<CountryForecast | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    fetchCountries()
      .then((data) => {
        if (cancelled) return;
        setCountries(data.countries);
        setSelected(data.defaultCountry);
      })
      .catch((err: unknown) => {
        console.error("Error loading countries:", err);
        if (!cancelled) setError(messageOf(err, "Failed to load countries"));
      });
    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    if (!selected) return;
    let cancelled = false;
    setLoading(true);
    setError(null);
    fetchForecast(selected)
      .then((data) => {
        if (!cancelled) setForecast(data);
      })
      .catch((err: unknown) => {
        console.error(`Error loading forecast for ${selected}:`, err);
        if (!cancelled) {
          setForecast(null);
          setError(messageOf(err, "Failed to load forecast"));
        }
      })
      .finally(() => {
        if (!cancelled) setLoading(false);
      });
    return () => {
      cancelled = true;
    };
  }, [selected]);

  return (
    <main
      style={{
        maxWidth: 1100,
        margin: "0 auto",
        padding: "32px 20px",
        fontFamily: "'Lato', sans-serif",
        color: "#e3f2fd",
        display: "flex",
        flexDirection: "column",
        gap: 24,
      }}
    >
      <header>
        <h1 style={{ margin: 0, fontSize: 30, letterSpacing: "-0.3px" }}>
          Population Forecast
        </h1>
        <p style={{ margin: "6px 0 0 0", color: "#90caf9" }}>
          Exponential and logistic growth models fitted to census data from 1970 to 2022.
        </p>
      </header>

      <label style={{ display: "flex", gap: 12, alignItems: "center" }}>
        Country
        <select
          value={selected}
          disabled={countries.length === 0 || loading}
          onChange={(e) => setSelected(e.target.value)}
          style={{
            padding: "8px 12px",
            background: "rgba(144, 202, 249, 0.15)",
            color: "#e3f2fd",
            border: "1px solid rgba(144, 202, 249, 0.3)",
            borderRadius: 8,
            fontSize: 14,
          }}
        >
          {countries.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
        {loading && <span style={{ color: "#90caf9" }}>Loading...</span>}
      </label>

      {error && (
        <div
          role="alert"
          style={{
            padding: "12px 16px",
            borderRadius: 8,
            background: "rgba(239, 83, 80, 0.15)",
            border: "1px solid rgba(239, 83, 80, 0.4)",
          }}
        >
          {error}
        </div>
      )}

      {forecast && (
        <>
          <ForecastChart
            country={forecast.country}
            historical={forecast.series.historical}
            exponential={forecast.series.exponential}
            logistic={forecast.series.logistic}
          />
          <ForecastReport forecast={forecast} />
        </>
      )}
    </main>
  );
}
