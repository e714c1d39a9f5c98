import React from "react";
import type { CountryForecast } from "../services/api.js";

type ForecastReportProps = {
  forecast: CountryForecast;
};

const SECTION_STYLE: React.CSSProperties = {
  background: "rgba(25, 118, 210, 0.08)",
  border: "1px solid rgba(144, 202, 249, 0.12)",
  borderRadius: 12,
  padding: "18px 20px",
  display: "flex",
  flexDirection: "column",
  gap: 10,
};

const SECTION_TITLE_STYLE: React.CSSProperties = {
  color: "#90caf9",
  fontSize: 14,
  fontWeight: 700,
  letterSpacing: "0.04em",
  textTransform: "uppercase",
  margin: 0,
};

const ITEM_TEXT_STYLE: React.CSSProperties = {
  color: "#e3f2fd",
  fontSize: 14,
  fontWeight: 500,
  lineHeight: 1.5,
  margin: 0,
};

const CELL_STYLE: React.CSSProperties = {
  ...ITEM_TEXT_STYLE,
  padding: "6px 10px",
  borderBottom: "1px solid rgba(144, 202, 249, 0.12)",
  textAlign: "right",
};

const HEAD_CELL_STYLE: React.CSSProperties = {
  ...CELL_STYLE,
  color: "#90caf9",
  fontWeight: 700,
};

export function ForecastReport({ forecast }: ForecastReportProps) {
  return (
    <div
      style={{
        display: "grid",
        gridTemplateColumns: "repeat(auto-fit, minmax(280px, 1fr))",
        gap: 16,
      }}
    >
      <section style={SECTION_STYLE}>
        <h4 style={SECTION_TITLE_STYLE}>{forecast.country}</h4>
        <dl style={{ margin: 0, display: "grid", gridTemplateColumns: "auto 1fr", gap: "6px 16px" }}>
          {Object.entries(forecast.stats).map(([label, value]) => (
            <React.Fragment key={label}>
              <dt style={{ ...ITEM_TEXT_STYLE, color: "#90caf9" }}>{label}</dt>
              <dd style={{ ...ITEM_TEXT_STYLE, margin: 0 }}>{value}</dd>
            </React.Fragment>
          ))}
        </dl>
        <p style={ITEM_TEXT_STYLE}>
          Fitted growth rate (r): <strong>{forecast.growthRate}</strong>
        </p>
      </section>

      <section style={SECTION_STYLE}>
        <h4 style={SECTION_TITLE_STYLE}>Population history</h4>
        <table style={{ borderCollapse: "collapse" }}>
          <thead>
            <tr>
              <th style={HEAD_CELL_STYLE}>Year</th>
              <th style={HEAD_CELL_STYLE}>Population</th>
            </tr>
          </thead>
          <tbody>
            {forecast.populationHistory.map((row) => (
              <tr key={row.year}>
                <td style={CELL_STYLE}>{row.year}</td>
                <td style={CELL_STYLE}>{row.population}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </section>

      <section style={SECTION_STYLE}>
        <h4 style={SECTION_TITLE_STYLE}>Forecast</h4>
        {forecast.forecastTable.length > 0 ? (
          <table style={{ borderCollapse: "collapse" }}>
            <thead>
              <tr>
                <th style={HEAD_CELL_STYLE}>Year</th>
                <th style={HEAD_CELL_STYLE}>Exponential</th>
                <th style={HEAD_CELL_STYLE}>Logistic</th>
              </tr>
            </thead>
            <tbody>
              {forecast.forecastTable.map((row) => (
                <tr key={row.year}>
                  <td style={CELL_STYLE}>{row.year}</td>
                  <td style={CELL_STYLE}>{row.exponential}</td>
                  <td style={CELL_STYLE}>{row.logistic}</td>
                </tr>
              ))}
            </tbody>
          </table>
        ) : (
          <p style={ITEM_TEXT_STYLE}>No checkpoint year falls inside the forecast horizon.</p>
        )}
        <p style={ITEM_TEXT_STYLE}>{forecast.forecastSummary}</p>
      </section>
    </div>
  );
}
