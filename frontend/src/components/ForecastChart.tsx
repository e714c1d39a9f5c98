import React from "react";
import {
  buildLinePath,
  buildTicks,
  buildYearTicks,
  createScale,
  formatAxisValue,
  getMinMax,
  type ChartPoint,
} from "../lib/chartGeometry.js";

type ForecastChartProps = {
  country: string;
  historical: ChartPoint[];
  exponential: ChartPoint[];
  logistic: ChartPoint[];
  width?: number;
  height?: number;
};

const CHART_COLORS = {
  bg: "#0f1726",
  axis: "#90caf9",
  grid: "rgba(144, 202, 249, 0.18)",
  label: "#e3f2fd",
  historical: "#00d1ff",
  exponential: "#ff6b6b",
  logistic: "#feca57",
};

const LEGEND = [
  { label: "Historical data", color: CHART_COLORS.historical, dashed: false },
  { label: "Exponential model", color: CHART_COLORS.exponential, dashed: true },
  { label: "Logistic model", color: CHART_COLORS.logistic, dashed: true },
];

const paddingLeft = 80;
const paddingRight = 30;
const paddingTop = 40;
const paddingBottom = 60;

export function ForecastChart({
  country,
  historical,
  exponential,
  logistic,
  width = 900,
  height = 420,
}: ForecastChartProps) {
  const all = [...historical, ...exponential, ...logistic];
  const [minYear, maxYear] = getMinMax(all.map((p) => p.year));
  const [, maxValue] = getMinMax(all.map((p) => p.population));
  const yMax = maxValue * 1.05;

  const x = createScale([minYear, maxYear], [paddingLeft, width - paddingRight]);
  const y = createScale([0, yMax], [height - paddingBottom, paddingTop]);

  const yTicks = buildTicks(0, yMax, 6);
  const xTicks = buildYearTicks(minYear, maxYear, 10);

  return (
    <div
      style={{
        background: "rgba(25, 118, 210, 0.08)",
        border: "1px solid rgba(144, 202, 249, 0.12)",
        borderRadius: 16,
        padding: "24px 20px",
        overflowX: "auto",
      }}
    >
      <h3
        style={{
          margin: "0 0 16px 0",
          color: CHART_COLORS.label,
          fontSize: 22,
          fontWeight: 700,
        }}
      >
        Population dynamics: {country}
      </h3>
      <svg
        width={width}
        height={height}
        role="img"
        aria-label={`Population history and forecasts for ${country}`}
        style={{ background: CHART_COLORS.bg, display: "block", borderRadius: 12 }}
      >
        {/* Y axis */}
        <line
          x1={paddingLeft}
          y1={paddingTop}
          x2={paddingLeft}
          y2={height - paddingBottom}
          stroke={CHART_COLORS.axis}
          strokeWidth={2}
        />
        {/* X axis */}
        <line
          x1={paddingLeft}
          y1={height - paddingBottom}
          x2={width - paddingRight}
          y2={height - paddingBottom}
          stroke={CHART_COLORS.axis}
          strokeWidth={2}
        />
        {yTicks.map((tick) => {
          const tickY = y(tick);
          return (
            <g key={`y-${tick}`}>
              <line
                x1={paddingLeft - 8}
                y1={tickY}
                x2={width - paddingRight}
                y2={tickY}
                stroke={CHART_COLORS.grid}
                strokeDasharray="3 7"
              />
              <text
                x={paddingLeft - 12}
                y={tickY + 4}
                fontSize={12}
                textAnchor="end"
                fill={CHART_COLORS.label}
              >
                {formatAxisValue(tick)}
              </text>
            </g>
          );
        })}
        {xTicks.map((year) => {
          const tickX = x(year);
          return (
            <g key={`x-${year}`}>
              <line
                x1={tickX}
                y1={height - paddingBottom}
                x2={tickX}
                y2={height - paddingBottom + 8}
                stroke={CHART_COLORS.axis}
              />
              <text
                x={tickX}
                y={height - paddingBottom + 24}
                fontSize={12}
                textAnchor="middle"
                fill={CHART_COLORS.label}
              >
                {year}
              </text>
            </g>
          );
        })}
        <text
          x={paddingLeft + (width - paddingLeft - paddingRight) / 2}
          y={height - 12}
          textAnchor="middle"
          fontSize={14}
          fill={CHART_COLORS.label}
        >
          Year
        </text>
        <path
          d={buildLinePath(exponential, x, y)}
          stroke={CHART_COLORS.exponential}
          strokeWidth={2.5}
          strokeDasharray="10 5"
          fill="none"
        />
        <path
          d={buildLinePath(logistic, x, y)}
          stroke={CHART_COLORS.logistic}
          strokeWidth={2.5}
          strokeDasharray="10 5"
          fill="none"
        />
        <path
          d={buildLinePath(historical, x, y)}
          stroke={CHART_COLORS.historical}
          strokeWidth={3}
          fill="none"
        />
        {historical.map((point) => (
          <circle
            key={`dot-${point.year}`}
            cx={x(point.year)}
            cy={y(point.population)}
            r={4}
            fill={CHART_COLORS.bg}
            stroke={CHART_COLORS.historical}
            strokeWidth={2}
          >
            <title>{`${point.year}: ${Math.trunc(point.population).toLocaleString("en-US")}`}</title>
          </circle>
        ))}
        {LEGEND.map((entry, idx) => (
          <g
            key={entry.label}
            transform={`translate(${paddingLeft + 16}, ${paddingTop + 8 + idx * 20})`}
          >
            <line
              x1={0}
              y1={0}
              x2={22}
              y2={0}
              stroke={entry.color}
              strokeWidth={3}
              strokeDasharray={entry.dashed ? "6 3" : undefined}
            />
            <text x={30} y={4} fontSize={12} fill={CHART_COLORS.label}>
              {entry.label}
            </text>
          </g>
        ))}
      </svg>
    </div>
  );
}
