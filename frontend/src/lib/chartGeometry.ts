export type ChartPoint = { year: number; population: number };

export type Scale = (value: number) => number;

const compactNumber = new Intl.NumberFormat("en-US", {
  notation: "compact",
  maximumFractionDigits: 1,
});

export function getMinMax(values: number[]): [number, number] {
  const numeric = values.filter((value) => Number.isFinite(value));
  if (numeric.length === 0) return [0, 1];
  let min = Math.min(...numeric);
  let max = Math.max(...numeric);
  // Avoid collapsing to a single line if all values are the same
  if (min === max) {
    min = min - 1;
    max = max + 1;
  }
  return [min, max];
}

export function createScale(
  [domainStart, domainEnd]: [number, number],
  [rangeStart, rangeEnd]: [number, number]
): Scale {
  const span = domainEnd - domainStart || 1;
  return (value) =>
    rangeStart + ((value - domainStart) / span) * (rangeEnd - rangeStart);
}

/** SVG path through the points, skipping any that land off the chart. */
export function buildLinePath(points: ChartPoint[], x: Scale, y: Scale): string {
  const segments: string[] = [];
  for (const point of points) {
    const X = x(point.year);
    const Y = y(point.population);
    if (!Number.isFinite(X) || !Number.isFinite(Y)) continue;
    segments.push(`${segments.length === 0 ? "M" : "L"}${X},${Y}`);
  }
  return segments.join(" ");
}

export function buildTicks(min: number, max: number, count: number): number[] {
  if (count < 2) return [min];
  return Array.from(
    { length: count },
    (_, idx) => min + ((max - min) * idx) / (count - 1)
  );
}

export function buildYearTicks(
  firstYear: number,
  lastYear: number,
  step = 10
): number[] {
  const ticks: number[] = [];
  for (
    let year = Math.ceil(firstYear / step) * step;
    year <= lastYear;
    year += step
  ) {
    ticks.push(year);
  }
  return ticks;
}

export function formatAxisValue(value: number): string {
  return compactNumber.format(value);
}
