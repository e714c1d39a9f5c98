const groupedInteger = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
  useGrouping: true,
});

/**
 * Truncates toward zero and groups thousands: 1234567.9 -> "1,234,567".
 */
export function formatCount(value: number): string {
  const truncated = Math.trunc(value);
  // Math.trunc(-0.4) is -0, which Intl renders as "-0".
  return groupedInteger.format(truncated === 0 ? 0 : truncated);
}

export function formatFixed(value: number, digits: number): string {
  return value.toFixed(digits);
}

export function formatArea(areaKm2: number): string {
  return `${formatCount(areaKm2)} km²`;
}

export function formatDensity(perKm2: number): string {
  return `${formatFixed(perKm2, 2)} people/km²`;
}

export function formatPercent(value: number): string {
  return `${formatFixed(value, 2)}%`;
}
