/**
 * Raised when a country's historical series cannot be fitted:
 * too few points, years out of order, or a population the log-regression
 * cannot take.
 */
export class DataError extends Error {
  readonly country: string;
  readonly year?: number;

  constructor(message: string, country: string, year?: number) {
    super(message);
    this.name = "DataError";
    this.country = country;
    this.year = year;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
