import { readFileSync } from 'fs';
import path from 'path';
import { createDataset, parseDataset } from '../src/lib/dataset';
import { DataError } from '../src/lib/errors';
import { prepareCountryContext } from '../src/services/countryContext';

const dataset = createDataset(
  parseDataset(
    readFileSync(path.join(__dirname, 'fixtures', 'population.csv'), 'utf8')
  ),
  'Arcadia'
);

describe('prepareCountryContext', () => {
  const context = prepareCountryContext(dataset, 'Arcadia');

  it('formats the country attributes', () => {
    expect(context.country).toBe('Arcadia');
    expect(context.stats).toEqual({
      Rank: '1',
      Capital: 'Port Lumen',
      Continent: 'Oceania',
      Area: '120,000 km²',
      Density: '43.33 people/km²',
      'Growth Rate': '1.0150',
      'World Share': '0.07%',
    });
  });

  it('lists the history newest first', () => {
    expect(context.populationHistory).toHaveLength(8);
    expect(context.populationHistory[0]).toEqual({
      year: 2022,
      population: '5,200,000',
    });
    expect(context.populationHistory[7]).toEqual({
      year: 1970,
      population: '2,000,000',
    });
  });

  it('reports the fitted rate to four decimals', () => {
    expect(context.growthRate).toBe(context.model.r.toFixed(4));
    expect(context.model.p0).toBe(2000000);
    expect(context.model.k).toBe(15600000);
  });

  it('exposes the raw series for charting', () => {
    expect(context.series.historical[0]).toEqual({
      year: 1970,
      population: 2000000,
    });
    expect(context.series.exponential).toHaveLength(50);
    expect(context.series.logistic[0].year).toBe(2022);
    expect(context.forecastTable.map((row) => row.year)).toEqual([
      2030, 2040, 2050, 2060, 2071,
    ]);
    expect(context.forecastSummary).toContain('through 2071');
  });

  it('substitutes the default country for an unknown name', () => {
    expect(prepareCountryContext(dataset, 'Nonexistent')).toEqual(context);
    expect(prepareCountryContext(dataset, undefined)).toEqual(context);
  });

  it('falls back to the last forecast point when no checkpoint is in range', () => {
    const short = prepareCountryContext(dataset, 'Borealis', {
      horizon: 4,
      checkpointYears: [2030, 2040, 2050, 2060, 2071],
      carryingCapacityMultiplier: 3,
    });
    expect(short.forecastTable).toEqual([]);
    expect(short.series.exponential.map((p) => p.year)).toEqual([
      2022, 2023, 2024, 2025,
    ]);
    expect(short.forecastSummary).toContain('through 2025,');
  });

  it('rejects a country with a zero census value', () => {
    expect(() => prepareCountryContext(dataset, 'Caldera')).toThrow(DataError);
    expect(() => prepareCountryContext(dataset, 'Caldera')).toThrow(
      'Caldera: population for 2010 must be a positive number, got 0'
    );
  });

  it('leaves later forecasts unaffected by a failed one', () => {
    expect(() => prepareCountryContext(dataset, 'Caldera')).toThrow(DataError);
    expect(prepareCountryContext(dataset, 'Arcadia')).toEqual(context);
  });
});
