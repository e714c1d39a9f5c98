import { readFileSync } from 'fs';
import path from 'path';
import {
  createDataset,
  getDataset,
  initDataset,
  parseDataset,
  toHistoricalSeries,
} from '../src/lib/dataset';

const FIXTURE = path.join(__dirname, 'fixtures', 'population.csv');
const records = parseDataset(readFileSync(FIXTURE, 'utf8'));

const HEADER =
  'Rank,CCA3,Country/Territory,Capital,Continent,2022 Population,2020 Population,' +
  '2015 Population,2010 Population,2000 Population,1990 Population,1980 Population,' +
  '1970 Population,Area (km²),Density (per km²),Growth Rate,World Population Percentage';

describe('parseDataset', () => {
  it('reads one record per row', () => {
    expect(records.map((r) => r.name)).toEqual([
      'Arcadia',
      'Borealis',
      'Zenith',
      'Caldera',
    ]);
  });

  it('maps the census columns to an ordered history', () => {
    const arcadia = records[0];
    expect(arcadia.rank).toBe(1);
    expect(arcadia.code).toBe('ARC');
    expect(arcadia.capital).toBe('Port Lumen');
    expect(arcadia.continent).toBe('Oceania');
    expect(arcadia.history.map((p) => p.year)).toEqual([
      1970, 1980, 1990, 2000, 2010, 2015, 2020, 2022,
    ]);
    expect(arcadia.history[0]).toEqual({ year: 1970, population: 2000000 });
    expect(arcadia.history[7]).toEqual({ year: 2022, population: 5200000 });
    expect(arcadia.areaKm2).toBe(120000);
    expect(arcadia.worldPopulationPercentage).toBe(0.07);
  });

  it('keeps quoted commas inside a cell', () => {
    const [row] = parseDataset(
      `${HEADER}\n5,QQQ,Quayside,"Dock, Upper",Europe,8,7,6,5,4,3,2,1,10,0.8,1.01,0.001\n`
    );
    expect(row.capital).toBe('Dock, Upper');
    expect(toHistoricalSeries(row).points[0]).toEqual({
      year: 1970,
      population: 1,
    });
  });

  it('reads a blank census cell as NaN rather than zero', () => {
    const [row] = parseDataset(
      `${HEADER}\n5,QQQ,Quayside,Dock,Europe,8,7,6,5,4,3,,1,10,0.8,1.01,0.001\n`
    );
    expect(row.history[1].year).toBe(1980);
    expect(row.history[1].population).toBeNaN();
  });
});

describe('createDataset', () => {
  const dataset = createDataset(records, 'Arcadia');

  it('lists country names in sorted order', () => {
    expect(dataset.countries()).toEqual([
      'Arcadia',
      'Borealis',
      'Caldera',
      'Zenith',
    ]);
  });

  it('matches names exactly and case-sensitively', () => {
    expect(dataset.find('Zenith')?.capital).toBe('Highgate');
    expect(dataset.find('zenith')).toBeUndefined();
  });

  it('resolves unknown or missing names to the default country', () => {
    expect(dataset.resolve('Nonexistent').name).toBe('Arcadia');
    expect(dataset.resolve(undefined).name).toBe('Arcadia');
    expect(dataset.resolve('Borealis').name).toBe('Borealis');
  });

  it('hands out frozen records', () => {
    const record = dataset.resolve('Borealis');
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.history)).toBe(true);
  });

  it('refuses a default country the data does not contain', () => {
    expect(() => createDataset(records, 'Atlantis')).toThrow(
      'Default country "Atlantis" is not present in the dataset'
    );
  });
});

describe('initDataset', () => {
  it('fails lookups before the dataset is loaded', () => {
    expect(() => getDataset()).toThrow(
      'Dataset has not been initialised; call initDataset first'
    );
  });

  it('loads once and shares the snapshot', async () => {
    const config = { DATASET_PATH: FIXTURE, DEFAULT_COUNTRY: 'Borealis' };
    const first = await initDataset(config);
    const second = await initDataset(config);
    expect(second).toBe(first);
    expect(getDataset()).toBe(first);
    expect(first.defaultCountry).toBe('Borealis');
  });
});
