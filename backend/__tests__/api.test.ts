import path from 'path';
import request from 'supertest';
import { createApp } from '../src/app';
import { initDataset } from '../src/lib/dataset';

const app = createApp();

beforeAll(async () => {
  await initDataset({
    DATASET_PATH: path.join(__dirname, 'fixtures', 'population.csv'),
    DEFAULT_COUNTRY: 'Arcadia',
  });
});

describe('health endpoint', () => {
  it('returns ok', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });
});

describe('countries endpoint', () => {
  it('lists the known countries and the default', async () => {
    const res = await request(app).get('/api/countries');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      countries: ['Arcadia', 'Borealis', 'Caldera', 'Zenith'],
      defaultCountry: 'Arcadia',
    });
  });
});

describe('forecast endpoint', () => {
  it('forecasts the requested country', async () => {
    const res = await request(app)
      .get('/api/forecast')
      .query({ country: 'Borealis' });
    expect(res.status).toBe(200);
    expect(res.body.requestedCountry).toBe('Borealis');
    expect(res.body.country).toBe('Borealis');
    expect(res.body.stats.Capital).toBe('Frostholm');
    expect(res.body.forecastTable).toHaveLength(5);
    expect(res.body.series.exponential).toHaveLength(50);
    expect(res.body.series.historical).toHaveLength(8);
  });

  it('uses the default country for an unknown name', async () => {
    const unknown = await request(app)
      .get('/api/forecast')
      .query({ country: 'Nonexistent' });
    const fallback = await request(app)
      .get('/api/forecast')
      .query({ country: 'Arcadia' });
    expect(unknown.status).toBe(200);
    expect(unknown.body.requestedCountry).toBe('Nonexistent');
    expect(unknown.body.country).toBe('Arcadia');
    expect({ ...unknown.body, requestedCountry: null }).toEqual({
      ...fallback.body,
      requestedCountry: null,
    });
  });

  it('uses the default country when none is given', async () => {
    const res = await request(app).get('/api/forecast');
    expect(res.status).toBe(200);
    expect(res.body.requestedCountry).toBe('Arcadia');
    expect(res.body.country).toBe('Arcadia');
  });

  it('accepts the country in a JSON body', async () => {
    const res = await request(app)
      .post('/api/forecast')
      .send({ country: 'Zenith' });
    expect(res.status).toBe(200);
    expect(res.body.country).toBe('Zenith');
    expect(res.body.stats.Rank).toBe('4');
  });

  it('answers 422 for a country whose history cannot be fitted', async () => {
    const res = await request(app)
      .get('/api/forecast')
      .query({ country: 'Caldera' });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: 'Invalid historical data',
      details: 'Caldera: population for 2010 must be a positive number, got 0',
    });
  });

  it('returns the same body for the same request', async () => {
    const first = await request(app)
      .get('/api/forecast')
      .query({ country: 'Zenith' });
    const second = await request(app)
      .get('/api/forecast')
      .query({ country: 'Zenith' });
    expect(second.text).toBe(first.text);
  });
});
