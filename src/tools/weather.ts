import { z } from 'zod';
import type { Tool } from '../types';
import { addDays, diffDays } from '../utils/dates';
import type { DateResolver } from './date-resolver';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface WeatherToolDependencies {
  resolver: DateResolver;
  fetch?: FetchLike;
}

const GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';
const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';
const ARCHIVE_URL = 'https://archive-api.open-meteo.com/v1/era5';

const MAX_FORECAST_DAYS = 16;
const MAX_ARCHIVE_DAYS = 31;

type Units = 'metric' | 'imperial';

const unitsSchema = z
  .string()
  .optional()
  .transform((value): Units =>
    value?.trim().toLowerCase() === 'imperial' ? 'imperial' : 'metric',
  )
  .describe('metric or imperial');

const geocodingSchema = z.object({
  results: z
    .array(
      z.object({
        latitude: z.number(),
        longitude: z.number(),
        name: z.string().optional(),
        country: z.string().optional(),
      }),
    )
    .optional(),
});

const series = z.array(z.number().nullable()).optional();
const labels = z.array(z.string().nullable()).optional();

const dailyResponseSchema = z.object({
  daily: z
    .object({
      time: z.array(z.string()).optional(),
      temperature_2m_max: series,
      temperature_2m_min: series,
      precipitation_sum: series,
      precipitation_probability_max: series,
      windspeed_10m_max: series,
      weathercode: series,
      sunrise: labels,
      sunset: labels,
    })
    .optional(),
});

type DailyResponse = NonNullable<z.infer<typeof dailyResponseSchema>['daily']>;

interface GeoLocation {
  name: string;
  country: string | null;
  lat: number;
  lon: number;
}

const at = <T>(values: T[] | undefined, index: number): T | null =>
  values?.[index] ?? null;

const unitParams = (units: Units): Record<string, string> =>
  units === 'metric'
    ? { temperature_unit: 'celsius', windspeed_unit: 'kmh', precipitation_unit: 'mm' }
    : { temperature_unit: 'fahrenheit', windspeed_unit: 'mph', precipitation_unit: 'inch' };

const requestJson = async (
  fetchImpl: FetchLike,
  baseUrl: string,
  params: Record<string, string | number>,
  label: string,
  timeoutMs: number,
): Promise<unknown> => {
  const query = new URLSearchParams(
    Object.entries(params).map(([key, value]): [string, string] => [
      key,
      String(value),
    ]),
  );
  const response = await fetchImpl(`${baseUrl}?${query.toString()}`, {
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) {
    throw new Error(
      `${label} error: HTTP ${response.status} - ${await response.text()}`,
    );
  }
  return response.json();
};

const geocode = async (
  fetchImpl: FetchLike,
  location: string,
): Promise<GeoLocation> => {
  const body = geocodingSchema.parse(
    await requestJson(
      fetchImpl,
      GEOCODING_URL,
      { name: location, count: 1, language: 'en', format: 'json' },
      'Open-Meteo geocoding',
      20_000,
    ),
  );
  const city = body.results?.[0];
  if (!city) {
    throw new Error(`Location not found: "${location}"`);
  }
  return {
    name: city.name ?? location,
    country: city.country ?? null,
    lat: city.latitude,
    lon: city.longitude,
  };
};

export const forecastSchema = z.object({
  location: z.string().min(1).describe('City or place name'),
  target_date: z
    .string()
    .optional()
    .describe('Single day to forecast (ISO or phrase such as "tomorrow")'),
  units: unitsSchema,
  days: z.number().int().optional().describe('Days window (1-16)'),
});

export const archiveSchema = z.object({
  location: z.string().min(1).describe('City or place name'),
  start_date: z.string().min(1),
  end_date: z.string().min(1),
  units: unitsSchema,
});

export const createForecastTool = ({
  resolver,
  fetch: fetchImpl = fetch,
}: WeatherToolDependencies): Tool => ({
  name: 'openmeteo_forecast',
  description:
    'Weather forecast using Open-Meteo (exact target_date or days window, max 16 days).',
  argsSchema: forecastSchema,
  execute: async (args) => {
    const { location, target_date: targetDate, units, days: requested } =
      forecastSchema.parse(args);

    const days = Math.max(1, requested ?? 1);
    if (days > MAX_FORECAST_DAYS) {
      throw new Error(
        'Requested forecast horizon exceeds provider limits (max 16 days). Please request 16 days or fewer.',
      );
    }

    const today = resolver.today();
    const lastDay = addDays(today, MAX_FORECAST_DAYS);
    let target: string | null = null;
    if (targetDate?.trim()) {
      target = await resolver.resolve(targetDate);
      if (target < today || target > lastDay) {
        throw new Error(
          `Requested date ${target} is outside the forecast window (${today} .. ${lastDay}). Pass a relative phrase like "tomorrow", or choose a date within 16 days.`,
        );
      }
    }

    const place = await geocode(fetchImpl, location);
    const params: Record<string, string | number> = {
      latitude: place.lat,
      longitude: place.lon,
      timezone: 'auto',
      daily: [
        'temperature_2m_max',
        'temperature_2m_min',
        'precipitation_sum',
        'precipitation_probability_max',
        'windspeed_10m_max',
        'weathercode',
        'sunrise',
        'sunset',
      ].join(','),
      ...unitParams(units),
      ...(target
        ? { start_date: target, end_date: target }
        : { forecast_days: days }),
    };

    const body = dailyResponseSchema.parse(
      await requestJson(fetchImpl, FORECAST_URL, params, 'Open-Meteo forecast', 25_000),
    );
    const daily = normalizeForecast(body.daily ?? {});
    if (target && daily.length !== 1) {
      throw new Error(
        `Provider did not return a single-day forecast for ${target}. It may be out of forecast range (max 16 days).`,
      );
    }

    return {
      location: place,
      units,
      daily,
      provider_note: 'Daily forecast limited to 16 days by Open-Meteo.',
    };
  },
});

export const createArchiveTool = ({
  resolver,
  fetch: fetchImpl = fetch,
}: WeatherToolDependencies): Tool => ({
  name: 'openmeteo_archive',
  description: 'Historical daily weather via Open-Meteo ERA5 (max 31 days).',
  argsSchema: archiveSchema,
  execute: async (args) => {
    const { location, start_date: startDate, end_date: endDate, units } =
      archiveSchema.parse(args);

    const start = await resolver.resolve(startDate);
    const end = await resolver.resolve(endDate);
    if (start > end) {
      throw new Error(`start_date ${start} must be <= end_date ${end}`);
    }
    const span = diffDays(start, end) + 1;
    if (span > MAX_ARCHIVE_DAYS) {
      throw new Error(
        `Date range too large (${span} days). Please request 31 days or fewer.`,
      );
    }

    const place = await geocode(fetchImpl, location);
    const body = dailyResponseSchema.parse(
      await requestJson(
        fetchImpl,
        ARCHIVE_URL,
        {
          latitude: place.lat,
          longitude: place.lon,
          start_date: start,
          end_date: end,
          daily: [
            'temperature_2m_max',
            'temperature_2m_min',
            'precipitation_sum',
            'windspeed_10m_max',
            'weathercode',
          ].join(','),
          timezone: 'auto',
          ...unitParams(units),
        },
        'Open-Meteo ERA5',
        30_000,
      ),
    );

    const daily = normalizeArchive(body.daily ?? {});
    if (daily.length === 0) {
      throw new Error('Provider returned no daily records for the requested range.');
    }

    return {
      location: place,
      units,
      start_date: start,
      end_date: end,
      daily,
      provider_note: 'Historical daily data from ERA5 reanalysis.',
    };
  },
});

const normalizeForecast = (daily: DailyResponse) =>
  (daily.time ?? []).map((date, i) => ({
    date,
    temp_min: at(daily.temperature_2m_min, i),
    temp_max: at(daily.temperature_2m_max, i),
    precip_sum: at(daily.precipitation_sum, i),
    precip_prob_max: at(daily.precipitation_probability_max, i),
    windspeed_max: at(daily.windspeed_10m_max, i),
    weathercode: at(daily.weathercode, i),
    sunrise: at(daily.sunrise, i),
    sunset: at(daily.sunset, i),
  }));

const normalizeArchive = (daily: DailyResponse) =>
  (daily.time ?? []).map((date, i) => ({
    date,
    temp_min: at(daily.temperature_2m_min, i),
    temp_max: at(daily.temperature_2m_max, i),
    precip_sum: at(daily.precipitation_sum, i),
    windspeed_max: at(daily.windspeed_10m_max, i),
    weathercode: at(daily.weathercode, i),
  }));
