import fetch from 'node-fetch';
import { IWeatherClient } from '../../core/interfaces/ICapabilities.js';
import { errorMessage } from '../../core/errors.js';

interface WeatherCondition {
  text: string;
  icon: string;
}

export interface WeatherApiResponse {
  location: {
    name: string;
    region: string;
    country: string;
    lat: number;
    lon: number;
    localtime: string;
  };
  current?: {
    temp_c: number;
    temp_f: number;
    condition: WeatherCondition;
    wind_kph: number;
    wind_mph: number;
    wind_dir: string;
    humidity: number;
    feelslike_c: number;
    feelslike_f: number;
    uv: number;
    vis_km: number;
  };
  forecast?: {
    forecastday: Array<{
      date: string;
      day: {
        maxtemp_c: number;
        maxtemp_f: number;
        mintemp_c: number;
        mintemp_f: number;
        maxwind_kph: number;
        maxwind_mph: number;
        totalprecip_mm: number;
        totalprecip_in: number;
        daily_chance_of_rain?: number;
        condition: WeatherCondition;
      };
    }>;
  };
}

interface WeatherApiError {
  error?: {
    code: number;
    message: string;
  };
}

export const MAX_FORECAST_DAYS = 14;
export const DEFAULT_FORECAST_DAYS = 3;

/**
 * Day counts outside 1..14 fall back to a 3-day forecast
 */
export function clampForecastDays(days: number): number {
  return days < 1 || days > MAX_FORECAST_DAYS ? DEFAULT_FORECAST_DAYS : days;
}

/**
 * WeatherAPI.com client returning Markdown summaries for the model
 */
export class WeatherApiClient implements IWeatherClient {
  constructor(
    private apiKey: string,
    private baseUrl: string = 'https://api.weatherapi.com/v1'
  ) {}

  async getCurrentWeather(location: string, signal?: AbortSignal): Promise<string> {
    const weather = await this.request('current.json', { q: location, aqi: 'no' }, signal);
    return formatCurrentWeather(weather);
  }

  async getForecast(location: string, days: number, signal?: AbortSignal): Promise<string> {
    const weather = await this.request(
      'forecast.json',
      { q: location, days: String(clampForecastDays(days)), aqi: 'no', alerts: 'no' },
      signal
    );
    return formatForecast(weather);
  }

  private async request(
    endpoint: string,
    query: Record<string, string>,
    signal?: AbortSignal
  ): Promise<WeatherApiResponse> {
    const params = new URLSearchParams({ key: this.apiKey, ...query });
    const res = await fetch(`${this.baseUrl}/${endpoint}?${params.toString()}`, { signal });
    const body = await res.text();

    if (!res.ok) {
      throw new Error(describeApiError(res.status, body));
    }

    try {
      return JSON.parse(body) as WeatherApiResponse;
    } catch (error) {
      throw new Error(`failed to parse weather response: ${errorMessage(error)}`);
    }
  }
}

function describeApiError(status: number, body: string): string {
  try {
    const parsed = JSON.parse(body) as WeatherApiError;
    if (parsed.error?.message) {
      return `weather API error: ${parsed.error.message}`;
    }
  } catch {
    // not JSON; report the raw body
  }
  return `weather API returned status ${status}: ${body}`;
}

const fixed = (value: number) => value.toFixed(1);

function header(weather: WeatherApiResponse): string[] {
  const loc = weather.location;
  return [
    `**${loc.name}, ${loc.country}**`,
    `Coordinates: ${loc.lat.toFixed(2)}, ${loc.lon.toFixed(2)}`,
    `Local Time: ${loc.localtime}`,
    '',
  ];
}

export function formatCurrentWeather(weather: WeatherApiResponse): string {
  const current = weather.current;
  if (!current) {
    throw new Error('weather response has no current conditions');
  }

  return [
    ...header(weather),
    '**Current Weather Conditions:**',
    `**Temperature:** ${fixed(current.temp_c)}°C (${fixed(current.temp_f)}°F)`,
    `**Conditions:** ${current.condition.text}`,
    `**Wind:** ${fixed(current.wind_kph)} km/h (${fixed(current.wind_mph)} mph) ${current.wind_dir}`,
    `**Humidity:** ${current.humidity}%`,
    `**Feels Like:** ${fixed(current.feelslike_c)}°C (${fixed(current.feelslike_f)}°F)`,
    `**UV Index:** ${fixed(current.uv)}`,
    `**Visibility:** ${fixed(current.vis_km)} km`,
    '',
  ].join('\n');
}

const weekday = new Intl.DateTimeFormat('en-US', { weekday: 'long', timeZone: 'UTC' });
const monthDay = new Intl.DateTimeFormat('en-US', { month: 'long', day: 'numeric', timeZone: 'UTC' });

export function formatForecast(weather: WeatherApiResponse): string {
  const days = weather.forecast?.forecastday ?? [];
  const lines = [...header(weather), `**${days.length}-Day Weather Forecast:**`, ''];

  days.forEach((forecastDay, index) => {
    const date = new Date(`${forecastDay.date}T00:00:00Z`);
    const label =
      index === 0
        ? `**Today** (${weekday.format(date)}, ${monthDay.format(date)})`
        : `**${weekday.format(date)}** (${monthDay.format(date)})`;
    const day = forecastDay.day;

    lines.push(
      label,
      `   **High:** ${fixed(day.maxtemp_c)}°C (${fixed(day.maxtemp_f)}°F) | **Low:** ${fixed(day.mintemp_c)}°C (${fixed(day.mintemp_f)}°F)`,
      `   **Conditions:** ${day.condition.text}`,
      `   **Wind:** ${fixed(day.maxwind_kph)} km/h (${fixed(day.maxwind_mph)} mph)`,
      `   **Precipitation:** ${fixed(day.totalprecip_mm)} mm (${fixed(day.totalprecip_in)} in)`
    );
    if (day.daily_chance_of_rain !== undefined) {
      lines.push(`   **Chance of Rain:** ${day.daily_chance_of_rain}%`);
    }
    lines.push('');
  });

  return lines.join('\n');
}
