/**
 * OpenWeatherMap Service
 * Current conditions and 5-day/3-hour forecasts for store coordinates.
 *
 * Free tier notes:
 * - 60 calls/minute, 1,000,000 calls/month
 * - Forecast endpoint returns up to 40 entries (5 days x 8 three-hour steps)
 */
import { WeatherForecastEntry, WeatherReading, periodForHour } from '../types';
import { ProviderUnavailableError, errorMessage } from '../errors';

/**
 * External weather collaborator consumed by the snapshot cache
 */
export interface WeatherProvider {
  getCurrent(latitude: number, longitude: number): Promise<WeatherReading>;
  getForecast(latitude: number, longitude: number, days: number): Promise<WeatherForecastEntry[]>;
}

export interface OpenWeatherMapConfig {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  utcOffsetMinutes?: number; // Used when the response carries no timezone
}

/**
 * Condition block shared by current and forecast responses
 */
interface OwmConditions {
  main: { temp: number; feels_like: number; humidity: number };
  weather: Array<{ main: string; description: string }>;
  wind: { speed: number }; // m/s
}

interface OwmForecastResponse {
  list: Array<OwmConditions & { dt: number }>;
  city?: { timezone?: number }; // Offset from UTC in seconds
}

const MAX_FORECAST_DAYS = 5;

export class OpenWeatherMapProvider implements WeatherProvider {
  private apiKey?: string;
  private baseUrl: string;
  private timeoutMs: number;
  private utcOffsetMinutes: number;

  constructor(config: OpenWeatherMapConfig = {}) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl || 'https://api.openweathermap.org/data/2.5').replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.utcOffsetMinutes = config.utcOffsetMinutes ?? 330;
  }

  async getCurrent(latitude: number, longitude: number): Promise<WeatherReading> {
    const data = await this.request<OwmConditions>('/weather', { lat: latitude, lon: longitude });
    return toReading(data);
  }

  async getForecast(latitude: number, longitude: number, days: number): Promise<WeatherForecastEntry[]> {
    const span = Math.min(Math.max(1, Math.floor(days)), MAX_FORECAST_DAYS);
    const data = await this.request<OwmForecastResponse>('/forecast', {
      lat: latitude,
      lon: longitude,
      cnt: span * 8, // 8 forecasts per day (3-hour intervals)
    });

    const offsetSeconds = data.city?.timezone ?? this.utcOffsetMinutes * 60;
    const entries: WeatherForecastEntry[] = [];
    const seen = new Set<string>();

    // Keep the first 3-hour step of each (date, period) bucket
    for (const item of data.list || []) {
      const local = new Date((item.dt + offsetSeconds) * 1000);
      const date = local.toISOString().slice(0, 10);
      const period = periodForHour(local.getUTCHours());
      const key = `${date}#${period}`;
      if (seen.has(key)) continue;
      seen.add(key);

      entries.push({ date, period, ...toReading(item) });
    }

    return entries;
  }

  /**
   * GET an endpoint with a hard timeout. Any failure becomes ProviderUnavailableError.
   */
  private async request<T>(endpoint: string, params: Record<string, number>): Promise<T> {
    if (!this.apiKey) {
      throw new ProviderUnavailableError('OpenWeatherMap', 'No API key configured');
    }

    const query = new URLSearchParams({ appid: this.apiKey, units: 'metric' });
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${endpoint}?${query.toString()}`, {
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ProviderUnavailableError(
          'OpenWeatherMap',
          `HTTP ${response.status}: ${response.statusText}`
        );
      }

      return (await response.json()) as T;
    } catch (error) {
      if (error instanceof ProviderUnavailableError) throw error;
      throw new ProviderUnavailableError('OpenWeatherMap', errorMessage(error), error);
    } finally {
      clearTimeout(timeout);
    }
  }
}

function toReading(data: OwmConditions): WeatherReading {
  if (!data.main || !data.wind) {
    throw new ProviderUnavailableError('OpenWeatherMap', 'Malformed response');
  }
  const conditions = data.weather?.[0];

  return {
    temperatureC: data.main.temp,
    feelsLikeC: data.main.feels_like,
    humidity: data.main.humidity,
    condition: conditions?.main || 'Unknown',
    description: conditions?.description || '',
    windSpeedKmh: Math.round(data.wind.speed * 3.6 * 10) / 10, // m/s to km/h
  };
}

/**
 * Factory function to create the weather provider from environment variables
 */
export function createWeatherProvider(utcOffsetMinutes?: number): OpenWeatherMapProvider {
  return new OpenWeatherMapProvider({
    apiKey: process.env.OPENWEATHER_API_KEY,
    baseUrl: process.env.OPENWEATHER_BASE_URL,
    timeoutMs: process.env.OPENWEATHER_TIMEOUT_MS ? Number(process.env.OPENWEATHER_TIMEOUT_MS) : undefined,
    utcOffsetMinutes,
  });
}
