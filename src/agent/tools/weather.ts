/**
 * Weather lookup via OpenWeatherMap (geocoding + current weather).
 *
 * Every failure is returned as a WeatherOutcome carrying user-facing text,
 * so callers always have a sentence to send back.
 */

import { config } from '../../config';
import { errorMessage, isRecord } from '../../utils/guards';
import { AgentTool } from './types';

export const MISSING_API_KEY_MESSAGE =
  'Weather API key not configured. Please set OPENWEATHER_API_KEY in the environment.';

export interface WeatherClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export type WeatherFailureKind = 'config' | 'not-found' | 'http' | 'network' | 'missing-field' | 'unexpected';

export interface WeatherPayload {
  geocoding: Record<string, unknown>;
  weather: Record<string, unknown>;
}

export type WeatherOutcome =
  | { ok: true; text: string; payload: WeatherPayload }
  | { ok: false; kind: WeatherFailureKind; text: string };

type WeatherFailure = Extract<WeatherOutcome, { ok: false }>;

type JsonResult = { ok: true; data: unknown; raw: string } | { ok: false; failure: WeatherFailure };

export interface WeatherLookup {
  getWeather(location: string): Promise<WeatherOutcome>;
}

function fail(kind: WeatherFailureKind, text: string): WeatherFailure {
  return { ok: false, kind, text };
}

function missingField(field: string): WeatherFailure {
  return fail(
    'missing-field',
    `Error parsing weather data: Missing field '${field}'. This might be due to API limitations.`,
  );
}

/** Capitalize the first letter of every word, lowercase the rest ("new york" -> "New York"). */
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, before: string, letter: string) => {
    return before + letter.toUpperCase();
  });
}

/**
 * The number as it appeared in the response body, so `20.0` stays `20.0`
 * rather than the parsed `20`. Falls back to the parsed value.
 */
export function numberAsSent(raw: string, key: string, value: unknown): string {
  const match = new RegExp(`"${key}"\\s*:\\s*(-?\\d+(?:\\.\\d+)?(?:[eE][+-]?\\d+)?)`).exec(raw);
  const literal = match?.[1];
  if (literal !== undefined && Number(literal) === value) return literal;
  return String(value);
}

function redact(url: URL): string {
  const copy = new URL(url);
  if (copy.searchParams.has('appid')) copy.searchParams.set('appid', '***');
  return copy.toString();
}

export class WeatherClient implements WeatherLookup {
  private readonly options: WeatherClientOptions;

  constructor(options: Partial<WeatherClientOptions> = {}) {
    this.options = { ...config.weather, ...options };
  }

  async getWeather(location: string): Promise<WeatherOutcome> {
    if (!this.options.apiKey) {
      return fail('config', MISSING_API_KEY_MESSAGE);
    }

    try {
      const outcome = await this.lookup(location);
      console.log(`[weather] ${location}: ${outcome.ok ? 'OK' : outcome.kind}`);
      return outcome;
    } catch (err) {
      return fail('unexpected', `Unexpected error getting weather: ${errorMessage(err)}`);
    }
  }

  private async lookup(location: string): Promise<WeatherOutcome> {
    const geoUrl = this.url('/geo/1.0/direct', { q: location, limit: '1' });
    const geo = await this.fetchJson(geoUrl);
    if (!geo.ok) return geo.failure;

    if (!Array.isArray(geo.data) || geo.data.length === 0) {
      return fail('not-found', `Could not find coordinates for '${location}'. Please check the location name.`);
    }

    const place: unknown = geo.data[0];
    if (!isRecord(place)) return missingField('lat');
    if (typeof place.lat !== 'number') return missingField('lat');
    if (typeof place.lon !== 'number') return missingField('lon');

    const weatherUrl = this.url('/data/2.5/weather', {
      lat: String(place.lat),
      lon: String(place.lon),
      units: 'metric',
    });
    const current = await this.fetchJson(weatherUrl);
    if (!current.ok) return current.failure;

    const weather = current.data;
    if (!isRecord(weather)) return missingField('main');

    const main = weather.main;
    if (!isRecord(main)) return missingField('main');
    if (main.temp === undefined) return missingField('temp');
    if (main.humidity === undefined) return missingField('humidity');

    const conditions = weather.weather;
    if (!Array.isArray(conditions)) return missingField('weather');
    const condition: unknown = conditions[0];
    if (!isRecord(condition) || typeof condition.description !== 'string') {
      return missingField('description');
    }

    const payload: WeatherPayload = { geocoding: place, weather };
    const summary =
      `The weather in ${titleCase(location)} is ${titleCase(condition.description)} ` +
      `with a temperature of ${numberAsSent(current.raw, 'temp', main.temp)}°C ` +
      `and humidity of ${numberAsSent(current.raw, 'humidity', main.humidity)}%.`;

    const text =
      'FULL_OPENWEATHERMAP_API_RESPONSE (JSON):\n' +
      '```json\n' +
      `${JSON.stringify(payload, null, 2)}\n` +
      '```\n\n' +
      'SUMMARY:\n' +
      summary;

    return { ok: true, text, payload };
  }

  private url(path: string, params: Record<string, string>): URL {
    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('appid', this.options.apiKey);
    return url;
  }

  private async fetchJson(url: URL): Promise<JsonResult> {
    console.log(`[weather] GET ${redact(url)}`);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, { signal: controller.signal });
      } catch (err) {
        const reason = controller.signal.aborted
          ? `Request timed out after ${this.options.timeoutMs}ms`
          : describeFetchError(err);
        return {
          ok: false,
          failure: fail('network', `Network/connection error fetching weather data: ${reason}`),
        };
      }

      if (!response.ok) {
        const details = await readProviderMessage(response);
        let text = `OpenWeatherMap API error (${response.status}).`;
        if (details) text += ` Details: ${details}`;
        return { ok: false, failure: fail('http', text) };
      }

      const raw = await response.text();
      const data: unknown = JSON.parse(raw);
      return { ok: true, data, raw };
    } finally {
      clearTimeout(timer);
    }
  }
}

function describeFetchError(err: unknown): string {
  const msg = errorMessage(err);
  if (err instanceof Error && err.cause instanceof Error) {
    return `${msg} (${err.cause.message})`;
  }
  return msg;
}

async function readProviderMessage(response: Response): Promise<string | undefined> {
  const body = await response.text().catch(() => '');
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed) && typeof parsed.message === 'string' && parsed.message) {
      return parsed.message;
    }
  } catch {
    // not JSON
  }
  return undefined;
}

export function createWeatherTool(client: WeatherLookup): AgentTool {
  return {
    name: 'get_weather',
    source: 'builtin',
    description:
      'Get real, current weather data for a location using OpenWeatherMap. Returns the full API payload as JSON followed by a one-line summary.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        location: {
          type: 'string',
          description: "The location to get the weather for (e.g., 'London', 'New York').",
        },
      },
      required: ['location'],
    },

    async execute(input) {
      const location = typeof input.location === 'string' ? input.location.trim() : '';
      if (!location) {
        return { content: 'location is required', isError: true };
      }
      const outcome = await client.getWeather(location);
      return { content: outcome.text, isError: !outcome.ok };
    },
  };
}
