import * as http from 'http'
import * as https from 'https'
import fetch, { FetchError, RequestInit, Response } from 'node-fetch'
import { ZodType, ZodTypeDef } from 'zod'

import { UpstreamConfig } from './Config'
import { ConfigurationError, CredentialError, LocationNotFoundError, UpstreamError } from './Errors'
import { OwmCurrentWeather, OwmForecast } from './UpstreamSchema'
import { Location } from './WeatherDomain'
import { describeLocation } from './Utils'
import { logger } from './Logging'

export type Fetch = (url: string, init?: RequestInit) => Promise<Response>

export interface WeatherClient {
  getCurrentWeather(location: Location): Promise<OwmCurrentWeather>,
  getForecast(location: Location): Promise<OwmForecast>,
  checkHealth(): Promise<boolean>,
  close(): void
}

export function createWeatherClient(config: UpstreamConfig, fetchImpl: Fetch = fetch): WeatherClient {
  // Connections are pooled for the lifetime of the client and shared by all requests
  const httpAgent = new http.Agent({ keepAlive: true })
  const httpsAgent = new https.Agent({ keepAlive: true })

  return {
    getCurrentWeather: location => {
      logger.info(`Fetching current weather for ${describeLocation(location)}`)
      return getFromUpstream('/weather', location, OwmCurrentWeather)
    },
    getForecast: location => {
      logger.info(`Fetching forecast for ${describeLocation(location)}`)
      return getFromUpstream('/forecast', location, OwmForecast)
    },
    checkHealth: () => getFromUpstream('/weather', { kind: 'city', city: config.healthCheckCity }, OwmCurrentWeather)
      .then(() => true)
      .catch(err => {
        logger.error(`Weather API health check failed: ${err instanceof Error ? err.message : String(err)}`)
        return false
      }),
    close: () => {
      httpAgent.destroy()
      httpsAgent.destroy()
    }
  }

  async function getFromUpstream<T>(path: string, location: Location, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    if (!config.apiKey) {
      throw new ConfigurationError('OpenWeatherMap API key not found. Please set OPENWEATHERMAP_API_KEY environment variable.')
    }

    const url = buildUrl(path, location, config.apiKey)
    const res = await fetchImpl(url, {
      timeout: config.requestTimeoutMs,
      agent: parsedUrl => parsedUrl.protocol === 'http:' ? httpAgent : httpsAgent
    }).catch(err => {
      throw toTransportError(err)
    })

    const body = await res.text().catch(err => {
      throw toTransportError(err)
    })
    if (res.status === 401) {
      throw new CredentialError('Invalid API key')
    } else if (res.status === 404) {
      throw new LocationNotFoundError(`Location not found (${describeLocation(location)})`)
    } else if (res.status !== 200) {
      throw new UpstreamError(`API request failed with status ${res.status}: ${body}`, 'status', res.status, body)
    }

    return decode(body, schema)
  }

  function buildUrl(path: string, location: Location, apiKey: string): string {
    const params = location.kind === 'city'
      ? new URLSearchParams({ q: location.city })
      : new URLSearchParams({ lat: String(location.latitude), lon: String(location.longitude) })
    params.set('appid', apiKey)
    params.set('units', 'metric')
    return `${config.baseUrl}${path}?${params.toString()}`
  }
}

function toTransportError(err: unknown): UpstreamError {
  // node-fetch's timeout covers both waiting for the response and reading its body
  if (err instanceof FetchError && (err.type === 'request-timeout' || err.type === 'body-timeout')) {
    return new UpstreamError('Request timeout - weather service unavailable', 'timeout')
  }
  return new UpstreamError(`Network error: ${err instanceof Error ? err.message : String(err)}`, 'network')
}

function decode<T>(body: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (e) {
    throw new UpstreamError(`Upstream response is not JSON: ${e instanceof Error ? e.message : String(e)}`, 'decode', 200, body)
  }

  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    throw new UpstreamError(`Unexpected upstream payload: ${parsed.error.message}`, 'decode', 200, body)
  }
  return parsed.data
}
