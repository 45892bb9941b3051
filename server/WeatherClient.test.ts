import { afterEach, describe, expect, it, vi } from 'vitest'
import { FetchError, RequestInit, Response } from 'node-fetch'

import { UpstreamConfig } from './Config'
import { ConfigurationError, CredentialError, LocationNotFoundError, UpstreamError } from './Errors'
import { createWeatherClient, WeatherClient } from './WeatherClient'
import { currentWeatherPayload, forecastPayload, granulesForDates } from './__fixtures__/openWeather'

const config: UpstreamConfig = {
  apiKey: 'test-key',
  baseUrl: 'https://weather.test/data/2.5',
  requestTimeoutMs: 5000,
  healthCheckCity: 'London'
}

const helsinki = { kind: 'city', city: 'Helsinki' } as const

function stubFetch(result: Response | Error) {
  return vi.fn(async (url: string, init?: RequestInit): Promise<Response> => {
    if (result instanceof Error) {
      throw result
    }
    return result
  })
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status })
}

describe('WeatherClient', () => {
  let client: WeatherClient | undefined

  afterEach(() => {
    client?.close()
    client = undefined
  })

  it('requests current weather for a city in metric units', async () => {
    const fetchStub = stubFetch(jsonResponse(currentWeatherPayload()))
    client = createWeatherClient(config, fetchStub)

    const data = await client.getCurrentWeather({ kind: 'city', city: 'London,UK' })

    expect(data.name).toBe('Helsinki')
    expect(fetchStub).toHaveBeenCalledTimes(1)
    expect(fetchStub.mock.calls[0][0]).toBe('https://weather.test/data/2.5/weather?q=London%2CUK&appid=test-key&units=metric')
    expect(fetchStub.mock.calls[0][1]?.timeout).toBe(5000)
  })

  it('requests a forecast by coordinates', async () => {
    const fetchStub = stubFetch(jsonResponse(forecastPayload(granulesForDates(['2026-10-20']))))
    client = createWeatherClient(config, fetchStub)

    const data = await client.getForecast({ kind: 'coordinates', latitude: 60.1695, longitude: 24.9355 })

    expect(data.list).toHaveLength(8)
    expect(fetchStub.mock.calls[0][0]).toBe('https://weather.test/data/2.5/forecast?lat=60.1695&lon=24.9355&appid=test-key&units=metric')
  })

  it('fails with a configuration error without calling upstream when the API key is missing', async () => {
    const fetchStub = stubFetch(jsonResponse(currentWeatherPayload()))
    client = createWeatherClient({ ...config, apiKey: undefined }, fetchStub)

    await expect(client.getCurrentWeather(helsinki)).rejects.toBeInstanceOf(ConfigurationError)
    expect(fetchStub).not.toHaveBeenCalled()
  })

  it('maps 401 to a credential error', async () => {
    client = createWeatherClient(config, stubFetch(jsonResponse({ cod: 401, message: 'Invalid API key' }, 401)))

    const error = await client.getCurrentWeather(helsinki).catch(e => e)

    expect(error).toBeInstanceOf(CredentialError)
    expect(error).toBeInstanceOf(ConfigurationError)
    expect(error.statusCode).toBe(500)
  })

  it('maps 404 to a location not found error', async () => {
    client = createWeatherClient(config, stubFetch(jsonResponse({ cod: '404', message: 'city not found' }, 404)))

    await expect(client.getForecast({ kind: 'city', city: 'Atlantis' })).rejects.toBeInstanceOf(LocationNotFoundError)
  })

  it('maps other statuses to an upstream error carrying status and body', async () => {
    client = createWeatherClient(config, stubFetch(new Response('upstream exploded', { status: 502 })))

    await expect(client.getCurrentWeather(helsinki)).rejects.toMatchObject({
      reason: 'status',
      upstreamStatus: 502,
      body: 'upstream exploded',
      message: 'API request failed with status 502: upstream exploded'
    })
  })

  it('maps a timeout to an upstream error', async () => {
    client = createWeatherClient(config, stubFetch(new FetchError('network timeout at: https://weather.test/data/2.5/weather', 'request-timeout')))

    const error = await client.getCurrentWeather(helsinki).catch(e => e)

    expect(error).toBeInstanceOf(UpstreamError)
    expect(error.reason).toBe('timeout')
    expect(error.message).toBe('Request timeout - weather service unavailable')
  })

  it('maps a timeout while reading the body to an upstream timeout', async () => {
    const response = new Response('{}', { status: 200 })
    vi.spyOn(response, 'text').mockRejectedValue(new FetchError('Response timeout while trying to fetch https://weather.test/data/2.5/weather (over 5000ms)', 'body-timeout'))
    client = createWeatherClient(config, stubFetch(response))

    await expect(client.getCurrentWeather(helsinki)).rejects.toMatchObject({
      reason: 'timeout',
      message: 'Request timeout - weather service unavailable'
    })
  })

  it('maps transport failures to an upstream error', async () => {
    client = createWeatherClient(config, stubFetch(new FetchError('request to https://weather.test failed, reason: getaddrinfo ENOTFOUND weather.test', 'system')))

    await expect(client.getCurrentWeather(helsinki)).rejects.toMatchObject({
      reason: 'network',
      message: 'Network error: request to https://weather.test failed, reason: getaddrinfo ENOTFOUND weather.test'
    })
  })

  it('treats a payload that does not match the upstream schema as an upstream error', async () => {
    client = createWeatherClient(config, stubFetch(jsonResponse({ name: 'Helsinki' })))

    await expect(client.getCurrentWeather(helsinki)).rejects.toMatchObject({ reason: 'decode', upstreamStatus: 200 })
  })

  it('treats out of range values as a decode failure', async () => {
    const payload = currentWeatherPayload({ main: { temp: 1, feels_like: 1, temp_min: 1, temp_max: 1, pressure: 1000, humidity: 140 } })
    client = createWeatherClient(config, stubFetch(jsonResponse(payload)))

    await expect(client.getCurrentWeather(helsinki)).rejects.toBeInstanceOf(UpstreamError)
  })

  it('treats a body that is not JSON as a decode failure', async () => {
    client = createWeatherClient(config, stubFetch(new Response('<html>maintenance</html>', { status: 200 })))

    await expect(client.getForecast(helsinki)).rejects.toMatchObject({ reason: 'decode' })
  })

  describe('checkHealth', () => {
    it('fetches current weather for the reference city', async () => {
      const fetchStub = stubFetch(jsonResponse(currentWeatherPayload()))
      client = createWeatherClient(config, fetchStub)

      await expect(client.checkHealth()).resolves.toBe(true)
      expect(fetchStub.mock.calls[0][0]).toBe('https://weather.test/data/2.5/weather?q=London&appid=test-key&units=metric')
    })

    it('reports false instead of failing', async () => {
      client = createWeatherClient(config, stubFetch(new Response('', { status: 503 })))

      await expect(client.checkHealth()).resolves.toBe(false)
    })

    it('reports false when the API key is missing', async () => {
      client = createWeatherClient({ ...config, apiKey: undefined }, stubFetch(jsonResponse(currentWeatherPayload())))

      await expect(client.checkHealth()).resolves.toBe(false)
    })
  })
})
