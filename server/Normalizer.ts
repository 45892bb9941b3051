import * as R from 'ramda'
import { fromUnixTime } from 'date-fns'

import type { OwmCondition, OwmCurrentWeather, OwmForecast, OwmForecastItem } from './UpstreamSchema'
import { CurrentWeather, Forecast, ForecastDay, WeatherCondition } from './WeatherDomain'
import { groupInOrder, mean, roundTo, roundTo1Decimal } from './Utils'

// Upstream forecasts come in 3 hour steps
export const GRANULES_PER_DAY = 8

export const UNKNOWN_CONDITION: WeatherCondition = {
  condition: 'unknown',
  description: 'No description available',
  icon: ''
}

export function toCurrentWeather(data: OwmCurrentWeather): CurrentWeather {
  return {
    city: data.name,
    country: data.sys.country,
    coordinates: { lat: data.coord.lat, lon: data.coord.lon },
    temperature: roundTo1Decimal(data.main.temp),
    feels_like: roundTo1Decimal(data.main.feels_like),
    humidity: data.main.humidity,
    pressure: data.main.pressure,
    weather: toCondition(R.head(data.weather)),
    wind_speed: roundTo1Decimal(data.wind.speed),
    wind_direction: data.wind.deg,
    cloudiness: data.clouds.all,
    visibility: data.visibility,
    timestamp: fromUnixTime(data.dt)
  }
}

export function toForecast(data: OwmForecast, days: number, generatedAt: Date = new Date()): Forecast {
  return {
    city: data.city.name,
    country: data.city.country,
    coordinates: { lat: data.city.coord.lat, lon: data.city.coord.lon },
    forecast_days: summarizeDays(data.list, days),
    generated_at: generatedAt
  }
}

/*
  The granule list is cut to `days` worth of 3h steps *before* grouping, so a
  list that does not start at midnight yields a short last day. Granules are
  assumed to be in chronological order and are never re-sorted.
 */
export function summarizeDays(granules: OwmForecastItem[], days: number): ForecastDay[] {
  const window = R.take(days * GRANULES_PER_DAY, granules)
  const byDate = groupInOrder(granule => granule.dt_txt.substring(0, 10), window)

  return R.take(days, byDate)
    .filter(([, dayGranules]) => dayGranules.length > 0)
    .map(([date, dayGranules]) => summarizeDay(date, dayGranules))
}

function summarizeDay(date: string, granules: OwmForecastItem[]): ForecastDay {
  const temperatures = granules.map(g => g.main.temp)
  const firstCondition = R.head(granules.filter(g => g.weather.length > 0).map(g => g.weather[0]))

  return {
    date,
    temperature_min: roundTo1Decimal(Math.min(...temperatures)),
    temperature_max: roundTo1Decimal(Math.max(...temperatures)),
    humidity: roundTo(0, mean(granules.map(g => g.main.humidity))),
    weather: toCondition(firstCondition),
    wind_speed: roundTo1Decimal(mean(granules.map(g => g.wind.speed))),
    precipitation_probability: roundTo(2, Math.max(...granules.map(g => g.pop)))
  }
}

function toCondition(condition: OwmCondition | undefined): WeatherCondition {
  if (condition === undefined) {
    return { ...UNKNOWN_CONDITION }
  }
  return {
    condition: condition.main.toLowerCase(),
    description: condition.description,
    icon: condition.icon
  }
}
