import { query, validationResult, ValidationChain } from 'express-validator'

import { SchemaError, ValidationError } from './Errors'
import { FieldError, Location, WeatherQuery } from './WeatherDomain'

export const DEFAULT_FORECAST_DAYS = 3
export const MAX_FORECAST_DAYS = 5

type QueryParams = Record<string, unknown>

export interface LocationParams {
  city?: string,
  lat?: number,
  lon?: number
}

const singleValue = (field: string, message: string) => query(field).optional().not().isArray().withMessage(message).bail()

const locationChains: ValidationChain[] = [
  singleValue('city', 'city must be a single text value').isString().withMessage('city must be a single text value'),
  numberInRange('lat', -90, 90),
  numberInRange('lon', -180, 180)
]

const daysChain: ValidationChain = singleValue('days', `days must be an integer between 1 and ${MAX_FORECAST_DAYS}`)
  .isInt({ min: 1, max: MAX_FORECAST_DAYS }).withMessage(`days must be an integer between 1 and ${MAX_FORECAST_DAYS}`)

/*
  Two tiers: malformed or out of range values are a SchemaError (422), checked first.
  Conflicting, incomplete or missing location parameters are a ValidationError (400).
 */
export async function validateWeatherQuery(params: QueryParams, acceptDays: boolean): Promise<WeatherQuery> {
  const chains = acceptDays ? [...locationChains, daysChain] : locationChains
  const req = { query: params }
  await Promise.all(chains.map(chain => chain.run(req)))

  const errors = validationResult(req)
  if (!errors.isEmpty()) {
    throw new SchemaError(errors.array({ onlyFirstError: true }).map((e): FieldError => ({
      field: e.type === 'field' ? e.path : e.type,
      message: String(e.msg)
    })))
  }

  const location = resolveLocation({
    city: typeof params.city === 'string' ? params.city : undefined,
    lat: typeof params.lat === 'string' ? parseFloat(params.lat) : undefined,
    lon: typeof params.lon === 'string' ? parseFloat(params.lon) : undefined
  })
  const days = acceptDays && typeof params.days === 'string' ? parseInt(params.days, 10) : DEFAULT_FORECAST_DAYS

  return { location, days }
}

export function resolveLocation({ city, lat, lon }: LocationParams): Location {
  const cityName = city === '' ? undefined : city

  if (cityName !== undefined && (lat !== undefined || lon !== undefined)) {
    throw new ValidationError('Cannot specify both city and coordinates')
  }
  if ((lat === undefined) !== (lon === undefined)) {
    throw new ValidationError('Both latitude and longitude must be provided')
  }
  if (cityName !== undefined) {
    return { kind: 'city', city: cityName }
  }
  if (lat !== undefined && lon !== undefined) {
    return { kind: 'coordinates', latitude: lat, longitude: lon }
  }
  throw new ValidationError('Either city name or both latitude and longitude must be provided')
}

function numberInRange(field: string, min: number, max: number): ValidationChain {
  const message = `${field} must be a number between ${min} and ${max}`
  return singleValue(field, message).isFloat({ min, max }).withMessage(message)
}
