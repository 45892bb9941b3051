export interface Coords {
  latitude: number,
  longitude: number
}

export type Location =
  | { kind: 'city', city: string }
  | ({ kind: 'coordinates' } & Coords)

export interface WeatherQuery {
  location: Location,
  days: number
}

// Response shapes below are the service's wire format, hence snake_case

export interface WireCoordinates {
  lat: number,
  lon: number
}

export interface WeatherCondition {
  condition: string,
  description: string,
  icon: string
}

export interface CurrentWeather {
  city: string,
  country: string,
  coordinates: WireCoordinates,
  temperature: number,
  feels_like: number,
  humidity: number,
  pressure: number,
  weather: WeatherCondition,
  wind_speed: number,
  wind_direction: number,
  cloudiness: number,
  visibility: number,
  timestamp: Date
}

export interface ForecastDay {
  date: string,
  temperature_min: number,
  temperature_max: number,
  humidity: number,
  weather: WeatherCondition,
  wind_speed: number,
  precipitation_probability: number
}

export interface Forecast {
  city: string,
  country: string,
  coordinates: WireCoordinates,
  forecast_days: ForecastDay[],
  generated_at: Date
}

export type ServiceStatus = 'healthy' | 'degraded' | 'unhealthy'
export type UpstreamStatus = 'healthy' | 'unhealthy' | 'unknown'

export interface HealthReport {
  status: ServiceStatus,
  timestamp: Date,
  version: string,
  upstream_status: UpstreamStatus
}

export interface ServiceInfo {
  service: string,
  version: string,
  status: 'running',
  timestamp: Date,
  health: string
}

export interface ErrorBody {
  error: string,
  message: string,
  timestamp: Date,
  status_code: number,
  details?: FieldError[]
}

export interface FieldError {
  field: string,
  message: string
}
