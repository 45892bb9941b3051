import { ConfigurationError } from './Errors'

export interface UpstreamConfig {
  apiKey: string | undefined,
  baseUrl: string,
  requestTimeoutMs: number,
  healthCheckCity: string
}

export interface Config extends UpstreamConfig {
  appName: string,
  appVersion: string,
  host: string,
  port: number,
  mountPrefix: string,
  logLevel: string,
  accessLogDir: string | undefined
}

const DEFAULT_BASE_URL = 'https://api.openweathermap.org/data/2.5'

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    apiKey: env.OPENWEATHERMAP_API_KEY || undefined,
    baseUrl: (env.OPENWEATHERMAP_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
    requestTimeoutMs: positiveNumber('REQUEST_TIMEOUT', env.REQUEST_TIMEOUT, 10) * 1000,
    healthCheckCity: env.HEALTH_CHECK_CITY || 'London',
    appName: env.APP_NAME || 'Weather Forecast Microservice',
    appVersion: env.APP_VERSION || '1.0.0',
    host: env.HOST || '0.0.0.0',
    port: positiveNumber('PORT', env.PORT, 8080),
    mountPrefix: (env.MOUNT_PREFIX || '').replace(/\/+$/, ''),
    logLevel: env.LOG_LEVEL || 'info',
    accessLogDir: env.ACCESS_LOG_DIR === undefined ? 'logs' : env.ACCESS_LOG_DIR || undefined
  }
}

function positiveNumber(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue
  }
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got '${value}'`)
  }
  return parsed
}
