import express, { NextFunction, Request, Response } from 'express'
import cors from 'cors'
import compression from 'compression'
import morgan, { StreamOptions } from 'morgan'

import { Config } from './Config'
import { RouteNotFoundError, toServiceError } from './Errors'
import { logger, requestLoggingFormat } from './Logging'
import { toCurrentWeather, toForecast } from './Normalizer'
import { validateWeatherQuery } from './Validation'
import { WeatherClient } from './WeatherClient'
import { HealthReport, ServiceInfo } from './WeatherDomain'

export interface AppDependencies {
  config: Pick<Config, 'appName' | 'appVersion' | 'mountPrefix'>,
  weatherClient: WeatherClient,
  accessLogStream?: StreamOptions
}

export function createApp({ config, weatherClient, accessLogStream }: AppDependencies): express.Express {
  const prefix = config.mountPrefix
  const app = express()

  if (accessLogStream) {
    app.use(morgan(requestLoggingFormat, { stream: accessLogStream }))
  }
  app.use(cors({ methods: ['GET'] }))
  app.use(compression())

  app.get(prefix + '/', (req, res) => {
    const info: ServiceInfo = {
      service: config.appName,
      version: config.appVersion,
      status: 'running',
      timestamp: new Date(),
      health: prefix + '/health'
    }
    res.json(info)
  })

  app.get(prefix + '/weather/current', (req, res, next) => {
    validateWeatherQuery(req.query, false)
      .then(({ location }) => weatherClient.getCurrentWeather(location))
      .then(data => res.json(toCurrentWeather(data)))
      .catch(next)
  })

  app.get(prefix + '/weather/forecast', (req, res, next) => {
    validateWeatherQuery(req.query, true)
      .then(({ location, days }) => weatherClient.getForecast(location)
        .then(data => res.json(toForecast(data, days))))
      .catch(next)
  })

  // Always 200, upstream trouble only shows in the reported status
  app.get(prefix + '/health', (req, res, next) => {
    Promise.resolve()
      .then(() => weatherClient.checkHealth())
      .then((upstreamHealthy): Pick<HealthReport, 'status' | 'upstream_status'> => upstreamHealthy
        ? { status: 'healthy', upstream_status: 'healthy' }
        : { status: 'degraded', upstream_status: 'unhealthy' })
      .catch((err): Pick<HealthReport, 'status' | 'upstream_status'> => {
        logger.error(`Health check failed: ${err instanceof Error ? err.message : String(err)}`)
        return { status: 'unhealthy', upstream_status: 'unknown' }
      })
      .then(({ status, upstream_status }) => {
        logger.info(`Health check completed: ${status}`)
        const report: HealthReport = { status, timestamp: new Date(), version: config.appVersion, upstream_status }
        res.json(report)
      })
      .catch(next)
  })

  app.use((req, res, next) => {
    next(new RouteNotFoundError(`No route for ${req.method} ${req.path}`))
  })

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    const error = toServiceError(err)
    const context = `${req.method} ${req.originalUrl}`
    if (error.statusCode >= 500) {
      logger.error(`${context} -> ${error.statusCode} ${error.kind}: ${error.message}`)
    } else {
      logger.warn(`${context} -> ${error.statusCode} ${error.kind}: ${error.message}`)
    }
    res.status(error.statusCode).json(error.toBody())
  })

  return app
}
