import { createApp } from './App'
import { loadConfig } from './Config'
import { createAccessLogStream, logger } from './Logging'
import { createWeatherClient } from './WeatherClient'

const config = loadConfig()
logger.level = config.logLevel

logger.info(`Starting ${config.appName} v${config.appVersion}..`)
if (!config.apiKey) {
  logger.warn('OpenWeatherMap API key not configured. Weather endpoints will answer with a configuration error.')
}

const weatherClient = createWeatherClient(config)
const app = createApp({
  config,
  weatherClient,
  accessLogStream: config.accessLogDir ? createAccessLogStream(config.accessLogDir) : undefined
})

const server = app.listen(config.port, config.host, () => logger.info(`Weather proxy is running at ${config.host}:${config.port}${config.mountPrefix}`))

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Received ${signal}, shutting down..`)
  server.close(err => {
    weatherClient.close()
    if (err) {
      logger.error(`Error while closing HTTP server: ${err.message}`)
      process.exitCode = 1
    }
  })
}

process.once('SIGINT', shutdown)
process.once('SIGTERM', shutdown)
