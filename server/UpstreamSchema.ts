import { z } from 'zod'

// OpenWeatherMap 2.5 payloads, metric units

const percentage = z.number().min(0).max(100)

export const OwmCoord = z.object({
  lon: z.number(),
  lat: z.number()
})

export const OwmCondition = z.object({
  id: z.number().optional(),
  main: z.string(),
  description: z.string(),
  icon: z.string()
})

export const OwmMain = z.object({
  temp: z.number(),
  feels_like: z.number(),
  temp_min: z.number(),
  temp_max: z.number(),
  pressure: z.number(),
  humidity: percentage,
  sea_level: z.number().optional(),
  grnd_level: z.number().optional()
})

export const OwmWind = z.object({
  speed: z.number().min(0),
  deg: z.number().min(0).max(360),
  gust: z.number().optional()
})

export const OwmClouds = z.object({
  all: percentage
})

export const OwmCurrentWeather = z.object({
  coord: OwmCoord,
  weather: z.array(OwmCondition),
  base: z.string().optional(),
  main: OwmMain,
  visibility: z.number(),
  wind: OwmWind,
  clouds: OwmClouds,
  dt: z.number().int(),
  sys: z.object({
    country: z.string(),
    sunrise: z.number().optional(),
    sunset: z.number().optional()
  }),
  timezone: z.number().optional(),
  id: z.number().optional(),
  name: z.string(),
  cod: z.number().optional()
})

export const OwmForecastItem = z.object({
  dt: z.number().int(),
  main: OwmMain,
  weather: z.array(OwmCondition),
  clouds: OwmClouds,
  wind: OwmWind,
  visibility: z.number().optional(),
  pop: z.number().min(0).max(1),
  dt_txt: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/)
})

export const OwmForecast = z.object({
  cod: z.string().optional(),
  message: z.number().optional(),
  cnt: z.number().optional(),
  list: z.array(OwmForecastItem),
  city: z.object({
    id: z.number().optional(),
    name: z.string(),
    coord: OwmCoord,
    country: z.string(),
    population: z.number().optional(),
    timezone: z.number().optional(),
    sunrise: z.number().optional(),
    sunset: z.number().optional()
  })
})

export type OwmCondition = z.infer<typeof OwmCondition>
export type OwmCurrentWeather = z.infer<typeof OwmCurrentWeather>
export type OwmForecastItem = z.infer<typeof OwmForecastItem>
export type OwmForecast = z.infer<typeof OwmForecast>
