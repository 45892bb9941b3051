import type { OwmCurrentWeather, OwmForecast, OwmForecastItem } from '../UpstreamSchema'

export function currentWeatherPayload(overrides: Partial<OwmCurrentWeather> = {}): OwmCurrentWeather {
  return {
    coord: { lon: 24.9355, lat: 60.1695 },
    weather: [{ id: 803, main: 'Clouds', description: 'broken clouds', icon: '04d' }],
    base: 'stations',
    main: { temp: 12.46, feels_like: 11.04, temp_min: 11.2, temp_max: 13.8, pressure: 1012, humidity: 71 },
    visibility: 10000,
    wind: { speed: 4.12, deg: 250 },
    clouds: { all: 75 },
    dt: 1760868000,
    sys: { country: 'FI', sunrise: 1760849000, sunset: 1760884000 },
    timezone: 10800,
    id: 658225,
    name: 'Helsinki',
    cod: 200,
    ...overrides
  }
}

interface GranuleValues {
  temp?: number,
  humidity?: number,
  speed?: number,
  pop?: number,
  main?: string
}

export function granule(dtTxt: string, { temp = 10, humidity = 70, speed = 3, pop = 0, main = 'Clear' }: GranuleValues = {}): OwmForecastItem {
  return {
    dt: Date.parse(dtTxt.replace(' ', 'T') + 'Z') / 1000,
    main: { temp, feels_like: temp - 1, temp_min: temp - 2, temp_max: temp + 2, pressure: 1010, humidity },
    weather: [{ id: 800, main, description: `${main.toLowerCase()} description`, icon: '01d' }],
    clouds: { all: 20 },
    wind: { speed, deg: 180 },
    visibility: 10000,
    pop,
    dt_txt: dtTxt
  }
}

// Eight 3h granules per date, starting at midnight
export function granulesForDates(dates: string[], values: (date: string, slot: number) => GranuleValues = () => ({})): OwmForecastItem[] {
  return dates.flatMap(date => [0, 3, 6, 9, 12, 15, 18, 21].map((hour, slot) =>
    granule(`${date} ${String(hour).padStart(2, '0')}:00:00`, values(date, slot))))
}

export function forecastPayload(list: OwmForecastItem[]): OwmForecast {
  return {
    cod: '200',
    message: 0,
    cnt: list.length,
    list,
    city: {
      id: 658225,
      name: 'Helsinki',
      coord: { lat: 60.1695, lon: 24.9355 },
      country: 'FI',
      population: 558457,
      timezone: 10800,
      sunrise: 1760849000,
      sunset: 1760884000
    }
  }
}
