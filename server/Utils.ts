import * as R from 'ramda'

import { Location } from './WeatherDomain'

/*
  Rounds half to even, judged on the exact binary value: 12.25 is a tie and
  goes to 12.2, 12.35 is really 12.3499.. and goes to 12.3
 */
export function roundTo(decimals: number, num: number): number {
  if (!Number.isFinite(num) || Math.abs(num) >= 1e21) {
    return num
  }
  const exact = Math.abs(num).toFixed(100)
  const dot = exact.indexOf('.')
  const fraction = exact.substring(dot + 1)
  const isTie = fraction[decimals] === '5' && /^0*$/.test(fraction.substring(decimals + 1))
  if (!isTie) {
    return Number(num.toFixed(decimals))
  }

  const truncated = Number(exact.substring(0, dot) + fraction.substring(0, decimals))
  const even = truncated % 2 === 0 ? truncated : truncated + 1
  return Math.sign(num) * even / Math.pow(10, decimals)
}

export const roundTo1Decimal = (num: number): number => roundTo(1, num)

export function mean(values: number[]): number {
  return R.mean(values)
}

/*
  Like R.groupBy, but keeps groups in the order their keys were first seen
  regardless of what the keys look like
 */
export function groupInOrder<T>(keyFn: (item: T) => string, items: readonly T[]): Array<[string, T[]]> {
  const groups = new Map<string, T[]>()
  items.forEach(item => {
    const key = keyFn(item)
    const group = groups.get(key)
    if (group) {
      group.push(item)
    } else {
      groups.set(key, [item])
    }
  })
  return Array.from(groups.entries())
}

export function describeLocation(location: Location): string {
  return location.kind === 'city'
    ? `city: ${location.city}`
    : `coordinates: ${location.latitude}, ${location.longitude}`
}
