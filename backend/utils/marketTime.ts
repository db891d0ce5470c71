// backend/utils/marketTime.ts - ニューヨーク時間での日付計算
import { DateTime } from 'luxon'

export const MARKET_ZONE = 'America/New_York'

export type Clock = () => DateTime

export const marketClock: Clock = () => DateTime.now().setZone(MARKET_ZONE)

export function formatExpiry(date: DateTime): string {
  return date.toFormat('yyyyLLdd')
}

export function formatDate(date: DateTime): string {
  return date.toFormat('yyyy-LL-dd')
}

export function formatTime(date: DateTime): string {
  return date.toFormat('HH:mm:ss')
}

/** ショート/ロングの満期日 (例: 21日後 / 28日後) */
export function calculateExpiryDates(
  now: DateTime,
  shortDte: number,
  longDte: number
): { shortExpiry: string; longExpiry: string } {
  const today = now.setZone(MARKET_ZONE).startOf('day')
  return {
    shortExpiry: formatExpiry(today.plus({ days: shortDte })),
    longExpiry: formatExpiry(today.plus({ days: longDte })),
  }
}

/** "2025-03-14" からの経過日数 (暦日) */
export function daysSince(entryDate: string, now: DateTime): number {
  const entry = DateTime.fromISO(entryDate, { zone: MARKET_ZONE }).startOf('day')
  const today = now.setZone(MARKET_ZONE).startOf('day')
  return Math.round(today.diff(entry, 'days').days)
}

export function isWeekday(now: DateTime): boolean {
  return now.setZone(MARKET_ZONE).weekday <= 5
}

/** "09:45" / "09:45:30" をその日の DateTime に変換 */
export function atWallClock(now: DateTime, time: string): DateTime {
  const [hour, minute, second] = time.split(':').map((part) => parseInt(part, 10))
  return now.setZone(MARKET_ZONE).set({
    hour: hour || 0,
    minute: minute || 0,
    second: second || 0,
    millisecond: 0,
  })
}

/** "20250404" → "04/04" */
export function shortExpiryLabel(expiry: string): string {
  return `${expiry.slice(4, 6)}/${expiry.slice(6, 8)}`
}

export function generateTradeId(now: DateTime): string {
  return `CAL_${now.setZone(MARKET_ZONE).toFormat('yyyyLLdd_HHmmss')}`
}
