// backend/utils/pricing.ts - SPX コンボ価格の刻み計算

export const SPX_TICK = 0.05
export const PROFIT_TARGET_TICK = 0.1

const EPSILON = 1e-9

/** 小数誤差を落として2桁に正規化 */
export function normalizePrice(value: number): number {
  return Number(value.toFixed(2))
}

export function roundToTick(value: number, tick: number = SPX_TICK): number {
  return normalizePrice(Math.round(value / tick) * tick)
}

/** 売り指値用の切り捨て (6.00 は 6.00 のまま) */
export function roundDownToTick(value: number, tick: number = PROFIT_TARGET_TICK): number {
  return normalizePrice(Math.floor(value / tick + EPSILON) * tick)
}

export interface LegMids {
  shortPut: number
  shortCall: number
  longPut: number
  longCall: number
}

/** ダブルカレンダーの純デビット = −(ショート中値) + (ロング中値) */
export function spreadValue(mids: LegMids): number {
  return roundToTick(-mids.shortPut - mids.shortCall + mids.longPut + mids.longCall)
}

export function profitTargetPrice(entryCredit: number, profitTargetPct: number): number {
  return roundDownToTick(entryCredit * (1 + profitTargetPct))
}
