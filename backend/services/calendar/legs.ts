// backend/services/calendar/legs.ts - 4レッグの契約・コンボ構成
import { CalendarSpread, LegName, OptionRight } from '../../../shared/types'
import { ComboLegSpec, OptionContractSpec } from '../ib-service/types'

export const SPX_SYMBOL = 'SPX'
export const SPX_TRADING_CLASS = 'SPXW'

export type LegConIds = Record<LegName, number>

export type LegStrikes = Pick<CalendarSpread, 'putStrike' | 'callStrike' | 'longPutStrike' | 'longCallStrike'>

export function optionContract(expiry: string, strike: number, right: OptionRight): OptionContractSpec {
  return { symbol: SPX_SYMBOL, tradingClass: SPX_TRADING_CLASS, expiry, strike, right }
}

export function isShortLeg(leg: LegName): boolean {
  return leg === 'shortPut' || leg === 'shortCall'
}

export function legRight(leg: LegName): OptionRight {
  return leg === 'shortPut' || leg === 'longPut' ? 'P' : 'C'
}

/** 実際に建てたストライク (ロング未調整ならショートと同じ) */
export function legContracts(
  trade: Pick<CalendarSpread, 'shortExpiry' | 'longExpiry'> & LegStrikes
): Record<LegName, OptionContractSpec> {
  return {
    shortPut: optionContract(trade.shortExpiry, trade.putStrike, 'P'),
    shortCall: optionContract(trade.shortExpiry, trade.callStrike, 'C'),
    longPut: optionContract(trade.longExpiry, trade.longPutStrike || trade.putStrike, 'P'),
    longCall: optionContract(trade.longExpiry, trade.longCallStrike || trade.callStrike, 'C'),
  }
}

/** 新規: ショート売り / ロング買い (1:1:1:1) */
export function openingComboLegs(conIds: LegConIds): ComboLegSpec[] {
  return [
    { conId: conIds.shortPut, action: 'SELL', ratio: 1 },
    { conId: conIds.shortCall, action: 'SELL', ratio: 1 },
    { conId: conIds.longPut, action: 'BUY', ratio: 1 },
    { conId: conIds.longCall, action: 'BUY', ratio: 1 },
  ]
}

/** 決済: ショート買戻し / ロング売り */
export function closingComboLegs(conIds: LegConIds): ComboLegSpec[] {
  return [
    { conId: conIds.shortPut, action: 'BUY', ratio: 1 },
    { conId: conIds.shortCall, action: 'BUY', ratio: 1 },
    { conId: conIds.longPut, action: 'SELL', ratio: 1 },
    { conId: conIds.longCall, action: 'SELL', ratio: 1 },
  ]
}

export function storedConIds(trade: CalendarSpread): LegConIds | null {
  const { shortPut, shortCall, longPut, longCall } = trade.legs
  if (shortPut.conId === null || shortCall.conId === null || longPut.conId === null || longCall.conId === null) {
    return null
  }
  return {
    shortPut: shortPut.conId,
    shortCall: shortCall.conId,
    longPut: longPut.conId,
    longCall: longCall.conId,
  }
}
