// services/ib-service/types.ts
import { OptionRight } from '../../../shared/types'

export interface OptionContractSpec {
  symbol: string // "SPX"
  tradingClass: string // "SPXW"
  expiry: string // "20250404"
  strike: number
  right: OptionRight
}

/** ストライク未指定で満期のチェーンを照会する */
export type ChainQuery = Omit<OptionContractSpec, 'strike'> & { strike?: number }

export interface ContractDetail {
  conId: number
  symbol: string
  tradingClass: string
  expiry: string
  strike: number
  right: OptionRight
  localSymbol?: string
}

export interface QuoteSnapshot {
  bid: number | null
  ask: number | null
  last: number | null
  close: number | null
  delta: number | null
  impliedVolatility: number | null
  gamma: number | null
  theta: number | null
  vega: number | null
  underlyingPrice: number | null
  updatedAt: Date | null
}

export interface QuoteHandle {
  reqId: number
  contract: OptionContractSpec
}

export type OrderAction = 'BUY' | 'SELL'

export interface ComboLegSpec {
  conId: number
  action: OrderAction
  ratio: number
}

export interface ComboOrderSpec {
  symbol: string
  legs: ComboLegSpec[]
  action: OrderAction
  quantity: number
  /** コンボの純指値 (クローズ用は負値) */
  limitPrice: number
  tif: 'DAY' | 'GTC'
  outsideRth?: boolean
}

export interface OrderStatusUpdate {
  orderId: number
  status: string // "Submitted" / "Filled" / "Cancelled" ...
  filled: number
  remaining: number
  avgFillPrice: number
  timestamp: Date
}

export interface PositionRecord {
  account: string
  symbol: string
  secType: string
  conId: number | null
  expiry: string | null
  strike: number | null
  right: OptionRight | null
  quantity: number
  avgCost: number
  localSymbol?: string
}

export interface ConnectionInfo {
  host: string
  port: number
  clientId: number
  connected: boolean
  pendingRequests: number
}

export type BrokerEvent =
  | { type: 'OrderStatusChanged'; update: OrderStatusUpdate }
  | { type: 'QuoteUpdated'; reqId: number; quote: QuoteSnapshot }
  | { type: 'ContractResolved'; reqId: number; detail: ContractDetail }
  | { type: 'PositionReported'; position: PositionRecord }
  | { type: 'OrderError'; orderId: number; code: number; message: string }
  | { type: 'ConnectionLost'; code: number; message: string }

export type BrokerEventType = BrokerEvent['type']

export type BrokerEventOf<T extends BrokerEventType> = Extract<BrokerEvent, { type: T }>

/** 約定以外で注文が終了したステータス */
export const TERMINAL_ORDER_STATUSES = ['Cancelled', 'ApiCancelled', 'Inactive'] as const

export const WORKING_ORDER_STATUSES = ['Submitted', 'PreSubmitted'] as const

export function isTerminalOrderStatus(status: string): boolean {
  return TERMINAL_ORDER_STATUSES.some((value) => value === status)
}

export function isWorkingOrderStatus(status: string): boolean {
  return WORKING_ORDER_STATUSES.some((value) => value === status)
}

export function emptyQuote(): QuoteSnapshot {
  return {
    bid: null,
    ask: null,
    last: null,
    close: null,
    delta: null,
    impliedVolatility: null,
    gamma: null,
    theta: null,
    vega: null,
    underlyingPrice: null,
    updatedAt: null,
  }
}

/** bid/ask が両方ある場合のみ中値 */
export function quoteMid(quote: QuoteSnapshot | null | undefined): number | null {
  if (!quote || quote.bid === null || quote.ask === null) return null
  if (quote.bid <= 0 || quote.ask <= 0) return null
  return (quote.bid + quote.ask) / 2
}
