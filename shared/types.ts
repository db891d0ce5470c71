// shared/types.ts - バックエンドとダッシュボードで共有する型定義

export type TradeStatus = 'PENDING' | 'ACTIVE' | 'CLOSED' | 'CANCELLED' | 'MANUAL_CONTROL'

export type ProfitTargetStatus = 'NONE' | 'PLACED' | 'FILLED' | 'CANCELLED' | 'REJECTED'

export type FillStatus = 'PENDING' | 'FILLED' | 'CANCELLED'

export type OptionRight = 'P' | 'C'

export type LegName = 'shortPut' | 'shortCall' | 'longPut' | 'longCall'

export const LEG_NAMES: readonly LegName[] = ['shortPut', 'shortCall', 'longPut', 'longCall']

export type ExitReason = 'profit target' | 'time exit' | 'manual close' | 'reconciliation close'

export interface LegSnapshot {
  conId: number | null
  entryDelta: number | null
  entryIv: number | null
  exitDelta: number | null
  exitIv: number | null
}

export interface CalendarSpread {
  tradeId: string
  entryDate: string // "2025-03-14"
  entryTime: string // "09:45:12"
  spxPrice: number | null
  shortExpiry: string // "20250404"
  longExpiry: string // "20250411"

  putStrike: number
  callStrike: number
  longPutStrike: number
  longCallStrike: number

  legs: Record<LegName, LegSnapshot>

  entryCredit: number | null
  exitCredit: number | null
  realizedPnl: number | null
  profitTarget: number | null

  status: TradeStatus
  exitReason: ExitReason | null
  exitDate: string | null
  exitTime: string | null
  exitSpxPrice: number | null

  comboOrderId: number | null
  fillStatus: FillStatus
  fillAttempts: number
  lastAttemptPrice: number | null

  profitTargetOrderId: number | null
  profitTargetPrice: number | null
  profitTargetStatus: ProfitTargetStatus

  notes: string | null
}

export type OrderHistoryType = 'ENTRY' | 'EXIT' | 'PROFIT_TARGET'

export interface OrderHistoryEntry {
  tradeId: string
  orderId: number
  orderType: OrderHistoryType
  price: number
  status: string
  timestamp: Date
}

export type DailyLogAction =
  | 'TRADE_PLACED'
  | 'ORDER_FAILED'
  | 'NO_STRIKES'
  | 'GHOST_STRIKE'
  | 'CONTRACTS_MISSING'
  | 'ALREADY_TRADED'
  | 'POSITION_LIMIT'
  | 'PROFIT_TARGET_PLACED'
  | 'PROFIT_TARGET_FAILED'
  | 'PROFIT_TARGET_HIT'
  | 'TIME_EXIT'
  | 'TIME_EXIT_CHECK'
  | 'EXIT_FAILED'
  | 'RECONCILIATION'
  | 'COMMAND'
  | 'MANUAL_CONTROL'
  | 'IMPORT'
  | 'CONNECTION'

export interface DailyLogEntry {
  date: string
  action: DailyLogAction
  message: string
  success: boolean
  timestamp: Date
}

export type SettingType = 'int' | 'float' | 'string' | 'bool'

export interface UserSetting {
  name: string
  value: string
  type: SettingType
  min: number | null
  max: number | null
  category: string
  description: string
}

export type CommandType =
  | 'CLOSE_POSITION'
  | 'STOP_MANAGING'
  | 'RUN_RECONCILIATION'
  | 'PLACE_MISSING_GTC'
  | 'RECORD_EXTERNAL_CLOSE'
  | 'IMPORT_TRADE'
  | 'RUN_ENTRY'

export const COMMAND_TYPES: readonly CommandType[] = [
  'CLOSE_POSITION',
  'STOP_MANAGING',
  'RUN_RECONCILIATION',
  'PLACE_MISSING_GTC',
  'RECORD_EXTERNAL_CLOSE',
  'IMPORT_TRADE',
  'RUN_ENTRY',
]

export type CommandStatus = 'PENDING' | 'PROCESSING' | 'COMPLETED' | 'FAILED'

export type CommandParameters = Record<string, string | number | boolean | null>

export interface QueuedCommand {
  id: string
  // キューには UI から任意の文字列が入りうる
  commandType: string
  tradeId: string | null
  parameters: CommandParameters
  status: CommandStatus
  result: string | null
  createdBy: string
  createdAt: Date
  processedAt: Date | null
}

export type DiscrepancyKind = 'MISSING_LEG' | 'QUANTITY_MISMATCH' | 'ORPHANED_POSITION'

export interface Discrepancy {
  kind: DiscrepancyKind
  key: string // "20250404-4800-P"
  tradeIds: string[]
  leg: LegName | null
  expected: number
  actual: number
  message: string
}

export interface ReconciliationReport {
  checkedTrades: number
  brokerPositions: number
  discrepancies: Discrepancy[]
  clean: boolean
  timestamp: Date
}

export interface SpreadValuation {
  tradeId: string
  spreadValue: number | null
  unrealizedPnl: number | null
  ready: boolean
  updatedAt: Date | null
}

export interface ApiResponse<T> {
  success: boolean
  message?: string
  data?: T
  error?: string
}
