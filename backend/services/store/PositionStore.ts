// backend/services/store/PositionStore.ts
import {
  CalendarSpread,
  CommandParameters,
  CommandStatus,
  DailyLogEntry,
  OrderHistoryEntry,
  QueuedCommand,
  TradeStatus,
  UserSetting,
} from '../../../shared/types'

export interface TradeFilter {
  status?: TradeStatus | TradeStatus[]
  entryDateFrom?: string
  entryDateTo?: string
  limit?: number
}

export interface NewCommand {
  commandType: string
  tradeId?: string | null
  parameters?: CommandParameters
  createdBy?: string
}

export interface CommandUpdate {
  status: CommandStatus
  result?: string | null
  processedAt?: Date | null
}

/**
 * 永続化層のインターフェース。
 * コアはこのインターフェースにだけ依存する (本番は MongoDB 実装)。
 */
export interface PositionStore {
  saveTrade(trade: CalendarSpread): Promise<void>
  getTrade(tradeId: string): Promise<CalendarSpread | null>
  listTrades(filter?: TradeFilter): Promise<CalendarSpread[]>
  findTradeByProfitTargetOrderId(orderId: number): Promise<CalendarSpread | null>
  /** CANCELLED を除いた指定日のエントリー件数 */
  countTradesForDate(entryDate: string): Promise<number>

  appendOrderHistory(entry: OrderHistoryEntry): Promise<void>
  getOrderHistory(tradeId: string): Promise<OrderHistoryEntry[]>

  appendDailyLog(entry: DailyLogEntry): Promise<void>
  listDailyLogs(limit: number): Promise<DailyLogEntry[]>

  getSettings(): Promise<UserSetting[]>
  upsertSetting(setting: UserSetting): Promise<void>

  enqueueCommand(command: NewCommand): Promise<QueuedCommand>
  getCommand(id: string): Promise<QueuedCommand | null>
  listPendingCommands(): Promise<QueuedCommand[]>
  updateCommand(id: string, update: CommandUpdate): Promise<void>
  deleteCommandsOlderThan(cutoff: Date): Promise<number>
}
