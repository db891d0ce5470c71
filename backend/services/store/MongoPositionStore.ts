// backend/services/store/MongoPositionStore.ts
import { isValidObjectId } from 'mongoose'
import { CalendarTrade } from '../../models/CalendarTrade'
import { OrderHistory } from '../../models/OrderHistory'
import { DailyLog } from '../../models/DailyLog'
import { UserSettingModel } from '../../models/UserSetting'
import { CommandQueue, ICommandQueue } from '../../models/CommandQueue'
import {
  CalendarSpread,
  CommandParameters,
  DailyLogEntry,
  OrderHistoryEntry,
  QueuedCommand,
  UserSetting,
} from '../../../shared/types'
import { CommandUpdate, NewCommand, PositionStore, TradeFilter } from './PositionStore'
import { toCalendarSpread } from './tradeMapper'

type CommandRecord = Pick<
  ICommandQueue,
  'commandType' | 'tradeId' | 'parameters' | 'status' | 'result' | 'createdBy' | 'createdAt' | 'processedAt'
> & { _id: unknown }

function toQueuedCommand(doc: CommandRecord): QueuedCommand {
  const parameters: CommandParameters = doc.parameters ?? {}
  return {
    id: String(doc._id),
    commandType: doc.commandType,
    tradeId: doc.tradeId ?? null,
    parameters,
    status: doc.status,
    result: doc.result ?? null,
    createdBy: doc.createdBy,
    createdAt: doc.createdAt,
    processedAt: doc.processedAt ?? null,
  }
}

export class MongoPositionStore implements PositionStore {
  async saveTrade(trade: CalendarSpread): Promise<void> {
    await CalendarTrade.updateOne({ tradeId: trade.tradeId }, { $set: trade }, { upsert: true })
  }

  async getTrade(tradeId: string): Promise<CalendarSpread | null> {
    const doc = await CalendarTrade.findOne({ tradeId }).lean()
    return doc ? toCalendarSpread(doc) : null
  }

  async listTrades(filter: TradeFilter = {}): Promise<CalendarSpread[]> {
    const query: Record<string, unknown> = {}
    if (filter.status) {
      query.status = Array.isArray(filter.status) ? { $in: filter.status } : filter.status
    }
    if (filter.entryDateFrom || filter.entryDateTo) {
      const range: Record<string, string> = {}
      if (filter.entryDateFrom) range.$gte = filter.entryDateFrom
      if (filter.entryDateTo) range.$lte = filter.entryDateTo
      query.entryDate = range
    }

    let cursor = CalendarTrade.find(query).sort({ entryDate: -1, entryTime: -1 })
    if (filter.limit) {
      cursor = cursor.limit(filter.limit)
    }
    const docs = await cursor.lean()
    return docs.map((doc) => toCalendarSpread(doc))
  }

  async findTradeByProfitTargetOrderId(orderId: number): Promise<CalendarSpread | null> {
    const doc = await CalendarTrade.findOne({ profitTargetOrderId: orderId }).lean()
    return doc ? toCalendarSpread(doc) : null
  }

  async countTradesForDate(entryDate: string): Promise<number> {
    return CalendarTrade.countDocuments({ entryDate, status: { $ne: 'CANCELLED' } })
  }

  async appendOrderHistory(entry: OrderHistoryEntry): Promise<void> {
    await OrderHistory.create(entry)
  }

  async getOrderHistory(tradeId: string): Promise<OrderHistoryEntry[]> {
    const docs = await OrderHistory.find({ tradeId }).sort({ timestamp: 1 }).lean()
    return docs.map((doc) => ({
      tradeId: doc.tradeId,
      orderId: doc.orderId,
      orderType: doc.orderType,
      price: doc.price,
      status: doc.status,
      timestamp: doc.timestamp,
    }))
  }

  async appendDailyLog(entry: DailyLogEntry): Promise<void> {
    await DailyLog.create(entry)
  }

  async listDailyLogs(limit: number): Promise<DailyLogEntry[]> {
    const docs = await DailyLog.find().sort({ timestamp: -1 }).limit(limit).lean()
    return docs.map((doc) => ({
      date: doc.date,
      action: doc.action,
      message: doc.message,
      success: doc.success,
      timestamp: doc.timestamp,
    }))
  }

  async getSettings(): Promise<UserSetting[]> {
    const docs = await UserSettingModel.find().lean()
    return docs.map((doc) => ({
      name: doc.name,
      value: doc.value,
      type: doc.type,
      min: doc.min ?? null,
      max: doc.max ?? null,
      category: doc.category,
      description: doc.description ?? '',
    }))
  }

  async upsertSetting(setting: UserSetting): Promise<void> {
    await UserSettingModel.updateOne({ name: setting.name }, { $set: setting }, { upsert: true })
  }

  async enqueueCommand(command: NewCommand): Promise<QueuedCommand> {
    const doc = await CommandQueue.create({
      commandType: command.commandType,
      tradeId: command.tradeId ?? null,
      parameters: command.parameters ?? {},
      status: 'PENDING',
      createdBy: command.createdBy ?? 'web_ui',
      createdAt: new Date(),
    })
    return toQueuedCommand(doc)
  }

  async getCommand(id: string): Promise<QueuedCommand | null> {
    if (!isValidObjectId(id)) return null
    const doc = await CommandQueue.findById(id).lean()
    return doc ? toQueuedCommand(doc) : null
  }

  async listPendingCommands(): Promise<QueuedCommand[]> {
    const docs = await CommandQueue.find({ status: 'PENDING' }).sort({ createdAt: 1 }).lean()
    return docs.map((doc) => toQueuedCommand(doc))
  }

  async updateCommand(id: string, update: CommandUpdate): Promise<void> {
    await CommandQueue.updateOne({ _id: id }, { $set: update })
  }

  async deleteCommandsOlderThan(cutoff: Date): Promise<number> {
    const result = await CommandQueue.deleteMany({
      status: { $in: ['COMPLETED', 'FAILED'] },
      createdAt: { $lt: cutoff },
    })
    return result.deletedCount
  }
}
