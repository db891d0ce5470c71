// backend/models/CalendarTrade.ts - ダブルカレンダー1トレード単位のモデル
import mongoose, { Schema, Document } from 'mongoose'
import { CalendarSpread } from '../../shared/types'

export interface ICalendarTrade extends CalendarSpread, Document {
  createdAt: Date
  updatedAt: Date
}

const LegSnapshotSchema = new Schema(
  {
    conId: { type: Number, default: null },
    entryDelta: { type: Number, default: null },
    entryIv: { type: Number, default: null },
    exitDelta: { type: Number, default: null },
    exitIv: { type: Number, default: null },
  },
  { _id: false }
)

const CalendarTradeSchema = new Schema<ICalendarTrade>(
  {
    // 基本情報
    tradeId: { type: String, required: true, unique: true },
    entryDate: { type: String, required: true, index: true },
    entryTime: { type: String, required: true },
    spxPrice: { type: Number, default: null },
    shortExpiry: { type: String, required: true },
    longExpiry: { type: String, required: true },

    // ストライク (ロングは調整時のみショートと異なる)
    putStrike: { type: Number, required: true },
    callStrike: { type: Number, required: true },
    longPutStrike: { type: Number, required: true },
    longCallStrike: { type: Number, required: true },

    legs: {
      shortPut: { type: LegSnapshotSchema, required: true },
      shortCall: { type: LegSnapshotSchema, required: true },
      longPut: { type: LegSnapshotSchema, required: true },
      longCall: { type: LegSnapshotSchema, required: true },
    },

    // 価格・損益
    entryCredit: { type: Number, default: null },
    exitCredit: { type: Number, default: null },
    realizedPnl: { type: Number, default: null },
    profitTarget: { type: Number, default: null },

    status: {
      type: String,
      enum: ['PENDING', 'ACTIVE', 'CLOSED', 'CANCELLED', 'MANUAL_CONTROL'],
      default: 'PENDING',
      index: true,
    },
    exitReason: {
      type: String,
      enum: ['profit target', 'time exit', 'manual close', 'reconciliation close', null],
      default: null,
    },
    exitDate: { type: String, default: null },
    exitTime: { type: String, default: null },
    exitSpxPrice: { type: Number, default: null },

    // 注文トラッキング
    comboOrderId: { type: Number, default: null },
    fillStatus: { type: String, enum: ['PENDING', 'FILLED', 'CANCELLED'], default: 'PENDING' },
    fillAttempts: { type: Number, default: 0 },
    lastAttemptPrice: { type: Number, default: null },

    profitTargetOrderId: { type: Number, default: null, index: true },
    profitTargetPrice: { type: Number, default: null },
    profitTargetStatus: {
      type: String,
      enum: ['NONE', 'PLACED', 'FILLED', 'CANCELLED', 'REJECTED'],
      default: 'NONE',
    },

    notes: { type: String, default: null },
  },
  {
    timestamps: true,
    collection: 'calendar_trades',
  }
)

CalendarTradeSchema.index({ status: 1, entryDate: -1 })

export const CalendarTrade = mongoose.model<ICalendarTrade>('CalendarTrade', CalendarTradeSchema, 'calendar_trades')
