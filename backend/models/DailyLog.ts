// backend/models/DailyLog.ts - ダッシュボードで再表示する運用ログ
import mongoose, { Schema, Document } from 'mongoose'
import { DailyLogAction } from '../../shared/types'

export interface IDailyLog extends Document {
  date: string
  action: DailyLogAction
  message: string
  success: boolean
  timestamp: Date
}

const DailyLogSchema = new Schema<IDailyLog>(
  {
    date: { type: String, required: true, index: true },
    action: { type: String, required: true, index: true },
    message: { type: String, required: true },
    success: { type: Boolean, required: true },
    timestamp: { type: Date, required: true, default: Date.now },
  },
  {
    collection: 'daily_logs',
  }
)

DailyLogSchema.index({ timestamp: -1 })

export const DailyLog = mongoose.model<IDailyLog>('DailyLog', DailyLogSchema, 'daily_logs')
