// backend/models/CommandQueue.ts - UI → コアの操作コマンド
import mongoose, { Schema, Document } from 'mongoose'
import { CommandParameters, CommandStatus } from '../../shared/types'

export interface ICommandQueue extends Document {
  commandType: string
  tradeId: string | null
  parameters: CommandParameters
  status: CommandStatus
  result: string | null
  createdBy: string
  createdAt: Date
  processedAt: Date | null
}

const CommandQueueSchema = new Schema<ICommandQueue>(
  {
    commandType: { type: String, required: true },
    tradeId: { type: String, default: null, index: true },
    parameters: { type: Schema.Types.Mixed, default: {} },
    status: {
      type: String,
      enum: ['PENDING', 'PROCESSING', 'COMPLETED', 'FAILED'],
      default: 'PENDING',
      index: true,
    },
    result: { type: String, default: null },
    createdBy: { type: String, default: 'web_ui' },
    createdAt: { type: Date, required: true, default: Date.now },
    processedAt: { type: Date, default: null },
  },
  {
    collection: 'command_queue',
    minimize: false,
  }
)

CommandQueueSchema.index({ status: 1, createdAt: 1 })

export const CommandQueue = mongoose.model<ICommandQueue>('CommandQueue', CommandQueueSchema, 'command_queue')
