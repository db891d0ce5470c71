// backend/models/OrderHistory.ts
import mongoose, { Schema, Document } from 'mongoose'
import { OrderHistoryType } from '../../shared/types'

export interface IOrderHistory extends Document {
  tradeId: string
  orderId: number
  orderType: OrderHistoryType
  price: number
  status: string
  timestamp: Date
}

const OrderHistorySchema = new Schema<IOrderHistory>(
  {
    tradeId: { type: String, required: true, index: true },
    orderId: { type: Number, required: true },
    orderType: { type: String, required: true, enum: ['ENTRY', 'EXIT', 'PROFIT_TARGET'] },
    price: { type: Number, required: true },
    status: { type: String, required: true },
    timestamp: { type: Date, required: true, default: Date.now },
  },
  {
    collection: 'order_history',
  }
)

OrderHistorySchema.index({ tradeId: 1, timestamp: 1 })

export const OrderHistory = mongoose.model<IOrderHistory>('OrderHistory', OrderHistorySchema, 'order_history')
