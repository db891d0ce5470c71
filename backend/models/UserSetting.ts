// backend/models/UserSetting.ts
import mongoose, { Schema, Document } from 'mongoose'
import { SettingType } from '../../shared/types'

export interface IUserSetting extends Document {
  name: string
  value: string
  type: SettingType
  min: number | null
  max: number | null
  category: string
  description: string
  updatedAt: Date
}

const UserSettingSchema = new Schema<IUserSetting>(
  {
    name: { type: String, required: true, unique: true },
    value: { type: String, required: true },
    type: { type: String, required: true, enum: ['int', 'float', 'string', 'bool'] },
    min: { type: Number, default: null },
    max: { type: Number, default: null },
    category: { type: String, required: true, index: true },
    description: { type: String, default: '' },
  },
  {
    timestamps: true,
    collection: 'user_settings',
  }
)

export const UserSettingModel = mongoose.model<IUserSetting>('UserSetting', UserSettingSchema, 'user_settings')
