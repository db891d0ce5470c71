// backend/database/connection.ts
import mongoose from 'mongoose'

export const DEFAULT_MONGODB_URI = 'mongodb://localhost:27017/spx-calendar'

export async function connectToDatabase(uri: string = process.env.MONGODB_URI || DEFAULT_MONGODB_URI): Promise<void> {
  mongoose.connection.on('error', (error) => {
    console.error('MongoDB エラー:', error)
  })

  mongoose.connection.on('disconnected', () => {
    console.log('MongoDB から切断されました')
  })

  await mongoose.connect(uri)
  console.log('✅ MongoDB に接続しました')
}

export async function disconnectFromDatabase(): Promise<void> {
  await mongoose.connection.close()
  console.log('MongoDB 接続をクローズしました')
}
