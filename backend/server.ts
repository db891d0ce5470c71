// server.ts
import express from 'express'
import cors from 'cors'
import dotenv from 'dotenv'
import { connectToDatabase, disconnectFromDatabase } from './database/connection'
import { RuntimeConfig } from './config'
import { createIbServices } from './services/ib-service'
import { MongoPositionStore } from './services/store/MongoPositionStore'
import { NotificationService } from './services/NotificationService'
import { ActivityLogger } from './services/calendar/ActivityLogger'
import { StrikeSelectionService } from './services/calendar/StrikeSelectionService'
import { OrderExecutionService } from './services/calendar/OrderExecutionService'
import { StreamingPnLService } from './services/calendar/StreamingPnLService'
import { PositionLifecycleService } from './services/calendar/PositionLifecycleService'
import { ReconciliationService } from './services/calendar/ReconciliationService'
import { CommandProcessor } from './services/calendar/CommandProcessor'
import { BrokerEventConsumer } from './services/calendar/BrokerEventConsumer'
import { TradeScheduler } from './services/calendar/TradeScheduler'
import { StatusController } from './controllers/StatusController'
import { TradeController } from './controllers/TradeController'
import { LogController } from './controllers/LogController'
import { SettingController } from './controllers/SettingController'
import { CommandController } from './controllers/CommandController'
import { PositionStreamController } from './controllers/PositionStreamController'
import { createApiRouter } from './routes/api'
import { marketClock } from './utils/marketTime'
import { errorMessage } from './utils/util'

dotenv.config()

const PORT = Number(process.env.PORT || 3001)

async function main(): Promise<void> {
  await connectToDatabase()

  const store = new MongoPositionStore()
  const runtimeConfig = new RuntimeConfig(store)
  const config = await runtimeConfig.reload()
  const getConfig = runtimeConfig.get

  // 売買用とダッシュボード (気配) 用でクライアントIDを分ける
  const trading = createIbServices({ host: config.ibHost, port: config.ibPort, clientId: config.ibClientId })
  const dashboard = createIbServices({ host: config.ibHost, port: config.ibPort, clientId: config.ibDashboardClientId })

  const notifier = new NotificationService({
    webhookUrl: process.env.SMS_WEBHOOK_URL,
    enabled: () => getConfig().smsEnabled,
  })
  const activity = new ActivityLogger(store, marketClock)
  const strikes = new StrikeSelectionService(trading.gateway, getConfig)
  const executor = new OrderExecutionService(trading.gateway, store, notifier)
  const pnl = new StreamingPnLService(dashboard.gateway)
  const lifecycle = new PositionLifecycleService(
    trading.gateway,
    store,
    strikes,
    executor,
    pnl,
    notifier,
    activity,
    getConfig,
    marketClock
  )
  const reconciliation = new ReconciliationService(trading.gateway, store, notifier, activity, getConfig)
  const commands = new CommandProcessor(store, lifecycle, reconciliation, activity, marketClock)
  const consumer = new BrokerEventConsumer(trading.gateway, lifecycle, activity)

  const schedulerDisabled = process.env.SCHEDULER_DISABLED === 'true'
  const scheduler = schedulerDisabled
    ? null
    : new TradeScheduler(trading.gateway, lifecycle, reconciliation, commands, getConfig, marketClock)

  const app = express()
  app.use(cors())
  app.use(express.json({ limit: '1mb' }))

  app.use(
    '/api',
    createApiRouter({
      status: new StatusController(trading.gateway, dashboard.gateway, store, getConfig, scheduler),
      trades: new TradeController(store, pnl),
      logs: new LogController(store),
      settings: new SettingController(store, runtimeConfig),
      commands: new CommandController(store),
      stream: new PositionStreamController(pnl),
    })
  )

  // エラーハンドリング
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error('API Error:', err)
    if (res.headersSent) {
      next(err)
      return
    }
    res.status(500).json({
      success: false,
      message: 'Internal server error',
      error: err.message,
    })
  })

  const server = app.listen(PORT, () => {
    console.log(`🚀 サーバーがポート ${PORT} で起動しました`)
  })

  consumer.start()

  try {
    await trading.gateway.ensureConnected()
    await lifecycle.recoverActiveTrades()
  } catch (error) {
    console.error('起動時のIB接続に失敗 (スケジューラで再試行):', errorMessage(error))
  }

  if (scheduler) {
    scheduler.start()
  } else {
    console.log('スケジューラは無効です (SCHEDULER_DISABLED=true)')
  }

  const shutdown = async () => {
    console.log('シャットダウン中...')
    try {
      if (scheduler) await scheduler.stop()
      consumer.stop()
      pnl.stopAll()
      await trading.ib.cleanup()
      await dashboard.ib.cleanup()
      server.close()
      await disconnectFromDatabase()
      process.exit(0)
    } catch (error) {
      console.error('シャットダウンエラー:', error)
      process.exit(1)
    }
  }

  process.on('SIGINT', () => {
    shutdown()
  })
  process.on('SIGTERM', () => {
    shutdown()
  })
}

main().catch((error) => {
  console.error('❌ 起動エラー:', error)
  process.exit(1)
})
