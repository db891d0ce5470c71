// routes/api.ts
import { Router } from 'express'
import { StatusController } from '../controllers/StatusController'
import { TradeController } from '../controllers/TradeController'
import { LogController } from '../controllers/LogController'
import { SettingController } from '../controllers/SettingController'
import { CommandController } from '../controllers/CommandController'
import { PositionStreamController } from '../controllers/PositionStreamController'

export interface ApiControllers {
  status: StatusController
  trades: TradeController
  logs: LogController
  settings: SettingController
  commands: CommandController
  stream: PositionStreamController
}

export function createApiRouter(controllers: ApiControllers): Router {
  const router = Router()
  const { status, trades, logs, settings, commands, stream } = controllers

  router.get('/health', status.getHealth.bind(status))
  router.get('/status', status.getStatus.bind(status))

  // トレード
  router.get('/trades', trades.getTrades.bind(trades))
  router.get('/trades/:tradeId', trades.getTrade.bind(trades))
  router.get('/trades/:tradeId/valuation', trades.getValuation.bind(trades))

  router.get('/logs', logs.getLogs.bind(logs))

  // 設定
  router.get('/settings', settings.getSettings.bind(settings))
  router.put('/settings/:name', settings.updateSetting.bind(settings))

  // コマンドキュー
  router.post('/commands', commands.createCommand.bind(commands))
  router.get('/commands/:id', commands.getCommand.bind(commands))

  // SSE
  router.get('/positions/stream', stream.streamPositions.bind(stream))

  return router
}
