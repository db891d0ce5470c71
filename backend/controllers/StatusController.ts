// controllers/StatusController.ts
import { Request, Response } from 'express'
import { BrokerGateway } from '../services/ib-service/BrokerGateway'
import { PositionStore } from '../services/store/PositionStore'
import { TradeScheduler } from '../services/calendar/TradeScheduler'
import { CalendarConfig } from '../config'
import { sendError } from './respond'

export class StatusController {
  constructor(
    private tradingGateway: BrokerGateway,
    private dashboardGateway: BrokerGateway,
    private store: PositionStore,
    private config: () => CalendarConfig,
    private scheduler: TradeScheduler | null
  ) {}

  async getHealth(req: Request, res: Response): Promise<void> {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      message: 'SPX calendar automation API is running',
    })
  }

  /**
   * 接続・スケジューラ・ACTIVE 件数
   */
  async getStatus(req: Request, res: Response): Promise<void> {
    try {
      const active = await this.store.listTrades({ status: 'ACTIVE' })
      res.json({
        success: true,
        data: {
          broker: {
            trading: this.tradingGateway.getConnectionInfo(),
            dashboard: this.dashboardGateway.getConnectionInfo(),
          },
          activeTrades: active.length,
          scheduler: this.scheduler ? this.scheduler.getStatus() : { running: false, disabled: true },
          config: this.config(),
        },
      })
    } catch (error) {
      sendError(res, error, 'ステータス取得に失敗しました')
    }
  }
}
