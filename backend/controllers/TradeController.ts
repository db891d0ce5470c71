// controllers/TradeController.ts
import { Request, Response } from 'express'
import { TradeStatus } from '../../shared/types'
import { PositionStore } from '../services/store/PositionStore'
import { StreamingPnLService } from '../services/calendar/StreamingPnLService'
import { TradeNotFoundError } from '../utils/errors'
import { sendError } from './respond'

const TRADE_STATUSES: readonly TradeStatus[] = ['PENDING', 'ACTIVE', 'CLOSED', 'CANCELLED', 'MANUAL_CONTROL']

function parseStatuses(raw: unknown): TradeStatus[] | undefined {
  if (typeof raw !== 'string' || raw === '') return undefined
  const statuses = raw
    .split(',')
    .map((value) => value.trim().toUpperCase())
    .flatMap((value) => TRADE_STATUSES.filter((status) => status === value))
  return statuses.length > 0 ? statuses : undefined
}

export class TradeController {
  constructor(
    private store: PositionStore,
    private pnl: StreamingPnLService
  ) {}

  /**
   * トレード一覧 (?status=ACTIVE,CLOSED&limit=50)
   */
  async getTrades(req: Request, res: Response): Promise<void> {
    try {
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : undefined
      const trades = await this.store.listTrades({
        status: parseStatuses(req.query.status),
        limit: limit && limit > 0 ? limit : undefined,
      })

      res.json({
        success: true,
        data: trades.map((trade) => ({ ...trade, valuation: this.pnl.getValuation(trade.tradeId) })),
      })
    } catch (error) {
      sendError(res, error, 'トレード一覧の取得に失敗しました')
    }
  }

  async getTrade(req: Request, res: Response): Promise<void> {
    try {
      const { tradeId } = req.params
      const trade = await this.store.getTrade(tradeId)
      if (!trade) {
        throw new TradeNotFoundError(tradeId)
      }
      const orderHistory = await this.store.getOrderHistory(tradeId)

      res.json({
        success: true,
        data: { ...trade, orderHistory, valuation: this.pnl.getValuation(tradeId) },
      })
    } catch (error) {
      sendError(res, error, 'トレードの取得に失敗しました')
    }
  }

  async getValuation(req: Request, res: Response): Promise<void> {
    try {
      const { tradeId } = req.params
      const trade = await this.store.getTrade(tradeId)
      if (!trade) {
        throw new TradeNotFoundError(tradeId)
      }

      res.json({
        success: true,
        data: this.pnl.getValuation(tradeId) ?? {
          tradeId,
          spreadValue: null,
          unrealizedPnl: null,
          ready: false,
          updatedAt: null,
        },
      })
    } catch (error) {
      sendError(res, error, '評価額の取得に失敗しました')
    }
  }
}
