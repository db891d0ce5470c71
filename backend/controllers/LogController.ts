// controllers/LogController.ts
import { Request, Response } from 'express'
import { PositionStore } from '../services/store/PositionStore'
import { sendError } from './respond'

const DEFAULT_LIMIT = 100
const MAX_LIMIT = 1000

export class LogController {
  constructor(private store: PositionStore) {}

  async getLogs(req: Request, res: Response): Promise<void> {
    try {
      const requested = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : DEFAULT_LIMIT
      const limit = Number.isFinite(requested) && requested > 0 ? Math.min(requested, MAX_LIMIT) : DEFAULT_LIMIT
      const logs = await this.store.listDailyLogs(limit)

      res.json({ success: true, data: logs })
    } catch (error) {
      sendError(res, error, 'ログの取得に失敗しました')
    }
  }
}
