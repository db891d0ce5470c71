// controllers/PositionStreamController.ts
import { Request, Response } from 'express'
import { SpreadValuation } from '../../shared/types'
import { StreamingPnLService } from '../services/calendar/StreamingPnLService'

const HEARTBEAT_MS = 30000

/**
 * 評価額の SSE 配信
 */
export class PositionStreamController {
  private activeConnections: Set<Response> = new Set()

  constructor(private pnl: StreamingPnLService) {
    this.pnl.on('valuationUpdated', (valuation: SpreadValuation) => {
      this.broadcast('valuation', {
        type: 'valuation',
        data: valuation,
        timestamp: new Date().toISOString(),
      })
    })
  }

  streamPositions(req: Request, res: Response): void {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    })

    this.activeConnections.add(res)
    console.log(`SSE接続追加: ${this.activeConnections.size}件`)

    // 接続時に現在の評価額を送信
    this.sendToClient(res, 'initial', {
      type: 'initial',
      data: this.pnl.getAllValuations(),
      timestamp: new Date().toISOString(),
    })

    const heartbeat = setInterval(() => {
      this.sendToClient(res, 'heartbeat', { type: 'heartbeat', timestamp: new Date().toISOString() })
    }, HEARTBEAT_MS)

    req.on('close', () => {
      clearInterval(heartbeat)
      this.activeConnections.delete(res)
      console.log(`SSE接続削除: ${this.activeConnections.size}件`)
    })
  }

  private broadcast(event: string, data: object): void {
    for (const connection of this.activeConnections) {
      this.sendToClient(connection, event, data)
    }
  }

  private sendToClient(res: Response, event: string, data: object): void {
    try {
      res.write(`event: ${event}\n`)
      res.write(`data: ${JSON.stringify(data)}\n\n`)
    } catch (error) {
      console.warn('SSE送信エラー:', error)
      this.activeConnections.delete(res)
    }
  }
}
