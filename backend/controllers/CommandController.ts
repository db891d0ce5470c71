// controllers/CommandController.ts
import { Request, Response } from 'express'
import { COMMAND_TYPES, CommandParameters } from '../../shared/types'
import { PositionStore } from '../services/store/PositionStore'
import { sendError } from './respond'

function toParameters(raw: unknown): CommandParameters {
  const parameters: CommandParameters = {}
  if (typeof raw !== 'object' || raw === null) return parameters
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value === null) {
      parameters[key] = value
    }
  }
  return parameters
}

export class CommandController {
  constructor(private store: PositionStore) {}

  /**
   * POST /api/commands  body: { commandType, tradeId?, parameters?, createdBy? }
   * 処理はスケジューラのポーリングで行う
   */
  async createCommand(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body
      if (typeof body !== 'object' || body === null) {
        res.status(400).json({ success: false, message: 'リクエストが不正です' })
        return
      }

      const commandType = 'commandType' in body && typeof body.commandType === 'string' ? body.commandType : ''
      if (!COMMAND_TYPES.some((type) => type === commandType)) {
        res.status(400).json({
          success: false,
          message: `不明なコマンド: ${commandType}`,
          error: `commandType は ${COMMAND_TYPES.join(', ')} のいずれかです`,
        })
        return
      }

      const tradeId = 'tradeId' in body && typeof body.tradeId === 'string' && body.tradeId !== '' ? body.tradeId : null
      const createdBy = 'createdBy' in body && typeof body.createdBy === 'string' ? body.createdBy : 'dashboard'
      const command = await this.store.enqueueCommand({
        commandType,
        tradeId,
        parameters: toParameters('parameters' in body ? body.parameters : undefined),
        createdBy,
      })
      console.log(`コマンド受付: ${commandType} ${tradeId ?? ''} (${command.id})`)

      res.status(201).json({ success: true, message: 'コマンドを受け付けました', data: command })
    } catch (error) {
      sendError(res, error, 'コマンドの登録に失敗しました')
    }
  }

  async getCommand(req: Request, res: Response): Promise<void> {
    try {
      const command = await this.store.getCommand(req.params.id)
      if (!command) {
        res.status(404).json({ success: false, message: 'コマンドが見つかりません' })
        return
      }
      res.json({ success: true, data: command })
    } catch (error) {
      sendError(res, error, 'コマンドの取得に失敗しました')
    }
  }
}
