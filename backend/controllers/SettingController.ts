// controllers/SettingController.ts
import { Request, Response } from 'express'
import { PositionStore } from '../services/store/PositionStore'
import { RuntimeConfig } from '../config'
import { SettingValidationError } from '../utils/errors'
import { sendError } from './respond'

export class SettingController {
  constructor(
    private store: PositionStore,
    private config: RuntimeConfig
  ) {}

  async getSettings(req: Request, res: Response): Promise<void> {
    try {
      const settings = await this.store.getSettings()
      res.json({ success: true, data: settings })
    } catch (error) {
      sendError(res, error, '設定の取得に失敗しました')
    }
  }

  /**
   * PUT /api/settings/:name  body: { value }
   */
  async updateSetting(req: Request, res: Response): Promise<void> {
    try {
      const { name } = req.params
      const body: unknown = req.body
      const value = typeof body === 'object' && body !== null && 'value' in body ? body.value : undefined
      if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
        throw new SettingValidationError('value を指定してください')
      }

      await this.config.update(name, String(value))
      const updated = (await this.store.getSettings()).find((setting) => setting.name === name)
      console.log(`設定更新: ${name}=${value}`)

      res.json({ success: true, message: `${name} を更新しました`, data: updated })
    } catch (error) {
      sendError(res, error, '設定の更新に失敗しました')
    }
  }
}
