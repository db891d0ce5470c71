// backend/services/calendar/ActivityLogger.ts
import { DailyLogAction } from '../../../shared/types'
import { PositionStore } from '../store/PositionStore'
import { Clock, formatDate } from '../../utils/marketTime'

/** コンソールと daily_log の両方に残す */
export class ActivityLogger {
  constructor(
    private store: PositionStore,
    private clock: Clock
  ) {}

  async log(action: DailyLogAction, message: string, success: boolean): Promise<void> {
    if (success) {
      console.log(`[${action}] ${message}`)
    } else {
      console.warn(`[${action}] ${message}`)
    }

    const now = this.clock()
    try {
      await this.store.appendDailyLog({
        date: formatDate(now),
        action,
        message,
        success,
        timestamp: now.toJSDate(),
      })
    } catch (error) {
      console.error('daily_log 保存エラー:', error)
    }
  }
}
