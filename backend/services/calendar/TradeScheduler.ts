// backend/services/calendar/TradeScheduler.ts
import { DateTime } from 'luxon'
import { CalendarConfig } from '../../config'
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { CommandProcessor } from './CommandProcessor'
import { PositionLifecycleService } from './PositionLifecycleService'
import { ReconciliationService } from './ReconciliationService'
import { Clock, atWallClock, formatDate, isWeekday } from '../../utils/marketTime'
import { BrokerConnectionError } from '../../utils/errors'
import { errorMessage } from '../../utils/util'

export type ScheduledJob = 'entry' | 'timeExit' | 'reconciliation'

export const SCHEDULER_POLL_MS = 30_000

// 時間決済は引けまでに終える
const EXIT_WINDOW_MINUTES = 60

export interface JobRun {
  date: string
  at: Date
  success: boolean
  message: string
}

export interface SchedulerStatus {
  running: boolean
  inFlight: boolean
  pollMs: number
  lastTickAt: Date | null
  lastError: string | null
  lastRuns: Record<ScheduledJob, JobRun | null>
}

/**
 * 当日その時刻以降 (windowMinutes 指定時はその幅の中) で、まだ実行していなければ true
 */
export function isJobDue(
  now: DateTime,
  time: string,
  windowMinutes: number | null,
  lastRunDate: string | null
): boolean {
  if (!isWeekday(now)) return false
  if (lastRunDate === formatDate(now)) return false

  const start = atWallClock(now, time)
  if (now < start) return false
  if (windowMinutes !== null && now > start.plus({ minutes: windowMinutes })) return false
  return true
}

/**
 * 30秒ごとのポーリングで日次ジョブとコマンドキューを処理する。
 * ブローカーへのアクセスはすべてこのループから行う。
 */
export class TradeScheduler {
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<void> | null = null
  private lastTickAt: Date | null = null
  private lastError: string | null = null
  private lastRuns: Record<ScheduledJob, JobRun | null> = { entry: null, timeExit: null, reconciliation: null }
  // 初回接続時と切断後は GTC の状態を取り直す
  private orderSyncPending = true

  constructor(
    private gateway: BrokerGateway,
    private lifecycle: PositionLifecycleService,
    private reconciliation: ReconciliationService,
    private commands: CommandProcessor,
    private config: () => CalendarConfig,
    private clock: Clock,
    private pollMs: number = SCHEDULER_POLL_MS
  ) {
    this.gateway.events.subscribe('ConnectionLost', () => {
      this.orderSyncPending = true
    })
  }

  public start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.triggerTick()
    }, this.pollMs)
    console.log(`⏰ スケジューラ開始 (${this.pollMs / 1000}秒間隔)`)
    this.triggerTick()
  }

  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    if (this.inFlight) {
      await this.inFlight
    }
    console.log('スケジューラ停止')
  }

  public isRunning(): boolean {
    return this.timer !== null
  }

  public getStatus(): SchedulerStatus {
    return {
      running: this.isRunning(),
      inFlight: this.inFlight !== null,
      pollMs: this.pollMs,
      lastTickAt: this.lastTickAt,
      lastError: this.lastError,
      lastRuns: { ...this.lastRuns },
    }
  }

  /** 前回の tick が終わっていなければ何もしない */
  public triggerTick(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight
    }
    this.inFlight = this.tick().finally(() => {
      this.inFlight = null
    })
    return this.inFlight
  }

  private async tick(): Promise<void> {
    const now = this.clock()
    this.lastTickAt = now.toJSDate()

    try {
      await this.gateway.ensureConnected()
    } catch (error) {
      this.lastError = `接続エラー: ${errorMessage(error)}`
      console.error('IB接続エラー (次回ポーリングで再試行):', errorMessage(error))
      return
    }

    await this.resyncAfterConnect()

    const config = this.config()
    const today = formatDate(now)

    if (isJobDue(now, config.entryTime, config.entryWindowMinutes, this.lastRuns.entry?.date ?? null)) {
      await this.runJob('entry', today, async () => {
        const outcome = await this.lifecycle.runDailyEntry()
        return outcome.status === 'FILLED' ? `FILLED ${outcome.trade.tradeId}` : `${outcome.status}: ${outcome.reason}`
      })
    }

    if (isJobDue(now, config.exitTime, EXIT_WINDOW_MINUTES, this.lastRuns.timeExit?.date ?? null)) {
      await this.runJob('timeExit', today, async () => {
        const summary = await this.lifecycle.runTimeExitCheck()
        return `closed ${summary.closed.length}/${summary.due}`
      })
    }

    if (isJobDue(now, config.reconciliationTime, null, this.lastRuns.reconciliation?.date ?? null)) {
      await this.runJob('reconciliation', today, async () => {
        const report = await this.reconciliation.reconcile()
        return report.clean ? 'clean' : `${report.discrepancies.length} discrepancies`
      })
    }

    await this.commands.processPending()
    this.lastError = null
  }

  /** 受信し損ねた GTC の約定・取消と、失われた気配購読を回復する */
  private async resyncAfterConnect(): Promise<void> {
    if (this.orderSyncPending) {
      try {
        await this.lifecycle.syncProfitTargets()
        this.orderSyncPending = false
      } catch (error) {
        console.error('利確 GTC 同期エラー (次回再試行):', errorMessage(error))
      }
    }

    if (this.lifecycle.valuationsNeedRestart()) {
      try {
        await this.lifecycle.recoverActiveTrades()
      } catch (error) {
        console.error('時価評価の再開エラー (次回再試行):', errorMessage(error))
      }
    }
  }

  private async runJob(job: ScheduledJob, date: string, task: () => Promise<string>): Promise<void> {
    console.log(`▶️ ジョブ実行: ${job}`)
    try {
      const message = await task()
      this.lastRuns[job] = { date, at: new Date(), success: true, message }
      console.log(`ジョブ完了: ${job} (${message})`)
    } catch (error) {
      console.error(`ジョブ失敗: ${job}`, errorMessage(error))
      if (error instanceof BrokerConnectionError) {
        // 接続断は次回ポーリングで再実行
        this.lastError = errorMessage(error)
        return
      }
      this.lastRuns[job] = { date, at: new Date(), success: false, message: errorMessage(error) }
    }
  }
}
