// backend/services/NotificationService.ts - SMS (メール→SMS ブリッジ) 通知
import axios from 'axios'
import { CalendarSpread, Discrepancy, ExitReason } from '../../shared/types'
import { shortExpiryLabel } from '../utils/marketTime'

export interface NotificationSink {
  send(message: string): Promise<void>
}

export interface NotificationOptions {
  webhookUrl?: string
  enabled: () => boolean
  timeoutMs?: number
}

/**
 * 通知の送信失敗は売買フローに影響させない (ログのみ)
 */
export class NotificationService implements NotificationSink {
  constructor(private options: NotificationOptions) {}

  async send(message: string): Promise<void> {
    if (!this.options.enabled() || !this.options.webhookUrl) {
      console.log(`[通知] ${message}`)
      return
    }

    try {
      await axios.post(this.options.webhookUrl, { text: message }, { timeout: this.options.timeoutMs ?? 10000 })
      console.log(`SMS送信: ${message}`)
    } catch (error) {
      console.warn('SMS送信失敗:', error instanceof Error ? error.message : error)
    }
  }
}

function strikesLabel(trade: Pick<CalendarSpread, 'putStrike' | 'callStrike' | 'longPutStrike' | 'longCallStrike'>): string {
  const shorts = `${trade.putStrike.toFixed(0)}P/${trade.callStrike.toFixed(0)}C`
  if (trade.longPutStrike === trade.putStrike && trade.longCallStrike === trade.callStrike) {
    return shorts
  }
  return `Short:${shorts} Long:${trade.longPutStrike.toFixed(0)}P/${trade.longCallStrike.toFixed(0)}C`
}

export interface FailureContext {
  spxPrice?: number
  putStrike?: number
  callStrike?: number
  shortExpiry?: string
  longExpiry?: string
}

// SMS 本文 (キャリアのゲートウェイで化けないよう ASCII)
export const notificationMessages = {
  tradeAttempt(trade: CalendarSpread, startingPrice: number): string {
    const spx = trade.spxPrice === null ? 'n/a' : trade.spxPrice.toFixed(2)
    return (
      `SPX Calendar: Attempting trade at ${spx}. ` +
      `Strikes: ${strikesLabel(trade)}. Starting bid: $${startingPrice.toFixed(2)}. ` +
      `Expiry: ${trade.shortExpiry}/${trade.longExpiry}`
    )
  },

  tradeFilled(trade: CalendarSpread): string {
    return (
      `SPX Calendar FILLED: ${(trade.entryCredit ?? 0).toFixed(2)} debit. ` +
      `Target: ${(trade.profitTarget ?? 0).toFixed(2)}. Strikes: ${strikesLabel(trade)}`
    )
  },

  tradeFailed(reason: string, context: FailureContext = {}): string {
    let message = `SPX Calendar FAILED: ${reason}`
    if (context.spxPrice) {
      message += ` SPX@${context.spxPrice.toFixed(2)}`
    }
    if (context.shortExpiry && context.longExpiry) {
      message += ` Exp:${shortExpiryLabel(context.shortExpiry)},${shortExpiryLabel(context.longExpiry)}`
    }
    if (context.putStrike && context.callStrike) {
      message += ` Strikes:${context.putStrike.toFixed(0)}P/${context.callStrike.toFixed(0)}C`
    }
    return message
  },

  positionClosed(trade: CalendarSpread): string {
    const pnl = trade.realizedPnl ?? 0
    const basis = Math.abs(trade.entryCredit ?? 0)
    const pct = basis > 0 ? (pnl / basis) * 100 : 0
    return `SPX Calendar CLOSED: ${trade.exitReason ?? 'unknown'}. P&L: ${pnl.toFixed(2)} (${pct.toFixed(1)}%)`
  },

  exitAttempt(trade: CalendarSpread, reason: ExitReason, startingPrice: number): string {
    return (
      `SPX Calendar: Closing ${trade.tradeId} (${reason}). ` +
      `Strikes: ${strikesLabel(trade)}. Starting price: $${startingPrice.toFixed(2)}`
    )
  },

  /** 決済約定 (P&L は約定価格から計算) */
  exitFilled(trade: CalendarSpread, reason: ExitReason, fillPrice: number): string {
    const exitCredit = Math.abs(fillPrice)
    const basis = Math.abs(trade.entryCredit ?? 0)
    const pnl = trade.entryCredit === null ? 0 : exitCredit - trade.entryCredit
    const pct = basis > 0 ? (pnl / basis) * 100 : 0
    return `SPX Calendar CLOSED: ${reason} at $${exitCredit.toFixed(2)}. P&L: ${pnl.toFixed(2)} (${pct.toFixed(1)}%)`
  },

  exitFailed(trade: CalendarSpread, reason: string): string {
    return `SPX Calendar EXIT FAILED: ${trade.tradeId} ${reason}. Position still open.`
  },

  profitTargetPlaced(trade: CalendarSpread): string {
    return `SPX Calendar: GTC profit target placed for ${trade.tradeId} at $${(trade.profitTargetPrice ?? 0).toFixed(2)}`
  },

  profitTargetFailed(trade: CalendarSpread, reason: string): string {
    return `SPX Calendar: Profit target order failed for ${trade.tradeId} (${reason}). Check logs for details.`
  },

  profitTargetTerminated(trade: CalendarSpread, status: string): string {
    return `SPX Calendar: GTC order for ${trade.tradeId} is ${status}. Position has no profit target.`
  },

  reconciliation(discrepancies: Discrepancy[]): string {
    const missing = discrepancies.filter((item) => item.kind === 'MISSING_LEG').length
    const mismatched = discrepancies.filter((item) => item.kind === 'QUANTITY_MISMATCH').length
    const orphaned = discrepancies.filter((item) => item.kind === 'ORPHANED_POSITION').length
    return `SPX Reconciliation: ${discrepancies.length} issues (missing ${missing}, mismatch ${mismatched}, orphaned ${orphaned})`
  },
}
