// backend/services/calendar/OrderExecutionService.ts
import { OrderHistoryType } from '../../../shared/types'
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { OrderStatusUpdate, isTerminalOrderStatus } from '../ib-service/types'
import { PositionStore } from '../store/PositionStore'
import { NotificationSink } from '../NotificationService'
import { CANCEL_ACK_CODES, REJECTION_CODES, isFilled, waitForOrder } from './orderWaits'
import { LegConIds, SPX_SYMBOL, closingComboLegs, openingComboLegs } from './legs'
import { SPX_TICK, normalizePrice, roundToTick } from '../../utils/pricing'
import { errorMessage } from '../../utils/util'

export type ExecutionDirection = 'ENTRY' | 'EXIT'

export type AttemptOutcome = 'FILLED' | 'TIMED_OUT' | 'REJECTED' | 'CANCEL_UNCONFIRMED'

export interface AttemptRecord {
  attempt: number
  orderId: number
  price: number
  outcome: AttemptOutcome
}

export interface ExecutionNotifications {
  started: (price: number) => string
  filled: (fillPrice: number) => string
  exhausted: (result: ExecutionCancelled) => string
}

export interface ExecutionRequest {
  tradeId: string
  direction: ExecutionDirection
  conIds: LegConIds
  quantity: number
  initialPrice: number
  increment: number
  maxAttempts: number
  /** 初期中値からの上乗せ (エントリー) / 値引き (決済) の上限 */
  maxDeviation: number
  fillTimeoutMs: number
  cancelTimeoutMs: number
  notifications?: ExecutionNotifications
  onAttempt?: (record: AttemptRecord) => Promise<void>
}

export interface ExecutionFilled {
  status: 'FILLED'
  fillPrice: number
  orderId: number
  attempts: number
  submittedPrices: number[]
}

export interface ExecutionCancelled {
  status: 'CANCELLED'
  attempts: number
  submittedPrices: number[]
  lastPrice: number | null
  reason: string
}

export type ExecutionResult = ExecutionFilled | ExecutionCancelled

interface AttemptResult {
  outcome: AttemptOutcome
  orderId: number
  fillPrice: number | null
}

const EPSILON = 1e-9

/**
 * コンボ注文の価格調整ループ。
 * 1回の試行につき発注は1本。次の発注は前の注文の終了 (約定/拒否/キャンセル確認) 後。
 */
export class OrderExecutionService {
  constructor(
    private gateway: BrokerGateway,
    private store: PositionStore,
    private notifier: NotificationSink
  ) {}

  public async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const sign = request.direction === 'ENTRY' ? 1 : -1
    const initialPrice = Math.max(roundToTick(request.initialPrice), SPX_TICK)
    const submittedPrices: number[] = []
    let price = initialPrice
    let reason = `Not filled after ${request.maxAttempts} attempts`

    console.log(
      `${request.direction === 'ENTRY' ? 'エントリー' : '決済'}注文開始 ${request.tradeId}: ` +
        `初期価格 ${initialPrice.toFixed(2)}, 刻み ${request.increment}, 最大 ${request.maxAttempts}回`
    )
    if (request.notifications) {
      await this.notifier.send(request.notifications.started(initialPrice))
    }

    for (let attempt = 1; attempt <= request.maxAttempts; attempt++) {
      submittedPrices.push(price)

      let result: AttemptResult
      try {
        result = await this.runAttempt(request, price)
      } catch (error) {
        // 発注自体の失敗 (接続断など) は呼び出し側で再実行する
        reason = `Order submission error: ${errorMessage(error)}`
        console.error(`発注エラー ${request.tradeId} (試行 ${attempt}):`, errorMessage(error))
        break
      }

      console.log(`試行 ${attempt}/${request.maxAttempts} ${request.tradeId} @ ${price.toFixed(2)}: ${result.outcome}`)
      if (request.onAttempt) {
        await request.onAttempt({ attempt, orderId: result.orderId, price, outcome: result.outcome })
      }

      if (result.outcome === 'FILLED') {
        const fillPrice = normalizePrice(Math.abs(result.fillPrice ?? price))
        if (request.notifications) {
          await this.notifier.send(request.notifications.filled(fillPrice))
        }
        return { status: 'FILLED', fillPrice, orderId: result.orderId, attempts: attempt, submittedPrices }
      }

      if (result.outcome === 'CANCEL_UNCONFIRMED') {
        // 前の注文が生きている可能性があるため次は出さない
        reason = `Cancel of order #${result.orderId} was not confirmed`
        break
      }

      if (attempt === request.maxAttempts) break

      const next = roundToTick(price + sign * request.increment)
      if (Math.abs(next - initialPrice) > request.maxDeviation + EPSILON) {
        reason = `Price limit reached (${initialPrice.toFixed(2)} ${sign > 0 ? '+' : '-'} ${request.maxDeviation.toFixed(2)})`
        break
      }
      if (next < SPX_TICK) {
        reason = 'Price reached minimum tick'
        break
      }
      price = next
    }

    const cancelled: ExecutionCancelled = {
      status: 'CANCELLED',
      attempts: submittedPrices.length,
      submittedPrices,
      lastPrice: submittedPrices.length > 0 ? submittedPrices[submittedPrices.length - 1] : null,
      reason,
    }
    console.warn(`注文不成立 ${request.tradeId}: ${reason}`)
    if (request.notifications) {
      await this.notifier.send(request.notifications.exhausted(cancelled))
    }
    return cancelled
  }

  private async runAttempt(request: ExecutionRequest, price: number): Promise<AttemptResult> {
    const legs = request.direction === 'ENTRY' ? openingComboLegs(request.conIds) : closingComboLegs(request.conIds)
    const orderId = await this.gateway.placeComboOrder({
      symbol: SPX_SYMBOL,
      legs,
      action: 'BUY',
      quantity: request.quantity,
      // 決済は逆向きコンボを負の指値で買う
      limitPrice: request.direction === 'ENTRY' ? price : -price,
      tif: 'DAY',
    })
    await this.recordHistory(request.tradeId, orderId, request.direction, price, 'SUBMITTED')

    const isDone = (update: OrderStatusUpdate) => isFilled(update) || isTerminalOrderStatus(update.status)

    const first = await waitForOrder(this.gateway, orderId, isDone, REJECTION_CODES, request.fillTimeoutMs)
    if (first?.kind === 'status' && first.update.status === 'Filled') {
      await this.recordHistory(request.tradeId, orderId, request.direction, price, 'FILLED')
      return { outcome: 'FILLED', orderId, fillPrice: first.update.avgFillPrice || null }
    }
    if (first) {
      const detail = first.kind === 'status' ? first.update.status : `error ${first.code}`
      console.warn(`注文拒否 #${orderId}: ${detail}`)
      await this.recordHistory(request.tradeId, orderId, request.direction, price, 'REJECTED')
      return { outcome: 'REJECTED', orderId, fillPrice: null }
    }

    // タイムアウト → キャンセルして確認を待つ
    this.gateway.cancelOrder(orderId)
    const ack = await waitForOrder(this.gateway, orderId, isDone, CANCEL_ACK_CODES, request.cancelTimeoutMs)

    // キャンセル要求後に約定した場合は約定を優先
    const latest = this.gateway.getOrderStatus(orderId)
    const filled =
      ack?.kind === 'status' && ack.update.status === 'Filled' ? ack.update : latest?.status === 'Filled' ? latest : null
    if (filled) {
      console.log(`キャンセル要求後に約定 #${orderId}`)
      await this.recordHistory(request.tradeId, orderId, request.direction, price, 'FILLED')
      return { outcome: 'FILLED', orderId, fillPrice: filled.avgFillPrice || null }
    }

    if (!ack) {
      console.warn(`キャンセル確認なし #${orderId}`)
      await this.recordHistory(request.tradeId, orderId, request.direction, price, 'CANCEL_UNCONFIRMED')
      return { outcome: 'CANCEL_UNCONFIRMED', orderId, fillPrice: null }
    }

    await this.recordHistory(request.tradeId, orderId, request.direction, price, 'CANCELLED')
    return { outcome: 'TIMED_OUT', orderId, fillPrice: null }
  }

  private async recordHistory(
    tradeId: string,
    orderId: number,
    orderType: OrderHistoryType,
    price: number,
    status: string
  ): Promise<void> {
    try {
      await this.store.appendOrderHistory({ tradeId, orderId, orderType, price, status, timestamp: new Date() })
    } catch (error) {
      console.error('注文履歴保存エラー:', errorMessage(error))
    }
  }
}
