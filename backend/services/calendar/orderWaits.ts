// backend/services/calendar/orderWaits.ts
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { OrderStatusUpdate } from '../ib-service/types'

// 注文を拒否したことを示すエラーコード
export const REJECTION_CODES: ReadonlySet<number> = new Set([103, 110, 135, 161, 201, 203, 321, 382, 383, 387, 462])
// キャンセル受付 (10147: 取消対象の注文がない)
export const CANCEL_ACK_CODES: ReadonlySet<number> = new Set([202, 10147])

export type OrderWaitResult =
  | { kind: 'status'; update: OrderStatusUpdate }
  | { kind: 'error'; code: number; message: string }

/**
 * 注文ステータスが条件を満たすか、指定コードのエラーが来るまで待つ。
 * キャッシュ済みのステータスを先に確認する。タイムアウトは null。
 */
export function waitForOrder(
  gateway: BrokerGateway,
  orderId: number,
  isDone: (update: OrderStatusUpdate) => boolean,
  errorCodes: ReadonlySet<number>,
  timeoutMs: number
): Promise<OrderWaitResult | null> {
  const current = gateway.getOrderStatus(orderId)
  if (current && isDone(current)) {
    return Promise.resolve({ kind: 'status', update: current })
  }

  return new Promise<OrderWaitResult | null>((resolve) => {
    const finish = (result: OrderWaitResult | null) => {
      clearTimeout(timeoutId)
      unsubscribeStatus()
      unsubscribeError()
      resolve(result)
    }

    const timeoutId = setTimeout(() => finish(null), timeoutMs)

    const unsubscribeStatus = gateway.events.subscribe('OrderStatusChanged', (event) => {
      if (event.update.orderId === orderId && isDone(event.update)) {
        finish({ kind: 'status', update: event.update })
      }
    })

    const unsubscribeError = gateway.events.subscribe('OrderError', (event) => {
      if (event.orderId === orderId && errorCodes.has(event.code)) {
        finish({ kind: 'error', code: event.code, message: event.message })
      }
    })
  })
}

export function isFilled(update: OrderStatusUpdate | null): boolean {
  return update !== null && update.status === 'Filled'
}
