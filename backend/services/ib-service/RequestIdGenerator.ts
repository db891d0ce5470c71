// services/ib-service/RequestIdGenerator.ts
import { BrokerConnectionError } from '../../utils/errors'

/**
 * リクエストIDと注文IDを1本のカウンタで払い出す。
 * エラーコールバックの id が両者で衝突しないよう、番号帯は分けない。
 */
export class RequestIdGenerator {
  private counter: number
  private orderIdsReady = false

  constructor(start = 5000) {
    this.counter = start
  }

  /** nextValidId 受信時。既に払い出した番号より小さい値では戻さない */
  seedOrderId(nextValidId: number): void {
    this.counter = Math.max(this.counter, nextValidId - 1)
    this.orderIdsReady = true
  }

  nextRequestId(): number {
    return ++this.counter
  }

  nextOrderId(): number {
    if (!this.orderIdsReady) {
      throw new BrokerConnectionError('有効な注文IDを未受信です (nextValidId 待ち)')
    }
    return ++this.counter
  }

  hasOrderIds(): boolean {
    return this.orderIdsReady
  }
}
