// backend/services/calendar/BrokerEventConsumer.ts
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { OrderStatusUpdate, isTerminalOrderStatus } from '../ib-service/types'
import { ActivityLogger } from './ActivityLogger'
import { PositionLifecycleService } from './PositionLifecycleService'
import { errorMessage } from '../../utils/util'

/**
 * ブローカーからのプッシュ (約定・切断) をライフサイクルへ流す
 */
export class BrokerEventConsumer {
  private unsubscribers: (() => void)[] = []
  private inFlight: Set<Promise<void>> = new Set()

  constructor(
    private gateway: BrokerGateway,
    private lifecycle: PositionLifecycleService,
    private activity: ActivityLogger
  ) {}

  public start(): void {
    if (this.unsubscribers.length > 0) return

    this.unsubscribers.push(
      this.gateway.events.subscribe('OrderStatusChanged', (event) => this.track(this.onOrderStatus(event.update))),
      this.gateway.events.subscribe('ConnectionLost', (event) =>
        this.track(this.activity.log('CONNECTION', `接続断 (Code: ${event.code}) ${event.message}`, false))
      )
    )
  }

  public stop(): void {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe())
    this.unsubscribers = []
  }

  /** 処理中のハンドラの完了を待つ (停止時・テスト用) */
  public async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight))
    }
  }

  private async onOrderStatus(update: OrderStatusUpdate): Promise<void> {
    if (update.status === 'Filled') {
      const handled = await this.lifecycle.handleProfitTargetFill(update.orderId, update.avgFillPrice)
      if (handled) {
        console.log(`🎯 利確約定 #${update.orderId} @ ${Math.abs(update.avgFillPrice).toFixed(2)}`)
      }
      return
    }
    if (isTerminalOrderStatus(update.status)) {
      await this.lifecycle.handleProfitTargetTerminated(update.orderId, update.status)
    }
  }

  private track(task: Promise<void | boolean>): void {
    const handled: Promise<void> = task
      .then(() => undefined)
      .catch((error: unknown) => {
        console.error('ブローカーイベント処理エラー:', errorMessage(error))
      })
      .finally(() => {
        this.inFlight.delete(handled)
      })
    this.inFlight.add(handled)
  }
}
