// services/ib-service/OrderService.ts
import { EventName, SecType, Contract, Order, OrderAction, OrderType, TimeInForce } from '@stoqey/ib'
import { IbService } from './IbService'
import { ComboOrderSpec, OrderStatusUpdate } from './types'
import { BrokerConnectionError } from '../../utils/errors'

function asNumber(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : 0
  }
  return 0
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/** openOrder / completedOrder の order・orderState からステータスを組み立てる */
function toSyncedStatus(orderId: unknown, order: unknown, orderState: unknown): OrderStatusUpdate | null {
  if (typeof orderId !== 'number' || orderId <= 0 || !isRecord(orderState)) return null
  if (typeof orderState.status !== 'string' || !orderState.status) return null
  const totalQuantity = isRecord(order) ? asNumber(order.totalQuantity) : 0
  const filled = isRecord(order) ? asNumber(order.filledQuantity) : 0
  return {
    orderId,
    status: orderState.status,
    filled,
    remaining: Math.max(totalQuantity - filled, 0),
    avgFillPrice: 0,
    timestamp: new Date(),
  }
}

function toAction(action: 'BUY' | 'SELL'): OrderAction {
  return action === 'BUY' ? OrderAction.BUY : OrderAction.SELL
}

export class OrderService {
  // orderId → 最新ステータス
  private statuses = new Map<number, OrderStatusUpdate>()

  constructor(private ibService: IbService) {
    this.setupEventListeners()
  }

  private setupEventListeners(): void {
    this.ibService.getIbApi().on(EventName.orderStatus, (...args: unknown[]) => this.onOrderStatus(args))
  }

  private onOrderStatus(args: unknown[]): void {
    const [rawOrderId, rawStatus, filled, remaining, avgFillPrice] = args
    if (typeof rawOrderId !== 'number') return

    const update: OrderStatusUpdate = {
      orderId: rawOrderId,
      status: String(rawStatus ?? 'Unknown'),
      filled: asNumber(filled),
      remaining: asNumber(remaining),
      avgFillPrice: asNumber(avgFillPrice),
      timestamp: new Date(),
    }

    // 約定済みの注文に後から別ステータスが届いても約定を優先
    const previous = this.statuses.get(rawOrderId)
    if (previous?.status === 'Filled' && update.status !== 'Filled') return

    this.statuses.set(rawOrderId, update)
    console.log(`注文ステータス: #${update.orderId} ${update.status} (約定 ${update.filled}, 平均 ${update.avgFillPrice})`)
    this.ibService.events.publish({ type: 'OrderStatusChanged', update })
  }

  /**
   * コンボ (BAG) 指値注文を発注し orderId を返す
   */
  public async placeComboOrder(spec: ComboOrderSpec): Promise<number> {
    await this.ibService.ensureConnected()
    const orderId = this.ibService.getNextOrderId()

    const contract: Contract = {
      symbol: spec.symbol,
      secType: SecType.BAG,
      exchange: 'SMART',
      currency: 'USD',
      comboLegs: spec.legs.map((leg) => ({
        conId: leg.conId,
        ratio: leg.ratio,
        action: toAction(leg.action),
        exchange: 'SMART',
      })),
    }

    const order: Order = {
      action: toAction(spec.action),
      totalQuantity: spec.quantity,
      orderType: OrderType.LMT,
      lmtPrice: spec.limitPrice,
      tif: spec.tif === 'GTC' ? TimeInForce.GTC : TimeInForce.DAY,
      outsideRth: spec.outsideRth ?? false,
      transmit: true,
    }

    this.statuses.set(orderId, {
      orderId,
      status: 'PendingSubmit',
      filled: 0,
      remaining: spec.quantity,
      avgFillPrice: 0,
      timestamp: new Date(),
    })

    console.log(
      `コンボ注文発注 #${orderId}: ${spec.action} ${spec.quantity} @ ${spec.limitPrice.toFixed(2)} (${spec.tif}, ${spec.legs.length}レッグ)`
    )
    this.ibService.getIbApi().placeOrder(orderId, contract, order)
    return orderId
  }

  public cancelOrder(orderId: number): void {
    console.log(`注文キャンセル要求: #${orderId}`)
    this.ibService.getIbApi().cancelOrder(orderId)
  }

  public getOrderStatus(orderId: number): OrderStatusUpdate | null {
    return this.statuses.get(orderId) ?? null
  }

  /**
   * 全クライアントの未約定注文と完了済み注文を取得してステータスを更新する。
   * 再起動・再接続後、受信し損ねた GTC の約定や取消を拾うために使う。
   * タイムアウト時はそれまでに受信した分を返す。
   */
  public async syncOrderStatuses(timeoutMs: number): Promise<OrderStatusUpdate[]> {
    await this.ibService.ensureConnected()
    const ibApi = this.ibService.getIbApi()

    return new Promise<OrderStatusUpdate[]>((resolve, reject) => {
      const found = new Map<number, OrderStatusUpdate>()
      let openDone = false
      let completedDone = false
      let finished = false

      const record = (update: OrderStatusUpdate | null) => {
        if (!update) return
        const previous = this.statuses.get(update.orderId)
        // 約定済みの平均価格を落とさない
        if (previous?.status === 'Filled') {
          found.set(update.orderId, previous)
          return
        }
        this.statuses.set(update.orderId, update)
        found.set(update.orderId, update)
      }

      const onOpenOrder = (...args: unknown[]) => record(toSyncedStatus(args[0], args[2], args[3]))
      const onCompletedOrder = (...args: unknown[]) => {
        const order = args[1]
        record(toSyncedStatus(isRecord(order) ? order.orderId : undefined, order, args[2]))
      }

      const cleanup = () => {
        finished = true
        clearTimeout(timeoutId)
        ibApi.off(EventName.openOrder, onOpenOrder)
        ibApi.off(EventName.openOrderEnd, onOpenOrderEnd)
        ibApi.off(EventName.completedOrder, onCompletedOrder)
        ibApi.off(EventName.completedOrdersEnd, onCompletedOrdersEnd)
        unsubscribe()
      }

      const finishIfDone = () => {
        if (finished || !openDone || !completedDone) return
        cleanup()
        console.log(`注文ステータス同期完了: ${found.size}件`)
        resolve(Array.from(found.values()))
      }

      const onOpenOrderEnd = () => {
        openDone = true
        finishIfDone()
      }

      const onCompletedOrdersEnd = () => {
        completedDone = true
        finishIfDone()
      }

      const unsubscribe = this.ibService.events.subscribe('ConnectionLost', (event) => {
        if (finished) return
        cleanup()
        reject(new BrokerConnectionError(`注文同期中に切断 (Code: ${event.code})`))
      })

      const timeoutId = setTimeout(() => {
        if (finished) return
        cleanup()
        console.warn(`注文ステータス同期タイムアウト (${found.size}件受信)`)
        resolve(Array.from(found.values()))
      }, timeoutMs)

      ibApi.on(EventName.openOrder, onOpenOrder)
      ibApi.on(EventName.openOrderEnd, onOpenOrderEnd)
      ibApi.on(EventName.completedOrder, onCompletedOrder)
      ibApi.on(EventName.completedOrdersEnd, onCompletedOrdersEnd)

      console.log('未約定・完了済み注文をリクエスト中...')
      ibApi.reqAllOpenOrders()
      ibApi.reqCompletedOrders(false)
    })
  }
}
