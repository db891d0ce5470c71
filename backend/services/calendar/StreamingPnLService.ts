// backend/services/calendar/StreamingPnLService.ts
import EventEmitter from 'events'
import { CalendarSpread, LEG_NAMES, LegName, SpreadValuation } from '../../../shared/types'
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { QuoteHandle, quoteMid } from '../ib-service/types'
import { LegMids, normalizePrice, spreadValue } from '../../utils/pricing'
import { errorMessage } from '../../utils/util'
import { legContracts } from './legs'

interface TrackedTrade {
  tradeId: string
  entryCredit: number | null
  handles: Record<LegName, QuoteHandle>
  valuation: SpreadValuation
  unsubscribe: () => void
}

/**
 * ACTIVE トレードの時価評価。4レッグ分の気配を購読し、
 * 全レッグの bid/ask が揃ったときだけスプレッド値を更新する。
 * 接続断で購読は失われるため、評価を ready=false にして再購読を待つ。
 */
export class StreamingPnLService extends EventEmitter {
  private tracked: Map<string, TrackedTrade> = new Map()
  private starting: Set<string> = new Set()
  // 起動直後も未購読なので true
  private resubscribePending = true

  constructor(private gateway: BrokerGateway) {
    super()
    this.gateway.events.subscribe('ConnectionLost', (event) => {
      console.warn(`気配セッション切断 (Code: ${event.code}): 時価評価を停止`)
      this.markStale()
    })
  }

  /** 全トレードの評価を未確定にする */
  public markStale(): void {
    this.resubscribePending = true
    Array.from(this.tracked.values()).forEach((entry) => {
      entry.valuation = { ...entry.valuation, ready: false }
      this.emit('valuationUpdated', { ...entry.valuation })
    })
  }

  public needsResubscribe(): boolean {
    return this.resubscribePending
  }

  /**
   * 購読をすべて張り直す。全トレードの購読に成功したときだけ再購読待ちを解除する。
   */
  public async resubscribe(trades: CalendarSpread[]): Promise<number> {
    this.stopAll()
    for (const trade of trades) {
      await this.startTracking(trade)
    }
    const started = trades.filter((trade) => this.tracked.has(trade.tradeId)).length
    this.resubscribePending = started < trades.length
    return started
  }

  public async startTracking(trade: CalendarSpread): Promise<void> {
    if (this.tracked.has(trade.tradeId) || this.starting.has(trade.tradeId)) {
      return
    }
    this.starting.add(trade.tradeId)

    const contracts = legContracts(trade)
    const opened: QuoteHandle[] = []
    try {
      const handles: Partial<Record<LegName, QuoteHandle>> = {}
      for (const leg of LEG_NAMES) {
        const handle = await this.gateway.subscribeQuote(contracts[leg], false)
        opened.push(handle)
        handles[leg] = handle
      }
      const { shortPut, shortCall, longPut, longCall } = handles
      if (!shortPut || !shortCall || !longPut || !longCall) {
        throw new Error('レッグ購読が揃いません')
      }

      const reqIds = new Set(opened.map((handle) => handle.reqId))
      const entry: TrackedTrade = {
        tradeId: trade.tradeId,
        entryCredit: trade.entryCredit,
        handles: { shortPut, shortCall, longPut, longCall },
        valuation: { tradeId: trade.tradeId, spreadValue: null, unrealizedPnl: null, ready: false, updatedAt: null },
        unsubscribe: () => undefined,
      }
      entry.unsubscribe = this.gateway.events.subscribe('QuoteUpdated', (event) => {
        if (reqIds.has(event.reqId)) {
          this.recompute(entry)
        }
      })
      this.tracked.set(trade.tradeId, entry)
      this.recompute(entry)
      console.log(`📈 時価評価開始: ${trade.tradeId}`)
    } catch (error) {
      opened.forEach((handle) => this.gateway.cancelQuote(handle))
      console.error(`時価評価の開始に失敗 ${trade.tradeId}:`, errorMessage(error))
    } finally {
      this.starting.delete(trade.tradeId)
    }
  }

  public stopTracking(tradeId: string): void {
    const entry = this.tracked.get(tradeId)
    if (!entry) return

    entry.unsubscribe()
    LEG_NAMES.forEach((leg) => this.gateway.cancelQuote(entry.handles[leg]))
    this.tracked.delete(tradeId)
    console.log(`時価評価停止: ${tradeId}`)
  }

  public stopAll(): void {
    Array.from(this.tracked.keys()).forEach((tradeId) => this.stopTracking(tradeId))
  }

  public getValuation(tradeId: string): SpreadValuation | null {
    const entry = this.tracked.get(tradeId)
    return entry ? { ...entry.valuation } : null
  }

  public getAllValuations(): SpreadValuation[] {
    return Array.from(this.tracked.values()).map((entry) => ({ ...entry.valuation }))
  }

  public isTracking(tradeId: string): boolean {
    return this.tracked.has(tradeId)
  }

  /** 購読ハンドルの reqId (トレード間で共有しないことの確認用) */
  public getHandles(tradeId: string): QuoteHandle[] {
    const entry = this.tracked.get(tradeId)
    return entry ? LEG_NAMES.map((leg) => entry.handles[leg]) : []
  }

  private recompute(entry: TrackedTrade): void {
    const mids: Partial<LegMids> = {}
    for (const leg of LEG_NAMES) {
      const mid = quoteMid(this.gateway.getQuote(entry.handles[leg]))
      // 一部欠けている間は前回値を保持
      if (mid === null) return
      mids[leg] = mid
    }
    const { shortPut, shortCall, longPut, longCall } = mids
    if (shortPut === undefined || shortCall === undefined || longPut === undefined || longCall === undefined) return

    const value = spreadValue({ shortPut, shortCall, longPut, longCall })
    entry.valuation = {
      tradeId: entry.tradeId,
      spreadValue: value,
      unrealizedPnl: entry.entryCredit === null ? null : normalizePrice(value - entry.entryCredit),
      ready: true,
      updatedAt: new Date(),
    }
    this.emit('valuationUpdated', { ...entry.valuation })
  }
}
