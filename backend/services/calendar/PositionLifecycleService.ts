// backend/services/calendar/PositionLifecycleService.ts
import { CalendarSpread, ExitReason, LEG_NAMES, LegName, LegSnapshot } from '../../../shared/types'
import { CalendarConfig } from '../../config'
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { OrderStatusUpdate, QuoteHandle, isTerminalOrderStatus, isWorkingOrderStatus, quoteMid } from '../ib-service/types'
import { PositionStore } from '../store/PositionStore'
import { emptyLeg } from '../store/tradeMapper'
import { NotificationSink, notificationMessages } from '../NotificationService'
import { ActivityLogger } from './ActivityLogger'
import { ExecutionResult, OrderExecutionService } from './OrderExecutionService'
import { SpreadStrikes, StrikeSelectionService } from './StrikeSelectionService'
import { StreamingPnLService } from './StreamingPnLService'
import { LegConIds, SPX_SYMBOL, closingComboLegs, legContracts, storedConIds } from './legs'
import { CANCEL_ACK_CODES, REJECTION_CODES, isFilled, waitForOrder } from './orderWaits'
import { hasBidAsk, waitForQuotes } from './quoteWaits'
import { KeyedMutex } from '../../utils/KeyedMutex'
import { InvalidTransitionError, ProfitTargetCancelError, TradeNotFoundError } from '../../utils/errors'
import {
  Clock,
  atWallClock,
  calculateExpiryDates,
  daysSince,
  formatDate,
  formatTime,
  generateTradeId,
} from '../../utils/marketTime'
import { normalizePrice, profitTargetPrice, spreadValue } from '../../utils/pricing'
import { errorMessage } from '../../utils/util'

export interface EntryOptions {
  /** 時間帯・曜日のチェックを省略 (手動実行) */
  force?: boolean
}

export type EntryOutcome =
  | { status: 'FILLED'; trade: CalendarSpread }
  | { status: 'SKIPPED'; reason: string }
  | { status: 'FAILED'; reason: string; trade: CalendarSpread | null }

export type CloseOutcome =
  | { status: 'CLOSED'; trade: CalendarSpread }
  | { status: 'ALREADY_CLOSED'; trade: CalendarSpread }
  | { status: 'FAILED'; trade: CalendarSpread; reason: string }

export interface TimeExitSummary {
  checked: number
  due: number
  closed: string[]
  failed: string[]
}

export interface MissingProfitTargetSummary {
  placed: number
  totalMissing: number
  failedTrades: string[]
}

export interface ProfitTargetSyncSummary {
  checked: number
  filled: string[]
  terminated: string[]
  confirmed: string[]
}

export interface ImportTradeInput {
  tradeId?: string
  entryDate: string
  entryTime?: string
  spxPrice?: number
  shortExpiry: string
  longExpiry: string
  putStrike: number
  callStrike: number
  longPutStrike?: number
  longCallStrike?: number
  entryCredit: number
  notes?: string
}

type CancelResult =
  | { kind: 'cancelled'; trade: CalendarSpread }
  | { kind: 'filled'; avgFillPrice: number }
  | { kind: 'unconfirmed' }

interface LegMarket {
  mids: Record<LegName, number> | null
  greeks: Record<LegName, { delta: number | null; iv: number | null }>
}

// ゴーストストライク確認の対象 (前週エントリー)
const PRIOR_TRADE_MIN_DAYS = 6
const PRIOR_TRADE_MAX_DAYS = 8

/**
 * トレードのライフサイクル管理。
 * 1トレードへの状態遷移はすべて tradeId ごとのロック内で行う。
 */
export class PositionLifecycleService {
  private mutex = new KeyedMutex()

  constructor(
    private gateway: BrokerGateway,
    private store: PositionStore,
    private strikes: StrikeSelectionService,
    private executor: OrderExecutionService,
    private pnl: StreamingPnLService,
    private notifier: NotificationSink,
    private activity: ActivityLogger,
    private config: () => CalendarConfig,
    private clock: Clock
  ) {}

  // ---------------------------------------------------------------
  // エントリー
  // ---------------------------------------------------------------

  public runDailyEntry(options: EntryOptions = {}): Promise<EntryOutcome> {
    return this.mutex.runExclusive('daily-entry', () => this.enterCalendar(options))
  }

  private async enterCalendar(options: EntryOptions): Promise<EntryOutcome> {
    const config = this.config()
    const now = this.clock()
    const today = formatDate(now)

    if (!options.force) {
      const start = atWallClock(now, config.entryTime)
      const end = start.plus({ minutes: config.entryWindowMinutes })
      if (now < start || now > end) {
        return { status: 'SKIPPED', reason: `エントリー時間外 (${config.entryTime} +${config.entryWindowMinutes}分)` }
      }
    }

    if ((await this.store.countTradesForDate(today)) > 0) {
      await this.activity.log('ALREADY_TRADED', `${today} は既にエントリー済み`, true)
      return { status: 'SKIPPED', reason: 'Already traded today' }
    }

    const active = await this.store.listTrades({ status: 'ACTIVE' })
    if (active.length >= config.maxConcurrentPositions) {
      const reason = `Position limit reached (${active.length}/${config.maxConcurrentPositions})`
      await this.activity.log('POSITION_LIMIT', reason, false)
      await this.notifier.send(notificationMessages.tradeFailed(reason))
      return { status: 'SKIPPED', reason }
    }

    let spxPrice: number
    try {
      spxPrice = await this.gateway.getUnderlyingPrice(config.timeouts.quoteMs)
    } catch (error) {
      const reason = `SPX price unavailable: ${errorMessage(error)}`
      await this.activity.log('ORDER_FAILED', reason, false)
      await this.notifier.send(notificationMessages.tradeFailed(reason))
      return { status: 'FAILED', reason, trade: null }
    }

    const { shortExpiry, longExpiry } = calculateExpiryDates(now, config.shortDte, config.longDte)
    console.log(`📅 エントリー開始: SPX ${spxPrice.toFixed(2)}, 満期 ${shortExpiry}/${longExpiry}`)

    const selection = await this.strikes.selectStrikes(shortExpiry, spxPrice, config.targetDelta, config.deltaTolerance)
    if (!selection.ok) {
      await this.activity.log('NO_STRIKES', selection.reason, false)
      await this.notifier.send(
        notificationMessages.tradeFailed('No strikes found', { spxPrice, shortExpiry, longExpiry })
      )
      return { status: 'FAILED', reason: selection.reason, trade: null }
    }

    const { putStrike, callStrike } = selection.value
    const proposed: SpreadStrikes = { shortPut: putStrike, shortCall: callStrike, longPut: putStrike, longCall: callStrike }
    const context = { spxPrice, putStrike, callStrike, shortExpiry, longExpiry }

    const ghost = await this.strikes.checkGhostStrikes(proposed, shortExpiry, await this.findPriorTrade())
    if (!ghost.ok) {
      await this.activity.log('GHOST_STRIKE', ghost.reason, false)
      await this.notifier.send(notificationMessages.tradeFailed('Ghost strike conflict', context))
      return { status: 'FAILED', reason: ghost.reason, trade: null }
    }
    if (ghost.value.conflicts.length > 0) {
      await this.activity.log(
        'GHOST_STRIKE',
        `${ghost.value.conflicts.join(', ')} → ${ghost.value.adjusted ? '調整' : '無視'}`,
        true
      )
    }

    let legs = ghost.value.strikes
    const exists = await this.strikes.verifyContractsExist(
      shortExpiry,
      longExpiry,
      legs.shortPut,
      legs.shortCall,
      legs.longPut,
      legs.longCall
    )
    if (!exists) {
      const adjusted = await this.strikes.handleFailedTrade(shortExpiry, longExpiry, legs.shortPut, legs.shortCall)
      if (!adjusted.ok) {
        await this.activity.log('CONTRACTS_MISSING', adjusted.reason, false)
        await this.notifier.send(notificationMessages.tradeFailed('Contracts not available', context))
        return { status: 'FAILED', reason: adjusted.reason, trade: null }
      }
      legs = adjusted.value
    }

    let trade: CalendarSpread = {
      tradeId: generateTradeId(now),
      entryDate: today,
      entryTime: formatTime(now),
      spxPrice: normalizePrice(spxPrice),
      shortExpiry,
      longExpiry,
      putStrike: legs.shortPut,
      callStrike: legs.shortCall,
      longPutStrike: legs.longPut,
      longCallStrike: legs.longCall,
      legs: { shortPut: emptyLeg(), shortCall: emptyLeg(), longPut: emptyLeg(), longCall: emptyLeg() },
      entryCredit: null,
      exitCredit: null,
      realizedPnl: null,
      profitTarget: null,
      status: 'PENDING',
      exitReason: null,
      exitDate: null,
      exitTime: null,
      exitSpxPrice: null,
      comboOrderId: null,
      fillStatus: 'PENDING',
      fillAttempts: 0,
      lastAttemptPrice: null,
      profitTargetOrderId: null,
      profitTargetPrice: null,
      profitTargetStatus: 'NONE',
      notes: null,
    }
    await this.store.saveTrade(trade)

    return this.mutex.runExclusive(trade.tradeId, async () => {
      const conIds = await this.resolveConIds(trade, config.timeouts.contractLookupMs)
      if (!conIds) {
        trade = await this.cancelPending(trade, 'Could not resolve contract ids')
        await this.notifier.send(notificationMessages.tradeFailed('Contract lookup failed', context))
        return { status: 'FAILED', reason: 'Could not resolve contract ids', trade }
      }
      trade = this.withConIds(trade, conIds)

      const market = await this.captureLegMarket(trade)
      trade = this.withGreeks(trade, market, 'entry')
      await this.store.saveTrade(trade)
      if (!market.mids) {
        trade = await this.cancelPending(trade, 'No market data for legs')
        await this.notifier.send(notificationMessages.tradeFailed('No market data', context))
        return { status: 'FAILED', reason: 'No market data for legs', trade }
      }

      const initialPrice = spreadValue(market.mids)
      const pending = trade
      const result = await this.executor.execute({
        tradeId: trade.tradeId,
        direction: 'ENTRY',
        conIds,
        quantity: config.positionSize,
        initialPrice,
        increment: config.priceIncrement,
        maxAttempts: config.maxPriceAttempts,
        maxDeviation: config.maxSpreadPremium,
        fillTimeoutMs: config.fillWaitTime * 1000,
        cancelTimeoutMs: config.timeouts.cancelAckMs,
        notifications: {
          started: (price) => notificationMessages.tradeAttempt(pending, price),
          filled: (fillPrice) =>
            notificationMessages.tradeFilled({
              ...pending,
              entryCredit: fillPrice,
              profitTarget: profitTargetPrice(fillPrice, config.profitTargetPct),
            }),
          exhausted: (cancelled) => notificationMessages.tradeFailed(cancelled.reason, context),
        },
        onAttempt: async (record) => {
          trade = { ...trade, fillAttempts: record.attempt, lastAttemptPrice: record.price, comboOrderId: record.orderId }
          await this.store.saveTrade(trade)
        },
      })

      if (result.status === 'CANCELLED') {
        trade = await this.cancelPending(trade, result.reason)
        return { status: 'FAILED', reason: result.reason, trade }
      }

      trade = {
        ...trade,
        status: 'ACTIVE',
        fillStatus: 'FILLED',
        comboOrderId: result.orderId,
        fillAttempts: result.attempts,
        entryCredit: result.fillPrice,
        profitTarget: profitTargetPrice(result.fillPrice, config.profitTargetPct),
      }
      await this.store.saveTrade(trade)
      await this.activity.log(
        'TRADE_PLACED',
        `${trade.tradeId}: ${trade.putStrike}P/${trade.callStrike}C @ ${result.fillPrice.toFixed(2)} (${result.attempts}回目)`,
        true
      )

      trade = await this.placeProfitTarget(trade)
      if (trade.status === 'ACTIVE') {
        await this.pnl.startTracking(trade)
      }
      return { status: 'FILLED', trade }
    })
  }

  /** 6〜8日前にエントリーした ACTIVE トレード (最新のもの) */
  private async findPriorTrade(): Promise<CalendarSpread | null> {
    const now = this.clock()
    const active = await this.store.listTrades({ status: 'ACTIVE' })
    const candidates = active
      .filter((trade) => {
        const age = daysSince(trade.entryDate, now)
        return age >= PRIOR_TRADE_MIN_DAYS && age <= PRIOR_TRADE_MAX_DAYS
      })
      .sort((a, b) => `${b.entryDate} ${b.entryTime}`.localeCompare(`${a.entryDate} ${a.entryTime}`))
    return candidates[0] ?? null
  }

  private async cancelPending(trade: CalendarSpread, reason: string): Promise<CalendarSpread> {
    const cancelled: CalendarSpread = { ...trade, status: 'CANCELLED', fillStatus: 'CANCELLED', notes: reason }
    await this.store.saveTrade(cancelled)
    await this.activity.log('ORDER_FAILED', `${trade.tradeId}: ${reason}`, false)
    return cancelled
  }

  // ---------------------------------------------------------------
  // 利確 GTC
  // ---------------------------------------------------------------

  public armProfitTarget(tradeId: string): Promise<CalendarSpread> {
    return this.mutex.runExclusive(tradeId, async () => {
      const trade = await this.requireTrade(tradeId)
      if (trade.status !== 'ACTIVE') {
        throw new InvalidTransitionError(tradeId, trade.status, 'PROFIT_TARGET')
      }
      return this.placeProfitTarget(trade)
    })
  }

  /**
   * 決済コンボの GTC 指値を発注し、受付を確認する。
   * 確認が取れない場合は NONE のまま注文IDを残す (次回の修復で取消してから再発注)。
   * その取消も確認できなければ新しい GTC は出さない。
   */
  private async placeProfitTarget(current: CalendarSpread): Promise<CalendarSpread> {
    const config = this.config()
    if (current.entryCredit === null) {
      return this.recordProfitTargetFailure(current, 'no entry credit')
    }

    let trade = current
    if (trade.profitTargetOrderId !== null && trade.profitTargetStatus === 'NONE') {
      console.log(`未確認の利確注文 #${trade.profitTargetOrderId} を取消`)
      const stale = await this.cancelProfitTarget(trade)
      if (stale.kind === 'filled') {
        return this.completeProfitTargetFill(trade, stale.avgFillPrice)
      }
      if (stale.kind === 'unconfirmed') {
        return this.recordProfitTargetFailure(trade, 'stale profit target cancel not confirmed')
      }
      trade = stale.trade
    }

    const conIds = await this.resolveConIds(trade, config.timeouts.closeContractLookupMs)
    if (!conIds) {
      return this.recordProfitTargetFailure(trade, 'contract lookup failed')
    }

    const target = profitTargetPrice(current.entryCredit, config.profitTargetPct)
    let orderId: number
    try {
      orderId = await this.gateway.placeComboOrder({
        symbol: SPX_SYMBOL,
        legs: closingComboLegs(conIds),
        action: 'BUY',
        quantity: config.positionSize,
        limitPrice: -target,
        tif: 'GTC',
        outsideRth: true,
      })
    } catch (error) {
      return this.recordProfitTargetFailure(this.withConIds(trade, conIds), errorMessage(error))
    }

    let updated: CalendarSpread = {
      ...this.withConIds(trade, conIds),
      profitTarget: target,
      profitTargetOrderId: orderId,
      profitTargetPrice: target,
      profitTargetStatus: 'NONE',
    }

    const ack = await waitForOrder(
      this.gateway,
      orderId,
      (update) => isFilled(update) || isWorkingOrderStatus(update.status) || isTerminalOrderStatus(update.status),
      REJECTION_CODES,
      config.timeouts.profitTargetConfirmMs
    )

    if (ack?.kind === 'status' && isFilled(ack.update)) {
      updated = { ...updated, profitTargetStatus: 'PLACED' }
      await this.store.saveTrade(updated)
      return this.completeProfitTargetFill(updated, ack.update.avgFillPrice)
    }

    if (ack?.kind === 'status' && isWorkingOrderStatus(ack.update.status)) {
      updated = { ...updated, profitTargetStatus: 'PLACED' }
      await this.store.saveTrade(updated)
      await this.appendHistory(updated, orderId, target, 'PLACED')
      await this.activity.log('PROFIT_TARGET_PLACED', `${trade.tradeId}: GTC #${orderId} @ ${target.toFixed(2)}`, true)
      await this.notifier.send(notificationMessages.profitTargetPlaced(updated))
      return updated
    }

    if (ack) {
      const detail = ack.kind === 'status' ? ack.update.status : `error ${ack.code}: ${ack.message}`
      updated = { ...updated, profitTargetStatus: 'REJECTED' }
      await this.store.saveTrade(updated)
      await this.appendHistory(updated, orderId, target, 'REJECTED')
      await this.activity.log('PROFIT_TARGET_FAILED', `${trade.tradeId}: GTC #${orderId} 拒否 (${detail})`, false)
      await this.notifier.send(notificationMessages.profitTargetFailed(updated, detail))
      return updated
    }

    await this.store.saveTrade(updated)
    await this.appendHistory(updated, orderId, target, 'UNCONFIRMED')
    await this.activity.log('PROFIT_TARGET_FAILED', `${trade.tradeId}: GTC #${orderId} 受付未確認`, false)
    await this.notifier.send(notificationMessages.profitTargetFailed(updated, 'not confirmed'))
    return updated
  }

  private async recordProfitTargetFailure(trade: CalendarSpread, reason: string): Promise<CalendarSpread> {
    await this.activity.log('PROFIT_TARGET_FAILED', `${trade.tradeId}: ${reason}`, false)
    await this.notifier.send(notificationMessages.profitTargetFailed(trade, reason))
    await this.store.saveTrade(trade)
    return trade
  }

  /**
   * 利確 GTC の約定通知。同じ約定の再通知は何もしない。
   */
  public async handleProfitTargetFill(orderId: number, avgFillPrice: number): Promise<boolean> {
    const found = await this.store.findTradeByProfitTargetOrderId(orderId)
    if (!found) return false

    return this.mutex.runExclusive(found.tradeId, async () => {
      const trade = await this.store.getTrade(found.tradeId)
      if (!trade || trade.status !== 'ACTIVE' || trade.profitTargetOrderId !== orderId) {
        return false
      }
      await this.completeProfitTargetFill(trade, avgFillPrice)
      return true
    })
  }

  private async completeProfitTargetFill(trade: CalendarSpread, avgFillPrice: number): Promise<CalendarSpread> {
    const price = avgFillPrice !== 0 ? Math.abs(avgFillPrice) : trade.profitTargetPrice ?? 0
    const closed = await this.closeTrade({ ...trade, profitTargetStatus: 'FILLED' }, price, 'profit target')
    if (trade.profitTargetOrderId !== null) {
      await this.appendHistory(closed, trade.profitTargetOrderId, price, 'FILLED')
    }
    await this.activity.log(
      'PROFIT_TARGET_HIT',
      `${closed.tradeId}: ${price.toFixed(2)} で利確 (P&L ${(closed.realizedPnl ?? 0).toFixed(2)})`,
      true
    )
    await this.notifier.send(notificationMessages.positionClosed(closed))
    return closed
  }

  /**
   * ブローカー側で GTC が取消/失効した場合
   */
  public async handleProfitTargetTerminated(orderId: number, status: string): Promise<boolean> {
    const found = await this.store.findTradeByProfitTargetOrderId(orderId)
    if (!found) return false

    return this.mutex.runExclusive(found.tradeId, async () => {
      const trade = await this.store.getTrade(found.tradeId)
      if (!trade || trade.profitTargetOrderId !== orderId || trade.profitTargetStatus !== 'PLACED') {
        return false
      }
      const updated: CalendarSpread = {
        ...trade,
        profitTargetStatus: status === 'Inactive' ? 'REJECTED' : 'CANCELLED',
      }
      await this.store.saveTrade(updated)
      await this.appendHistory(updated, orderId, trade.profitTargetPrice ?? 0, status.toUpperCase())
      await this.activity.log('PROFIT_TARGET_FAILED', `${trade.tradeId}: GTC #${orderId} が ${status}`, false)
      await this.notifier.send(notificationMessages.profitTargetTerminated(updated, status))
      return true
    })
  }

  public async placeMissingProfitTargets(): Promise<MissingProfitTargetSummary> {
    const active = await this.store.listTrades({ status: 'ACTIVE' })
    const missing = active.filter((trade) => trade.profitTargetStatus !== 'PLACED' && trade.entryCredit !== null)
    const summary: MissingProfitTargetSummary = { placed: 0, totalMissing: missing.length, failedTrades: [] }

    for (const candidate of missing) {
      try {
        const result = await this.mutex.runExclusive(candidate.tradeId, async () => {
          const trade = await this.store.getTrade(candidate.tradeId)
          if (!trade || trade.status !== 'ACTIVE' || trade.profitTargetStatus === 'PLACED') return trade
          return this.placeProfitTarget(trade)
        })
        if (result && (result.profitTargetStatus === 'PLACED' || result.status === 'CLOSED')) {
          summary.placed++
        } else {
          summary.failedTrades.push(candidate.tradeId)
        }
      } catch (error) {
        console.error(`GTC 再発注エラー ${candidate.tradeId}:`, errorMessage(error))
        summary.failedTrades.push(candidate.tradeId)
      }
    }

    console.log(`利確 GTC 補完: ${summary.placed}/${summary.totalMissing}`)
    return summary
  }

  // ---------------------------------------------------------------
  // 決済
  // ---------------------------------------------------------------

  public async runTimeExitCheck(): Promise<TimeExitSummary> {
    const config = this.config()
    const now = this.clock()
    const active = await this.store.listTrades({ status: 'ACTIVE' })
    const due = active.filter((trade) => daysSince(trade.entryDate, now) >= config.exitDay)
    const summary: TimeExitSummary = { checked: active.length, due: due.length, closed: [], failed: [] }

    for (const trade of due) {
      try {
        const outcome = await this.closePosition(trade.tradeId, 'time exit')
        if (outcome.status === 'FAILED') {
          summary.failed.push(trade.tradeId)
        } else {
          summary.closed.push(trade.tradeId)
        }
      } catch (error) {
        console.error(`時間決済エラー ${trade.tradeId}:`, errorMessage(error))
        summary.failed.push(trade.tradeId)
      }
    }

    await this.activity.log(
      'TIME_EXIT_CHECK',
      `ACTIVE ${summary.checked}件, 対象 ${summary.due}件, 決済 ${summary.closed.length}件, 失敗 ${summary.failed.length}件`,
      summary.failed.length === 0
    )
    return summary
  }

  public closePosition(tradeId: string, reason: ExitReason): Promise<CloseOutcome> {
    return this.mutex.runExclusive(tradeId, () => this.exitTrade(tradeId, reason))
  }

  private async exitTrade(tradeId: string, reason: ExitReason): Promise<CloseOutcome> {
    const config = this.config()
    let trade = await this.requireTrade(tradeId)

    if (trade.status === 'CLOSED' || trade.status === 'CANCELLED') {
      return { status: 'ALREADY_CLOSED', trade }
    }
    if (trade.status !== 'ACTIVE') {
      throw new InvalidTransitionError(tradeId, trade.status, 'CLOSED')
    }

    console.log(`🔻 決済開始 ${tradeId} (${reason})`)

    // 1. 利確 GTC を取消 (取消前に約定していればそれを採用)
    const gtc = await this.cancelProfitTarget(trade)
    if (gtc.kind === 'filled') {
      const closed = await this.completeProfitTargetFill(trade, gtc.avgFillPrice)
      return { status: 'CLOSED', trade: closed }
    }
    if (gtc.kind === 'unconfirmed') {
      return this.failExit(trade, 'profit target cancel not confirmed', false)
    }
    trade = gtc.trade

    // 2. conId
    const conIds = await this.resolveConIds(trade, config.timeouts.closeContractLookupMs)
    if (!conIds) {
      return this.failExit(trade, 'contract lookup failed', true)
    }
    trade = this.withConIds(trade, conIds)

    // 3-4. 中値と決済時のグリーク
    const market = await this.captureLegMarket(trade)
    trade = this.withGreeks(trade, market, 'exit')
    await this.store.saveTrade(trade)
    if (!market.mids) {
      return this.failExit(trade, 'no market data for legs', true)
    }

    const exitSpxPrice = await this.gateway.getUnderlyingPrice(config.timeouts.quoteMs).catch((error: unknown) => {
      console.warn('決済時 SPX 価格取得失敗:', errorMessage(error))
      return null
    })

    const result: ExecutionResult = await this.executor.execute({
      tradeId,
      direction: 'EXIT',
      conIds,
      quantity: config.positionSize,
      initialPrice: spreadValue(market.mids),
      increment: config.priceIncrement,
      maxAttempts: config.exitMaxAttempts,
      maxDeviation: config.maxExitDiscount,
      fillTimeoutMs: config.exitFillWaitTime * 1000,
      cancelTimeoutMs: config.timeouts.cancelAckMs,
      notifications: {
        started: (price) => notificationMessages.exitAttempt(trade, reason, price),
        filled: (fillPrice) => notificationMessages.exitFilled(trade, reason, fillPrice),
        exhausted: (cancelled) => notificationMessages.exitFailed(trade, cancelled.reason),
      },
    })

    if (result.status === 'CANCELLED') {
      // 通知は executor が送信済み
      return this.failExit(trade, result.reason, true, false)
    }

    const closed = await this.closeTrade(
      { ...trade, exitSpxPrice: exitSpxPrice === null ? null : normalizePrice(exitSpxPrice) },
      result.fillPrice,
      reason
    )
    await this.activity.log(
      reason === 'time exit' ? 'TIME_EXIT' : 'COMMAND',
      `${tradeId}: ${reason} @ ${result.fillPrice.toFixed(2)} (P&L ${(closed.realizedPnl ?? 0).toFixed(2)})`,
      true
    )
    return { status: 'CLOSED', trade: closed }
  }

  private async failExit(trade: CalendarSpread, reason: string, rearm: boolean, notify = true): Promise<CloseOutcome> {
    await this.activity.log('EXIT_FAILED', `${trade.tradeId}: ${reason}`, false)
    if (notify) {
      await this.notifier.send(notificationMessages.exitFailed(trade, reason))
    }
    await this.store.saveTrade(trade)

    // ポジションは残るので利確 GTC を戻す
    const restored = rearm && trade.profitTargetStatus !== 'PLACED' ? await this.placeProfitTarget(trade) : trade
    if (restored.status === 'CLOSED') {
      return { status: 'CLOSED', trade: restored }
    }
    return { status: 'FAILED', trade: restored, reason }
  }

  /** 利確 GTC を取り消せないまま手動管理・外部決済へ進めない */
  private async releaseProfitTarget(trade: CalendarSpread): Promise<CancelResult> {
    const gtc = await this.cancelProfitTarget(trade)
    if (gtc.kind === 'unconfirmed' && trade.profitTargetOrderId !== null) {
      throw new ProfitTargetCancelError(trade.tradeId, trade.profitTargetOrderId)
    }
    return gtc
  }

  private async cancelProfitTarget(trade: CalendarSpread): Promise<CancelResult> {
    const orderId = trade.profitTargetOrderId
    const live = trade.profitTargetStatus === 'PLACED' || trade.profitTargetStatus === 'NONE'
    if (orderId === null || !live) {
      return { kind: 'cancelled', trade }
    }

    this.gateway.cancelOrder(orderId)
    const ack = await waitForOrder(
      this.gateway,
      orderId,
      (update) => isFilled(update) || isTerminalOrderStatus(update.status),
      CANCEL_ACK_CODES,
      this.config().timeouts.cancelAckMs
    )

    const latest = this.gateway.getOrderStatus(orderId)
    if (ack?.kind === 'status' && isFilled(ack.update)) {
      return { kind: 'filled', avgFillPrice: ack.update.avgFillPrice }
    }
    if (latest && isFilled(latest)) {
      return { kind: 'filled', avgFillPrice: latest.avgFillPrice }
    }

    if (!ack) {
      console.warn(`利確 GTC #${orderId} の取消確認なし`)
      return { kind: 'unconfirmed' }
    }

    const updated: CalendarSpread = { ...trade, profitTargetStatus: 'CANCELLED' }
    await this.store.saveTrade(updated)
    await this.appendHistory(updated, orderId, trade.profitTargetPrice ?? 0, 'CANCELLED')
    return { kind: 'cancelled', trade: updated }
  }

  private async closeTrade(trade: CalendarSpread, exitCredit: number, reason: ExitReason): Promise<CalendarSpread> {
    const now = this.clock()
    const credit = normalizePrice(Math.abs(exitCredit))
    const closed: CalendarSpread = {
      ...trade,
      status: 'CLOSED',
      exitReason: reason,
      exitCredit: credit,
      realizedPnl: trade.entryCredit === null ? null : normalizePrice(credit - trade.entryCredit),
      exitDate: trade.exitDate ?? formatDate(now),
      exitTime: trade.exitTime ?? formatTime(now),
    }
    await this.store.saveTrade(closed)
    this.pnl.stopTracking(trade.tradeId)
    console.log(`✅ ${trade.tradeId} CLOSED (${reason}) exit ${credit.toFixed(2)}`)
    return closed
  }

  // ---------------------------------------------------------------
  // 手動操作
  // ---------------------------------------------------------------

  public stopManaging(tradeId: string): Promise<CalendarSpread> {
    return this.mutex.runExclusive(tradeId, async () => {
      const trade = await this.requireTrade(tradeId)
      if (trade.status === 'MANUAL_CONTROL') {
        return trade
      }
      if (trade.status !== 'ACTIVE') {
        throw new InvalidTransitionError(tradeId, trade.status, 'MANUAL_CONTROL')
      }

      const gtc = await this.releaseProfitTarget(trade)
      if (gtc.kind === 'filled') {
        return this.completeProfitTargetFill(trade, gtc.avgFillPrice)
      }

      const base = gtc.kind === 'cancelled' ? gtc.trade : trade
      const manual: CalendarSpread = { ...base, status: 'MANUAL_CONTROL' }
      await this.store.saveTrade(manual)
      this.pnl.stopTracking(tradeId)
      await this.activity.log('MANUAL_CONTROL', `${tradeId} を手動管理へ移行`, true)
      return manual
    })
  }

  public recordExternalClose(
    tradeId: string,
    exitCredit: number,
    exitDate?: string,
    exitTime?: string
  ): Promise<CalendarSpread> {
    return this.mutex.runExclusive(tradeId, async () => {
      const trade = await this.requireTrade(tradeId)
      if (trade.status !== 'ACTIVE') {
        throw new InvalidTransitionError(tradeId, trade.status, 'CLOSED')
      }

      const gtc = await this.releaseProfitTarget(trade)
      if (gtc.kind === 'filled') {
        return this.completeProfitTargetFill(trade, gtc.avgFillPrice)
      }
      const base = gtc.kind === 'cancelled' ? gtc.trade : trade

      const closed = await this.closeTrade(
        { ...base, exitDate: exitDate ?? null, exitTime: exitTime ?? null },
        exitCredit,
        'reconciliation close'
      )
      await this.activity.log('COMMAND', `${tradeId}: 外部決済を記録 (${closed.exitCredit?.toFixed(2)})`, true)
      return closed
    })
  }

  /**
   * 手動で建てたポジションを取り込む。
   * ID 省略時は CAL_YYYYMMDD_IMPORT、使用済みなら _2, _3 ... を付ける。
   */
  public importTrade(input: ImportTradeInput): Promise<CalendarSpread> {
    // 採番と保存を同じロック内で行う
    return this.mutex.runExclusive('import', async () => {
      const tradeId = input.tradeId ?? (await this.nextImportId(input.entryDate))
      if (await this.store.getTrade(tradeId)) {
        throw new InvalidTransitionError(tradeId, 'EXISTS', 'ACTIVE')
      }
      return this.mutex.runExclusive(tradeId, () => this.createImportedTrade(tradeId, input))
    })
  }

  private async nextImportId(entryDate: string): Promise<string> {
    const base = `CAL_${entryDate.replace(/-/g, '')}_IMPORT`
    let candidate = base
    for (let suffix = 2; await this.store.getTrade(candidate); suffix++) {
      candidate = `${base}_${suffix}`
    }
    return candidate
  }

  private async createImportedTrade(tradeId: string, input: ImportTradeInput): Promise<CalendarSpread> {
    const config = this.config()
    let trade: CalendarSpread = {
      tradeId,
      entryDate: input.entryDate,
      entryTime: input.entryTime ?? '00:00:00',
      spxPrice: input.spxPrice === undefined ? null : normalizePrice(input.spxPrice),
      shortExpiry: input.shortExpiry,
      longExpiry: input.longExpiry,
      putStrike: input.putStrike,
      callStrike: input.callStrike,
      longPutStrike: input.longPutStrike ?? input.putStrike,
      longCallStrike: input.longCallStrike ?? input.callStrike,
      legs: { shortPut: emptyLeg(), shortCall: emptyLeg(), longPut: emptyLeg(), longCall: emptyLeg() },
      entryCredit: normalizePrice(input.entryCredit),
      exitCredit: null,
      realizedPnl: null,
      profitTarget: profitTargetPrice(input.entryCredit, config.profitTargetPct),
      status: 'ACTIVE',
      exitReason: null,
      exitDate: null,
      exitTime: null,
      exitSpxPrice: null,
      comboOrderId: null,
      fillStatus: 'FILLED',
      fillAttempts: 0,
      lastAttemptPrice: null,
      profitTargetOrderId: null,
      profitTargetPrice: null,
      profitTargetStatus: 'NONE',
      notes: input.notes ?? 'imported',
    }
    await this.store.saveTrade(trade)
    await this.activity.log('IMPORT', `${tradeId}: ${trade.putStrike}P/${trade.callStrike}C を取り込み`, true)

    trade = await this.placeProfitTarget(trade)
    if (trade.status === 'ACTIVE') {
      await this.pnl.startTracking(trade)
    }
    return trade
  }

  /** 起動時・気配セッション再接続後: ACTIVE トレードの時価評価を張り直す */
  public async recoverActiveTrades(): Promise<number> {
    const active = await this.store.listTrades({ status: 'ACTIVE' })
    const started = await this.pnl.resubscribe(active)
    console.log(`ACTIVE トレード ${started}/${active.length}件の監視を再開`)
    return started
  }

  public valuationsNeedRestart(): boolean {
    return this.pnl.needsResubscribe()
  }

  /**
   * 起動時・再接続後: 停止中に受信し損ねた利確 GTC の約定・取消を
   * ブローカーの注文一覧から反映する。受付未確認の GTC が生きていれば PLACED にする。
   */
  public async syncProfitTargets(): Promise<ProfitTargetSyncSummary> {
    const active = await this.store.listTrades({ status: 'ACTIVE' })
    const watched = active.filter(
      (trade) =>
        trade.profitTargetOrderId !== null &&
        (trade.profitTargetStatus === 'PLACED' || trade.profitTargetStatus === 'NONE')
    )
    const summary: ProfitTargetSyncSummary = { checked: watched.length, filled: [], terminated: [], confirmed: [] }
    if (watched.length === 0) return summary

    const statuses = await this.gateway.syncOrderStatuses(this.config().timeouts.orderSyncMs)
    const byOrderId = new Map<number, OrderStatusUpdate>()
    statuses.forEach((update) => byOrderId.set(update.orderId, update))

    for (const trade of watched) {
      const update = trade.profitTargetOrderId === null ? undefined : byOrderId.get(trade.profitTargetOrderId)
      if (!update) continue

      if (isFilled(update)) {
        if (await this.handleProfitTargetFill(update.orderId, update.avgFillPrice)) {
          summary.filled.push(trade.tradeId)
        }
      } else if (isTerminalOrderStatus(update.status)) {
        if (await this.handleProfitTargetTerminated(update.orderId, update.status)) {
          summary.terminated.push(trade.tradeId)
        }
      } else if (isWorkingOrderStatus(update.status) && trade.profitTargetStatus === 'NONE') {
        if (await this.confirmProfitTarget(trade.tradeId, update.orderId)) {
          summary.confirmed.push(trade.tradeId)
        }
      }
    }

    console.log(
      `利確 GTC 同期: ${summary.checked}件確認, 約定 ${summary.filled.length}, ` +
        `終了 ${summary.terminated.length}, 受付確認 ${summary.confirmed.length}`
    )
    return summary
  }

  private confirmProfitTarget(tradeId: string, orderId: number): Promise<boolean> {
    return this.mutex.runExclusive(tradeId, async () => {
      const trade = await this.store.getTrade(tradeId)
      if (!trade || trade.status !== 'ACTIVE' || trade.profitTargetOrderId !== orderId) return false
      if (trade.profitTargetStatus !== 'NONE') return false

      const updated: CalendarSpread = { ...trade, profitTargetStatus: 'PLACED' }
      await this.store.saveTrade(updated)
      await this.appendHistory(updated, orderId, trade.profitTargetPrice ?? 0, 'PLACED')
      await this.activity.log('PROFIT_TARGET_PLACED', `${tradeId}: GTC #${orderId} の受付を確認`, true)
      return true
    })
  }

  // ---------------------------------------------------------------
  // 共通
  // ---------------------------------------------------------------

  private async requireTrade(tradeId: string): Promise<CalendarSpread> {
    const trade = await this.store.getTrade(tradeId)
    if (!trade) {
      throw new TradeNotFoundError(tradeId)
    }
    return trade
  }

  private async resolveConIds(trade: CalendarSpread, timeoutMs: number): Promise<LegConIds | null> {
    const stored = storedConIds(trade)
    if (stored) return stored

    const contracts = legContracts(trade)
    try {
      const [shortPut, shortCall, longPut, longCall] = await Promise.all(
        LEG_NAMES.map((leg) => this.gateway.resolveConId(contracts[leg], timeoutMs))
      )
      if (shortPut === null || shortCall === null || longPut === null || longCall === null) {
        console.warn(`${trade.tradeId}: conId を解決できないレッグがあります`)
        return null
      }
      return { shortPut, shortCall, longPut, longCall }
    } catch (error) {
      console.warn(`${trade.tradeId}: conId 解決エラー`, errorMessage(error))
      return null
    }
  }

  /** 4レッグの気配 (中値) とグリークを取得し、購読はすべて解除する */
  private async captureLegMarket(trade: CalendarSpread): Promise<LegMarket> {
    const contracts = legContracts(trade)
    const handles: QuoteHandle[] = []
    const greeks: LegMarket['greeks'] = {
      shortPut: { delta: null, iv: null },
      shortCall: { delta: null, iv: null },
      longPut: { delta: null, iv: null },
      longCall: { delta: null, iv: null },
    }

    try {
      for (const leg of LEG_NAMES) {
        handles.push(await this.gateway.subscribeQuote(contracts[leg], true))
      }
      await waitForQuotes(this.gateway, handles, hasBidAsk, this.config().timeouts.quoteMs)

      const mids: Partial<Record<LegName, number>> = {}
      LEG_NAMES.forEach((leg, index) => {
        const quote = this.gateway.getQuote(handles[index])
        greeks[leg] = { delta: quote?.delta ?? null, iv: quote?.impliedVolatility ?? null }
        const mid = quoteMid(quote)
        if (mid !== null) mids[leg] = mid
      })

      const { shortPut, shortCall, longPut, longCall } = mids
      if (shortPut === undefined || shortCall === undefined || longPut === undefined || longCall === undefined) {
        return { mids: null, greeks }
      }
      return { mids: { shortPut, shortCall, longPut, longCall }, greeks }
    } catch (error) {
      console.warn(`${trade.tradeId}: 気配取得エラー`, errorMessage(error))
      return { mids: null, greeks }
    } finally {
      handles.forEach((handle) => this.gateway.cancelQuote(handle))
    }
  }

  private withConIds(trade: CalendarSpread, conIds: LegConIds): CalendarSpread {
    const legs = { ...trade.legs }
    LEG_NAMES.forEach((leg) => {
      legs[leg] = { ...legs[leg], conId: conIds[leg] }
    })
    return { ...trade, legs }
  }

  private withGreeks(trade: CalendarSpread, market: LegMarket, phase: 'entry' | 'exit'): CalendarSpread {
    const legs = { ...trade.legs }
    LEG_NAMES.forEach((leg) => {
      const { delta, iv } = market.greeks[leg]
      const current: LegSnapshot = legs[leg]
      legs[leg] =
        phase === 'entry'
          ? { ...current, entryDelta: delta ?? current.entryDelta, entryIv: iv ?? current.entryIv }
          : { ...current, exitDelta: delta ?? current.exitDelta, exitIv: iv ?? current.exitIv }
    })
    return { ...trade, legs }
  }

  private async appendHistory(trade: CalendarSpread, orderId: number, price: number, status: string): Promise<void> {
    try {
      await this.store.appendOrderHistory({
        tradeId: trade.tradeId,
        orderId,
        orderType: 'PROFIT_TARGET',
        price,
        status,
        timestamp: new Date(),
      })
    } catch (error) {
      console.error('注文履歴保存エラー:', errorMessage(error))
    }
  }
}
