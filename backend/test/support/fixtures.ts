// test/support/fixtures.ts
import { DateTime } from 'luxon'
import { CalendarSpread } from '../../../shared/types'
import { CalendarConfig, DEFAULT_CONFIG } from '../../config'
import { NotificationSink } from '../../services/NotificationService'
import { ActivityLogger } from '../../services/calendar/ActivityLogger'
import { OrderExecutionService } from '../../services/calendar/OrderExecutionService'
import { PositionLifecycleService } from '../../services/calendar/PositionLifecycleService'
import { ReconciliationService } from '../../services/calendar/ReconciliationService'
import { StrikeSelectionService } from '../../services/calendar/StrikeSelectionService'
import { StreamingPnLService } from '../../services/calendar/StreamingPnLService'
import { emptyLeg } from '../../services/store/tradeMapper'
import { Clock, MARKET_ZONE } from '../../utils/marketTime'
import { FakeBrokerGateway } from './FakeBrokerGateway'
import { InMemoryPositionStore } from './InMemoryPositionStore'

/** 2025-03-14 (金) 09:50 ET */
export const ENTRY_NOW = DateTime.fromISO('2025-03-14T09:50:00', { zone: MARKET_ZONE })

export function fixedClock(now: DateTime): Clock {
  return () => now
}

/** 待ち時間だけ短くしたテスト用設定 */
export function testConfig(overrides: Partial<CalendarConfig> = {}): CalendarConfig {
  return {
    ...DEFAULT_CONFIG,
    fillWaitTime: 0.01,
    exitFillWaitTime: 0.01,
    timeouts: {
      contractLookupMs: 20,
      closeContractLookupMs: 20,
      quoteMs: 20,
      cancelAckMs: 15,
      profitTargetConfirmMs: 15,
      positionSnapshotMs: 20,
      orderSyncMs: 20,
    },
    ...overrides,
  }
}

export class RecordingNotifier implements NotificationSink {
  messages: string[] = []

  async send(message: string): Promise<void> {
    this.messages.push(message)
  }
}

export function makeTrade(overrides: Partial<CalendarSpread> = {}): CalendarSpread {
  return {
    tradeId: 'CAL_20250307_094512',
    entryDate: '2025-03-07',
    entryTime: '09:45:12',
    spxPrice: 5000,
    shortExpiry: '20250328',
    longExpiry: '20250404',
    putStrike: 4750,
    callStrike: 5150,
    longPutStrike: 4750,
    longCallStrike: 5150,
    legs: { shortPut: emptyLeg(), shortCall: emptyLeg(), longPut: emptyLeg(), longCall: emptyLeg() },
    entryCredit: 4,
    exitCredit: null,
    realizedPnl: null,
    profitTarget: 6,
    status: 'ACTIVE',
    exitReason: null,
    exitDate: null,
    exitTime: null,
    exitSpxPrice: null,
    comboOrderId: 101,
    fillStatus: 'FILLED',
    fillAttempts: 1,
    lastAttemptPrice: 4,
    profitTargetOrderId: null,
    profitTargetPrice: null,
    profitTargetStatus: 'NONE',
    notes: null,
    ...overrides,
  }
}

/** 4レッグに bid/ask を設定 (中値: SP 2.00, SC 1.50, LP 3.50, LC 3.00 → スプレッド 3.00) */
export function quoteLegs(gateway: FakeBrokerGateway, trade: CalendarSpread, mids = { sp: 2, sc: 1.5, lp: 3.5, lc: 3 }): void {
  const half = 0.05
  gateway.setQuote(trade.shortExpiry, trade.putStrike, 'P', { bid: mids.sp - half, ask: mids.sp + half, delta: -0.2, impliedVolatility: 0.18 })
  gateway.setQuote(trade.shortExpiry, trade.callStrike, 'C', { bid: mids.sc - half, ask: mids.sc + half, delta: 0.2, impliedVolatility: 0.15 })
  gateway.setQuote(trade.longExpiry, trade.longPutStrike, 'P', { bid: mids.lp - half, ask: mids.lp + half, delta: -0.22, impliedVolatility: 0.19 })
  gateway.setQuote(trade.longExpiry, trade.longCallStrike, 'C', { bid: mids.lc - half, ask: mids.lc + half, delta: 0.21, impliedVolatility: 0.16 })
}

export interface Harness {
  gateway: FakeBrokerGateway
  store: InMemoryPositionStore
  notifier: RecordingNotifier
  activity: ActivityLogger
  strikes: StrikeSelectionService
  executor: OrderExecutionService
  pnl: StreamingPnLService
  lifecycle: PositionLifecycleService
  reconciliation: ReconciliationService
  config: CalendarConfig
}

export function createHarness(options: { now?: DateTime; config?: Partial<CalendarConfig> } = {}): Harness {
  const clock = fixedClock(options.now ?? ENTRY_NOW)
  const config = testConfig(options.config)
  const getConfig = () => config
  const gateway = new FakeBrokerGateway()
  const store = new InMemoryPositionStore()
  const notifier = new RecordingNotifier()
  const activity = new ActivityLogger(store, clock)
  const strikes = new StrikeSelectionService(gateway, getConfig)
  const executor = new OrderExecutionService(gateway, store, notifier)
  const pnl = new StreamingPnLService(gateway)
  const lifecycle = new PositionLifecycleService(
    gateway,
    store,
    strikes,
    executor,
    pnl,
    notifier,
    activity,
    getConfig,
    clock
  )
  const reconciliation = new ReconciliationService(gateway, store, notifier, activity, getConfig)
  return { gateway, store, notifier, activity, strikes, executor, pnl, lifecycle, reconciliation, config }
}
