import { describe, expect, it } from 'vitest'
import { BrokerEventConsumer } from '../services/calendar/BrokerEventConsumer'
import { InvalidTransitionError, ProfitTargetCancelError } from '../utils/errors'
import { FakeBrokerGateway } from './support/FakeBrokerGateway'
import { ENTRY_NOW, createHarness, makeTrade, quoteLegs } from './support/fixtures'

const SHORT_EXPIRY = '20250404'
const LONG_EXPIRY = '20250411'

/** DAY 注文 (エントリー/決済) は即約定、GTC は受付 */
function fillDayOrders(gateway: FakeBrokerGateway, entryFill?: number): void {
  gateway.onPlace = ({ orderId, spec }) => {
    if (spec.tif === 'DAY') {
      gateway.emitStatus(orderId, 'Filled', entryFill ?? spec.limitPrice)
    } else {
      gateway.emitStatus(orderId, 'Submitted')
    }
  }
}

function prepareEntryMarket(gateway: FakeBrokerGateway): void {
  gateway.setStrikes(SHORT_EXPIRY, 'P', [4790])
  gateway.setStrikes(SHORT_EXPIRY, 'C', [5150])
  quoteLegs(
    gateway,
    makeTrade({ shortExpiry: SHORT_EXPIRY, longExpiry: LONG_EXPIRY, putStrike: 4790, longPutStrike: 4790 })
  )
}

describe('PositionLifecycleService: エントリー', () => {
  it('約定 → ACTIVE、$4.00 の約定で利確 GTC を −6.00 で発注', async () => {
    const { gateway, store, notifier, lifecycle, pnl } = createHarness()
    prepareEntryMarket(gateway)
    fillDayOrders(gateway, 4)

    const outcome = await lifecycle.runDailyEntry()

    expect(outcome.status).toBe('FILLED')
    const trade = await store.getTrade('CAL_20250314_095000')
    expect(trade).toMatchObject({
      status: 'ACTIVE',
      entryDate: '2025-03-14',
      entryTime: '09:50:00',
      shortExpiry: SHORT_EXPIRY,
      longExpiry: LONG_EXPIRY,
      putStrike: 4790,
      callStrike: 5150,
      entryCredit: 4,
      profitTarget: 6,
      profitTargetPrice: 6,
      profitTargetStatus: 'PLACED',
      fillStatus: 'FILLED',
      fillAttempts: 1,
    })
    expect(trade?.legs.shortPut.conId).toBe(gateway.conIdOf(SHORT_EXPIRY, 4790, 'P'))
    expect(trade?.legs.longCall.entryDelta).toBe(0.21)

    const [entryOrder, gtc] = gateway.placedOrders
    expect(entryOrder.spec).toMatchObject({ action: 'BUY', quantity: 4, limitPrice: 3, tif: 'DAY' })
    expect(gtc.spec).toMatchObject({ action: 'BUY', quantity: 4, limitPrice: -6, tif: 'GTC', outsideRth: true })
    expect(trade?.profitTargetOrderId).toBe(gtc.orderId)

    expect(store.logActions()).toEqual(['TRADE_PLACED', 'PROFIT_TARGET_PLACED'])
    expect(notifier.messages).toEqual([
      'SPX Calendar: Attempting trade at 5000.00. Strikes: 4790P/5150C. Starting bid: $3.00. Expiry: 20250404/20250411',
      'SPX Calendar FILLED: 4.00 debit. Target: 6.00. Strikes: 4790P/5150C',
      'SPX Calendar: GTC profit target placed for CAL_20250314_095000 at $6.00',
    ])

    // 時価評価の4購読だけが残る
    expect(pnl.isTracking('CAL_20250314_095000')).toBe(true)
    expect(gateway.activeQuoteCount()).toBe(4)
  })

  it('利確の約定通知が重複しても CLOSED は1回だけ', async () => {
    const { gateway, store, notifier, activity, lifecycle, pnl } = createHarness()
    prepareEntryMarket(gateway)
    fillDayOrders(gateway, 4)
    await lifecycle.runDailyEntry()
    const gtcId = gateway.placedOrders[1].orderId

    const consumer = new BrokerEventConsumer(gateway, lifecycle, activity)
    consumer.start()
    gateway.emitStatus(gtcId, 'Filled', -6)
    gateway.emitStatus(gtcId, 'Filled', -6)
    await consumer.drain()
    consumer.stop()

    const trade = await store.getTrade('CAL_20250314_095000')
    expect(trade).toMatchObject({
      status: 'CLOSED',
      exitReason: 'profit target',
      exitCredit: 6,
      realizedPnl: 2,
      profitTargetStatus: 'FILLED',
      exitDate: '2025-03-14',
    })
    expect(store.logActions().filter((action) => action === 'PROFIT_TARGET_HIT')).toHaveLength(1)
    expect(notifier.messages.filter((message) => message.startsWith('SPX Calendar CLOSED'))).toEqual([
      'SPX Calendar CLOSED: profit target. P&L: 2.00 (50.0%)',
    ])
    expect(pnl.isTracking('CAL_20250314_095000')).toBe(false)
    expect(gateway.activeQuoteCount()).toBe(0)

    expect(await lifecycle.handleProfitTargetFill(gtcId, -6)).toBe(false)
  })

  it('同日に既にトレードがあればスキップ', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ tradeId: 'CAL_20250314_094500', entryDate: '2025-03-14' }))

    const outcome = await lifecycle.runDailyEntry()

    expect(outcome).toEqual({ status: 'SKIPPED', reason: 'Already traded today' })
    expect(store.logActions()).toEqual(['ALREADY_TRADED'])
    expect(gateway.placedOrders).toEqual([])
  })

  it('同時保有数の上限でスキップ', async () => {
    const { store, notifier, lifecycle } = createHarness({ config: { maxConcurrentPositions: 1 } })
    await store.saveTrade(makeTrade())

    const outcome = await lifecycle.runDailyEntry()

    expect(outcome).toEqual({ status: 'SKIPPED', reason: 'Position limit reached (1/1)' })
    expect(store.logActions()).toEqual(['POSITION_LIMIT'])
    expect(notifier.messages).toEqual(['SPX Calendar FAILED: Position limit reached (1/1)'])
  })

  it('エントリー時間外は force なしでは何もしない', async () => {
    const { gateway, lifecycle } = createHarness({ now: ENTRY_NOW.set({ hour: 9, minute: 30 }) })

    const outcome = await lifecycle.runDailyEntry()

    expect(outcome.status).toBe('SKIPPED')
    expect(gateway.placedOrders).toEqual([])
  })

  it('約定しなければ CANCELLED で記録', async () => {
    const { gateway, store, lifecycle } = createHarness()
    prepareEntryMarket(gateway)

    const outcome = await lifecycle.runDailyEntry()

    expect(outcome.status).toBe('FAILED')
    const trade = await store.getTrade('CAL_20250314_095000')
    expect(trade).toMatchObject({ status: 'CANCELLED', fillStatus: 'CANCELLED', fillAttempts: 5, lastAttemptPrice: 3.2 })
    expect(gateway.placedOrders.map((order) => order.spec.limitPrice)).toEqual([3, 3.05, 3.1, 3.15, 3.2])
    expect(store.logActions()).toEqual(['ORDER_FAILED'])
    expect(await store.countTradesForDate('2025-03-14')).toBe(0)
  })
})

describe('PositionLifecycleService: 決済', () => {
  it('手動決済: GTC を取消してから中値で決済', async () => {
    const { gateway, store, notifier, lifecycle } = createHarness()
    const trade = makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' })
    await store.saveTrade(trade)
    quoteLegs(gateway, trade)
    fillDayOrders(gateway)

    const outcome = await lifecycle.closePosition(trade.tradeId, 'manual close')

    expect(outcome.status).toBe('CLOSED')
    expect(gateway.cancelledOrders).toEqual([55])
    expect(gateway.lastOrder()?.spec.limitPrice).toBe(-3)
    const closed = await store.getTrade(trade.tradeId)
    expect(closed).toMatchObject({
      status: 'CLOSED',
      exitReason: 'manual close',
      exitCredit: 3,
      realizedPnl: -1,
      exitDate: '2025-03-14',
      exitTime: '09:50:00',
      exitSpxPrice: 5000,
      profitTargetStatus: 'CANCELLED',
    })
    expect(closed?.legs.shortPut.exitDelta).toBe(-0.2)
    expect(store.logActions()).toEqual(['COMMAND'])
    expect(notifier.messages).toEqual([
      'SPX Calendar: Closing CAL_20250307_094512 (manual close). Strikes: 4750P/5150C. Starting price: $3.00',
      'SPX Calendar CLOSED: manual close at $3.00. P&L: -1.00 (-25.0%)',
    ])
  })

  it('決済済みなら ALREADY_CLOSED', async () => {
    const { store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ status: 'CLOSED' }))

    const outcome = await lifecycle.closePosition('CAL_20250307_094512', 'manual close')

    expect(outcome.status).toBe('ALREADY_CLOSED')
  })

  it('決済が約定しなければ ACTIVE のまま GTC を再発注', async () => {
    const { gateway, store, notifier, lifecycle } = createHarness()
    const trade = makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' })
    await store.saveTrade(trade)
    quoteLegs(gateway, trade)
    gateway.onPlace = ({ orderId, spec }) => {
      if (spec.tif === 'GTC') gateway.emitStatus(orderId, 'Submitted')
    }

    const outcome = await lifecycle.closePosition(trade.tradeId, 'manual close')

    expect(outcome.status).toBe('FAILED')
    const exitPrices = gateway.placedOrders.filter((order) => order.spec.tif === 'DAY').map((order) => order.spec.limitPrice)
    expect(exitPrices).toEqual([-3, -2.95, -2.9, -2.85, -2.8, -2.75, -2.7, -2.65])
    const current = await store.getTrade(trade.tradeId)
    expect(current?.status).toBe('ACTIVE')
    expect(current?.profitTargetStatus).toBe('PLACED')
    expect(current?.profitTargetOrderId).toBe(gateway.lastOrder()?.orderId)
    expect(store.logActions()).toEqual(['EXIT_FAILED', 'PROFIT_TARGET_PLACED'])
    expect(notifier.messages).toEqual([
      'SPX Calendar: Closing CAL_20250307_094512 (manual close). Strikes: 4750P/5150C. Starting price: $3.00',
      'SPX Calendar EXIT FAILED: CAL_20250307_094512 Not filled after 8 attempts. Position still open.',
      'SPX Calendar: GTC profit target placed for CAL_20250307_094512 at $6.00',
    ])
  })

  it('受付未確認の GTC が取消できなければ決済も再発注もしない', async () => {
    const { gateway, store, notifier, lifecycle } = createHarness()
    const trade = makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'NONE' })
    await store.saveTrade(trade)
    quoteLegs(gateway, trade)
    fillDayOrders(gateway)
    gateway.onCancel = () => undefined

    const outcome = await lifecycle.closePosition(trade.tradeId, 'manual close')

    expect(outcome).toMatchObject({ status: 'FAILED', reason: 'profit target cancel not confirmed' })
    expect(gateway.cancelledOrders).toEqual([55])
    expect(gateway.placedOrders).toEqual([])
    expect(await store.getTrade(trade.tradeId)).toMatchObject({
      status: 'ACTIVE',
      profitTargetOrderId: 55,
      profitTargetStatus: 'NONE',
    })
    expect(store.logActions()).toEqual(['EXIT_FAILED'])
    expect(notifier.messages).toEqual([
      'SPX Calendar EXIT FAILED: CAL_20250307_094512 profit target cancel not confirmed. Position still open.',
    ])
  })

  it('時間決済: exit_day 経過したトレードだけ決済', async () => {
    const { gateway, store, lifecycle } = createHarness()
    const old = makeTrade({ tradeId: 'CAL_20250228_094500', entryDate: '2025-02-28' })
    await store.saveTrade(old)
    await store.saveTrade(makeTrade())
    quoteLegs(gateway, old)
    fillDayOrders(gateway)

    const summary = await lifecycle.runTimeExitCheck()

    expect(summary).toEqual({ checked: 2, due: 1, closed: ['CAL_20250228_094500'], failed: [] })
    expect((await store.getTrade('CAL_20250228_094500'))?.exitReason).toBe('time exit')
    expect((await store.getTrade('CAL_20250307_094512'))?.status).toBe('ACTIVE')
    expect(store.logActions()).toEqual(['TIME_EXIT', 'TIME_EXIT_CHECK'])
  })
})

describe('PositionLifecycleService: 利確 GTC と手動操作', () => {
  it('受付未確認の GTC は次回発注前に取消', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade())

    const first = await lifecycle.armProfitTarget('CAL_20250307_094512')
    const staleId = gateway.placedOrders[0].orderId
    expect(first.profitTargetStatus).toBe('NONE')
    expect(first.profitTargetOrderId).toBe(staleId)
    expect(store.orderHistory.map((entry) => entry.status)).toEqual(['UNCONFIRMED'])

    fillDayOrders(gateway)
    const second = await lifecycle.armProfitTarget('CAL_20250307_094512')

    expect(gateway.cancelledOrders).toEqual([staleId])
    expect(second.profitTargetStatus).toBe('PLACED')
    expect(second.profitTargetOrderId).toBe(gateway.placedOrders[1].orderId)
  })

  it('前回の GTC の取消が確認できなければ新しい GTC を出さない', async () => {
    const { gateway, store, notifier, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'NONE' }))
    fillDayOrders(gateway)
    gateway.onCancel = () => undefined

    const result = await lifecycle.armProfitTarget('CAL_20250307_094512')

    expect(gateway.cancelledOrders).toEqual([55])
    expect(gateway.placedOrders).toEqual([])
    expect(result).toMatchObject({ status: 'ACTIVE', profitTargetOrderId: 55, profitTargetStatus: 'NONE' })
    expect(store.logActions()).toEqual(['PROFIT_TARGET_FAILED'])
    expect(notifier.messages).toEqual([
      'SPX Calendar: Profit target order failed for CAL_20250307_094512 (stale profit target cancel not confirmed). Check logs for details.',
    ])
  })

  it('取消中に前回の GTC が約定していれば利確で CLOSED', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'NONE' }))
    gateway.onCancel = (orderId) => gateway.emitStatus(orderId, 'Filled', -6)

    const result = await lifecycle.armProfitTarget('CAL_20250307_094512')

    expect(gateway.placedOrders).toEqual([])
    expect(result).toMatchObject({
      status: 'CLOSED',
      exitReason: 'profit target',
      exitCredit: 6,
      realizedPnl: 2,
      profitTargetStatus: 'FILLED',
    })
  })

  it('GTC 未発注の ACTIVE トレードに発注する', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade())
    await store.saveTrade(makeTrade({ tradeId: 'CAL_20250310_094500', entryDate: '2025-03-10' }))
    await store.saveTrade(makeTrade({ tradeId: 'CAL_20250311_094500', entryDate: '2025-03-11', profitTargetStatus: 'PLACED', profitTargetOrderId: 77 }))
    // 新しいトレードから順に処理される
    gateway.onPlace = ({ orderId }) => {
      gateway.emitStatus(orderId, gateway.placedOrders.length === 1 ? 'Submitted' : 'Inactive')
    }

    const summary = await lifecycle.placeMissingProfitTargets()

    expect(summary).toEqual({ placed: 1, totalMissing: 2, failedTrades: ['CAL_20250307_094512'] })
    expect((await store.getTrade('CAL_20250310_094500'))?.profitTargetStatus).toBe('PLACED')
    expect((await store.getTrade('CAL_20250307_094512'))?.profitTargetStatus).toBe('REJECTED')
  })

  it('ブローカー側で GTC が取消されたら CANCELLED', async () => {
    const { store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' }))

    expect(await lifecycle.handleProfitTargetTerminated(55, 'Cancelled')).toBe(true)
    expect((await store.getTrade('CAL_20250307_094512'))?.profitTargetStatus).toBe('CANCELLED')
    expect(await lifecycle.handleProfitTargetTerminated(55, 'Cancelled')).toBe(false)
  })

  it('管理停止: GTC を取消して MANUAL_CONTROL、以後の決済は不可', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' }))

    const manual = await lifecycle.stopManaging('CAL_20250307_094512')

    expect(manual.status).toBe('MANUAL_CONTROL')
    expect(manual.profitTargetStatus).toBe('CANCELLED')
    expect(gateway.cancelledOrders).toEqual([55])

    const again = await lifecycle.stopManaging('CAL_20250307_094512')
    expect(again.status).toBe('MANUAL_CONTROL')
    expect(gateway.cancelledOrders).toEqual([55])

    await expect(lifecycle.closePosition('CAL_20250307_094512', 'manual close')).rejects.toBeInstanceOf(
      InvalidTransitionError
    )
  })

  it('管理停止: GTC の取消が確認できなければ ACTIVE のまま失敗し、後の約定を反映する', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' }))
    gateway.onCancel = () => undefined

    await expect(lifecycle.stopManaging('CAL_20250307_094512')).rejects.toBeInstanceOf(ProfitTargetCancelError)

    expect(await store.getTrade('CAL_20250307_094512')).toMatchObject({ status: 'ACTIVE', profitTargetStatus: 'PLACED' })
    expect(await lifecycle.handleProfitTargetFill(55, -6)).toBe(true)
    expect(await store.getTrade('CAL_20250307_094512')).toMatchObject({
      status: 'CLOSED',
      exitReason: 'profit target',
      exitCredit: 6,
    })
  })

  it('外部決済: GTC の取消が確認できなければ記録しない', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' }))
    gateway.onCancel = () => undefined

    await expect(lifecycle.recordExternalClose('CAL_20250307_094512', 5.2)).rejects.toThrow(
      'profit target cancel not confirmed (CAL_20250307_094512 GTC #55)'
    )
    expect(await store.getTrade('CAL_20250307_094512')).toMatchObject({
      status: 'ACTIVE',
      exitCredit: null,
      profitTargetStatus: 'PLACED',
    })
  })

  it('外部決済の記録', async () => {
    const { store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' }))

    const closed = await lifecycle.recordExternalClose('CAL_20250307_094512', 5.2, '2025-03-13', '15:30:00')

    expect(closed).toMatchObject({
      status: 'CLOSED',
      exitReason: 'reconciliation close',
      exitCredit: 5.2,
      realizedPnl: 1.2,
      exitDate: '2025-03-13',
      exitTime: '15:30:00',
      profitTargetStatus: 'CANCELLED',
    })
  })

  it('既存ポジションの取り込み', async () => {
    const { gateway, store, lifecycle, pnl } = createHarness()
    fillDayOrders(gateway)
    const input = {
      entryDate: '2025-03-12',
      shortExpiry: '20250402',
      longExpiry: '20250409',
      putStrike: 4800,
      callStrike: 5200,
      entryCredit: 3.85,
    }

    const trade = await lifecycle.importTrade(input)

    expect(trade).toMatchObject({
      tradeId: 'CAL_20250312_IMPORT',
      spxPrice: null,
      status: 'ACTIVE',
      longPutStrike: 4800,
      longCallStrike: 5200,
      entryCredit: 3.85,
      profitTarget: 5.7,
      profitTargetStatus: 'PLACED',
    })
    expect(gateway.lastOrder()?.spec.limitPrice).toBe(-5.7)
    expect(pnl.isTracking('CAL_20250312_IMPORT')).toBe(true)
    expect(store.logActions()).toEqual(['IMPORT', 'PROFIT_TARGET_PLACED'])

    const second = await lifecycle.importTrade(input)
    expect(second.tradeId).toBe('CAL_20250312_IMPORT_2')
    expect(second.profitTargetStatus).toBe('PLACED')
    expect((await lifecycle.importTrade(input)).tradeId).toBe('CAL_20250312_IMPORT_3')
  })

  it('同じ日付の取り込みを同時に実行しても ID は重複しない', async () => {
    const { gateway, lifecycle } = createHarness()
    fillDayOrders(gateway)
    const input = {
      entryDate: '2025-03-12',
      shortExpiry: '20250402',
      longExpiry: '20250409',
      putStrike: 4800,
      callStrike: 5200,
      entryCredit: 3.85,
      spxPrice: 5012.25,
    }

    const trades = await Promise.all([lifecycle.importTrade(input), lifecycle.importTrade(input)])

    expect(trades.map((trade) => trade.tradeId).sort()).toEqual(['CAL_20250312_IMPORT', 'CAL_20250312_IMPORT_2'])
    expect(trades[0].spxPrice).toBe(5012.25)
  })

  it('ID を指定した取り込みは既存トレードと重複できない', async () => {
    const { store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade())

    await expect(
      lifecycle.importTrade({
        tradeId: 'CAL_20250307_094512',
        entryDate: '2025-03-07',
        shortExpiry: '20250328',
        longExpiry: '20250404',
        putStrike: 4750,
        callStrike: 5150,
        entryCredit: 4,
      })
    ).rejects.toBeInstanceOf(InvalidTransitionError)
  })

  it('再接続後の同期: 停止中の約定・取消・受付を反映', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' }))
    await store.saveTrade(
      makeTrade({
        tradeId: 'CAL_20250310_094500',
        entryDate: '2025-03-10',
        profitTargetOrderId: 56,
        profitTargetPrice: 6,
        profitTargetStatus: 'PLACED',
      })
    )
    await store.saveTrade(
      makeTrade({
        tradeId: 'CAL_20250311_094500',
        entryDate: '2025-03-11',
        profitTargetOrderId: 57,
        profitTargetPrice: 6,
        profitTargetStatus: 'NONE',
      })
    )
    gateway.setBrokerStatus(55, 'Filled', -6)
    gateway.setBrokerStatus(56, 'Cancelled')
    gateway.setBrokerStatus(57, 'Submitted')

    const summary = await lifecycle.syncProfitTargets()

    expect(summary).toEqual({
      checked: 3,
      filled: ['CAL_20250307_094512'],
      terminated: ['CAL_20250310_094500'],
      confirmed: ['CAL_20250311_094500'],
    })
    expect(await store.getTrade('CAL_20250307_094512')).toMatchObject({
      status: 'CLOSED',
      exitReason: 'profit target',
      exitCredit: 6,
      realizedPnl: 2,
    })
    expect((await store.getTrade('CAL_20250310_094500'))?.profitTargetStatus).toBe('CANCELLED')
    expect((await store.getTrade('CAL_20250311_094500'))?.profitTargetStatus).toBe('PLACED')
    expect(gateway.orderSyncs).toBe(1)
  })

  it('同期対象の GTC がなければブローカーに問い合わせない', async () => {
    const { gateway, store, lifecycle } = createHarness()
    await store.saveTrade(makeTrade())

    expect(await lifecycle.syncProfitTargets()).toEqual({ checked: 0, filled: [], terminated: [], confirmed: [] })
    expect(gateway.orderSyncs).toBe(0)
  })
})
