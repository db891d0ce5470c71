import { describe, expect, it } from 'vitest'
import { aggregateBrokerPositions, findDiscrepancies } from '../services/calendar/ReconciliationService'
import { PositionRecord } from '../services/ib-service/types'
import { OptionRight } from '../../shared/types'
import { createHarness, makeTrade } from './support/fixtures'

function option(expiry: string, strike: number, right: OptionRight, quantity: number): PositionRecord {
  return {
    account: 'DU0000000',
    symbol: 'SPX',
    secType: 'OPT',
    conId: null,
    expiry,
    strike,
    right,
    quantity,
    avgCost: 100,
  }
}

// makeTrade() の4レッグ (サイズ4)
function tradePositions(): PositionRecord[] {
  return [
    option('20250328', 4750, 'P', -4),
    option('20250328', 5150, 'C', -4),
    option('20250404', 4750, 'P', 4),
    option('20250404', 5150, 'C', 4),
  ]
}

describe('aggregateBrokerPositions', () => {
  it('SPX オプションのみをキーごとに合算', () => {
    const actual = aggregateBrokerPositions([
      option('20250404', 4800, 'P', 2),
      option('20250404', 4800, 'P', 2),
      option('20250404', 4900, 'P', 0),
      { ...option('20250404', 4800, 'P', 5), symbol: 'ES', secType: 'FOP' },
    ])
    expect(Array.from(actual.entries())).toEqual([['20250404-4800-P', 4]])
  })
})

describe('findDiscrepancies', () => {
  it('4レッグが揃っていれば不一致なし', () => {
    const actual = aggregateBrokerPositions(tradePositions())
    expect(findDiscrepancies([makeTrade()], [], actual, 4)).toEqual([])
  })

  it('1レッグ欠落で MISSING_LEG が1件だけ', () => {
    const actual = aggregateBrokerPositions(tradePositions().slice(1))

    const discrepancies = findDiscrepancies([makeTrade()], [], actual, 4)

    expect(discrepancies).toHaveLength(1)
    expect(discrepancies[0]).toMatchObject({
      kind: 'MISSING_LEG',
      key: '20250328-4750-P',
      tradeIds: ['CAL_20250307_094512'],
      leg: 'shortPut',
      expected: -4,
      actual: 0,
    })
  })

  it('数量違いと管理外ポジション', () => {
    const positions = tradePositions()
    positions[3] = option('20250404', 5150, 'C', 3)
    positions.push(option('20250411', 5300, 'C', -1))

    const discrepancies = findDiscrepancies([makeTrade()], [], aggregateBrokerPositions(positions), 4)

    expect(discrepancies.map((item) => [item.kind, item.key, item.expected, item.actual])).toEqual([
      ['QUANTITY_MISMATCH', '20250404-5150-C', 4, 3],
      ['ORPHANED_POSITION', '20250411-5300-C', 0, -1],
    ])
  })

  it('同じキーを複数トレードが使う場合は合計で照合 (相殺して 0 なら一致)', () => {
    const first = makeTrade()
    // 前週のロングと今週のショートが同じ契約 (相殺して 0 → ブローカーには残らない)
    const second = makeTrade({
      tradeId: 'CAL_20250314_094500',
      shortExpiry: '20250404',
      longExpiry: '20250411',
      putStrike: 4750,
      longPutStrike: 4750,
      callStrike: 5200,
      longCallStrike: 5200,
    })
    const actual = aggregateBrokerPositions([
      option('20250328', 4750, 'P', -4),
      option('20250328', 5150, 'C', -4),
      option('20250404', 5150, 'C', 4),
      option('20250404', 5200, 'C', -4),
      option('20250411', 4750, 'P', 4),
      option('20250411', 5200, 'C', 4),
    ])

    expect(findDiscrepancies([first, second], [], actual, 4)).toEqual([])

    actual.set('20250404-4750-P', 4)
    expect(findDiscrepancies([first, second], [], actual, 4).map((item) => [item.kind, item.key, item.tradeIds])).toEqual([
      ['QUANTITY_MISMATCH', '20250404-4750-P', ['CAL_20250307_094512', 'CAL_20250314_094500']],
    ])
  })

  it('手動管理トレードのレッグは既知として扱う', () => {
    const manual = makeTrade({ tradeId: 'CAL_MANUAL', status: 'MANUAL_CONTROL' })
    const actual = aggregateBrokerPositions([option('20250328', 4750, 'P', -2)])

    expect(findDiscrepancies([], [manual], actual, 4)).toEqual([])
  })
})

describe('ReconciliationService.reconcile', () => {
  it('照合結果を daily_log に残す', async () => {
    const { gateway, store, reconciliation, notifier } = createHarness()
    await store.saveTrade(makeTrade())
    gateway.positions = tradePositions()

    const report = await reconciliation.reconcile()

    expect(report).toMatchObject({ checkedTrades: 1, brokerPositions: 4, discrepancies: [], clean: true })
    expect(store.dailyLogs.map((entry) => [entry.action, entry.success])).toEqual([['RECONCILIATION', true]])
    expect(notifier.messages).toEqual([])
  })

  it('不一致が閾値を超えたら通知', async () => {
    const { gateway, store, reconciliation, notifier } = createHarness({ config: { reconciliationAlertThreshold: 1 } })
    await store.saveTrade(makeTrade())
    gateway.positions = [option('20250411', 5300, 'C', -1)]

    const report = await reconciliation.reconcile()

    expect(report.discrepancies).toHaveLength(5)
    expect(notifier.messages).toEqual(['SPX Reconciliation: 5 issues (missing 4, mismatch 0, orphaned 1)'])
  })

  it('ポジション取得に失敗したら記録して再送出', async () => {
    const { gateway, store, reconciliation } = createHarness()
    gateway.positionError = new Error('positions タイムアウト')

    await expect(reconciliation.reconcile()).rejects.toThrow('positions タイムアウト')
    expect(store.dailyLogs[0]).toMatchObject({ action: 'RECONCILIATION', success: false })
  })
})
