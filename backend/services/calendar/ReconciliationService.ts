// backend/services/calendar/ReconciliationService.ts
import { CalendarSpread, Discrepancy, LEG_NAMES, LegName, ReconciliationReport } from '../../../shared/types'
import { CalendarConfig } from '../../config'
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { PositionRecord } from '../ib-service/types'
import { PositionStore } from '../store/PositionStore'
import { NotificationSink, notificationMessages } from '../NotificationService'
import { ActivityLogger } from './ActivityLogger'
import { SPX_SYMBOL, isShortLeg, legContracts } from './legs'
import { errorMessage, positionKey } from '../../utils/util'

const QUANTITY_TOLERANCE = 0.1

interface ExpectedKey {
  quantity: number
  legs: { tradeId: string; leg: LegName; quantity: number }[]
}

/** トレードの各レッグの照合キーと想定数量 (ショート負 / ロング正) */
export function expectedLegPositions(
  trade: CalendarSpread,
  positionSize: number
): { key: string; leg: LegName; quantity: number }[] {
  const contracts = legContracts(trade)
  return LEG_NAMES.map((leg) => ({
    key: positionKey(contracts[leg].expiry, contracts[leg].strike, contracts[leg].right),
    leg,
    quantity: isShortLeg(leg) ? -positionSize : positionSize,
  }))
}

/** SPX オプションのみをキーごとに合算 */
export function aggregateBrokerPositions(positions: PositionRecord[]): Map<string, number> {
  const actual = new Map<string, number>()
  for (const position of positions) {
    if (position.symbol !== SPX_SYMBOL || position.secType !== 'OPT') continue
    if (position.expiry === null || position.strike === null || position.right === null) continue
    if (position.quantity === 0) continue
    const key = positionKey(position.expiry, position.strike, position.right)
    actual.set(key, (actual.get(key) ?? 0) + position.quantity)
  }
  return actual
}

/**
 * ACTIVE トレードとブローカーのポジションの突き合わせ
 */
export function findDiscrepancies(
  active: CalendarSpread[],
  manual: CalendarSpread[],
  actual: Map<string, number>,
  positionSize: number
): Discrepancy[] {
  const expected = new Map<string, ExpectedKey>()
  for (const trade of active) {
    for (const leg of expectedLegPositions(trade, positionSize)) {
      const entry = expected.get(leg.key) ?? { quantity: 0, legs: [] }
      entry.quantity += leg.quantity
      entry.legs.push({ tradeId: trade.tradeId, leg: leg.leg, quantity: leg.quantity })
      expected.set(leg.key, entry)
    }
  }

  // 手動管理トレードのレッグは既知として扱う (数量照合はしない)
  const manualKeys = new Set<string>()
  for (const trade of manual) {
    expectedLegPositions(trade, positionSize).forEach((leg) => manualKeys.add(leg.key))
  }

  const discrepancies: Discrepancy[] = []

  expected.forEach((entry, key) => {
    const held = actual.get(key)
    // 前週ロングと今週ショートが相殺している契約はブローカーに残らない
    if (held === undefined && Math.abs(entry.quantity) <= QUANTITY_TOLERANCE) return
    if (held === undefined) {
      for (const leg of entry.legs) {
        discrepancies.push({
          kind: 'MISSING_LEG',
          key,
          tradeIds: [leg.tradeId],
          leg: leg.leg,
          expected: leg.quantity,
          actual: 0,
          message: `${leg.tradeId} ${leg.leg} (${key}) がブローカーにありません`,
        })
      }
      return
    }
    if (manualKeys.has(key)) return
    if (Math.abs(held - entry.quantity) > QUANTITY_TOLERANCE) {
      const tradeIds = Array.from(new Set(entry.legs.map((leg) => leg.tradeId)))
      discrepancies.push({
        kind: 'QUANTITY_MISMATCH',
        key,
        tradeIds,
        leg: entry.legs.length === 1 ? entry.legs[0].leg : null,
        expected: entry.quantity,
        actual: held,
        message: `${key}: 想定 ${entry.quantity}, 実際 ${held}`,
      })
    }
  })

  actual.forEach((held, key) => {
    if (expected.has(key) || manualKeys.has(key)) return
    discrepancies.push({
      kind: 'ORPHANED_POSITION',
      key,
      tradeIds: [],
      leg: null,
      expected: 0,
      actual: held,
      message: `${key}: 管理外のポジション ${held}`,
    })
  })

  return discrepancies
}

export class ReconciliationService {
  constructor(
    private gateway: BrokerGateway,
    private store: PositionStore,
    private notifier: NotificationSink,
    private activity: ActivityLogger,
    private config: () => CalendarConfig
  ) {}

  public async reconcile(): Promise<ReconciliationReport> {
    const config = this.config()
    console.log('🔍 ポジション照合開始')

    let positions: PositionRecord[]
    try {
      positions = await this.gateway.snapshotPositions(config.timeouts.positionSnapshotMs)
    } catch (error) {
      await this.activity.log('RECONCILIATION', `ポジション取得失敗: ${errorMessage(error)}`, false)
      throw error
    }

    const [active, manual] = await Promise.all([
      this.store.listTrades({ status: 'ACTIVE' }),
      this.store.listTrades({ status: 'MANUAL_CONTROL' }),
    ])
    const actual = aggregateBrokerPositions(positions)
    const discrepancies = findDiscrepancies(active, manual, actual, config.positionSize)

    const report: ReconciliationReport = {
      checkedTrades: active.length,
      brokerPositions: actual.size,
      discrepancies,
      clean: discrepancies.length === 0,
      timestamp: new Date(),
    }

    if (report.clean) {
      await this.activity.log('RECONCILIATION', `照合OK: トレード ${active.length}件, ポジション ${actual.size}件`, true)
    } else {
      discrepancies.forEach((item) => console.warn(`  [${item.kind}] ${item.message}`))
      await this.activity.log(
        'RECONCILIATION',
        `不一致 ${discrepancies.length}件: ${discrepancies.map((item) => `${item.kind} ${item.key}`).join(', ')}`,
        false
      )
    }

    if (discrepancies.length > config.reconciliationAlertThreshold) {
      await this.notifier.send(notificationMessages.reconciliation(discrepancies))
    }
    return report
  }
}
