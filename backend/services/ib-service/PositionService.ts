// services/ib-service/PositionService.ts
import { EventName } from '@stoqey/ib'
import { IbService } from './IbService'
import { PositionRecord } from './types'
import { BrokerConnectionError, BrokerTimeoutError } from '../../utils/errors'
import { extractOptionInfo } from '../../utils/util'
import { OptionRight } from '../../../shared/types'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function toRight(raw: unknown): OptionRight | null {
  if (raw === 'P' || raw === 'PUT') return 'P'
  if (raw === 'C' || raw === 'CALL') return 'C'
  return null
}

export function toPositionRecord(account: unknown, contract: unknown, position: unknown, avgCost: unknown): PositionRecord | null {
  if (!isRecord(contract) || typeof position !== 'number') return null

  const localSymbol = typeof contract.localSymbol === 'string' ? contract.localSymbol : undefined
  // strike / 満期が欠けている場合は localSymbol から補完
  const fallback = extractOptionInfo(localSymbol)
  const expiry =
    typeof contract.lastTradeDateOrContractMonth === 'string' && contract.lastTradeDateOrContractMonth
      ? contract.lastTradeDateOrContractMonth.split(' ')[0]
      : fallback.expiry

  return {
    account: String(account ?? ''),
    symbol: String(contract.symbol ?? ''),
    secType: String(contract.secType ?? ''),
    conId: typeof contract.conId === 'number' ? contract.conId : null,
    expiry,
    strike: typeof contract.strike === 'number' && contract.strike > 0 ? contract.strike : fallback.strike,
    right: toRight(contract.right) ?? fallback.right,
    quantity: position,
    avgCost: typeof avgCost === 'number' ? avgCost : 0,
    localSymbol,
  }
}

export class PositionService {
  private snapshotInFlight: Promise<PositionRecord[]> | null = null

  constructor(private ibService: IbService) {}

  /**
   * ポジション一覧を1回だけ取得する (positionEnd まで収集)
   * 同時に呼ばれた場合は同じリクエストを共有する
   */
  async snapshotPositions(timeoutMs: number): Promise<PositionRecord[]> {
    if (!this.snapshotInFlight) {
      this.snapshotInFlight = this.requestSnapshot(timeoutMs).finally(() => {
        this.snapshotInFlight = null
      })
    }
    return this.snapshotInFlight
  }

  private async requestSnapshot(timeoutMs: number): Promise<PositionRecord[]> {
    await this.ibService.ensureConnected()
    const ibApi = this.ibService.getIbApi()

    return new Promise<PositionRecord[]>((resolve, reject) => {
      const positions: PositionRecord[] = []
      let finished = false

      const onPosition = (...args: unknown[]) => {
        const record = toPositionRecord(args[0], args[1], args[2], args[3])
        if (!record || record.quantity === 0) return
        positions.push(record)
        this.ibService.events.publish({ type: 'PositionReported', position: record })
      }

      const cleanup = () => {
        finished = true
        clearTimeout(timeoutId)
        ibApi.off(EventName.position, onPosition)
        ibApi.off(EventName.positionEnd, onPositionEnd)
        unsubscribe()
        ibApi.cancelPositions()
      }

      const onPositionEnd = () => {
        if (finished) return
        cleanup()
        console.log(`ポジション取得完了: ${positions.length}件`)
        resolve(positions)
      }

      const unsubscribe = this.ibService.events.subscribe('ConnectionLost', (event) => {
        if (finished) return
        cleanup()
        reject(new BrokerConnectionError(`ポジション取得中に切断 (Code: ${event.code})`))
      })

      const timeoutId = setTimeout(() => {
        if (finished) return
        cleanup()
        console.warn('ポジション取得タイムアウト')
        reject(new BrokerTimeoutError('ポジション取得', timeoutMs))
      }, timeoutMs)

      ibApi.on(EventName.position, onPosition)
      ibApi.on(EventName.positionEnd, onPositionEnd)

      console.log('ポジション情報をリクエスト中...')
      ibApi.reqPositions()
    })
  }
}
