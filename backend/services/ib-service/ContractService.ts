// services/ib-service/ContractService.ts
import { EventName, SecType, Contract, OptionType } from '@stoqey/ib'
import { IbService } from './IbService'
import { ChainQuery, ContractDetail, OptionContractSpec } from './types'
import { BrokerTimeoutError } from '../../utils/errors'
import { OptionRight } from '../../../shared/types'

interface DetailsRequest {
  details: ContractDetail[]
  resolve: (details: ContractDetail[]) => void
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

export function toOptionContract(spec: ChainQuery): Contract {
  const contract: Contract = {
    symbol: spec.symbol,
    secType: SecType.OPT,
    exchange: 'SMART',
    currency: 'USD',
    lastTradeDateOrContractMonth: spec.expiry,
    right: spec.right === 'P' ? OptionType.Put : OptionType.Call,
    multiplier: 100,
    tradingClass: spec.tradingClass,
  }
  if (spec.strike !== undefined) {
    contract.strike = spec.strike
  }
  return contract
}

export class ContractService {
  private requests = new Map<number, DetailsRequest>()

  constructor(private ibService: IbService) {
    this.setupEventListeners()
  }

  private setupEventListeners(): void {
    const ibApi = this.ibService.getIbApi()
    ibApi.on(EventName.contractDetails, (...args: unknown[]) => this.onContractDetails(args[0], args[1]))
    ibApi.on(EventName.contractDetailsEnd, (reqId: number) => this.onContractDetailsEnd(reqId))
  }

  private onContractDetails(rawReqId: unknown, contractDetails: unknown): void {
    if (typeof rawReqId !== 'number') return
    const request = this.requests.get(rawReqId)
    if (!request || !isRecord(contractDetails) || !isRecord(contractDetails.contract)) return

    const contract = contractDetails.contract
    const right: OptionRight | null = contract.right === 'P' || contract.right === 'PUT' ? 'P' : contract.right === 'C' || contract.right === 'CALL' ? 'C' : null
    if (typeof contract.conId !== 'number' || typeof contract.strike !== 'number' || !right) return

    const detail: ContractDetail = {
      conId: contract.conId,
      symbol: String(contract.symbol ?? ''),
      tradingClass: String(contract.tradingClass ?? ''),
      expiry: String(contract.lastTradeDateOrContractMonth ?? '').split(' ')[0],
      strike: contract.strike,
      right,
      localSymbol: typeof contract.localSymbol === 'string' ? contract.localSymbol : undefined,
    }
    request.details.push(detail)
    this.ibService.events.publish({ type: 'ContractResolved', reqId: rawReqId, detail })
  }

  private onContractDetailsEnd(reqId: number): void {
    const request = this.requests.get(reqId)
    if (!request) return
    this.requests.delete(reqId)
    this.ibService.removePendingRequest(reqId)
    request.resolve(request.details)
  }

  /**
   * 契約詳細を照会 (終了イベントまで収集)
   * タイムアウトはデータ取得不可として reject する
   */
  public async requestContractDetails(spec: ChainQuery, timeoutMs: number): Promise<ContractDetail[]> {
    await this.ibService.ensureConnected()

    return new Promise<ContractDetail[]>((resolve, reject) => {
      const reqId = this.ibService.getNextRequestId()
      const label = `${spec.tradingClass} ${spec.expiry} ${spec.strike ?? '*'}${spec.right}`

      const timeoutId = setTimeout(() => {
        if (!this.requests.has(reqId)) return
        this.requests.delete(reqId)
        this.ibService.removePendingRequest(reqId)
        console.warn(`契約詳細取得タイムアウト: ${label}`)
        reject(new BrokerTimeoutError(`契約詳細取得 ${label}`, timeoutMs))
      }, timeoutMs)

      this.requests.set(reqId, {
        details: [],
        resolve: (details) => {
          clearTimeout(timeoutId)
          resolve(details)
        },
      })
      this.ibService.addPendingRequest(reqId, `contractDetails ${label}`, (error) => {
        clearTimeout(timeoutId)
        this.requests.delete(reqId)
        reject(error)
      })

      this.ibService.getIbApi().reqContractDetails(reqId, toOptionContract(spec))
    })
  }

  /** 1レッグの conId を解決。見つからなければ null */
  public async resolveConId(spec: OptionContractSpec, timeoutMs: number): Promise<number | null> {
    const details = await this.requestContractDetails(spec, timeoutMs)
    const match = details.find((detail) => detail.strike === spec.strike && detail.right === spec.right)
    return match ? match.conId : null
  }

  /** 満期の上場ストライク一覧 (昇順) */
  public async getStrikes(query: ChainQuery, timeoutMs: number): Promise<number[]> {
    const details = await this.requestContractDetails({ ...query, strike: undefined }, timeoutMs)
    const strikes = new Set(details.filter((detail) => detail.right === query.right).map((detail) => detail.strike))
    return Array.from(strikes).sort((a, b) => a - b)
  }
}
