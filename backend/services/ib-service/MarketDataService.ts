// services/ib-service/MarketDataService.ts
import { EventName, SecType, Contract } from '@stoqey/ib'
import { IbService } from './IbService'
import { toOptionContract } from './ContractService'
import { OptionContractSpec, QuoteHandle, QuoteSnapshot, emptyQuote } from './types'
import { BrokerTimeoutError } from '../../utils/errors'

// 106 = オプションのインプライド・ボラティリティ/グリークス
const GREEKS_TICK_LIST = '106'

const SPX_INDEX: Contract = {
  symbol: 'SPX',
  secType: SecType.IND,
  exchange: 'CBOE',
  currency: 'USD',
}

function finiteOrNull(value: unknown, min: number, max: number): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max ? value : null
}

export class MarketDataService {
  // reqId → 最新気配 (フィールドごとに後勝ち)
  private quotes = new Map<number, QuoteSnapshot>()

  constructor(private ibService: IbService) {
    this.setupEventListeners()
  }

  private setupEventListeners(): void {
    const ibApi = this.ibService.getIbApi()
    ibApi.on(EventName.tickPrice, (...args: unknown[]) => this.onTickPrice(args[0], args[1], args[2]))
    ibApi.on(EventName.tickOptionComputation, (...args: unknown[]) => this.onTickOptionComputation(args))
  }

  private onTickPrice(rawReqId: unknown, tickType: unknown, price: unknown): void {
    if (typeof rawReqId !== 'number') return
    const quote = this.quotes.get(rawReqId)
    if (!quote || typeof price !== 'number' || !Number.isFinite(price)) return

    // TickType: 1=bid, 2=ask, 4=last, 9=close (66/67/68/75 は遅延データ)
    const value = price > 0 ? price : null
    switch (tickType) {
      case 1:
      case 66:
        quote.bid = value
        break
      case 2:
      case 67:
        quote.ask = value
        break
      case 4:
      case 68:
        quote.last = value
        break
      case 9:
      case 75:
        quote.close = value
        break
      default:
        return
    }

    this.publish(rawReqId, quote)
  }

  /**
   * tickOptionComputation はライブラリのバージョンにより tickAttrib の有無が異なるため
   * 引数の個数で位置を判定する
   */
  private onTickOptionComputation(args: unknown[]): void {
    const [rawReqId, tickType] = args
    if (typeof rawReqId !== 'number') return
    const quote = this.quotes.get(rawReqId)
    if (!quote) return

    // TickType: 10=bid, 11=ask, 12=last, 13=model
    if (tickType !== 10 && tickType !== 11 && tickType !== 12 && tickType !== 13) return

    const offset = args.length >= 11 ? 3 : 2
    const impliedVol = finiteOrNull(args[offset], 0, 10)
    const delta = finiteOrNull(args[offset + 1], -1, 1)
    const gamma = finiteOrNull(args[offset + 4], -2, 2)
    const vega = finiteOrNull(args[offset + 5], -100, 100)
    const theta = finiteOrNull(args[offset + 6], -100, 100)
    const undPrice = finiteOrNull(args[offset + 7], 0, 1_000_000)

    if (impliedVol !== null) quote.impliedVolatility = impliedVol
    if (delta !== null) quote.delta = delta
    if (gamma !== null) quote.gamma = gamma
    if (vega !== null) quote.vega = vega
    if (theta !== null) quote.theta = theta
    if (undPrice !== null) quote.underlyingPrice = undPrice

    this.publish(rawReqId, quote)
  }

  private publish(reqId: number, quote: QuoteSnapshot): void {
    quote.updatedAt = new Date()
    this.ibService.events.publish({ type: 'QuoteUpdated', reqId, quote: { ...quote } })
  }

  /** オプションの気配を購読 (グリークス付き) */
  public async subscribe(contract: OptionContractSpec, withGreeks: boolean): Promise<QuoteHandle> {
    await this.ibService.ensureConnected()

    const reqId = this.ibService.getNextRequestId()
    this.quotes.set(reqId, emptyQuote())
    this.ibService.addPendingRequest(reqId, `mktData ${contract.expiry} ${contract.strike}${contract.right}`, (error) => {
      console.warn(`気配購読エラー (ReqID: ${reqId}):`, error.message)
      this.quotes.delete(reqId)
    })
    this.ibService.getIbApi().reqMktData(reqId, toOptionContract(contract), withGreeks ? GREEKS_TICK_LIST : '', false, false)
    return { reqId, contract }
  }

  public cancel(reqId: number): void {
    if (!this.quotes.has(reqId)) return
    this.quotes.delete(reqId)
    this.ibService.removePendingRequest(reqId)
    if (this.ibService.isConnected()) {
      this.ibService.getIbApi().cancelMktData(reqId)
    }
  }

  public getQuote(reqId: number): QuoteSnapshot | null {
    const quote = this.quotes.get(reqId)
    return quote ? { ...quote } : null
  }

  /**
   * SPX 指数の現在値を取得 (last → close → bid → ask の順)
   */
  public async getUnderlyingPrice(timeoutMs: number): Promise<number> {
    await this.ibService.ensureConnected()

    const reqId = this.ibService.getNextRequestId()
    this.quotes.set(reqId, emptyQuote())

    return new Promise<number>((resolve, reject) => {
      const finish = () => {
        clearTimeout(timeoutId)
        unsubscribe()
        this.cancel(reqId)
      }

      const timeoutId = setTimeout(() => {
        finish()
        reject(new BrokerTimeoutError('SPX価格取得', timeoutMs))
      }, timeoutMs)

      const unsubscribe = this.ibService.events.subscribe('QuoteUpdated', (event) => {
        if (event.reqId !== reqId) return
        const { last, close, bid, ask } = event.quote
        const price = last ?? close ?? bid ?? ask
        if (price !== null) {
          finish()
          console.log(`SPX価格: ${price.toFixed(2)}`)
          resolve(price)
        }
      })

      this.ibService.addPendingRequest(reqId, 'mktData SPX', (error) => {
        finish()
        reject(error)
      })
      this.ibService.getIbApi().reqMktData(reqId, SPX_INDEX, '', false, false)
    })
  }
}
