// services/ib-service/BrokerGateway.ts
import { BrokerEventChannel } from './BrokerEventChannel'
import {
  ChainQuery,
  ComboOrderSpec,
  ConnectionInfo,
  ContractDetail,
  OptionContractSpec,
  OrderStatusUpdate,
  PositionRecord,
  QuoteHandle,
  QuoteSnapshot,
} from './types'

/**
 * 売買ロジックから見たブローカーの窓口。
 * 要求/応答は Promise、約定や気配などのプッシュは events で受け取る。
 */
export interface BrokerGateway {
  readonly events: BrokerEventChannel

  ensureConnected(): Promise<void>
  isConnected(): boolean
  getConnectionInfo(): ConnectionInfo

  getUnderlyingPrice(timeoutMs: number): Promise<number>
  getStrikes(query: ChainQuery, timeoutMs: number): Promise<number[]>
  requestContractDetails(query: ChainQuery, timeoutMs: number): Promise<ContractDetail[]>
  resolveConId(contract: OptionContractSpec, timeoutMs: number): Promise<number | null>

  subscribeQuote(contract: OptionContractSpec, withGreeks: boolean): Promise<QuoteHandle>
  cancelQuote(handle: QuoteHandle): void
  getQuote(handle: QuoteHandle): QuoteSnapshot | null

  placeComboOrder(order: ComboOrderSpec): Promise<number>
  cancelOrder(orderId: number): void
  getOrderStatus(orderId: number): OrderStatusUpdate | null
  /** 未約定・完了済み注文のステータスを取り直す */
  syncOrderStatuses(timeoutMs: number): Promise<OrderStatusUpdate[]>

  snapshotPositions(timeoutMs: number): Promise<PositionRecord[]>
}
