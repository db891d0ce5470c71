// services/ib-service/IbGateway.ts
import { BrokerGateway } from './BrokerGateway'
import { IbService } from './IbService'
import { ContractService } from './ContractService'
import { MarketDataService } from './MarketDataService'
import { OrderService } from './OrderService'
import { PositionService } from './PositionService'
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

/** IB の各サービスを BrokerGateway としてまとめる */
export class IbGateway implements BrokerGateway {
  constructor(
    private ib: IbService,
    private contracts: ContractService,
    private marketData: MarketDataService,
    private orders: OrderService,
    private positions: PositionService
  ) {}

  get events() {
    return this.ib.events
  }

  ensureConnected(): Promise<void> {
    return this.ib.ensureConnected()
  }

  isConnected(): boolean {
    return this.ib.isConnected()
  }

  getConnectionInfo(): ConnectionInfo {
    return this.ib.getConnectionInfo()
  }

  getUnderlyingPrice(timeoutMs: number): Promise<number> {
    return this.marketData.getUnderlyingPrice(timeoutMs)
  }

  getStrikes(query: ChainQuery, timeoutMs: number): Promise<number[]> {
    return this.contracts.getStrikes(query, timeoutMs)
  }

  requestContractDetails(query: ChainQuery, timeoutMs: number): Promise<ContractDetail[]> {
    return this.contracts.requestContractDetails(query, timeoutMs)
  }

  resolveConId(contract: OptionContractSpec, timeoutMs: number): Promise<number | null> {
    return this.contracts.resolveConId(contract, timeoutMs)
  }

  subscribeQuote(contract: OptionContractSpec, withGreeks: boolean): Promise<QuoteHandle> {
    return this.marketData.subscribe(contract, withGreeks)
  }

  cancelQuote(handle: QuoteHandle): void {
    this.marketData.cancel(handle.reqId)
  }

  getQuote(handle: QuoteHandle): QuoteSnapshot | null {
    return this.marketData.getQuote(handle.reqId)
  }

  placeComboOrder(order: ComboOrderSpec): Promise<number> {
    return this.orders.placeComboOrder(order)
  }

  cancelOrder(orderId: number): void {
    this.orders.cancelOrder(orderId)
  }

  getOrderStatus(orderId: number): OrderStatusUpdate | null {
    return this.orders.getOrderStatus(orderId)
  }

  syncOrderStatuses(timeoutMs: number): Promise<OrderStatusUpdate[]> {
    return this.orders.syncOrderStatuses(timeoutMs)
  }

  snapshotPositions(timeoutMs: number): Promise<PositionRecord[]> {
    return this.positions.snapshotPositions(timeoutMs)
  }
}
