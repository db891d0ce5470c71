// services/ib-service/index.ts
import { IbService, IbServiceOptions } from './IbService'
import { ContractService } from './ContractService'
import { MarketDataService } from './MarketDataService'
import { OrderService } from './OrderService'
import { PositionService } from './PositionService'
import { IbGateway } from './IbGateway'

export { IbService } from './IbService'
export { ContractService } from './ContractService'
export { MarketDataService } from './MarketDataService'
export { OrderService } from './OrderService'
export { PositionService } from './PositionService'
export { IbGateway } from './IbGateway'
export { BrokerEventChannel } from './BrokerEventChannel'
export { RequestIdGenerator } from './RequestIdGenerator'
export type { BrokerGateway } from './BrokerGateway'

export * from './types'

// 便利なファクトリー関数 (セッションごとに1つ)
export function createIbServices(options: IbServiceOptions = {}) {
  const ib = new IbService(options)
  const contracts = new ContractService(ib)
  const marketData = new MarketDataService(ib)
  const orders = new OrderService(ib)
  const positions = new PositionService(ib)
  return {
    ib,
    contracts,
    marketData,
    orders,
    positions,
    gateway: new IbGateway(ib, contracts, marketData, orders, positions),
  }
}
