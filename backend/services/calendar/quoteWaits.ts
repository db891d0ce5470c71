// backend/services/calendar/quoteWaits.ts
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { QuoteHandle, QuoteSnapshot } from '../ib-service/types'

/**
 * 全ハンドルの気配が条件を満たすか、タイムアウトまで待つ。
 * タイムアウトしても reject はせず、その時点の気配で判断させる。
 */
export function waitForQuotes(
  gateway: BrokerGateway,
  handles: QuoteHandle[],
  isReady: (quote: QuoteSnapshot | null) => boolean,
  timeoutMs: number
): Promise<boolean> {
  const allReady = () => handles.every((handle) => isReady(gateway.getQuote(handle)))
  if (allReady()) {
    return Promise.resolve(true)
  }

  const reqIds = new Set(handles.map((handle) => handle.reqId))

  return new Promise<boolean>((resolve) => {
    const finish = (ready: boolean) => {
      clearTimeout(timeoutId)
      unsubscribe()
      resolve(ready)
    }

    const timeoutId = setTimeout(() => finish(allReady()), timeoutMs)

    const unsubscribe = gateway.events.subscribe('QuoteUpdated', (event) => {
      if (reqIds.has(event.reqId) && allReady()) {
        finish(true)
      }
    })
  })
}

export function hasDelta(quote: QuoteSnapshot | null): boolean {
  return quote !== null && quote.delta !== null
}

export function hasBidAsk(quote: QuoteSnapshot | null): boolean {
  return quote !== null && quote.bid !== null && quote.ask !== null && quote.bid > 0 && quote.ask > 0
}
