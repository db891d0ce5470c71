// services/ib-service/BrokerEventChannel.ts
import EventEmitter from 'events'
import { BrokerEvent, BrokerEventOf, BrokerEventType } from './types'

type Listener<T extends BrokerEventType> = (event: BrokerEventOf<T>) => void

/**
 * ブローカーからのプッシュイベントを型付きで配信するチャネル。
 * 購読側の例外は配信元 (IB のイベントループ) に伝播させない。
 */
export class BrokerEventChannel {
  private emitter = new EventEmitter()

  constructor() {
    this.emitter.setMaxListeners(0)
  }

  publish(event: BrokerEvent): void {
    this.emitter.emit(event.type, event)
  }

  subscribe<T extends BrokerEventType>(type: T, listener: Listener<T>): () => void {
    const handler = (event: BrokerEventOf<T>) => {
      try {
        listener(event)
      } catch (error) {
        console.error(`イベント処理エラー (${type}):`, error)
      }
    }
    this.emitter.on(type, handler)
    return () => {
      this.emitter.off(type, handler)
    }
  }
}
