// services/ib-service/IbService.ts
import { IBApi, EventName } from '@stoqey/ib'
import { BrokerEventChannel } from './BrokerEventChannel'
import { RequestIdGenerator } from './RequestIdGenerator'
import { ConnectionInfo } from './types'
import { BrokerConnectionError, BrokerRequestError } from '../../utils/errors'
import { sleep } from '../../utils/util'

// 実際の切断 (504: Not connected, 1100: 接続断, 502: 接続不可)
const DISCONNECT_CODES = new Set([502, 504, 1100])
// 情報メッセージ (データファーム接続状態など)
const INFO_CODES = new Set([2104, 2106, 2107, 2108, 2119, 2158])

export interface IbServiceOptions {
  host?: string
  port?: number
  clientId?: number
  connectTimeoutMs?: number
  reconnectDelayMs?: number
  /** clientId が使用中の場合に何番先まで試すか */
  maxClientIdOffset?: number
}

interface PendingRequest {
  description: string
  reject: (error: Error) => void
  timestamp: number
}

export class IbService {
  // プロセス内で接続中の clientId (売買用とダッシュボード用の衝突防止)
  private static activeClientIds = new Set<number>()

  readonly events = new BrokerEventChannel()
  readonly ids = new RequestIdGenerator()

  private ib: IBApi
  private connected: boolean = false
  private connecting: Promise<void> | null = null
  private host: string
  private port: number
  private baseClientId: number
  private clientId: number
  private connectTimeoutMs: number
  private reconnectDelayMs: number
  private maxClientIdOffset: number
  private pendingRequests: Map<number, PendingRequest> = new Map()

  constructor(options: IbServiceOptions = {}) {
    this.host = options.host || '127.0.0.1'
    this.port = options.port || 7496
    this.baseClientId = options.clientId || 2
    this.clientId = this.baseClientId
    this.connectTimeoutMs = options.connectTimeoutMs ?? 15000
    this.reconnectDelayMs = options.reconnectDelayMs ?? 2000
    this.maxClientIdOffset = options.maxClientIdOffset ?? 2

    this.ib = new IBApi({
      port: this.port,
      host: this.host,
      clientId: this.clientId,
    })

    console.log(`IBサービス初期化: ${this.host}:${this.port} (ClientID: ${this.clientId})`)
    this.setupEventListeners()
  }

  private setupEventListeners(): void {
    this.ib.on(EventName.error, this.onError.bind(this))
    this.ib.on(EventName.disconnected, this.onDisconnected.bind(this))
    this.ib.on(EventName.nextValidId, (orderId: number) => {
      this.ids.seedOrderId(orderId)
      console.log(`次の有効な注文ID: ${orderId}`)
    })
  }

  private onError(err: Error, code: number, reqId?: number): void {
    if (INFO_CODES.has(code)) {
      console.log(`IB情報 (Code: ${code}): ${err.message}`)
      return
    }

    console.warn(`IBエラー (Code: ${code}):`, err.message)

    if (DISCONNECT_CODES.has(code)) {
      this.markDisconnected(code, err.message)
      return
    }

    if (reqId === undefined || reqId < 0) {
      return
    }

    const request = this.pendingRequests.get(reqId)
    if (request) {
      this.pendingRequests.delete(reqId)
      request.reject(new BrokerRequestError(err.message, code, reqId))
      return
    }

    // 保留中リクエストに該当しない id は注文ID
    this.events.publish({ type: 'OrderError', orderId: reqId, code, message: err.message })
  }

  private onDisconnected(): void {
    if (this.connected) {
      this.markDisconnected(0, 'ソケットが切断されました')
    }
  }

  private markDisconnected(code: number, message: string): void {
    this.connected = false
    IbService.activeClientIds.delete(this.clientId)
    this.rejectAllPending(new BrokerConnectionError(`接続が切断されました (Code: ${code}): ${message}`))
    this.events.publish({ type: 'ConnectionLost', code, message })
  }

  private rejectAllPending(error: Error): void {
    const requests = Array.from(this.pendingRequests.values())
    this.pendingRequests.clear()
    for (const request of requests) {
      request.reject(error)
    }
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return
    }
    if (!this.connecting) {
      this.connecting = this.connectWith(this.clientId).finally(() => {
        this.connecting = null
      })
    }
    return this.connecting
  }

  private connectWith(clientId: number): Promise<void> {
    if (IbService.activeClientIds.has(clientId)) {
      return Promise.reject(new BrokerConnectionError(`ClientID ${clientId} は同一プロセス内で使用中です`))
    }
    IbService.activeClientIds.add(clientId)
    this.clientId = clientId

    return new Promise<void>((resolve, reject) => {
      const onConnected = () => {
        clearTimeout(timeout)
        this.connected = true
        console.log(`IBサービスに接続しました (ClientID: ${clientId})`)
        resolve()
      }

      const timeout = setTimeout(() => {
        this.ib.off(EventName.connected, onConnected)
        IbService.activeClientIds.delete(clientId)
        this.ib.disconnect()
        reject(new BrokerConnectionError(`接続タイムアウト (${this.host}:${this.port}, ClientID: ${clientId})`))
      }, this.connectTimeoutMs)

      this.ib.once(EventName.connected, onConnected)

      console.log(`IBサービス接続開始: ${this.host}:${this.port} (ClientID: ${clientId})`)
      this.ib.connect(clientId)
    })
  }

  /**
   * 再接続: 切断 → 待機 → 元の clientId、使用中なら +1, +2 と試す。
   * 待機は試行ごとに倍にする。
   */
  async reconnect(): Promise<void> {
    await this.disconnect()
    await sleep(this.reconnectDelayMs)

    let lastError: unknown = null
    for (let offset = 0; offset <= this.maxClientIdOffset; offset++) {
      const clientId = this.baseClientId + offset
      try {
        await this.connectWith(clientId)
        if (offset > 0) {
          console.warn(`ClientID ${this.baseClientId} が使用中のため ${clientId} で再接続しました`)
        }
        return
      } catch (error) {
        lastError = error
        console.warn(`再接続失敗 (ClientID: ${clientId}):`, error instanceof Error ? error.message : error)
        await sleep(this.reconnectDelayMs * 2 ** offset)
      }
    }

    throw new BrokerConnectionError(
      `IBへの再接続に失敗しました: ${lastError instanceof Error ? lastError.message : String(lastError)}`
    )
  }

  /** 未接続なら接続、失敗したら再接続ルーチンへ */
  async ensureConnected(): Promise<void> {
    if (this.connected) return
    try {
      await this.connect()
    } catch (error) {
      console.warn('接続失敗、再接続を試みます:', error instanceof Error ? error.message : error)
      await this.reconnect()
    }
  }

  async disconnect(): Promise<void> {
    this.rejectAllPending(new BrokerConnectionError('接続が切断されました'))
    IbService.activeClientIds.delete(this.clientId)
    if (this.connected) {
      this.connected = false
      try {
        this.ib.disconnect()
        console.log('IBサービスから切断しました')
      } catch (error) {
        console.warn('切断時エラー:', error)
      }
    }
  }

  // 他のサービスから使用するためのパブリックメソッド
  public getIbApi(): IBApi {
    return this.ib
  }

  public getNextRequestId(): number {
    return this.ids.nextRequestId()
  }

  public getNextOrderId(): number {
    return this.ids.nextOrderId()
  }

  public addPendingRequest(id: number, description: string, reject: (error: Error) => void): void {
    this.pendingRequests.set(id, { description, reject, timestamp: Date.now() })
  }

  public removePendingRequest(id: number): void {
    this.pendingRequests.delete(id)
  }

  public isConnected(): boolean {
    return this.connected
  }

  public getConnectionInfo(): ConnectionInfo {
    return {
      host: this.host,
      port: this.port,
      clientId: this.clientId,
      connected: this.connected,
      pendingRequests: this.pendingRequests.size,
    }
  }

  public async cleanup(): Promise<void> {
    console.log('IBサービスをクリーンアップ中...')
    await this.disconnect()
  }
}
