// backend/utils/errors.ts

/** ブローカーセッションが切断中、または接続できない */
export class BrokerConnectionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BrokerConnectionError'
  }
}

/** 契約照会・気配取得・ポジション取得などの往復がタイムアウト */
export class BrokerTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} タイムアウト (${timeoutMs}ms)`)
    this.name = 'BrokerTimeoutError'
  }
}

export class BrokerRequestError extends Error {
  constructor(
    message: string,
    public readonly code: number,
    public readonly reqId?: number
  ) {
    super(`IBエラー (Code: ${code}): ${message}`)
    this.name = 'BrokerRequestError'
  }
}

export class InvalidTransitionError extends Error {
  constructor(tradeId: string, from: string, to: string) {
    super(`不正な状態遷移 ${tradeId}: ${from} → ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

export class SettingValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SettingValidationError'
  }
}

export class TradeNotFoundError extends Error {
  constructor(public readonly tradeId: string) {
    super(`トレードが見つかりません: ${tradeId}`)
    this.name = 'TradeNotFoundError'
  }
}

/** 利確 GTC の取消が確認できず、注文が生きている可能性がある */
export class ProfitTargetCancelError extends Error {
  constructor(
    public readonly tradeId: string,
    public readonly orderId: number
  ) {
    super(`profit target cancel not confirmed (${tradeId} GTC #${orderId})`)
    this.name = 'ProfitTargetCancelError'
  }
}
