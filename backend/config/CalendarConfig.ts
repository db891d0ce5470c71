// backend/config/CalendarConfig.ts
import { SettingType, UserSetting } from '../../shared/types'
import { SettingValidationError } from '../utils/errors'

export type FailedTradeAction = 'skip' | 'adjust_longs' | 'adjust_entire'
export type GhostStrikeAction = 'skip' | 'ignore' | 'move'

export interface StrikeWindow {
  putMinDistance: number
  putMaxDistance: number
  callMinDistance: number
  callMaxDistance: number
}

export interface CalendarConfig {
  ibHost: string
  ibPort: number
  ibClientId: number
  ibDashboardClientId: number

  positionSize: number
  maxConcurrentPositions: number
  targetDelta: number
  deltaTolerance: number
  shortDte: number
  longDte: number

  entryTime: string
  entryWindowMinutes: number
  exitTime: string
  reconciliationTime: string

  exitDay: number
  profitTargetPct: number

  priceIncrement: number
  maxPriceAttempts: number
  maxSpreadPremium: number
  maxExitDiscount: number
  exitMaxAttempts: number
  fillWaitTime: number // 秒
  exitFillWaitTime: number // 秒

  failedTradeAction: FailedTradeAction
  maxStrikeDeviation: number
  ghostStrikeAction: GhostStrikeAction

  reconciliationAlertThreshold: number
  smsEnabled: boolean

  // 設定テーブルには載せない内部値
  strikeWindow: StrikeWindow
  strikeStep: number
  timeouts: {
    contractLookupMs: number
    closeContractLookupMs: number
    quoteMs: number
    cancelAckMs: number
    profitTargetConfirmMs: number
    positionSnapshotMs: number
    orderSyncMs: number
  }
}

export const DEFAULT_CONFIG: CalendarConfig = {
  ibHost: '127.0.0.1',
  ibPort: 7496,
  ibClientId: 2,
  ibDashboardClientId: 20,

  positionSize: 4,
  maxConcurrentPositions: 7,
  targetDelta: 0.2,
  deltaTolerance: 0.05,
  shortDte: 21,
  longDte: 28,

  entryTime: '09:45:00',
  entryWindowMinutes: 15,
  exitTime: '15:00:00',
  reconciliationTime: '17:00:00',

  exitDay: 14,
  profitTargetPct: 0.5,

  priceIncrement: 0.05,
  maxPriceAttempts: 5,
  maxSpreadPremium: 0.25,
  maxExitDiscount: 0.5,
  exitMaxAttempts: 8,
  fillWaitTime: 15,
  exitFillWaitTime: 8,

  failedTradeAction: 'skip',
  maxStrikeDeviation: 10,
  ghostStrikeAction: 'move',

  reconciliationAlertThreshold: 4,
  smsEnabled: false,

  strikeWindow: {
    putMinDistance: 150,
    putMaxDistance: 350,
    callMinDistance: 50,
    callMaxDistance: 250,
  },
  strikeStep: 5,
  timeouts: {
    contractLookupMs: 5000,
    closeContractLookupMs: 30000,
    quoteMs: 10000,
    cancelAckMs: 5000,
    profitTargetConfirmMs: 5000,
    positionSnapshotMs: 30000,
    orderSyncMs: 10000,
  },
}

type SettingKey = {
  [K in keyof CalendarConfig]: CalendarConfig[K] extends string | number | boolean ? K : never
}[keyof CalendarConfig]

export interface SettingDefinition {
  key: SettingKey
  type: SettingType
  min?: number
  max?: number
  choices?: readonly string[]
  pattern?: RegExp
  category: string
  description: string
}

const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/

export const SETTING_DEFINITIONS: Record<string, SettingDefinition> = {
  ib_host: { key: 'ibHost', type: 'string', category: 'connection', description: 'TWS/Gateway ホスト' },
  ib_port: { key: 'ibPort', type: 'int', min: 1000, max: 9999, category: 'connection', description: 'TWS/Gateway ポート' },
  ib_client_id: { key: 'ibClientId', type: 'int', min: 1, max: 100, category: 'connection', description: '売買用クライアントID' },
  ib_dashboard_client_id: {
    key: 'ibDashboardClientId',
    type: 'int',
    min: 1,
    max: 100,
    category: 'connection',
    description: 'ダッシュボード用クライアントID',
  },
  position_size: { key: 'positionSize', type: 'int', min: 1, max: 50, category: 'trading', description: '1トレードの枚数' },
  max_concurrent_positions: {
    key: 'maxConcurrentPositions',
    type: 'int',
    min: 1,
    max: 20,
    category: 'trading',
    description: '同時保有トレード数の上限',
  },
  target_delta: { key: 'targetDelta', type: 'float', min: 0.05, max: 0.5, category: 'trading', description: '目標デルタ' },
  delta_tolerance: { key: 'deltaTolerance', type: 'float', min: 0.01, max: 0.2, category: 'trading', description: 'デルタ許容幅' },
  short_dte: { key: 'shortDte', type: 'int', min: 7, max: 60, category: 'trading', description: 'ショート満期までの日数' },
  long_dte: { key: 'longDte', type: 'int', min: 14, max: 90, category: 'trading', description: 'ロング満期までの日数' },
  entry_time: { key: 'entryTime', type: 'string', pattern: TIME_PATTERN, category: 'schedule', description: 'エントリー時刻 (ET)' },
  entry_window_minutes: {
    key: 'entryWindowMinutes',
    type: 'int',
    min: 1,
    max: 120,
    category: 'schedule',
    description: 'エントリー許容時間 (分)',
  },
  exit_time: { key: 'exitTime', type: 'string', pattern: TIME_PATTERN, category: 'schedule', description: '時間決済チェック時刻 (ET)' },
  reconciliation_time: {
    key: 'reconciliationTime',
    type: 'string',
    pattern: TIME_PATTERN,
    category: 'schedule',
    description: '照合時刻 (ET)',
  },
  exit_day: { key: 'exitDay', type: 'int', min: 1, max: 21, category: 'exit', description: '時間決済までの日数' },
  profit_target_pct: { key: 'profitTargetPct', type: 'float', min: 0.1, max: 2.0, category: 'exit', description: '利確率' },
  price_increment: { key: 'priceIncrement', type: 'float', min: 0.01, max: 1.0, category: 'execution', description: '価格調整幅' },
  max_price_attempts: { key: 'maxPriceAttempts', type: 'int', min: 1, max: 10, category: 'execution', description: 'エントリー試行回数' },
  max_spread_premium: {
    key: 'maxSpreadPremium',
    type: 'float',
    min: 0.05,
    max: 1.0,
    category: 'execution',
    description: '中値からの最大上乗せ',
  },
  max_exit_discount: {
    key: 'maxExitDiscount',
    type: 'float',
    min: 0.05,
    max: 2.0,
    category: 'execution',
    description: '決済時の中値からの最大値引き',
  },
  exit_max_attempts: { key: 'exitMaxAttempts', type: 'int', min: 1, max: 20, category: 'execution', description: '決済試行回数' },
  fill_wait_time: { key: 'fillWaitTime', type: 'int', min: 5, max: 300, category: 'execution', description: 'エントリー約定待ち (秒)' },
  exit_fill_wait_time: {
    key: 'exitFillWaitTime',
    type: 'int',
    min: 5,
    max: 120,
    category: 'execution',
    description: '決済約定待ち (秒)',
  },
  failed_trade_action: {
    key: 'failedTradeAction',
    type: 'string',
    choices: ['skip', 'adjust_longs', 'adjust_entire'],
    category: 'adjustment',
    description: '限月に契約がない場合の対応',
  },
  max_strike_deviation: {
    key: 'maxStrikeDeviation',
    type: 'int',
    min: 1,
    max: 50,
    category: 'adjustment',
    description: '調整時の最大ストライク乖離',
  },
  ghost_strike_action: {
    key: 'ghostStrikeAction',
    type: 'string',
    choices: ['skip', 'ignore', 'move'],
    category: 'adjustment',
    description: 'ゴーストストライク時の対応',
  },
  reconciliation_alert_threshold: {
    key: 'reconciliationAlertThreshold',
    type: 'int',
    min: 0,
    max: 50,
    category: 'monitoring',
    description: '照合アラートの不一致件数しきい値',
  },
  sms_enabled: { key: 'smsEnabled', type: 'bool', category: 'notifications', description: 'SMS 通知' },
}

export type SettingValue = string | number | boolean

/** 設定値の型と範囲を検証して変換 */
export function validateSettingValue(name: string, raw: string): SettingValue {
  const definition = SETTING_DEFINITIONS[name]
  if (!definition) {
    throw new SettingValidationError(`不明な設定項目: ${name}`)
  }

  const text = raw.trim()

  switch (definition.type) {
    case 'int':
    case 'float': {
      const value = Number(text)
      if (text === '' || !Number.isFinite(value)) {
        throw new SettingValidationError(`${name} は数値で指定してください: ${raw}`)
      }
      if (definition.type === 'int' && !Number.isInteger(value)) {
        throw new SettingValidationError(`${name} は整数で指定してください: ${raw}`)
      }
      if (definition.min !== undefined && value < definition.min) {
        throw new SettingValidationError(`${name} は ${definition.min} 以上にしてください`)
      }
      if (definition.max !== undefined && value > definition.max) {
        throw new SettingValidationError(`${name} は ${definition.max} 以下にしてください`)
      }
      return value
    }
    case 'bool': {
      const lowered = text.toLowerCase()
      if (['true', '1', 'yes', 'on'].includes(lowered)) return true
      if (['false', '0', 'no', 'off'].includes(lowered)) return false
      throw new SettingValidationError(`${name} は true/false で指定してください: ${raw}`)
    }
    case 'string': {
      if (definition.choices && !definition.choices.includes(text)) {
        throw new SettingValidationError(`${name} は ${definition.choices.join(' / ')} のいずれかです: ${raw}`)
      }
      if (definition.pattern && !definition.pattern.test(text)) {
        throw new SettingValidationError(`${name} の形式が不正です: ${raw}`)
      }
      return text
    }
  }
}

/** 検証済みの値を config に反映した新しい config を返す */
export function applySetting(config: CalendarConfig, name: string, value: SettingValue): CalendarConfig {
  const definition = SETTING_DEFINITIONS[name]
  if (!definition) {
    throw new SettingValidationError(`不明な設定項目: ${name}`)
  }
  const next: CalendarConfig = { ...config }

  switch (definition.key) {
    case 'failedTradeAction':
      if (value === 'skip' || value === 'adjust_longs' || value === 'adjust_entire') next.failedTradeAction = value
      break
    case 'ghostStrikeAction':
      if (value === 'skip' || value === 'ignore' || value === 'move') next.ghostStrikeAction = value
      break
    case 'ibHost':
    case 'entryTime':
    case 'exitTime':
    case 'reconciliationTime':
      next[definition.key] = String(value)
      break
    case 'smsEnabled':
      next.smsEnabled = value === true
      break
    default:
      if (typeof value === 'number') {
        next[definition.key] = value
      }
  }

  return next
}

export function settingValueOf(config: CalendarConfig, name: string): string {
  const definition = SETTING_DEFINITIONS[name]
  if (!definition) {
    throw new SettingValidationError(`不明な設定項目: ${name}`)
  }
  return String(config[definition.key])
}

export function toUserSetting(config: CalendarConfig, name: string): UserSetting {
  const definition = SETTING_DEFINITIONS[name]
  if (!definition) {
    throw new SettingValidationError(`不明な設定項目: ${name}`)
  }
  return {
    name,
    value: settingValueOf(config, name),
    type: definition.type,
    min: definition.min ?? null,
    max: definition.max ?? null,
    category: definition.category,
    description: definition.description,
  }
}
