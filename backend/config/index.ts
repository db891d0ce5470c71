// backend/config/index.ts
import { PositionStore } from '../services/store/PositionStore'
import {
  CalendarConfig,
  DEFAULT_CONFIG,
  SETTING_DEFINITIONS,
  applySetting,
  toUserSetting,
  validateSettingValue,
} from './CalendarConfig'

export * from './CalendarConfig'

/** 環境変数による接続設定の上書き (.env) */
export function applyEnvOverrides(config: CalendarConfig, env: NodeJS.ProcessEnv = process.env): CalendarConfig {
  const next = { ...config }
  if (env.IB_HOST) next.ibHost = env.IB_HOST
  if (env.IB_PORT && Number.isInteger(Number(env.IB_PORT))) next.ibPort = Number(env.IB_PORT)
  if (env.IB_CLIENT_ID && Number.isInteger(Number(env.IB_CLIENT_ID))) next.ibClientId = Number(env.IB_CLIENT_ID)
  if (env.IB_DASHBOARD_CLIENT_ID && Number.isInteger(Number(env.IB_DASHBOARD_CLIENT_ID))) {
    next.ibDashboardClientId = Number(env.IB_DASHBOARD_CLIENT_ID)
  }
  return next
}

/**
 * 設定テーブルから config を組み立てる。
 * 未登録の項目はデフォルト値で作成し、不正な値はデフォルトのまま警告する。
 */
export async function loadConfig(
  store: PositionStore,
  base: CalendarConfig = DEFAULT_CONFIG
): Promise<CalendarConfig> {
  let config: CalendarConfig = { ...base }
  const stored = new Map((await store.getSettings()).map((setting) => [setting.name, setting]))

  for (const name of Object.keys(SETTING_DEFINITIONS)) {
    const setting = stored.get(name)
    if (!setting) {
      await store.upsertSetting(toUserSetting(config, name))
      continue
    }

    try {
      config = applySetting(config, name, validateSettingValue(name, setting.value))
    } catch (error) {
      console.warn(`設定値が不正なためデフォルトを使用: ${name}=${setting.value}`, error instanceof Error ? error.message : error)
    }
  }

  return config
}

export async function saveConfig(store: PositionStore, config: CalendarConfig): Promise<void> {
  for (const name of Object.keys(SETTING_DEFINITIONS)) {
    await store.upsertSetting(toUserSetting(config, name))
  }
}

/** 1項目を検証して保存し、反映後の config を返す */
export async function updateSetting(
  store: PositionStore,
  config: CalendarConfig,
  name: string,
  raw: string
): Promise<CalendarConfig> {
  const value = validateSettingValue(name, raw)
  const next = applySetting(config, name, value)
  await store.upsertSetting(toUserSetting(next, name))
  return next
}

/**
 * 実行中の設定。サービスには get を渡し、更新は即時に反映される。
 */
export class RuntimeConfig {
  constructor(
    private store: PositionStore,
    private current: CalendarConfig = DEFAULT_CONFIG,
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  get = (): CalendarConfig => this.current

  async reload(): Promise<CalendarConfig> {
    this.current = applyEnvOverrides(await loadConfig(this.store), this.env)
    return this.current
  }

  async update(name: string, raw: string): Promise<CalendarConfig> {
    await updateSetting(this.store, this.current, name, raw)
    return this.reload()
  }
}
