// backend/services/store/tradeMapper.ts - Mongo ドキュメント ⇔ CalendarSpread
import {
  CalendarSpread,
  ExitReason,
  FillStatus,
  LegName,
  LegSnapshot,
  ProfitTargetStatus,
  TradeStatus,
} from '../../../shared/types'

/** lean() / toObject() で得られる素のオブジェクト */
export type TradeRecord = {
  [K in keyof CalendarSpread]?: unknown
}

const TRADE_STATUSES: readonly TradeStatus[] = ['PENDING', 'ACTIVE', 'CLOSED', 'CANCELLED', 'MANUAL_CONTROL']
const PROFIT_TARGET_STATUSES: readonly ProfitTargetStatus[] = ['NONE', 'PLACED', 'FILLED', 'CANCELLED', 'REJECTED']
const FILL_STATUSES: readonly FillStatus[] = ['PENDING', 'FILLED', 'CANCELLED']
const EXIT_REASONS: readonly ExitReason[] = ['profit target', 'time exit', 'manual close', 'reconciliation close']

function pick<T extends string>(values: readonly T[], raw: unknown, fallback: T): T {
  return values.find((value) => value === raw) ?? fallback
}

function numberOrNull(raw: unknown): number | null {
  return typeof raw === 'number' && Number.isFinite(raw) ? raw : null
}

function stringOrNull(raw: unknown): string | null {
  return typeof raw === 'string' ? raw : null
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null
}

export function emptyLeg(): LegSnapshot {
  return { conId: null, entryDelta: null, entryIv: null, exitDelta: null, exitIv: null }
}

function toLeg(raw: unknown): LegSnapshot {
  if (!isRecord(raw)) return emptyLeg()
  return {
    conId: numberOrNull(raw.conId),
    entryDelta: numberOrNull(raw.entryDelta),
    entryIv: numberOrNull(raw.entryIv),
    exitDelta: numberOrNull(raw.exitDelta),
    exitIv: numberOrNull(raw.exitIv),
  }
}

export function toCalendarSpread(record: TradeRecord): CalendarSpread {
  const rawLegs = isRecord(record.legs) ? record.legs : {}
  const legs: Record<LegName, LegSnapshot> = {
    shortPut: toLeg(rawLegs.shortPut),
    shortCall: toLeg(rawLegs.shortCall),
    longPut: toLeg(rawLegs.longPut),
    longCall: toLeg(rawLegs.longCall),
  }

  const putStrike = numberOrNull(record.putStrike) ?? 0
  const callStrike = numberOrNull(record.callStrike) ?? 0

  return {
    tradeId: String(record.tradeId ?? ''),
    entryDate: String(record.entryDate ?? ''),
    entryTime: String(record.entryTime ?? ''),
    spxPrice: numberOrNull(record.spxPrice),
    shortExpiry: String(record.shortExpiry ?? ''),
    longExpiry: String(record.longExpiry ?? ''),

    putStrike,
    callStrike,
    // 旧データでは 0 = 調整なし
    longPutStrike: numberOrNull(record.longPutStrike) || putStrike,
    longCallStrike: numberOrNull(record.longCallStrike) || callStrike,

    legs,

    entryCredit: numberOrNull(record.entryCredit),
    exitCredit: numberOrNull(record.exitCredit),
    realizedPnl: numberOrNull(record.realizedPnl),
    profitTarget: numberOrNull(record.profitTarget),

    status: pick(TRADE_STATUSES, record.status, 'PENDING'),
    exitReason: EXIT_REASONS.find((reason) => reason === record.exitReason) ?? null,
    exitDate: stringOrNull(record.exitDate),
    exitTime: stringOrNull(record.exitTime),
    exitSpxPrice: numberOrNull(record.exitSpxPrice),

    comboOrderId: numberOrNull(record.comboOrderId),
    fillStatus: pick(FILL_STATUSES, record.fillStatus, 'PENDING'),
    fillAttempts: numberOrNull(record.fillAttempts) ?? 0,
    lastAttemptPrice: numberOrNull(record.lastAttemptPrice),

    profitTargetOrderId: numberOrNull(record.profitTargetOrderId),
    profitTargetPrice: numberOrNull(record.profitTargetPrice),
    profitTargetStatus: pick(PROFIT_TARGET_STATUSES, record.profitTargetStatus, 'NONE'),

    notes: stringOrNull(record.notes),
  }
}
