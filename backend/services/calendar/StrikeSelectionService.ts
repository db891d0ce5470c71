// backend/services/calendar/StrikeSelectionService.ts
import { CalendarSpread, OptionRight } from '../../../shared/types'
import { CalendarConfig } from '../../config'
import { BrokerGateway } from '../ib-service/BrokerGateway'
import { QuoteHandle } from '../ib-service/types'
import { SPX_SYMBOL, SPX_TRADING_CLASS, optionContract } from './legs'
import { hasDelta, waitForQuotes } from './quoteWaits'
import { errorMessage } from '../../utils/util'

export type SelectionResult<T> = { ok: true; value: T } | { ok: false; reason: string }

export interface StrikeSelection {
  putStrike: number
  callStrike: number
  putDelta: number
  callDelta: number
}

export interface SpreadStrikes {
  shortPut: number
  shortCall: number
  longPut: number
  longCall: number
}

export interface GhostCheck {
  strikes: SpreadStrikes
  conflicts: string[]
  adjusted: boolean
}

export interface DeltaCandidate {
  strike: number
  delta: number
}

const EPSILON = 1e-9

/**
 * |delta| が目標に最も近いストライク。許容幅外は除外。
 * 同差の場合は先に見たもの (昇順で小さいストライク) を採用する。
 */
export function pickClosestDelta(
  candidates: DeltaCandidate[],
  targetDelta: number,
  tolerance: number = Number.POSITIVE_INFINITY
): (DeltaCandidate & { difference: number }) | null {
  let best: (DeltaCandidate & { difference: number }) | null = null
  for (const candidate of candidates) {
    const difference = Math.abs(Math.abs(candidate.delta) - targetDelta)
    if (difference > tolerance + EPSILON) continue
    if (best === null || difference < best.difference) {
      best = { ...candidate, difference }
    }
  }
  return best
}

/** 目標以下で最大のストライク (プット側) */
export function nearestPutStrike(strikes: number[], target: number): number | null {
  const below = strikes.filter((strike) => strike <= target)
  return below.length > 0 ? Math.max(...below) : null
}

/** 目標以上で最小のストライク (コール側) */
export function nearestCallStrike(strikes: number[], target: number): number | null {
  const above = strikes.filter((strike) => strike >= target)
  return above.length > 0 ? Math.min(...above) : null
}

export class StrikeSelectionService {
  constructor(
    private gateway: BrokerGateway,
    private config: () => CalendarConfig
  ) {}

  /**
   * 目標デルタに最も近いプット/コールのストライクを選択
   */
  public async selectStrikes(
    expiry: string,
    underlyingPrice: number,
    targetDelta: number,
    deltaTolerance: number
  ): Promise<SelectionResult<StrikeSelection>> {
    const { strikeWindow } = this.config()

    const putCandidates = await this.candidateStrikes(
      expiry,
      'P',
      underlyingPrice - strikeWindow.putMaxDistance,
      underlyingPrice - strikeWindow.putMinDistance
    )
    const callCandidates = await this.candidateStrikes(
      expiry,
      'C',
      underlyingPrice + strikeWindow.callMinDistance,
      underlyingPrice + strikeWindow.callMaxDistance
    )
    console.log(`ストライク候補: プット ${putCandidates.length}件, コール ${callCandidates.length}件 (SPX ${underlyingPrice.toFixed(2)})`)

    const [putDeltas, callDeltas] = await Promise.all([
      this.collectDeltas(expiry, 'P', putCandidates),
      this.collectDeltas(expiry, 'C', callCandidates),
    ])

    const put = pickClosestDelta(putDeltas, targetDelta, deltaTolerance)
    const call = pickClosestDelta(callDeltas, targetDelta, deltaTolerance)

    if (!put || !call) {
      const missing = [!put ? 'プット' : null, !call ? 'コール' : null].filter(Boolean).join('/')
      return {
        ok: false,
        reason: `目標デルタ ${targetDelta}±${deltaTolerance} の${missing}が見つかりません (デルタ受信: P ${putDeltas.length}件, C ${callDeltas.length}件)`,
      }
    }

    console.log(`選択: ${put.strike}P (Δ${put.delta.toFixed(3)}), ${call.strike}C (Δ${call.delta.toFixed(3)})`)
    return {
      ok: true,
      value: { putStrike: put.strike, callStrike: call.strike, putDelta: put.delta, callDelta: call.delta },
    }
  }

  /** 満期の上場ストライク。取得できない場合は空配列 */
  public async getAvailableStrikes(expiry: string, right: OptionRight): Promise<number[]> {
    try {
      return await this.gateway.getStrikes(
        { symbol: SPX_SYMBOL, tradingClass: SPX_TRADING_CLASS, expiry, right },
        this.config().timeouts.closeContractLookupMs
      )
    } catch (error) {
      console.warn(`ストライク一覧取得失敗 ${expiry} ${right}:`, errorMessage(error))
      return []
    }
  }

  private async candidateStrikes(expiry: string, right: OptionRight, low: number, high: number): Promise<number[]> {
    const listed = (await this.getAvailableStrikes(expiry, right)).filter((strike) => strike >= low && strike <= high)
    if (listed.length > 0) {
      return listed
    }

    // 一覧が取れない場合は刻みで生成
    const step = this.config().strikeStep
    const strikes: number[] = []
    for (let strike = Math.ceil(low / step) * step; strike <= high; strike += step) {
      strikes.push(strike)
    }
    return strikes
  }

  /** 候補のデルタを取得 (受信できたものだけ返す) */
  public async collectDeltas(expiry: string, right: OptionRight, strikes: number[]): Promise<DeltaCandidate[]> {
    const handles: QuoteHandle[] = []
    try {
      for (const strike of strikes) {
        handles.push(await this.gateway.subscribeQuote(optionContract(expiry, strike, right), true))
      }
      await waitForQuotes(this.gateway, handles, hasDelta, this.config().timeouts.quoteMs)

      const candidates: DeltaCandidate[] = []
      for (const handle of handles) {
        const delta = this.gateway.getQuote(handle)?.delta
        if (delta !== null && delta !== undefined) {
          candidates.push({ strike: handle.contract.strike, delta })
        }
      }
      return candidates.sort((a, b) => a.strike - b.strike)
    } finally {
      for (const handle of handles) {
        this.gateway.cancelQuote(handle)
      }
    }
  }

  /**
   * 4レッグすべての契約が存在するか (タイムアウトは存在しない扱い)
   */
  public async verifyContractsExist(
    shortExpiry: string,
    longExpiry: string,
    putStrike: number,
    callStrike: number,
    longPutStrike: number = putStrike,
    longCallStrike: number = callStrike
  ): Promise<boolean> {
    const contracts = [
      optionContract(shortExpiry, putStrike, 'P'),
      optionContract(shortExpiry, callStrike, 'C'),
      optionContract(longExpiry, longPutStrike, 'P'),
      optionContract(longExpiry, longCallStrike, 'C'),
    ]
    const timeoutMs = this.config().timeouts.contractLookupMs

    try {
      const conIds = await Promise.all(contracts.map((contract) => this.gateway.resolveConId(contract, timeoutMs)))
      const missing = contracts.filter((_, index) => conIds[index] === null)
      if (missing.length > 0) {
        console.warn(`契約が存在しません: ${missing.map((c) => `${c.expiry} ${c.strike}${c.right}`).join(', ')}`)
        return false
      }
      return true
    } catch (error) {
      console.warn('契約確認エラー:', errorMessage(error))
      return false
    }
  }

  /**
   * 目標ストライク付近で実在するストライク (プットは以下、コールは以上)
   */
  public async findNearestAvailableStrikes(
    expiry: string,
    targetPut: number,
    targetCall: number
  ): Promise<SelectionResult<{ put: number; call: number }>> {
    const maxDeviation = this.config().maxStrikeDeviation
    const [putStrikes, callStrikes] = await Promise.all([
      this.getAvailableStrikes(expiry, 'P'),
      this.getAvailableStrikes(expiry, 'C'),
    ])

    const put = nearestPutStrike(putStrikes, targetPut)
    const call = nearestCallStrike(callStrikes, targetCall)

    if (put === null || call === null) {
      return { ok: false, reason: `${expiry} に目標付近のストライクがありません` }
    }
    if (targetPut - put > maxDeviation || call - targetCall > maxDeviation) {
      return {
        ok: false,
        reason: `No suitable strikes found within ${maxDeviation} points (${put}P/${call}C vs ${targetPut}P/${targetCall}C)`,
      }
    }
    return { ok: true, value: { put, call } }
  }

  /**
   * 目標の契約が存在しない場合の対応 (skip / adjust_longs / adjust_entire)
   */
  public async handleFailedTrade(
    shortExpiry: string,
    longExpiry: string,
    putStrike: number,
    callStrike: number
  ): Promise<SelectionResult<SpreadStrikes>> {
    const action = this.config().failedTradeAction
    console.log(`契約なし: 対応ポリシー ${action} (${putStrike}P/${callStrike}C)`)

    switch (action) {
      case 'skip':
        return { ok: false, reason: `Contracts not available for ${putStrike}P/${callStrike}C (policy: skip)` }

      case 'adjust_longs': {
        const timeoutMs = this.config().timeouts.contractLookupMs
        try {
          const [shortPut, shortCall] = await Promise.all([
            this.gateway.resolveConId(optionContract(shortExpiry, putStrike, 'P'), timeoutMs),
            this.gateway.resolveConId(optionContract(shortExpiry, callStrike, 'C'), timeoutMs),
          ])
          if (shortPut === null || shortCall === null) {
            return { ok: false, reason: `ショート限月 ${shortExpiry} に ${putStrike}P/${callStrike}C がありません` }
          }
        } catch (error) {
          return { ok: false, reason: `ショートレッグ確認失敗: ${errorMessage(error)}` }
        }

        const nearest = await this.findNearestAvailableStrikes(longExpiry, putStrike, callStrike)
        if (!nearest.ok) return nearest

        const { put, call } = nearest.value
        const verified = await this.verifyContractsExist(shortExpiry, longExpiry, putStrike, callStrike, put, call)
        if (!verified) {
          return { ok: false, reason: `調整後のロング ${put}P/${call}C を確認できません` }
        }
        console.log(`ロング調整: Short ${putStrike}P/${callStrike}C, Long ${put}P/${call}C`)
        return { ok: true, value: { shortPut: putStrike, shortCall: callStrike, longPut: put, longCall: call } }
      }

      case 'adjust_entire': {
        const nearest = await this.findNearestAvailableStrikes(longExpiry, putStrike, callStrike)
        if (!nearest.ok) return nearest

        const { put, call } = nearest.value
        const verified = await this.verifyContractsExist(shortExpiry, longExpiry, put, call)
        if (!verified) {
          return { ok: false, reason: `${put}P/${call}C が両限月に存在しません` }
        }
        console.log(`全体調整: ${put}P/${call}C (両限月)`)
        return { ok: true, value: { shortPut: put, shortCall: call, longPut: put, longCall: call } }
      }
    }
  }

  /**
   * 前週のトレードのロングと今回のショートが重なるか確認
   */
  public async checkGhostStrikes(
    proposed: SpreadStrikes,
    shortExpiry: string,
    priorTrade: CalendarSpread | null
  ): Promise<SelectionResult<GhostCheck>> {
    if (!priorTrade) {
      return { ok: true, value: { strikes: proposed, conflicts: [], adjusted: false } }
    }

    const priorLongPut = priorTrade.longPutStrike || priorTrade.putStrike
    const priorLongCall = priorTrade.longCallStrike || priorTrade.callStrike
    const putConflict = proposed.shortPut === priorLongPut
    const callConflict = proposed.shortCall === priorLongCall

    const conflicts: string[] = []
    if (putConflict) conflicts.push(`${proposed.shortPut}P (${priorTrade.tradeId} のロング)`)
    if (callConflict) conflicts.push(`${proposed.shortCall}C (${priorTrade.tradeId} のロング)`)

    if (conflicts.length === 0) {
      return { ok: true, value: { strikes: proposed, conflicts, adjusted: false } }
    }

    const action = this.config().ghostStrikeAction
    console.warn(`ゴーストストライク検出: ${conflicts.join(', ')} (対応: ${action})`)

    if (action === 'skip') {
      return { ok: false, reason: `Trade skipped due to ghost strike conflict: ${conflicts.join(', ')}` }
    }
    if (action === 'ignore') {
      return { ok: true, value: { strikes: proposed, conflicts, adjusted: false } }
    }

    let strikes = { ...proposed }
    if (putConflict) {
      const moved = await this.moveGhostStrike(strikes, shortExpiry, 'P', priorTrade)
      if (!moved.ok) return moved
      strikes = moved.value
    }
    if (callConflict) {
      const moved = await this.moveGhostStrike(strikes, shortExpiry, 'C', priorTrade)
      if (!moved.ok) return moved
      strikes = moved.value
    }

    console.log(`ゴーストストライク調整: ${proposed.shortPut}P/${proposed.shortCall}C → ${strikes.shortPut}P/${strikes.shortCall}C`)
    return { ok: true, value: { strikes, conflicts, adjusted: true } }
  }

  /** 隣接ストライク (1つ上と1つ下のみ) から目標デルタに近い方へ移動 */
  private async moveGhostStrike(
    strikes: SpreadStrikes,
    shortExpiry: string,
    right: OptionRight,
    priorTrade: CalendarSpread
  ): Promise<SelectionResult<SpreadStrikes>> {
    const conflict = right === 'P' ? strikes.shortPut : strikes.shortCall
    const listed = await this.getAvailableStrikes(shortExpiry, right)
    const step = this.config().strikeStep

    const lower = listed.filter((strike) => strike < conflict)
    const higher = listed.filter((strike) => strike > conflict)
    const below = listed.length > 0 ? (lower.length > 0 ? Math.max(...lower) : null) : conflict - step
    const above = listed.length > 0 ? (higher.length > 0 ? Math.min(...higher) : null) : conflict + step

    // 他のレッグ (両トレード) と重ならないこと
    const occupied = new Set<number>(
      right === 'P'
        ? [strikes.longCall, strikes.shortCall, priorTrade.putStrike, priorTrade.callStrike, priorTrade.longPutStrike, priorTrade.longCallStrike]
        : [strikes.shortPut, strikes.longPut, priorTrade.putStrike, priorTrade.callStrike, priorTrade.longPutStrike, priorTrade.longCallStrike]
    )
    const neighbors = [below, above].filter((strike): strike is number => strike !== null && !occupied.has(strike))
    if (neighbors.length === 0) {
      return { ok: false, reason: `${conflict}${right} の隣接ストライクが使用できません` }
    }

    const deltas = await this.collectDeltas(shortExpiry, right, neighbors)
    const best = pickClosestDelta(deltas, this.config().targetDelta)
    if (!best) {
      return { ok: false, reason: `${conflict}${right} 隣接ストライクのデルタを取得できません` }
    }

    if (right === 'P') {
      const longMoves = strikes.longPut === strikes.shortPut
      return { ok: true, value: { ...strikes, shortPut: best.strike, longPut: longMoves ? best.strike : strikes.longPut } }
    }
    const longMoves = strikes.longCall === strikes.shortCall
    return { ok: true, value: { ...strikes, shortCall: best.strike, longCall: longMoves ? best.strike : strikes.longCall } }
  }
}
