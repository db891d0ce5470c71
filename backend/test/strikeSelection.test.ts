import { describe, expect, it } from 'vitest'
import { CalendarConfig } from '../config'
import { StrikeSelectionService, pickClosestDelta } from '../services/calendar/StrikeSelectionService'
import { FakeBrokerGateway } from './support/FakeBrokerGateway'
import { makeTrade, testConfig } from './support/fixtures'

const SHORT_EXPIRY = '20250404'
const LONG_EXPIRY = '20250411'

function setup(overrides: Partial<CalendarConfig> = {}) {
  const gateway = new FakeBrokerGateway()
  const config = testConfig(overrides)
  const service = new StrikeSelectionService(gateway, () => config)

  gateway.setStrikes(SHORT_EXPIRY, 'P', [4780, 4790, 4800])
  gateway.setStrikes(SHORT_EXPIRY, 'C', [5150, 5160])
  gateway.setQuote(SHORT_EXPIRY, 4780, 'P', { delta: -0.16 })
  gateway.setQuote(SHORT_EXPIRY, 4790, 'P', { delta: -0.19 })
  gateway.setQuote(SHORT_EXPIRY, 4800, 'P', { delta: -0.22 })
  gateway.setQuote(SHORT_EXPIRY, 5150, 'C', { delta: 0.2 })
  gateway.setQuote(SHORT_EXPIRY, 5160, 'C', { delta: 0.18 })
  return { gateway, service, config }
}

describe('pickClosestDelta', () => {
  it('|Δ| と目標の差が最小の候補を選ぶ', () => {
    const best = pickClosestDelta(
      [
        { strike: 4790, delta: -0.19 },
        { strike: 4800, delta: -0.22 },
      ],
      0.2,
      0.05
    )
    expect(best?.strike).toBe(4790)
  })

  it('許容幅外は除外し、同差は先の候補を採用する', () => {
    expect(pickClosestDelta([{ strike: 4700, delta: -0.1 }], 0.2, 0.05)).toBeNull()
    const tie = pickClosestDelta(
      [
        { strike: 4780, delta: -0.18 },
        { strike: 4800, delta: -0.22 },
      ],
      0.2
    )
    expect(tie?.strike).toBe(4780)
  })
})

describe('StrikeSelectionService.selectStrikes', () => {
  it('SPX 5000 / 目標 0.20: −0.19 のプットと 0.20 のコールを選ぶ', async () => {
    const { gateway, service } = setup()

    const result = await service.selectStrikes(SHORT_EXPIRY, 5000, 0.2, 0.05)

    expect(result).toEqual({
      ok: true,
      value: { putStrike: 4790, callStrike: 5150, putDelta: -0.19, callDelta: 0.2 },
    })
    expect(gateway.activeQuoteCount()).toBe(0)
  })

  it('許容幅内にデルタがなければ失敗', async () => {
    const { gateway, service } = setup()
    gateway.setQuote(SHORT_EXPIRY, 5150, 'C', { delta: 0.4 })
    gateway.setQuote(SHORT_EXPIRY, 5160, 'C', { delta: 0.35 })

    const result = await service.selectStrikes(SHORT_EXPIRY, 5000, 0.2, 0.05)

    expect(result.ok).toBe(false)
    expect(gateway.activeQuoteCount()).toBe(0)
  })
})

describe('StrikeSelectionService.handleFailedTrade', () => {
  it('adjust_longs: ロング限月の近いストライクへ調整 (乖離は上限内)', async () => {
    const { gateway, service } = setup({ failedTradeAction: 'adjust_longs', maxStrikeDeviation: 10 })
    gateway.setStrikes(LONG_EXPIRY, 'P', [4775, 4780, 4800])
    gateway.setStrikes(LONG_EXPIRY, 'C', [5150, 5175])
    gateway.markMissing(LONG_EXPIRY, 4790, 'P')

    const result = await service.handleFailedTrade(SHORT_EXPIRY, LONG_EXPIRY, 4790, 5150)

    expect(result).toEqual({ ok: true, value: { shortPut: 4790, shortCall: 5150, longPut: 4780, longCall: 5150 } })
    if (result.ok) {
      expect(Math.abs(result.value.longPut - 4790)).toBeLessThanOrEqual(10)
      expect(Math.abs(result.value.longCall - 5150)).toBeLessThanOrEqual(10)
    }
  })

  it('最大乖離を超える場合は失敗', async () => {
    const { gateway, service } = setup({ failedTradeAction: 'adjust_longs', maxStrikeDeviation: 10 })
    gateway.setStrikes(LONG_EXPIRY, 'P', [4775])
    gateway.setStrikes(LONG_EXPIRY, 'C', [5150])
    gateway.markMissing(LONG_EXPIRY, 4790, 'P')

    const result = await service.handleFailedTrade(SHORT_EXPIRY, LONG_EXPIRY, 4790, 5150)

    expect(result.ok).toBe(false)
  })

  it('adjust_entire: 両限月とも同じ調整後ストライク', async () => {
    const { gateway, service } = setup({ failedTradeAction: 'adjust_entire', maxStrikeDeviation: 10 })
    gateway.setStrikes(LONG_EXPIRY, 'P', [4780])
    gateway.setStrikes(LONG_EXPIRY, 'C', [5155])
    gateway.markMissing(LONG_EXPIRY, 4790, 'P')

    const result = await service.handleFailedTrade(SHORT_EXPIRY, LONG_EXPIRY, 4790, 5150)

    expect(result).toEqual({ ok: true, value: { shortPut: 4780, shortCall: 5155, longPut: 4780, longCall: 5155 } })
  })

  it('skip: 常に失敗', async () => {
    const { service } = setup({ failedTradeAction: 'skip' })
    const result = await service.handleFailedTrade(SHORT_EXPIRY, LONG_EXPIRY, 4790, 5150)
    expect(result.ok).toBe(false)
  })
})

describe('StrikeSelectionService.checkGhostStrikes', () => {
  const proposed = { shortPut: 4790, shortCall: 5150, longPut: 4790, longCall: 5150 }

  it('move: 衝突したショートを隣接ストライクへ移し、他のレッグと重ならない', async () => {
    const { service } = setup({ ghostStrikeAction: 'move' })
    // 7日前のトレードのロングプットが今回のショートプットと同じ
    const prior = makeTrade({ putStrike: 4790, longPutStrike: 4790, callStrike: 5200, longCallStrike: 5200 })

    const result = await service.checkGhostStrikes(proposed, SHORT_EXPIRY, prior)

    expect(result.ok).toBe(true)
    if (!result.ok) return
    const { strikes } = result.value
    expect(strikes.shortPut).toBe(4800)
    expect(strikes.longPut).toBe(4800)
    expect(strikes.shortPut).not.toBe(4790)
    const otherLegs = [strikes.shortCall, strikes.longCall, prior.putStrike, prior.callStrike, prior.longPutStrike, prior.longCallStrike]
    expect(otherLegs).not.toContain(strikes.shortPut)
    expect(result.value.adjusted).toBe(true)
  })

  it('move: 隣接ストライクが前回トレードのレッグなら反対側へ', async () => {
    const { service } = setup({ ghostStrikeAction: 'move' })
    const prior = makeTrade({ putStrike: 4800, longPutStrike: 4790, callStrike: 5200, longCallStrike: 5200 })

    const result = await service.checkGhostStrikes(proposed, SHORT_EXPIRY, prior)

    expect(result.ok && result.value.strikes.shortPut).toBe(4780)
  })

  it('skip は失敗、ignore はそのまま', async () => {
    const prior = makeTrade({ putStrike: 4790, longPutStrike: 4790, callStrike: 5200, longCallStrike: 5200 })

    const skipped = await setup({ ghostStrikeAction: 'skip' }).service.checkGhostStrikes(proposed, SHORT_EXPIRY, prior)
    expect(skipped.ok).toBe(false)

    const ignored = await setup({ ghostStrikeAction: 'ignore' }).service.checkGhostStrikes(proposed, SHORT_EXPIRY, prior)
    expect(ignored).toEqual({
      ok: true,
      value: { strikes: proposed, conflicts: ['4790P (CAL_20250307_094512 のロング)'], adjusted: false },
    })
  })

  it('衝突がなければ何もしない', async () => {
    const { service } = setup()
    const prior = makeTrade({ putStrike: 4700, longPutStrike: 4700, callStrike: 5200, longCallStrike: 5200 })
    const result = await service.checkGhostStrikes(proposed, SHORT_EXPIRY, prior)
    expect(result).toEqual({ ok: true, value: { strikes: proposed, conflicts: [], adjusted: false } })
  })
})
