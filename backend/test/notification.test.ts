import axios from 'axios'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { NotificationService, notificationMessages } from '../services/NotificationService'
import { makeTrade } from './support/fixtures'

vi.mock('axios', () => ({ default: { post: vi.fn() } }))

describe('notificationMessages', () => {
  it('失敗通知に価格・満期・ストライクを付ける', () => {
    expect(
      notificationMessages.tradeFailed('No strikes found', { spxPrice: 5000, shortExpiry: '20250404', longExpiry: '20250411' })
    ).toBe('SPX Calendar FAILED: No strikes found SPX@5000.00 Exp:04/04,04/11')
    expect(
      notificationMessages.tradeFailed('Ghost strike conflict', { putStrike: 4790, callStrike: 5150 })
    ).toBe('SPX Calendar FAILED: Ghost strike conflict Strikes:4790P/5150C')
  })

  it('ロングを調整したトレードは両方のストライクを表示', () => {
    expect(notificationMessages.tradeFilled(makeTrade({ longPutStrike: 4740 }))).toBe(
      'SPX Calendar FILLED: 4.00 debit. Target: 6.00. Strikes: Short:4750P/5150C Long:4740P/5150C'
    )
  })

  it('決済の開始と約定', () => {
    const trade = makeTrade()
    expect(notificationMessages.exitAttempt(trade, 'time exit', 4.6)).toBe(
      'SPX Calendar: Closing CAL_20250307_094512 (time exit). Strikes: 4750P/5150C. Starting price: $4.60'
    )
    expect(notificationMessages.exitFilled(trade, 'time exit', -4.6)).toBe(
      'SPX Calendar CLOSED: time exit at $4.60. P&L: 0.60 (15.0%)'
    )
  })

  it('SPX 価格が不明なら n/a', () => {
    expect(notificationMessages.tradeAttempt(makeTrade({ spxPrice: null }), 3)).toBe(
      'SPX Calendar: Attempting trade at n/a. Strikes: 4750P/5150C. Starting bid: $3.00. Expiry: 20250328/20250404'
    )
  })

  it('照合結果の内訳', () => {
    const base = { tradeIds: [], leg: null, expected: 0, actual: 0, message: '' }
    expect(
      notificationMessages.reconciliation([
        { ...base, kind: 'MISSING_LEG', key: '20250404-4750-P' },
        { ...base, kind: 'ORPHANED_POSITION', key: '20250411-5300-C' },
      ])
    ).toBe('SPX Reconciliation: 2 issues (missing 1, mismatch 0, orphaned 1)')
  })
})

describe('NotificationService', () => {
  afterEach(() => {
    vi.mocked(axios.post).mockReset()
  })

  it('無効時は送信しない', async () => {
    const service = new NotificationService({ webhookUrl: 'http://localhost/hook', enabled: () => false })
    await service.send('test')
    expect(axios.post).not.toHaveBeenCalled()
  })

  it('有効時は webhook に本文を送る', async () => {
    const service = new NotificationService({ webhookUrl: 'http://localhost/hook', enabled: () => true, timeoutMs: 500 })
    await service.send('SPX Calendar: test')
    expect(axios.post).toHaveBeenCalledWith('http://localhost/hook', { text: 'SPX Calendar: test' }, { timeout: 500 })
  })

  it('送信失敗は呼び出し元へ伝えない', async () => {
    vi.mocked(axios.post).mockRejectedValueOnce(new Error('timeout'))
    const service = new NotificationService({ webhookUrl: 'http://localhost/hook', enabled: () => true })
    await expect(service.send('test')).resolves.toBeUndefined()
  })
})
