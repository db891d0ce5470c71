import { describe, expect, it } from 'vitest'
import { CommandProcessor, parseImportTrade } from '../services/calendar/CommandProcessor'
import { ENTRY_NOW, createHarness, fixedClock, makeTrade, quoteLegs } from './support/fixtures'

function setup() {
  const harness = createHarness()
  const processor = new CommandProcessor(
    harness.store,
    harness.lifecycle,
    harness.reconciliation,
    harness.activity,
    fixedClock(ENTRY_NOW)
  )
  return { ...harness, processor }
}

describe('parseImportTrade', () => {
  it('文字列の数値を受け付け、必須項目がなければエラー', () => {
    const input = parseImportTrade(
      {
        entryDate: '2025-03-12',
        shortExpiry: '20250402',
        longExpiry: '20250409',
        putStrike: '4800',
        callStrike: 5200,
        entryCredit: '3.85',
        notes: '',
      },
      null
    )
    expect(input).toMatchObject({ tradeId: undefined, putStrike: 4800, callStrike: 5200, entryCredit: 3.85, notes: undefined })

    expect(() => parseImportTrade({ entryDate: '2025-03-12' }, null)).toThrow('Missing parameter: shortExpiry')
  })
})

describe('CommandProcessor', () => {
  it('CLOSE_POSITION で決済して COMPLETED', async () => {
    const { gateway, store, processor } = setup()
    const trade = makeTrade()
    await store.saveTrade(trade)
    quoteLegs(gateway, trade)
    gateway.onPlace = ({ orderId, spec }) => gateway.emitStatus(orderId, 'Filled', spec.limitPrice)
    const command = await store.enqueueCommand({ commandType: 'CLOSE_POSITION', tradeId: trade.tradeId })

    const summary = await processor.processPending()

    expect(summary).toEqual({ processed: 1, completed: 1, failed: 0 })
    expect(await store.getCommand(command.id)).toMatchObject({
      status: 'COMPLETED',
      result: 'Closed CAL_20250307_094512 at 3.00',
      processedAt: ENTRY_NOW.toJSDate(),
    })
    expect((await store.getTrade(trade.tradeId))?.exitReason).toBe('manual close')
  })

  it('決済済みのトレードは注記付きで完了', async () => {
    const { store, processor } = setup()
    await store.saveTrade(makeTrade({ status: 'CLOSED' }))
    const command = await store.enqueueCommand({ commandType: 'CLOSE_POSITION', tradeId: 'CAL_20250307_094512' })

    await processor.processPending()

    expect(await store.getCommand(command.id)).toMatchObject({
      status: 'COMPLETED',
      result: 'Trade CAL_20250307_094512 already CLOSED',
    })
  })

  it('失敗したコマンドは FAILED にして次へ進む', async () => {
    const { store, processor } = setup()
    await store.saveTrade(makeTrade({ status: 'MANUAL_CONTROL' }))
    const manual = await store.enqueueCommand({ commandType: 'CLOSE_POSITION', tradeId: 'CAL_20250307_094512' })
    const unknown = await store.enqueueCommand({ commandType: 'FLATTEN_ALL' })
    const noTrade = await store.enqueueCommand({ commandType: 'STOP_MANAGING' })
    const reconcile = await store.enqueueCommand({ commandType: 'RUN_RECONCILIATION' })

    const summary = await processor.processPending()

    expect(summary).toEqual({ processed: 4, completed: 1, failed: 3 })
    expect(await store.getCommand(manual.id)).toMatchObject({
      status: 'FAILED',
      result: '不正な状態遷移 CAL_20250307_094512: MANUAL_CONTROL → CLOSED',
    })
    expect(await store.getCommand(unknown.id)).toMatchObject({ status: 'FAILED', result: 'Unknown command type: FLATTEN_ALL' })
    expect(await store.getCommand(noTrade.id)).toMatchObject({ status: 'FAILED', result: 'トレードが見つかりません: (none)' })
    expect(await store.getCommand(reconcile.id)).toMatchObject({
      status: 'COMPLETED',
      result: 'Clean (0 trades, 0 positions)',
    })
  })

  it('RECORD_EXTERNAL_CLOSE と IMPORT_TRADE', async () => {
    const { gateway, store, processor } = setup()
    gateway.onPlace = ({ orderId }) => gateway.emitStatus(orderId, 'Submitted')
    await store.saveTrade(makeTrade())
    const close = await store.enqueueCommand({
      commandType: 'RECORD_EXTERNAL_CLOSE',
      tradeId: 'CAL_20250307_094512',
      parameters: { exitCredit: '5.2', exitDate: '2025-03-13' },
    })
    const imported = await store.enqueueCommand({
      commandType: 'IMPORT_TRADE',
      parameters: {
        entryDate: '2025-03-12',
        shortExpiry: '20250402',
        longExpiry: '20250409',
        putStrike: 4800,
        callStrike: 5200,
        entryCredit: 3.85,
      },
    })

    await processor.processPending()

    expect((await store.getCommand(close.id))?.result).toBe('Recorded close of CAL_20250307_094512 (P&L 1.20)')
    expect((await store.getCommand(imported.id))?.result).toBe('Imported CAL_20250312_IMPORT (target PLACED)')
    expect((await store.getTrade('CAL_20250307_094512'))?.exitDate).toBe('2025-03-13')
  })

  it('STOP_MANAGING: GTC の取消が確認できなければ FAILED', async () => {
    const { gateway, store, processor } = setup()
    gateway.onCancel = () => undefined
    await store.saveTrade(makeTrade({ profitTargetOrderId: 55, profitTargetPrice: 6, profitTargetStatus: 'PLACED' }))
    const command = await store.enqueueCommand({ commandType: 'STOP_MANAGING', tradeId: 'CAL_20250307_094512' })

    const summary = await processor.processPending()

    expect(summary).toEqual({ processed: 1, completed: 0, failed: 1 })
    expect(await store.getCommand(command.id)).toMatchObject({
      status: 'FAILED',
      result: 'profit target cancel not confirmed (CAL_20250307_094512 GTC #55)',
    })
    expect((await store.getTrade('CAL_20250307_094512'))?.status).toBe('ACTIVE')
  })

  it('7日より古い完了済みコマンドを削除', async () => {
    const { store, processor } = setup()
    const old = await store.enqueueCommand({ commandType: 'RUN_RECONCILIATION' })
    store.commands.set(old.id, {
      ...old,
      status: 'COMPLETED',
      createdAt: ENTRY_NOW.minus({ days: 8 }).toJSDate(),
    })

    const summary = await processor.processPending()

    expect(summary.processed).toBe(0)
    expect(await store.getCommand(old.id)).toBeNull()
  })
})
