// backend/services/calendar/CommandProcessor.ts
import { COMMAND_TYPES, CommandParameters, CommandType, QueuedCommand } from '../../../shared/types'
import { PositionStore } from '../store/PositionStore'
import { ActivityLogger } from './ActivityLogger'
import { ImportTradeInput, PositionLifecycleService } from './PositionLifecycleService'
import { ReconciliationService } from './ReconciliationService'
import { Clock } from '../../utils/marketTime'
import { TradeNotFoundError } from '../../utils/errors'
import { errorMessage } from '../../utils/util'

// 完了/失敗したコマンドの保持期間
const COMMAND_RETENTION_DAYS = 7

export interface CommandRunSummary {
  processed: number
  completed: number
  failed: number
}

function isCommandType(value: string): value is CommandType {
  return COMMAND_TYPES.some((type) => type === value)
}

function numberParam(parameters: CommandParameters, name: string): number | undefined {
  const value = parameters[name]
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value)
  return undefined
}

function stringParam(parameters: CommandParameters, name: string): string | undefined {
  const value = parameters[name]
  if (typeof value === 'string' && value.trim() !== '') return value.trim()
  if (typeof value === 'number') return String(value)
  return undefined
}

function requireNumber(parameters: CommandParameters, name: string): number {
  const value = numberParam(parameters, name)
  if (value === undefined) {
    throw new Error(`Missing numeric parameter: ${name}`)
  }
  return value
}

function requireString(parameters: CommandParameters, name: string): string {
  const value = stringParam(parameters, name)
  if (value === undefined) {
    throw new Error(`Missing parameter: ${name}`)
  }
  return value
}

export function parseImportTrade(parameters: CommandParameters, tradeId: string | null): ImportTradeInput {
  return {
    tradeId: tradeId ?? stringParam(parameters, 'tradeId'),
    entryDate: requireString(parameters, 'entryDate'),
    entryTime: stringParam(parameters, 'entryTime'),
    spxPrice: numberParam(parameters, 'spxPrice'),
    shortExpiry: requireString(parameters, 'shortExpiry'),
    longExpiry: requireString(parameters, 'longExpiry'),
    putStrike: requireNumber(parameters, 'putStrike'),
    callStrike: requireNumber(parameters, 'callStrike'),
    longPutStrike: numberParam(parameters, 'longPutStrike'),
    longCallStrike: numberParam(parameters, 'longCallStrike'),
    entryCredit: requireNumber(parameters, 'entryCredit'),
    notes: stringParam(parameters, 'notes'),
  }
}

/**
 * ダッシュボードから投入されたコマンドを順に処理する。
 * 例外はコマンド単位で FAILED にして、ポーリングは止めない。
 */
export class CommandProcessor {
  constructor(
    private store: PositionStore,
    private lifecycle: PositionLifecycleService,
    private reconciliation: ReconciliationService,
    private activity: ActivityLogger,
    private clock: Clock
  ) {}

  public async processPending(): Promise<CommandRunSummary> {
    const summary: CommandRunSummary = { processed: 0, completed: 0, failed: 0 }

    let pending: QueuedCommand[]
    try {
      pending = await this.store.listPendingCommands()
    } catch (error) {
      console.error('コマンドキュー取得エラー:', errorMessage(error))
      return summary
    }

    for (const command of pending) {
      summary.processed++
      const ok = await this.processCommand(command)
      if (ok) summary.completed++
      else summary.failed++
    }

    await this.cleanup()
    return summary
  }

  private async processCommand(command: QueuedCommand): Promise<boolean> {
    console.log(`⚙️ コマンド処理: ${command.commandType} (${command.id}) ${command.tradeId ?? ''}`)

    try {
      await this.store.updateCommand(command.id, { status: 'PROCESSING' })
      const result = await this.execute(command)
      await this.store.updateCommand(command.id, {
        status: 'COMPLETED',
        result,
        processedAt: this.clock().toJSDate(),
      })
      await this.activity.log('COMMAND', `${command.commandType}: ${result}`, true)
      return true
    } catch (error) {
      const message = errorMessage(error)
      console.error(`コマンド失敗 ${command.commandType}:`, message)
      try {
        await this.store.updateCommand(command.id, {
          status: 'FAILED',
          result: message,
          processedAt: this.clock().toJSDate(),
        })
      } catch (updateError) {
        console.error('コマンド状態更新エラー:', errorMessage(updateError))
      }
      await this.activity.log('COMMAND', `${command.commandType} 失敗: ${message}`, false)
      return false
    }
  }

  private async execute(command: QueuedCommand): Promise<string> {
    const type = command.commandType
    if (!isCommandType(type)) {
      throw new Error(`Unknown command type: ${type}`)
    }

    switch (type) {
      case 'CLOSE_POSITION': {
        const tradeId = this.requireTradeId(command)
        const outcome = await this.lifecycle.closePosition(tradeId, 'manual close')
        if (outcome.status === 'ALREADY_CLOSED') {
          return `Trade ${tradeId} already ${outcome.trade.status}`
        }
        if (outcome.status === 'FAILED') {
          throw new Error(`Close failed: ${outcome.reason}`)
        }
        return `Closed ${tradeId} at ${(outcome.trade.exitCredit ?? 0).toFixed(2)}`
      }

      case 'STOP_MANAGING': {
        const tradeId = this.requireTradeId(command)
        const trade = await this.lifecycle.stopManaging(tradeId)
        return `Trade ${tradeId} is ${trade.status}`
      }

      case 'RUN_RECONCILIATION': {
        const report = await this.reconciliation.reconcile()
        return report.clean
          ? `Clean (${report.checkedTrades} trades, ${report.brokerPositions} positions)`
          : `${report.discrepancies.length} discrepancies`
      }

      case 'PLACE_MISSING_GTC': {
        const summary = await this.lifecycle.placeMissingProfitTargets()
        const failed = summary.failedTrades.length > 0 ? ` (failed: ${summary.failedTrades.join(', ')})` : ''
        return `Placed ${summary.placed}/${summary.totalMissing}${failed}`
      }

      case 'RECORD_EXTERNAL_CLOSE': {
        const tradeId = this.requireTradeId(command)
        const trade = await this.lifecycle.recordExternalClose(
          tradeId,
          requireNumber(command.parameters, 'exitCredit'),
          stringParam(command.parameters, 'exitDate'),
          stringParam(command.parameters, 'exitTime')
        )
        return `Recorded close of ${tradeId} (P&L ${(trade.realizedPnl ?? 0).toFixed(2)})`
      }

      case 'IMPORT_TRADE': {
        const trade = await this.lifecycle.importTrade(parseImportTrade(command.parameters, command.tradeId))
        return `Imported ${trade.tradeId} (target ${trade.profitTargetStatus})`
      }

      case 'RUN_ENTRY': {
        const outcome = await this.lifecycle.runDailyEntry({ force: true })
        if (outcome.status === 'FILLED') {
          return `Entered ${outcome.trade.tradeId} at ${(outcome.trade.entryCredit ?? 0).toFixed(2)}`
        }
        if (outcome.status === 'FAILED') {
          throw new Error(outcome.reason)
        }
        return `Skipped: ${outcome.reason}`
      }
    }
  }

  private requireTradeId(command: QueuedCommand): string {
    if (!command.tradeId) {
      throw new TradeNotFoundError('(none)')
    }
    return command.tradeId
  }

  private async cleanup(): Promise<void> {
    const cutoff = this.clock().minus({ days: COMMAND_RETENTION_DAYS }).toJSDate()
    try {
      const removed = await this.store.deleteCommandsOlderThan(cutoff)
      if (removed > 0) {
        console.log(`古いコマンド ${removed}件を削除`)
      }
    } catch (error) {
      console.error('コマンド削除エラー:', errorMessage(error))
    }
  }
}
