// controllers/respond.ts
import { Response } from 'express'
import {
  InvalidTransitionError,
  ProfitTargetCancelError,
  SettingValidationError,
  TradeNotFoundError,
} from '../utils/errors'
import { errorMessage } from '../utils/util'

function statusFor(error: unknown): number {
  if (error instanceof SettingValidationError) return 400
  if (error instanceof InvalidTransitionError) return 409
  if (error instanceof ProfitTargetCancelError) return 409
  if (error instanceof TradeNotFoundError) return 404
  return 500
}

export function sendError(res: Response, error: unknown, message: string): void {
  const status = statusFor(error)
  if (status === 500) {
    console.error(`${message}:`, error)
  }
  res.status(status).json({
    success: false,
    message,
    error: errorMessage(error),
  })
}
