import { OptionRight } from '../../shared/types'

export type OptionInfo = {
  strike: number | null
  expiry: string | null
  right: OptionRight | null
}

/**
 * LocalSymbol からオプション情報を抽出
 * 例: "SPXW  250404P04800000" → { strike: 4800, expiry: "20250404", right: "P" }
 */
export function extractOptionInfo(localSymbol: string | undefined): OptionInfo {
  if (!localSymbol) {
    return { strike: null, expiry: null, right: null }
  }

  // expiry (YYMMDD)
  const expiryMatch = localSymbol.match(/(\d{6})[CP]/)
  const expiry = expiryMatch ? `20${expiryMatch[1]}` : null

  // strike (末尾8桁)
  const strikeMatch = localSymbol.match(/([CP])(\d{8})$/)
  const strike = strikeMatch ? parseInt(strikeMatch[2], 10) / 1000 : null

  const right: OptionRight | null = strikeMatch ? (strikeMatch[1] === 'P' ? 'P' : 'C') : null

  return { strike, expiry, right }
}

/** ポジション照合用キー 例: "20250404-4800-P" */
export function positionKey(expiry: string, strike: number, right: OptionRight): string {
  return `${expiry.slice(0, 8)}-${Number(strike)}-${right}`
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
