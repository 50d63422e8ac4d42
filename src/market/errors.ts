/**
 * Market error taxonomy
 *
 * Guard failures are returned as values from every operation, never thrown.
 * Numeric codes are stable and exposed to API consumers.
 */

export const MARKET_ERRORS = {
  OwnerOnly: { code: 100, kind: 'authorization', message: 'Caller is not the owner or round creator' },
  NotFound: { code: 101, kind: 'not-found', message: 'Record not found' },
  AlreadyPredicted: { code: 102, kind: 'phase', message: 'Prediction already recorded or rewarded' },
  PredictionClosed: { code: 103, kind: 'phase', message: 'Submission window has closed' },
  InsufficientStake: { code: 104, kind: 'validation', message: 'Stake is below the minimum' },
  InvalidSentiment: { code: 105, kind: 'validation', message: 'Sentiment must be 1, 2 or 3' },
  PredictionActive: { code: 106, kind: 'phase', message: 'Round is not yet resolvable' },
  AlreadyResolved: { code: 107, kind: 'phase', message: 'Round already resolved' },
  InvalidTimeframe: { code: 108, kind: 'validation', message: 'Durations and prices must be positive' },
  InvalidFee: { code: 109, kind: 'validation', message: 'Protocol fee must be between 0 and 100' },
  TransferFailed: { code: 110, kind: 'ledger', message: 'Stake ledger transfer failed' },
  InvalidAsset: { code: 111, kind: 'validation', message: 'Asset id must be 1-20 characters' },
} as const;

export type MarketErrorCode = keyof typeof MARKET_ERRORS;

export type MarketErrorKind = (typeof MARKET_ERRORS)[MarketErrorCode]['kind'];

export class MarketError extends Error {
  readonly code: MarketErrorCode;
  readonly numericCode: number;
  readonly kind: MarketErrorKind;

  constructor(code: MarketErrorCode, detail?: string) {
    const entry = MARKET_ERRORS[code];
    super(detail ? `${entry.message}: ${detail}` : entry.message);
    this.name = 'MarketError';
    this.code = code;
    this.numericCode = entry.code;
    this.kind = entry.kind;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: MarketError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: MarketErrorCode, detail?: string): Result<T> {
  return { ok: false, error: new MarketError(code, detail) };
}

export function isMarketError(error: unknown): error is MarketError {
  return error instanceof MarketError;
}
