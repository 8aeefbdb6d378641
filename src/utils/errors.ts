/**
 * Tagged errors for the PCR pipeline.
 *
 * Every failure is a value: operations return `Result<T>` and only the CLI
 * decides how to print it.
 */

export type PCRError =
  | { kind: 'InvalidExpressionFormat'; message: string; input: string }
  | { kind: 'InvalidMonth'; message: string; month: string }
  | { kind: 'InvalidDate'; message: string; year: number; month: number; day: number }
  | { kind: 'NoOptionsForDate'; message: string; symbol: string; date: string | null }
  | { kind: 'StrikeNotFound'; message: string; strike: number; date: string }
  | { kind: 'InvalidRange'; message: string }
  | { kind: 'ProviderUnavailable'; message: string; symbol: string };

export type PCRErrorKind = PCRError['kind'];

export type Result<T> = { ok: true; value: T } | { ok: false; error: PCRError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: PCRError): Result<T> {
  return { ok: false, error };
}

export const EXPRESSION_USAGE =
  "Use 'Month Day, Strike' (e.g. 'Nov 29, 150'), 'Month' (e.g. 'Nov'), or 'all'.";

export function invalidExpressionFormat(input: string, detail?: string): PCRError {
  return {
    kind: 'InvalidExpressionFormat',
    message: `Invalid format for date-strike "${input}". ${detail ?? EXPRESSION_USAGE}`,
    input,
  };
}

export function invalidMonth(month: string): PCRError {
  return {
    kind: 'InvalidMonth',
    message: `Invalid month provided: "${month}"`,
    month,
  };
}

export function invalidDate(year: number, month: number, day: number): PCRError {
  return {
    kind: 'InvalidDate',
    message: `Invalid date provided: ${year}-${month}-${day}`,
    year,
    month,
    day,
  };
}

export function noOptionsForDate(symbol: string, date: string | null): PCRError {
  return {
    kind: 'NoOptionsForDate',
    message: date
      ? `No options data available for ${symbol} on the expiration date ${date}`
      : `No upcoming option expirations listed for ${symbol}`,
    symbol,
    date,
  };
}

export function strikeNotFound(strike: number, date: string): PCRError {
  return {
    kind: 'StrikeNotFound',
    message: `No options data found for strike price ${strike} on ${date}`,
    strike,
    date,
  };
}

export function invalidRange(message: string): PCRError {
  return { kind: 'InvalidRange', message };
}

export function providerUnavailable(symbol: string, error: unknown): PCRError {
  const detail = error instanceof Error ? error.message : String(error);
  return {
    kind: 'ProviderUnavailable',
    message: `Market data unavailable for ${symbol}: ${detail}`,
    symbol,
  };
}
