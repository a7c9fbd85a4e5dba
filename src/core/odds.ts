import { WagerError } from './errors.js';

const EPSILON = 1e-9;

export type OddsErrorCode = 'InvalidOdds' | 'InvalidPrice' | 'EmptyLegSet';
export type OutcomeKind = 'won' | 'lost' | 'push' | 'void';

export class OddsConversionError extends WagerError {
  constructor(code: OddsErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'OddsConversionError';
  }
}

const ensureAmerican = (value: number): number => {
  if (!Number.isFinite(value)) throw new OddsConversionError('InvalidOdds', 'american odds must be finite', { americanOdds: value });
  if (value > -100 && value < 100) {
    throw new OddsConversionError('InvalidOdds', 'american odds must be -100 or lower, or +100 or higher', { americanOdds: value });
  }
  return value;
};

const ensureDecimalPrice = (value: number): number => {
  if (!Number.isFinite(value)) throw new OddsConversionError('InvalidPrice', 'decimal price must be finite', { decimalPrice: value });
  if (value <= 1 + EPSILON) throw new OddsConversionError('InvalidPrice', 'decimal price must be greater than 1', { decimalPrice: value });
  return value;
};

export const toDecimal = (americanOdds: number): number => {
  const odds = ensureAmerican(americanOdds);
  return odds > 0 ? 1 + odds / 100 : 1 + 100 / Math.abs(odds);
};

/**
 * Rounds to whole American odds. -100 and +100 are the same even-money price, so
 * `toAmerican(toDecimal(-100))` is `100`.
 */
export const toAmerican = (decimalPrice: number): number => {
  const price = ensureDecimalPrice(decimalPrice);
  if (price >= 2) return Math.round((price - 1) * 100);
  return Math.round(-100 / (price - 1));
};

export const combineLegs = (prices: readonly number[]): number => {
  if (!prices.length) throw new OddsConversionError('EmptyLegSet', 'at least one leg price is required');
  return prices.reduce((product, price) => product * ensureDecimalPrice(price), 1);
};

export const priceLegs = (americanOdds: readonly number[]): number => combineLegs(americanOdds.map((odds) => toDecimal(odds)));

export const resultValue = (stake: number, decimalPrice: number, outcome: OutcomeKind): number => {
  if (!Number.isFinite(stake) || stake <= 0) throw new WagerError('InvalidStake', 'stake must be a positive number', { stake });
  switch (outcome) {
    case 'won':
      return stake * (ensureDecimalPrice(decimalPrice) - 1);
    case 'lost':
      return -stake;
    case 'push':
    case 'void':
      return 0;
  }
};

export const formatAmerican = (americanOdds: number): string => (americanOdds > 0 ? `+${americanOdds}` : `${americanOdds}`);

/** Parses user-typed odds such as "+150", "-110" or " 200 ". */
export const parseAmerican = (raw: string): number => {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+(\.\d+)?$/.test(trimmed)) throw new OddsConversionError('InvalidOdds', `"${raw}" is not a valid american odds value`, { raw });
  return ensureAmerican(Number(trimmed));
};
