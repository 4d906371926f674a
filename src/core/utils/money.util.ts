/**
 * Decimal money helpers. Amounts travel as strings with two fraction digits
 * ("9.99") and are added up in integer minor units, never as floats.
 */

const AMOUNT_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

export const MONEY_PATTERN = /^\d+(\.\d{1,2})?$/;

export function toMinorUnits(amount: string | number): number {
  const text = typeof amount === 'number' ? amount.toFixed(2) : amount.trim();
  const match = AMOUNT_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`Invalid monetary amount: "${text}"`);
  }

  const [, sign, whole, fraction = ''] = match;
  const cents =
    Number.parseInt(whole, 10) * 100 +
    Number.parseInt(fraction.padEnd(2, '0'), 10);

  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Monetary amount out of range: "${text}"`);
  }

  return sign ? -cents : cents;
}

export function fromMinorUnits(cents: number): string {
  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Minor units must be an integer, got ${cents}`);
  }

  const sign = cents < 0 ? '-' : '';
  const absolute = Math.abs(cents);
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

export function normalizeAmount(amount: string | number): string {
  return fromMinorUnits(toMinorUnits(amount));
}

export function sumAmounts(amounts: readonly string[]): string {
  return fromMinorUnits(
    amounts.reduce((total, amount) => total + toMinorUnits(amount), 0),
  );
}
