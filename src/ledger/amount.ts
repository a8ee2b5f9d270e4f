const AMOUNT_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/** Parses a decimal string into integer minor units, or null when it does not fit the precision. */
export function parseAmount(amount: string, precision: number): bigint | null {
  const match = AMOUNT_PATTERN.exec(amount.trim());
  if (!match) return null;
  const whole = match[1];
  const fraction = match[2] ?? "";
  if (fraction.length > precision) return null;
  return BigInt(whole + fraction.padEnd(precision, "0"));
}

export function formatAmount(units: bigint, precision: number): string {
  if (precision === 0) return units.toString();
  const digits = units.toString().padStart(precision + 1, "0");
  return `${digits.slice(0, -precision)}.${digits.slice(-precision)}`;
}
