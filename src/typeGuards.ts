export function assertDigit(value: number, size: number): void {
  if (!Number.isInteger(value) || value < 1 || value > size) {
    throw new RangeError(`Digit out of range 1-${String(size)}: ${String(value)}`);
  }
}

export function assertNonNullable<T>(value: T, errorOrMessage?: Error | string): asserts value is NonNullable<T> {
  if (value !== null && value !== undefined) {
    return;
  }
  errorOrMessage ??= value === null ? 'Value is null' : 'Value is undefined';
  const error = typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
  throw error;
}

export function ensureNonNullable<T>(value: T, errorOrMessage?: Error | string): NonNullable<T> {
  assertNonNullable(value, errorOrMessage);
  return value;
}

export function isDigitChar(ch: string): boolean {
  return ch.length === 1 && ch >= '1' && ch <= '9';
}
