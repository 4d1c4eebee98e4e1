/**
 * Render `array` as lowercase hex, first byte first.
 */
export function uint8ArrayToHexString(array: Uint8Array): string {
  return Array.from(array, x => x.toString(16).padStart(2, '0')).join('');
}

/**
 * Parse a hexadecimal string (with or without a `0x` prefix) into an
 * unsigned integer of at most `bytes` bytes.
 */
export function hexStringToBigInt(str: string, bytes: number): bigint {
  const digits = str.startsWith('0x') ? str.slice(2) : str;
  if (digits.length === 0 || !/^[0-9a-fA-F]+$/.test(digits)) {
    throw new RangeError(`Not a hexadecimal string: ${str}`);
  }
  if (digits.replace(/^0+/, '').length > bytes * 2) {
    throw new RangeError(`Hexadecimal string does not fit in ${bytes} bytes: ${str}`);
  }
  return BigInt(`0x${digits}`);
}

/**
 * Render an unsigned integer as hex, zero-padded to `bytes` bytes.
 */
export function bigIntToHexString(value: bigint, bytes: number): string {
  return value.toString(16).padStart(bytes * 2, '0');
}

