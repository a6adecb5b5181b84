import { BYTES_BASE, BYTE_UNITS } from '../constants/index.js';
import { ByteSize } from '../types/index.js';
import { InvalidArgumentError } from './errors.js';

const UNIT_SYMBOL = /^(KB|MB|GB|TB)$/i;

function unitFactor(index: number): number {
  return BYTES_BASE ** (index + 1);
}

/**
 * Render a byte count in the largest unit that keeps the scaled value below
 * 1024. Counts beyond the terabyte range stay in terabytes.
 */
export function bytesToSize(bytes: number): ByteSize {
  if (!Number.isFinite(bytes) || bytes < 0) {
    throw new InvalidArgumentError(`Byte count must be a non-negative number, got ${bytes}`);
  }

  let index = BYTE_UNITS.findIndex((_unit, i) => bytes / BYTES_BASE < unitFactor(i));
  if (index === -1) {
    index = BYTE_UNITS.length - 1;
  }

  const calculatedSize = bytes / unitFactor(index);
  return {
    symbolic: `${calculatedSize.toFixed(3)} ${BYTE_UNITS[index]}`,
    calculatedSize,
    bytesSize: bytes
  };
}

/**
 * Parse a human size such as `657 KB` or `12.4 MB`. Returns null when the
 * text is not a number followed by a KB/MB/GB/TB unit.
 */
export function parseByteSize(text: string): ByteSize | null {
  const parts = text.trim().split(/\s+/);
  if (parts.length !== 2 || !UNIT_SYMBOL.test(parts[1])) {
    return null;
  }

  const amount = Number(parts[0].replace(/,/g, ''));
  if (!Number.isFinite(amount)) {
    return null;
  }

  const symbol = parts[1].toUpperCase();
  const index = BYTE_UNITS.findIndex(unit => unit.startsWith(symbol));
  return bytesToSize(amount * unitFactor(index));
}
