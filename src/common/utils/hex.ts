import { DecodeError } from './error-handler';

const HEX_PREFIX = '0x';
const HEX_BODY = /^[+-]?[0-9a-fA-F]+$/;

export const INT64_MAX = 2n ** 63n - 1n;
export const INT64_MIN = -(2n ** 63n);

/**
 * Decode a hexadecimal quantity such as `0x1b4` into a signed 64-bit integer.
 *
 * A single leading `0x` is stripped; the remainder may carry a sign and must consist of
 * hex digits only. Empty bodies, stray characters and values outside the int64 range
 * raise {@link DecodeError}.
 */
export function hexToInteger(input: string): bigint {
  const body = input.startsWith(HEX_PREFIX) ? input.slice(HEX_PREFIX.length) : input;

  if (!HEX_BODY.test(body)) {
    throw new DecodeError(`Invalid hexadecimal quantity: "${input}"`, input);
  }

  const negative = body.startsWith('-');
  const digits = body.replace(/^[+-]/, '');
  const magnitude = BigInt(`${HEX_PREFIX}${digits}`);
  const value = negative ? -magnitude : magnitude;

  if (value > INT64_MAX || value < INT64_MIN) {
    throw new DecodeError(`Hexadecimal quantity out of int64 range: "${input}"`, input);
  }

  return value;
}

/**
 * Encode an integer as a lowercase `0x` quantity without leading zeros
 */
export function integerToHex(value: bigint): string {
  return value < 0n ? `-${HEX_PREFIX}${(-value).toString(16)}` : `${HEX_PREFIX}${value.toString(16)}`;
}
