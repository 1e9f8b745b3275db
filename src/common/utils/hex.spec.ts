import { describe, expect, it } from 'vitest';

import { AppError, DecodeError, RpcError } from './error-handler';
import { hexToInteger, INT64_MAX, INT64_MIN, integerToHex } from './hex';

describe('hexToInteger', (): void => {
  it('decodes a prefixed block height', (): void => {
    expect(hexToInteger('0x1b4')).toBe(436n);
  });

  it('decodes zero', (): void => {
    expect(hexToInteger('0x0')).toBe(0n);
  });

  it('accepts mixed case digits and leading zeros', (): void => {
    expect(hexToInteger('0x00FfA')).toBe(4090n);
  });

  it('decodes a body without the prefix', (): void => {
    expect(hexToInteger('ff')).toBe(255n);
  });

  it('decodes the int64 bounds', (): void => {
    expect(hexToInteger('0x7fffffffffffffff')).toBe(INT64_MAX);
    expect(hexToInteger('0x-8000000000000000')).toBe(INT64_MIN);
  });

  it('recovers the numeric value after re-encoding', (): void => {
    for (const input of ['0x1', '0x1b4', '0x12a05f200', '0x7fffffffffffffff']) {
      expect(integerToHex(hexToInteger(input))).toBe(input);
    }
  });

  it.each([
    ['empty string', ''],
    ['prefix only', '0x'],
    ['non-hex characters', 'notahex'],
    ['non-hex digit after prefix', '0x1g'],
    ['upper-case prefix', '0X10'],
    ['double prefix', '0x0x10'],
    ['whitespace', ' 0x10'],
    ['sign without digits', '0x-'],
  ])('rejects %s', (_label: string, input: string): void => {
    expect((): bigint => hexToInteger(input)).toThrow(DecodeError);
  });

  it('rejects values above the int64 range', (): void => {
    expect((): bigint => hexToInteger('0x8000000000000000')).toThrow('out of int64 range');
  });

  it('rejects values below the int64 range', (): void => {
    expect((): bigint => hexToInteger('0x-8000000000000001')).toThrow('out of int64 range');
  });

  it('keeps the offending input on the error', (): void => {
    let caught: unknown;
    try {
      hexToInteger('notahex');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toBeInstanceOf(AppError);
    expect(caught).not.toBeInstanceOf(RpcError);
    if (caught instanceof DecodeError) {
      expect(caught.input).toBe('notahex');
      expect(caught.reason).toBe('decode');
      expect(caught.code).toBe('DECODE_ERROR');
    }
  });
});

describe('integerToHex', (): void => {
  it('writes lowercase digits without leading zeros', (): void => {
    expect(integerToHex(4090n)).toBe('0xffa');
    expect(integerToHex(0n)).toBe('0x0');
  });
});
