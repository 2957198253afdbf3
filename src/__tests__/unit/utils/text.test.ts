/**
 * Unit tests for the text helpers.
 */

import { describe, it, expect } from 'vitest';
import { InputEncodingError } from '../../../exceptions';
import { decodeInput, digitsOnly, foldText, toDisplayLine, touchesMask } from '../../../utils/text';

describe('decodeInput', () => {
  it('returns null for absent input', () => {
    expect(decodeInput(null)).toBeNull();
    expect(decodeInput(undefined)).toBeNull();
  });

  it('decodes UTF-8 bytes', () => {
    expect(decodeInput(new TextEncoder().encode('endereço'))).toBe('endereço');
  });

  it('rejects malformed bytes', () => {
    expect(() => decodeInput(new Uint8Array([0xff, 0xfe]))).toThrow(InputEncodingError);
  });

  it('rejects unpaired surrogates', () => {
    expect(() => decodeInput('abc\uD800')).toThrow('Input contains unpaired UTF-16 surrogates');
  });
});

describe('foldText', () => {
  it('strips accents and case', () => {
    expect(foldText('Endereço HABILITAÇÃO')).toBe('endereco habilitacao');
  });
});

describe('digitsOnly', () => {
  it('keeps only digits', () => {
    expect(digitsOnly('(61) 99876-5432')).toBe('61998765432');
  });
});

describe('touchesMask', () => {
  it('sees a mask inside the span', () => {
    expect(touchesMask('12*45', 0, 5)).toBe(true);
  });

  it('sees a mask through one separator', () => {
    const text = '***.456.789-**';
    expect(touchesMask(text, 4, 11)).toBe(true);
  });

  it('ignores masks further away', () => {
    expect(touchesMask('**  12345', 4, 9)).toBe(false);
  });
});

describe('toDisplayLine', () => {
  it('flattens control characters and whitespace', () => {
    expect(toDisplayLine(' Rua\tA,\n10 ')).toBe('Rua A, 10');
  });
});
