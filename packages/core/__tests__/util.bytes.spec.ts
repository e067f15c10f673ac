import { base64Decode, base64Encode, concat, hexDecode, hexEncode, wipe } from '../src/util/bytes.js';
import { DecodingError } from '../src/errors/index.js';

describe('byte helpers', () => {
  it('concatenates in order', () => {
    expect(Array.from(concat(new Uint8Array([1]), new Uint8Array(0), new Uint8Array([2, 3])))).toEqual([1, 2, 3]);
  });

  it('encodes Base64 and hex', () => {
    const b = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
    expect(base64Encode(b)).toBe('3q2+7w==');
    expect(hexEncode(b)).toBe('deadbeef');
    expect(Array.from(base64Decode('3q2+7w=='))).toEqual([0xde, 0xad, 0xbe, 0xef]);
    expect(Array.from(hexDecode('DEADbeef'))).toEqual([0xde, 0xad, 0xbe, 0xef]);
  });

  it('rejects malformed input', () => {
    expect(() => base64Decode('abc')).toThrow(DecodingError);
    expect(() => base64Decode('ab$=')).toThrow(DecodingError);
    expect(() => hexDecode('abc')).toThrow(DecodingError);
    expect(() => hexDecode('zz')).toThrow(DecodingError);
  });

  it('wipes in place', () => {
    const b = new Uint8Array([1, 2, 3]);
    wipe(b);
    wipe(null);
    expect(Array.from(b)).toEqual([0, 0, 0]);
  });
});
