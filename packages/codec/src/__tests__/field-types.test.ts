import { describe, it, expect } from '@jest/globals';
import { FIELD_TYPES, fitsField, fromRaw, toRaw } from '../codec/field-types.js';

describe('field types', () => {
  it('declares the wire width of every type', () => {
    const widths = Object.fromEntries(Object.entries(FIELD_TYPES).map(([type, info]) => [type, info.width]));
    expect(widths).toEqual({ u8: 1, i8: 1, u16: 2, i16: 2, u32: 4, i32: 4, f32: 4, f64: 8 });
  });

  it('rounds integer raw values half away from zero', () => {
    expect(toRaw('i16', 1, 2.5)).toBe(3);
    expect(toRaw('i16', 1, -2.5)).toBe(-3);
    expect(toRaw('i16', 1, -2.4)).toBe(-2);
    expect(toRaw('u16', 0.5, 10)).toBe(20);
  });

  it('narrows f32 raw values to single precision and leaves f64 unrounded', () => {
    expect(toRaw('f32', 1, 2.5)).toBe(2.5);
    expect(toRaw('f32', 1, 0.1)).toBe(Math.fround(0.1));
    expect(toRaw('f64', 2, 3)).toBe(1.5);
  });

  it('scales raw values back', () => {
    expect(fromRaw(0.5, 20)).toBe(10);
  });

  it('checks raw values against the field range', () => {
    expect(fitsField('u8', 255)).toBe(true);
    expect(fitsField('u8', 256)).toBe(false);
    expect(fitsField('i8', -128)).toBe(true);
    expect(fitsField('i8', -129)).toBe(false);
    expect(fitsField('u32', 0xffffffff)).toBe(true);
    expect(fitsField('i32', 0x80000000)).toBe(false);
    expect(fitsField('f32', 1e39)).toBe(false);
    expect(fitsField('f64', Number.NaN)).toBe(false);
  });
});
