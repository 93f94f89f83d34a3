import { describe, it, expect } from 'vitest';
import { clampCursor, navigate, stepCursor } from './navigation';

const FILES = ['a.png', 'b.jpg', 'c.png'];

describe('navigate', () => {
  it('moves forward and stops at the last image', () => {
    expect(navigate(0, FILES, { type: 'NEXT' })).toEqual({ cursor: 1, matched: true });
    expect(navigate(2, FILES, { type: 'NEXT' })).toEqual({ cursor: 2, matched: true });
  });

  it('moves back and stops at the first image', () => {
    expect(navigate(2, FILES, { type: 'PREVIOUS' })).toEqual({ cursor: 1, matched: true });
    expect(navigate(0, FILES, { type: 'PREVIOUS' })).toEqual({ cursor: 0, matched: true });
  });

  it('jumps to an exact filename', () => {
    expect(navigate(0, FILES, { type: 'JUMP_TO', name: 'c.png' })).toEqual({ cursor: 2, matched: true });
  });

  it('keeps the cursor for an unknown filename', () => {
    expect(navigate(1, FILES, { type: 'JUMP_TO', name: 'missing.png' })).toEqual({ cursor: 1, matched: false });
  });

  it('matches filenames case-sensitively', () => {
    expect(navigate(0, FILES, { type: 'JUMP_TO', name: 'B.JPG' })).toEqual({ cursor: 0, matched: false });
  });

  it('stays put in a single-image collection', () => {
    expect(navigate(0, ['only.png'], { type: 'NEXT' }).cursor).toBe(0);
    expect(navigate(0, ['only.png'], { type: 'PREVIOUS' }).cursor).toBe(0);
  });
});

describe('clampCursor', () => {
  it('keeps the cursor within the collection', () => {
    expect(clampCursor(-3, 3)).toBe(0);
    expect(clampCursor(7, 3)).toBe(2);
    expect(stepCursor(1, 5, 3)).toBe(2);
  });

  it('refuses an empty collection', () => {
    expect(() => clampCursor(0, 0)).toThrow(RangeError);
  });
});
