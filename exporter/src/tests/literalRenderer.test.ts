import { describe, it, expect } from 'vitest';
import type { TypeDescriptor } from '../models/scriptAsset.js';
import { renderLiteral } from '../services/literalRenderer.js';

const t = (category: string): TypeDescriptor => ({ category, isArray: false });

describe('renderLiteral', () => {
  it('renders nothing for absent values', () => {
    expect(renderLiteral(t('int'), undefined)).toBe('');
    expect(renderLiteral(t('int'), null)).toBe('');
  });

  it('passes strings through unchanged', () => {
    expect(renderLiteral(t('real'), '(X=1,Y=2)')).toBe('(X=1,Y=2)');
    expect(renderLiteral(t('string'), '')).toBe('');
  });

  it('renders booleans', () => {
    expect(renderLiteral(t('bool'), true)).toBe('true');
    expect(renderLiteral(t('bool'), false)).toBe('false');
  });

  it('truncates integers toward zero', () => {
    expect(renderLiteral(t('int'), 3.9)).toBe('3');
    expect(renderLiteral(t('int64'), -3.9)).toBe('-3');
    expect(renderLiteral(t('byte'), 255)).toBe('255');
  });

  it('renders reals with six decimals regardless of category case', () => {
    expect(renderLiteral(t('real'), 1.5)).toBe('1.500000');
    expect(renderLiteral(t('Float'), 2)).toBe('2.000000');
  });

  it('renders numbers of other categories as-is', () => {
    expect(renderLiteral(t('name'), 7)).toBe('7');
  });

  it('renders structs in key order with real members', () => {
    expect(renderLiteral(t('struct'), { X: 1, Y: 2, Z: 0 })).toBe('(X=1.000000,Y=2.000000,Z=0.000000)');
  });

  it('renders nested struct members', () => {
    const value = { Loc: { X: 1 }, Name: 'Door', Tags: ['a', 'b'], Empty: null };
    expect(renderLiteral(t('struct'), value)).toBe('(Loc=(X=1.000000),Name=Door,Tags=(a,b),Empty=)');
  });

  it('renders arrays with the element category', () => {
    expect(renderLiteral({ category: 'int', isArray: true }, [1, 2, 3])).toBe('(1,2,3)');
    expect(renderLiteral({ category: 'struct', isArray: true }, [{ A: true }])).toBe('((A=true))');
  });
});
