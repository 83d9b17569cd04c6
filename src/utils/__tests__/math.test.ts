/**
 * Decimal Helper Tests
 */

import { Decimal, formatAmount, formatPercent, formatSignedAmount, maxDecimal, minDecimal, signOf, sumDecimals, toDecimal } from '../math';
import { InputError } from '../errors';

describe('toDecimal', () => {
    test('accepts strings, numbers and decimals', () => {
        expect(toDecimal('12.50').toFixed()).toBe('12.5');
        expect(toDecimal(3).toFixed()).toBe('3');
        expect(toDecimal(new Decimal('0.1')).toFixed()).toBe('0.1');
    });

    test('rejects values that are not finite decimals', () => {
        expect(() => toDecimal('twelve', 'price')).toThrow('[INPUT_ERROR] Invalid decimal price: twelve');
        expect(() => toDecimal(Infinity)).toThrow(InputError);
    });

    test('adds tenths exactly', () => {
        expect(toDecimal('0.1').plus('0.2').toFixed()).toBe('0.3');
    });
});

describe('aggregates', () => {
    test('sums an empty list to zero', () => {
        expect(sumDecimals([]).toFixed()).toBe('0');
    });

    test('sums, mins and maxes', () => {
        const values = [new Decimal('1.5'), new Decimal(-2), new Decimal('0.25')];

        expect(sumDecimals(values).toFixed()).toBe('-0.25');
        expect(minDecimal(values[0], values[1]).toFixed()).toBe('-2');
        expect(maxDecimal(values[0], values[2]).toFixed()).toBe('1.5');
    });

    test('signOf', () => {
        expect(signOf(new Decimal('-0.01'))).toBe(-1);
        expect(signOf(new Decimal(0))).toBe(0);
        expect(signOf(new Decimal('-0'))).toBe(0);
        expect(signOf(new Decimal(7))).toBe(1);
    });
});

describe('formatting', () => {
    test('formats amounts with two decimals', () => {
        expect(formatAmount(new Decimal('1234.5'))).toBe('1234.50');
        expect(formatSignedAmount(new Decimal(100))).toBe('+100.00');
        expect(formatSignedAmount(new Decimal('-0.5'))).toBe('-0.50');
        expect(formatSignedAmount(new Decimal(0))).toBe('0.00');
    });

    test('formats fractions as percentages', () => {
        expect(formatPercent(new Decimal('0.6'))).toBe('60%');
        expect(formatPercent(new Decimal('0.125'))).toBe('12.5%');
    });
});
