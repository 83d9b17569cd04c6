import BigNumber from 'bignumber.js';
import { REBALANCE_CONFIG } from '../config/constants';
import { InputError } from './errors';

/**
 * Decimal constructor shared by the whole engine. Exact for +, -, *;
 * division rounds at DECIMAL_PLACES (half-even).
 */
export const Decimal = BigNumber.clone({
    DECIMAL_PLACES: REBALANCE_CONFIG.DECIMAL_PLACES,
    ROUNDING_MODE: BigNumber.ROUND_HALF_EVEN,
    EXPONENTIAL_AT: 1e9,
});
export type Decimal = BigNumber;

export type DecimalInput = string | number | BigNumber;

export const ZERO: Decimal = new Decimal(0);
export const ONE: Decimal = new Decimal(1);
export const HUNDRED: Decimal = new Decimal(100);

export const toDecimal = (value: DecimalInput, label: string = 'value'): Decimal => {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) {
        throw new InputError(`Invalid decimal ${label}: ${String(value)}`, { label, value: String(value) });
    }
    return decimal;
};

export const sumDecimals = (values: Decimal[]): Decimal => {
    return values.reduce((total, value) => total.plus(value), ZERO);
};

export const minDecimal = (a: Decimal, b: Decimal): Decimal => {
    return a.isLessThan(b) ? a : b;
};

export const maxDecimal = (a: Decimal, b: Decimal): Decimal => {
    return a.isGreaterThan(b) ? a : b;
};

/**
 * Sign of a decimal with -0 treated as 0
 */
export const signOf = (value: Decimal): -1 | 0 | 1 => {
    if (value.isGreaterThan(0)) return 1;
    if (value.isLessThan(0)) return -1;
    return 0;
};

export const formatAmount = (value: Decimal): string => {
    return value.toFixed(REBALANCE_CONFIG.REPORT_AMOUNT_DECIMALS);
};

export const formatSignedAmount = (value: Decimal): string => {
    const formatted = formatAmount(value.abs());
    switch (signOf(value)) {
        case 1:
            return `+${formatted}`;
        case -1:
            return `-${formatted}`;
        default:
            return formatted;
    }
};

export const formatPercent = (fraction: Decimal): string => {
    return `${fraction.times(HUNDRED).toFixed()}%`;
};
