/**
 * EXACT DECIMALS
 *
 * A value is `units / 10^scale` with bigint units. Scale travels through
 * every operation (10.00 + 5 is 15.00, 25.00 * 0.10 is 2.5000) and nothing
 * rounds unless `round` is called.
 */

import {Just, Maybe, Nothing} from 'purify-ts';

export type Decimal = {
    readonly units: bigint;
    readonly scale: number;
};

export type Scalar = number | bigint | string;

// sign, integer part (optionally grouped in thousands), fraction
const NUMERAL = /^\s*([+-]?)(\d{1,3}(?:,\d{3})+|\d*)(?:\.(\d*))?\s*$/;
// Number#toString output for very large or very small values
const EXPONENTIAL = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

export const ZERO: Decimal = {units: 0n, scale: 0};

export function parseDecimal(text: string): Maybe<Decimal> {
    const match = NUMERAL.exec(text);
    if (!match) return Nothing;

    const [, sign = '', whole = '', fraction = ''] = match;
    if (whole.length + fraction.length === 0) return Nothing;

    const magnitude = BigInt(whole.replace(/,/g, '') + fraction);
    return Just({
        units: sign === '-' ? -magnitude : magnitude,
        scale: fraction.length,
    });
}

export function fromNumber(value: number): Maybe<Decimal> {
    if (!Number.isFinite(value)) return Nothing;

    const text = String(value);
    const match = EXPONENTIAL.exec(text);
    if (!match) return parseDecimal(text);

    const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
    const magnitude = BigInt(whole + fraction);
    const units = sign === '-' ? -magnitude : magnitude;
    const scale = fraction.length - Number(exponent);

    return Just(scale >= 0
        ? {units, scale}
        : {units: units * 10n ** BigInt(-scale), scale: 0});
}

export function toDecimal(scalar: Scalar): Maybe<Decimal> {
    if (typeof scalar === 'bigint') return Just({units: scalar, scale: 0});
    if (typeof scalar === 'number') return fromNumber(scalar);
    return parseDecimal(scalar);
}

function unitsAt(value: Decimal, scale: number): bigint {
    return value.units * 10n ** BigInt(scale - value.scale);
}

export function add(a: Decimal, b: Decimal): Decimal {
    const scale = Math.max(a.scale, b.scale);
    return {units: unitsAt(a, scale) + unitsAt(b, scale), scale};
}

export function subtract(a: Decimal, b: Decimal): Decimal {
    const scale = Math.max(a.scale, b.scale);
    return {units: unitsAt(a, scale) - unitsAt(b, scale), scale};
}

export function multiply(a: Decimal, b: Decimal): Decimal {
    return {units: a.units * b.units, scale: a.scale + b.scale};
}

export function compare(a: Decimal, b: Decimal): -1 | 0 | 1 {
    const scale = Math.max(a.scale, b.scale);
    const left = unitsAt(a, scale);
    const right = unitsAt(b, scale);
    if (left === right) return 0;
    return left < right ? -1 : 1;
}

export function isNegative(value: Decimal): boolean {
    return value.units < 0n;
}

/**
 * Round to `scale` fractional digits, half away from zero. Rounding to a
 * larger scale pads with zeros.
 * @throws RangeError when `scale` is not a non-negative integer
 */
export function round(value: Decimal, scale: number): Decimal {
    if (!Number.isInteger(scale) || scale < 0) {
        throw new RangeError(`Scale must be a non-negative integer: ${scale}`);
    }
    if (value.scale <= scale) {
        return {units: unitsAt(value, scale), scale};
    }

    const divisor = 10n ** BigInt(value.scale - scale);
    const magnitude = value.units < 0n ? -value.units : value.units;
    const quotient = magnitude / divisor;
    const rounded = (magnitude % divisor) * 2n >= divisor ? quotient + 1n : quotient;

    return {units: value.units < 0n ? -rounded : rounded, scale};
}

export function format(value: Decimal): string {
    const sign = value.units < 0n ? '-' : '';
    const magnitude = value.units < 0n ? -value.units : value.units;
    const digits = magnitude.toString().padStart(value.scale + 1, '0');

    if (value.scale === 0) return sign + digits;
    return `${sign}${digits.slice(0, -value.scale)}.${digits.slice(-value.scale)}`;
}
