/**
 * MONEY
 *
 * An exact, non-negative monetary amount. Every way of obtaining a Money
 * goes through `fromValue`, so a negative amount can never be constructed.
 * Fallible operations return Either values instead of throwing.
 */

import {Either, Left, Right} from 'purify-ts';
import * as decimal from './decimal';
import {Decimal, Scalar} from './decimal';

export type MoneyError =
    | { readonly kind: 'InvalidFormat'; readonly message: string }
    | { readonly kind: 'InvalidAmount'; readonly message: string };

const invalidFormat = (input: string): MoneyError => ({
    kind: 'InvalidFormat',
    message: `Amount must be a valid decimal number: "${input}"`,
});

const invalidAmount = (value: Decimal): MoneyError => ({
    kind: 'InvalidAmount',
    message: `Amount cannot be negative: ${decimal.format(value)}`,
});

export class Money {
    private constructor(private readonly value: Decimal) {}

    static zero(): Money {
        return new Money(decimal.ZERO);
    }

    static parse(text: string): Either<MoneyError, Money> {
        return decimal.parseDecimal(text)
            .toEither(invalidFormat(text))
            .chain(Money.fromValue);
    }

    static fromDecimal(value: number | bigint): Either<MoneyError, Money> {
        return decimal.toDecimal(value)
            .toEither(invalidFormat(String(value)))
            .chain(Money.fromValue);
    }

    private static fromValue(value: Decimal): Either<MoneyError, Money> {
        return decimal.isNegative(value) ? Left(invalidAmount(value)) : Right(new Money(value));
    }

    /** The exact amount as decimal text, scale preserved. */
    get amount(): string {
        return decimal.format(this.value);
    }

    get scale(): number {
        return this.value.scale;
    }

    add(other: Money): Money {
        return new Money(decimal.add(this.value, other.value));
    }

    subtract(other: Money): Either<MoneyError, Money> {
        return Money.fromValue(decimal.subtract(this.value, other.value));
    }

    multiply(scalar: Scalar): Either<MoneyError, Money> {
        return decimal.toDecimal(scalar)
            .toEither(invalidFormat(String(scalar)))
            .chain(factor => Money.fromValue(decimal.multiply(this.value, factor)));
    }

    compareTo(other: Money): -1 | 0 | 1 {
        return decimal.compare(this.value, other.value);
    }

    equals(other: Money): boolean {
        return this.compareTo(other) === 0;
    }

    isZero(): boolean {
        return this.value.units === 0n;
    }

    /** Display rendering, rounded half away from zero. */
    toFixed(decimals: number): string {
        return decimal.format(decimal.round(this.value, decimals));
    }

    toString(): string {
        return this.amount;
    }

    toJSON(): string {
        return this.amount;
    }
}
