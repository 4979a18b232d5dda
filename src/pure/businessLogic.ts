/**
 * PURE BUSINESS LOGIC
 *
 * These functions take values and return values. No effects whatsoever.
 * Failures are returned as Left values carrying a PlacementError, never
 * thrown, so every rule here is tested with plain inputs and outputs.
 */

import {Actor, Order, OrderItem, OrderPlaced, PlacementReceipt} from '../domain';
import {NotificationPayload} from '../types';
import {DiscountPolicy, PlacementError} from './types';
import {Money, MoneyError} from '../money/Money';
import {compare, Decimal, parseDecimal, Scalar, ZERO} from '../money/decimal';
import {Either, Just, Left, Maybe, Nothing, Right} from 'purify-ts';

export const ADMINISTRATOR_ROLE = 'Administrator';

export const defaultDiscountPolicy: DiscountPolicy = {vipRate: '0.10'};

const ONE: Decimal = {units: 1n, scale: 0};

// ============================================================================
// Placement Rules
// ============================================================================

type Rule = (order: Order) => Either<PlacementError, Order>;

const invalidState = (order: Order, message: string): PlacementError => ({
    kind: 'InvalidState',
    orderId: order.orderId,
    message,
});

const ensureDraft: Rule = order => order.status === 'Draft'
    ? Right(order)
    : Left(invalidState(order, 'Order must be in Draft status to place the order'));

const ensureHasItems: Rule = order => order.items.length > 0
    ? Right(order)
    : Left(invalidState(order, 'Order must have at least one item'));

const ensureActorMayPlace = (actor: Actor): Rule => order =>
    actor.isAdministrator || order.customerId === actor.identifier
        ? Right(order)
        : Left<PlacementError, Order>({
            kind: 'Unauthorized',
            orderId: order.orderId,
            message: 'Order can only be placed by the same customer or an administrator',
        });

/**
 * Check that the loaded order may be placed by the actor. Rules run in a
 * fixed order and the first failure wins.
 */
export function validatePlacement(
    orderId: string,
    order: Order | null,
    actor: Actor
): Either<PlacementError, Order> {
    return Maybe.fromNullable(order)
        .toEither<PlacementError>({
            kind: 'OrderNotFound',
            orderId,
            message: `Order ${orderId} not found`,
        })
        .chain(ensureDraft)
        .chain(ensureHasItems)
        .chain(ensureActorMayPlace(actor));
}

// ============================================================================
// Core Calculations
// ============================================================================

export function calculateLineTotal(item: OrderItem): Either<MoneyError, Money> {
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
        return Left<MoneyError, Money>({
            kind: 'InvalidAmount',
            message: `Quantity must be a positive integer: ${item.quantity}`,
        });
    }
    return item.price.multiply(item.quantity);
}

export function calculateSubtotal(items: readonly OrderItem[]): Either<MoneyError, Money> {
    return items.reduce(
        (subtotal, item) => subtotal.chain(sum => calculateLineTotal(item).map(line => sum.add(line))),
        Right<Money, MoneyError>(Money.zero())
    );
}

export function findDiscountRate(order: Order, policy: DiscountPolicy): Maybe<Scalar> {
    return order.isVipCustomer ? Just(policy.vipRate) : Nothing;
}

export function calculateDiscount(subtotal: Money, rate: Maybe<Scalar>): Either<MoneyError, Money> {
    return rate
        .map(r => subtotal.multiply(r))
        .orDefault(Right(Money.zero()));
}

export function toPlacedOrder(order: Order, total: Money): Order {
    return {
        ...order,
        status: 'Placed',
        totalValue: total,
    };
}

/**
 * Price a validated order: subtotal from the items, the policy's discount
 * taken once off that subtotal, and the placed order carrying the total.
 */
export function priceOrder(
    order: Order,
    policy: DiscountPolicy
): Either<PlacementError, PlacementReceipt> {
    return calculateSubtotal(order.items).chain(subtotal =>
        calculateDiscount(subtotal, findDiscountRate(order, policy)).chain(discount =>
            subtotal.subtract(discount).map(total => ({
                order: toPlacedOrder(order, total),
                subtotal,
                discount,
                total,
            }))
        )
    );
}

// ============================================================================
// Configuration
// ============================================================================

export function parseDiscountPolicy(vipRate: string): Either<string, DiscountPolicy> {
    return parseDecimal(vipRate)
        .filter(rate => compare(rate, ZERO) >= 0 && compare(rate, ONE) <= 0)
        .toEither(`VIP discount rate must be a decimal between 0 and 1, got "${vipRate}"`)
        .map(() => ({vipRate: vipRate.trim()}));
}

// ============================================================================
// Identity
// ============================================================================

export function toActor(identifier: string, roles: readonly string[]): Actor {
    return {
        identifier,
        isAdministrator: roles.includes(ADMINISTRATOR_ROLE),
    };
}

// ============================================================================
// Notifications & External Data Preparation
// ============================================================================

export function buildConfirmationEmail(recipient: string, order: Order): NotificationPayload {
    const lines = order.items.map(item =>
        `${item.quantity} x ${item.productId} @ $${item.price.toFixed(2)}`
    );
    const total = order.totalValue ?? Money.zero();

    return {
        to: recipient,
        subject: `Order ${order.orderId} Confirmed`,
        body: [
            'Thank you for your order!',
            '',
            ...lines,
            '',
            `Total: $${total.toFixed(2)}`,
        ].join('\n'),
    };
}

export function buildOrderPlacedEvent(order: Order): OrderPlaced {
    return {
        type: 'OrderPlaced',
        orderId: order.orderId,
    };
}
