/**
 * TESTS FOR PURE BUSINESS LOGIC
 *
 * No mocks anywhere: the placement rules and the pricing are plain
 * functions from values to values.
 */

import {Actor} from '../domain';
import {
  buildConfirmationEmail,
  buildOrderPlacedEvent,
  calculateDiscount,
  calculateSubtotal,
  defaultDiscountPolicy,
  findDiscountRate,
  parseDiscountPolicy,
  priceOrder,
  toActor,
  toPlacedOrder,
  validatePlacement,
} from '../pure/businessLogic';
import {Money} from '../money/Money';
import {Just, Nothing} from 'purify-ts';
import {draftOrder, money} from './fixtures';

const owner: Actor = { identifier: 'cust-456', isAdministrator: false };
const stranger: Actor = { identifier: 'cust-999', isAdministrator: false };
const administrator: Actor = { identifier: 'admin-1', isAdministrator: true };

describe('validatePlacement', () => {
  it('fails with OrderNotFound when there is no order', () => {
    expect(validatePlacement('order-404', null, owner).extract()).toEqual({
      kind: 'OrderNotFound',
      orderId: 'order-404',
      message: 'Order order-404 not found',
    });
  });

  it('fails with InvalidState when the order is not a draft', () => {
    const order = draftOrder({ status: 'Placed' });

    expect(validatePlacement('order-123', order, owner).extract()).toEqual({
      kind: 'InvalidState',
      orderId: 'order-123',
      message: 'Order must be in Draft status to place the order',
    });
  });

  it('fails with InvalidState when the order has no items', () => {
    const order = draftOrder({ items: [] });

    expect(validatePlacement('order-123', order, owner).extract()).toEqual({
      kind: 'InvalidState',
      orderId: 'order-123',
      message: 'Order must have at least one item',
    });
  });

  it('reports the status before the missing items', () => {
    const order = draftOrder({ status: 'Shipped', items: [] });

    expect(validatePlacement('order-123', order, stranger).extract()).toEqual({
      kind: 'InvalidState',
      orderId: 'order-123',
      message: 'Order must be in Draft status to place the order',
    });
  });

  it('reports the missing items before the actor', () => {
    const order = draftOrder({ items: [] });

    expect(validatePlacement('order-123', order, stranger).extract()).toEqual({
      kind: 'InvalidState',
      orderId: 'order-123',
      message: 'Order must have at least one item',
    });
  });

  it('reports a missing order before the actor', () => {
    expect(validatePlacement('order-404', null, stranger).extract()).toEqual({
      kind: 'OrderNotFound',
      orderId: 'order-404',
      message: 'Order order-404 not found',
    });
  });

  it('fails with Unauthorized for another customer', () => {
    expect(validatePlacement('order-123', draftOrder(), stranger).extract()).toEqual({
      kind: 'Unauthorized',
      orderId: 'order-123',
      message: 'Order can only be placed by the same customer or an administrator',
    });
  });

  it('accepts the owning customer', () => {
    const order = draftOrder();

    expect(validatePlacement('order-123', order, owner).extract()).toBe(order);
  });

  it('accepts an administrator for any customer', () => {
    const order = draftOrder();

    expect(validatePlacement('order-123', order, administrator).extract()).toBe(order);
  });
});

describe('calculateSubtotal', () => {
  it('sums price times quantity over all items', () => {
    const subtotal = calculateSubtotal(draftOrder().items).unsafeCoerce();

    expect(subtotal.amount).toBe('25.00');
  });

  it('returns zero for no items', () => {
    expect(calculateSubtotal([]).unsafeCoerce().isZero()).toBe(true);
  });

  it.each([-1, 0, 1.5])('fails with InvalidAmount on quantity %p', (quantity) => {
    const items = [
      { productId: 'prod-1', price: money('10.00'), quantity: 2 },
      { productId: 'prod-2', price: money('3.00'), quantity },
    ];

    expect(calculateSubtotal(items).extract()).toEqual({
      kind: 'InvalidAmount',
      message: `Quantity must be a positive integer: ${quantity}`,
    });
  });
});

describe('findDiscountRate', () => {
  it('gives VIP customers the policy rate', () => {
    expect(findDiscountRate(draftOrder({ isVipCustomer: true }), defaultDiscountPolicy)).toEqual(Just('0.10'));
  });

  it('gives everyone else nothing', () => {
    expect(findDiscountRate(draftOrder(), defaultDiscountPolicy).isNothing()).toBe(true);
  });
});

describe('calculateDiscount', () => {
  it('applies the rate to the subtotal', () => {
    const discount = calculateDiscount(money('25.00'), Just('0.10')).unsafeCoerce();

    expect(discount.amount).toBe('2.5000');
    expect(discount.equals(money('2.50'))).toBe(true);
  });

  it('is zero without a rate', () => {
    expect(calculateDiscount(money('25.00'), Nothing).unsafeCoerce().isZero()).toBe(true);
  });
});

describe('priceOrder', () => {
  it('prices a regular order at its subtotal', () => {
    const receipt = priceOrder(draftOrder(), defaultDiscountPolicy).unsafeCoerce();

    expect(receipt.subtotal.amount).toBe('25.00');
    expect(receipt.discount.isZero()).toBe(true);
    expect(receipt.total.amount).toBe('25.00');
    expect(receipt.order.status).toBe('Placed');
    expect(receipt.order.totalValue).toBe(receipt.total);
  });

  it('takes ten percent off for VIP customers', () => {
    const receipt = priceOrder(draftOrder({ isVipCustomer: true }), defaultDiscountPolicy).unsafeCoerce();

    expect(receipt.subtotal.equals(money('25.00'))).toBe(true);
    expect(receipt.discount.equals(money('2.50'))).toBe(true);
    expect(receipt.total.equals(money('22.50'))).toBe(true);
    expect(receipt.total.amount).toBe('22.5000');
  });

  it('uses the configured rate', () => {
    const receipt = priceOrder(draftOrder({ isVipCustomer: true }), { vipRate: '0.25' }).unsafeCoerce();

    expect(receipt.discount.amount).toBe('6.2500');
    expect(receipt.total.amount).toBe('18.7500');
  });

  it('fails with InvalidAmount when the discount exceeds the subtotal', () => {
    const result = priceOrder(draftOrder({ isVipCustomer: true }), { vipRate: '1.5' });

    expect(result.extract()).toEqual({
      kind: 'InvalidAmount',
      message: 'Amount cannot be negative: -12.500',
    });
  });

  it('leaves the draft order untouched', () => {
    const order = draftOrder();

    priceOrder(order, defaultDiscountPolicy);

    expect(order.status).toBe('Draft');
    expect(order.totalValue).toBeNull();
  });
});

describe('toPlacedOrder', () => {
  it('sets the status and total and keeps everything else', () => {
    const order = draftOrder();
    const total = money('25.00');

    const placed = toPlacedOrder(order, total);

    expect(placed).toEqual({ ...order, status: 'Placed', totalValue: total });
    expect(placed).not.toBe(order);
  });
});

describe('parseDiscountPolicy', () => {
  it('accepts a rate between 0 and 1', () => {
    expect(parseDiscountPolicy('0.10').extract()).toEqual({ vipRate: '0.10' });
    expect(parseDiscountPolicy(' 0.2 ').extract()).toEqual({ vipRate: '0.2' });
    expect(parseDiscountPolicy('1').extract()).toEqual({ vipRate: '1' });
  });

  it.each(['1.5', '-0.1', 'ten', ''])('rejects "%s"', (rate) => {
    expect(parseDiscountPolicy(rate).extract())
      .toBe(`VIP discount rate must be a decimal between 0 and 1, got "${rate}"`);
  });
});

describe('toActor', () => {
  it('derives administrator from role membership', () => {
    expect(toActor('admin-1', ['Customer', 'Administrator'])).toEqual(administrator);
    expect(toActor('cust-456', ['Customer'])).toEqual(owner);
    expect(toActor('cust-456', [])).toEqual(owner);
  });
});

describe('buildConfirmationEmail', () => {
  it('lists the items and the total', () => {
    const order = toPlacedOrder(draftOrder(), money('22.5000'));

    const email = buildConfirmationEmail('customer@example.com', order);

    expect(email).toEqual({
      to: 'customer@example.com',
      subject: 'Order order-123 Confirmed',
      body: [
        'Thank you for your order!',
        '',
        '2 x prod-1 @ $10.00',
        '1 x prod-2 @ $5.00',
        '',
        'Total: $22.50',
      ].join('\n'),
    });
  });

  it('shows a zero total for an order without one', () => {
    const email = buildConfirmationEmail('customer@example.com', draftOrder());

    expect(email.body.split('\n').pop()).toBe('Total: $0.00');
  });
});

describe('buildOrderPlacedEvent', () => {
  it('carries the order id', () => {
    expect(buildOrderPlacedEvent(draftOrder())).toEqual({ type: 'OrderPlaced', orderId: 'order-123' });
  });
});

describe('Money in placed orders', () => {
  it('keeps the total exact through placement', () => {
    const total = Money.fromDecimal(0.1).unsafeCoerce().add(money('0.2'));

    expect(toPlacedOrder(draftOrder(), total).totalValue?.amount).toBe('0.3');
  });
});
