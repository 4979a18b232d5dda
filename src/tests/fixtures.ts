import {Order} from '../domain';
import {Money} from '../money/Money';

export function money(text: string): Money {
  return Money.parse(text).unsafeCoerce();
}

export function draftOrder(overrides: Partial<Order> = {}): Order {
  return {
    orderId: 'order-123',
    customerId: 'cust-456',
    status: 'Draft',
    totalValue: null,
    isVipCustomer: false,
    items: [
      { productId: 'prod-1', price: money('10.00'), quantity: 2 },
      { productId: 'prod-2', price: money('5.00'), quantity: 1 },
    ],
    version: 0,
    ...overrides,
  };
}
