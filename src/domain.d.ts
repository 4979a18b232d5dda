// Domain types shared across the application

import {Money} from './money/Money';

export type OrderStatus = 'Draft' | 'Placed' | 'Shipped' | 'Delivered';

export type Order = {
  readonly orderId: string;
  readonly customerId: string;
  readonly status: OrderStatus;
  readonly totalValue: Money | null;
  readonly isVipCustomer: boolean;
  readonly items: readonly OrderItem[];
  // optimistic concurrency token, bumped by the repository on every save
  readonly version: number;
};

export type OrderItem = {
  readonly productId: string;
  readonly price: Money;
  readonly quantity: number;
};

export type Actor = {
  readonly identifier: string;
  readonly isAdministrator: boolean;
};

export type OrderPlaced = {
  readonly type: 'OrderPlaced';
  readonly orderId: string;
};

export type PlacementReceipt = {
  readonly order: Order;
  readonly subtotal: Money;
  readonly discount: Money;
  readonly total: Money;
};
