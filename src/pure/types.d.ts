// Module product types

import {MoneyError} from '../money/Money';
import {Scalar} from '../money/decimal';

export type DiscountPolicy = {
    // fraction of the subtotal taken off for VIP customers, e.g. "0.10"
    readonly vipRate: Scalar;
};

type OrderFailure<K extends string> = {
    readonly kind: K;
    readonly orderId: string;
    readonly message: string;
};

export type PlacementError =
    | MoneyError
    | OrderFailure<'OrderNotFound'>
    | OrderFailure<'InvalidState'>
    | OrderFailure<'Unauthorized'>
    | OrderFailure<'PersistenceFailure'>;
