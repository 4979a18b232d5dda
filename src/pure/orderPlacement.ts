/**
 * ORDER PLACEMENT - The Coordinator
 *
 * The thin effectful shell around the placement rules:
 * 1. Load the order (effect)
 * 2. Validate and price it (pure business logic)
 * 3. Persist the placed order (effect, the durability boundary)
 * 4. Run the post-commit hooks (effects, best effort)
 */

import {Actor, Order, PlacementReceipt} from '../domain';
import {AppEffects, Logger} from './effects';
import {DiscountPolicy, PlacementError} from './types';
import {buildOrderPlacedEvent, defaultDiscountPolicy, priceOrder, validatePlacement} from './businessLogic';
import {Either, EitherAsync} from 'purify-ts';

/**
 * A side effect that runs only after the placed order has been saved.
 * Failures are logged and never undo the placement.
 */
export type PostCommitHook = {
    readonly name: string;
    readonly run: (order: Order) => Promise<void>;
};

/**
 * Place the given order on behalf of the actor.
 *
 * @return a function that places the order using the given app effects,
 * resolving to either the first failed rule or the placement receipt.
 * Rejects only when loading the order fails.
 */
export function placeOrder(
    orderId: string,
    actor: Actor,
    policy: DiscountPolicy = defaultDiscountPolicy
): (appEffects: AppEffects) => Promise<Either<PlacementError, PlacementReceipt>> {
    return async (appEffects: AppEffects) => {
        const order = await appEffects.orders.findById(orderId);

        const priced = validatePlacement(orderId, order, actor)
            .chain(validOrder => priceOrder(validOrder, policy));

        return priced.caseOf<Promise<Either<PlacementError, PlacementReceipt>>>({
            Left: () => Promise.resolve(priced),
            Right: receipt => commitPlacement(receipt)(appEffects),
        });
    };
}

/**
 * Save the placed order and, once it is durable, notify.
 * @return either PersistenceFailure or the receipt
 */
function commitPlacement(
    receipt: PlacementReceipt
): (appEffects: AppEffects) => Promise<Either<PlacementError, PlacementReceipt>> {
    return async (appEffects: AppEffects) => {
        const {order} = receipt;

        const persisted = await EitherAsync(() => appEffects.orders.save(order))
            .mapLeft((error): PlacementError => ({
                kind: 'PersistenceFailure',
                orderId: order.orderId,
                message: `Failed to save order ${order.orderId}: ${describeError(error)}`,
            }))
            .map(() => receipt)
            .run();

        if (persisted.isRight()) {
            appEffects.logger.info(`Order ${order.orderId} placed with total ${receipt.total.toFixed(2)}`);
            await runPostCommitHooks(order, postCommitHooks(appEffects), appEffects.logger);
        }

        return persisted;
    };
}

/**
 * The hooks run after every successful placement, in order: the customer
 * hears about the order before the rest of the system does.
 */
export function postCommitHooks(appEffects: AppEffects): PostCommitHook[] {
    return [
        {
            name: 'order-confirmation',
            run: order => appEffects.notifications.sendOrderConfirmation(order),
        },
        {
            name: 'order-placed-event',
            run: order => appEffects.events.publish(buildOrderPlacedEvent(order)),
        },
    ];
}

/**
 * Run each hook in sequence. A failing hook is logged and the next one
 * still runs.
 */
export async function runPostCommitHooks(
    order: Order,
    hooks: readonly PostCommitHook[],
    logger: Logger
): Promise<void> {
    for (const hook of hooks) {
        const result = await EitherAsync(() => hook.run(order)).run();
        result.ifLeft(error => {
            logger.warn(`Post-commit hook ${hook.name} failed for order ${order.orderId}: ${describeError(error)}`);
        });
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
