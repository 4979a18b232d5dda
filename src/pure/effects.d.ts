/**
 * EFFECTS LAYER
 *
 * The collaborators the placement engine calls into. Implementations are
 * thin wrappers that move data in and out; no business logic lives behind
 * these interfaces.
 */

import {Actor, Order, OrderPlaced} from '../domain';

export interface OrderRepository {
  findById(orderId: string): Promise<Order | null>;
  /** Rejects when the write fails or the stored version no longer matches. */
  save(order: Order): Promise<void>;
}

export interface IdentityResolver {
  resolve(identifier: string): Promise<Actor>;
}

export interface NotificationSink {
  sendOrderConfirmation(order: Order): Promise<void>;
}

export interface EventPublisher {
  publish(event: OrderPlaced): Promise<void>;
}

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export type AppEffects = {
  readonly orders: OrderRepository;
  readonly notifications: NotificationSink;
  readonly events: EventPublisher;
  readonly logger: Logger;
}
