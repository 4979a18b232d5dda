/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * The real implementations behind the effect interfaces:
 * - PostgreSQL for orders, users and customer e-mail addresses
 * - SMTP (MailHog locally) for order confirmations
 * - SNS (LocalStack locally) for OrderPlaced events
 */
import {Actor, Order, OrderItem, OrderPlaced, OrderStatus} from '../domain';
import {
  AppEffects,
  EventPublisher,
  IdentityResolver,
  Logger,
  NotificationSink,
  OrderRepository,
} from '../pure/effects';
import {AwsConfig, EmailConfig, ProductionConfig} from './types';
import {buildConfirmationEmail, toActor} from '../pure/businessLogic';
import {Money} from '../money/Money';
import {Pool} from 'pg';
import nodemailer, {Transporter} from 'nodemailer';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';

// Load configuration from environment variables
export function loadConfigFromEnv(): ProductionConfig {
  const region = process.env.AWS_DEFAULT_REGION || 'us-east-1';
  return {
    database: {
      host: process.env.DATABASE_HOST || 'localhost',
      port: parseInt(process.env.DATABASE_PORT || '5432', 10),
      user: process.env.DATABASE_USER || 'appuser',
      password: process.env.DATABASE_PASSWORD || 'apppassword',
      database: process.env.DATABASE_NAME || 'orderdb',
    },
    email: {
      host: process.env.SMTP_HOST || 'localhost',
      port: parseInt(process.env.SMTP_PORT || '1025', 10),
      from: process.env.SMTP_FROM || '"Order Service" <noreply@example.com>',
    },
    aws: {
      region,
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || 'test',
      eventsEndpoint: process.env.AWS_ENDPOINT_EVENTS || 'http://localhost:4566',
      orderEventsTopicArn: process.env.ORDER_EVENTS_TOPIC_ARN
        || `arn:aws:sns:${region}:000000000000:order-events`,
    },
    discounts: {
      vipRate: process.env.VIP_DISCOUNT_RATE || '0.10',
    },
  };
}

// ============================================================================
// Row mapping
// ============================================================================

type OrderRow = {
  id: string;
  customer_id: string;
  status: string;
  total_value: string | null;
  is_vip_customer: boolean;
  version: number;
};

type OrderItemRow = {
  product_id: string;
  price: string;
  quantity: number;
};

const ORDER_STATUSES: readonly OrderStatus[] = ['Draft', 'Placed', 'Shipped', 'Delivered'];

function toOrderStatus(value: string): OrderStatus {
  const status = ORDER_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new Error(`Unknown order status "${value}"`);
  }
  return status;
}

// NUMERIC columns arrive as text, which Money parses without loss
function toMoney(column: string, text: string): Money {
  return Money.parse(text).caseOf({
    Left: error => {
      throw new Error(`Invalid ${column} value: ${error.message}`);
    },
    Right: money => money,
  });
}

// ============================================================================
// PostgreSQL Order Repository
// ============================================================================

class PostgresOrderRepository implements OrderRepository {
  constructor(private pool: Pool) {}

  async findById(orderId: string): Promise<Order | null> {
    const client = await this.pool.connect();
    try {
      const orderResult = await client.query<OrderRow>(
        'SELECT id, customer_id, status, total_value, is_vip_customer, version FROM orders WHERE id = $1',
        [orderId]
      );

      if (orderResult.rows.length === 0) {
        return null;
      }

      const orderRow = orderResult.rows[0];

      const itemsResult = await client.query<OrderItemRow>(
        'SELECT product_id, price, quantity FROM order_items WHERE order_id = $1 ORDER BY position',
        [orderId]
      );

      const items: OrderItem[] = itemsResult.rows.map((row) => ({
        productId: row.product_id,
        price: toMoney('order_items.price', row.price),
        quantity: row.quantity,
      }));

      return {
        orderId: orderRow.id,
        customerId: orderRow.customer_id,
        status: toOrderStatus(orderRow.status),
        totalValue: orderRow.total_value === null ? null : toMoney('orders.total_value', orderRow.total_value),
        isVipCustomer: orderRow.is_vip_customer,
        items,
        version: orderRow.version,
      };
    } finally {
      client.release();
    }
  }

  async save(order: Order): Promise<void> {
    const client = await this.pool.connect();
    try {
      // the version check serialises concurrent placements of the same order
      const result = await client.query(
        `UPDATE orders
            SET status = $1, total_value = $2, version = version + 1
          WHERE id = $3 AND version = $4`,
        [order.status, order.totalValue?.amount ?? null, order.orderId, order.version]
      );

      if (result.rowCount !== 1) {
        throw new Error(`Order ${order.orderId} was modified concurrently (expected version ${order.version})`);
      }
    } finally {
      client.release();
    }
  }
}

// ============================================================================
// PostgreSQL Identity Resolver & Customer Directory
// ============================================================================

class PostgresIdentityResolver implements IdentityResolver {
  constructor(private pool: Pool) {}

  async resolve(identifier: string): Promise<Actor> {
    const result = await this.pool.query<{ roles: string[] | null }>(
      'SELECT roles FROM users WHERE id = $1',
      [identifier]
    );

    const roles = result.rows.length === 0 ? [] : result.rows[0].roles ?? [];
    return toActor(identifier, roles);
  }
}

class PostgresCustomerDirectory {
  constructor(private pool: Pool) {}

  async getEmail(customerId: string): Promise<string | null> {
    const result = await this.pool.query<{ email: string }>(
      'SELECT email FROM customers WHERE id = $1',
      [customerId]
    );

    return result.rows.length === 0 ? null : result.rows[0].email;
  }
}

// ============================================================================
// Nodemailer Notification Sink
// ============================================================================

class NodemailerNotificationSink implements NotificationSink {
  private transporter: Transporter;

  constructor(
    private config: EmailConfig,
    private customers: PostgresCustomerDirectory,
    private logger: Logger
  ) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: false, // MailHog doesn't use TLS
      ignoreTLS: true,
    });
  }

  async sendOrderConfirmation(order: Order): Promise<void> {
    const recipient = await this.customers.getEmail(order.customerId);
    if (!recipient) {
      throw new Error(`No e-mail address on file for customer ${order.customerId}`);
    }

    const payload = buildConfirmationEmail(recipient, order);
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: payload.to,
        subject: payload.subject,
        text: payload.body,
        html: `<p>${payload.body.replace(/\n/g, '<br>')}</p>`,
      });
      this.logger.info(`Email sent to ${payload.to}: ${payload.subject}`);
    } catch (error) {
      this.logger.error('Failed to send email:', error);
      throw new Error('Email service unavailable');
    }
  }

  close(): void {
    this.transporter.close();
  }
}

// ============================================================================
// SNS Event Publisher
// ============================================================================

class SnsEventPublisher implements EventPublisher {
  private sns: SNSClient;

  constructor(private config: AwsConfig, private logger: Logger) {
    this.sns = new SNSClient({
      region: config.region,
      endpoint: config.eventsEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
  }

  async publish(event: OrderPlaced): Promise<void> {
    try {
      await this.sns.send(new PublishCommand({
        TopicArn: this.config.orderEventsTopicArn,
        Message: JSON.stringify(event),
        MessageAttributes: {
          eventType: {DataType: 'String', StringValue: event.type},
        },
      }));
      this.logger.info(`Published ${event.type} for order: ${event.orderId}`);
    } catch (error) {
      this.logger.error('Failed to publish event:', error);
      throw new Error('Event publisher unavailable');
    }
  }

  close(): void {
    this.sns.destroy();
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

export type ProductionEffects = AppEffects & {
  readonly identities: IdentityResolver;
  close(): Promise<void>;
};

class EffectsFactory implements ProductionEffects {
  private _pool?: Pool;
  private _orderRepository?: PostgresOrderRepository;
  private _identityResolver?: PostgresIdentityResolver;
  private _notificationSink?: NodemailerNotificationSink;
  private _eventPublisher?: SnsEventPublisher;

  constructor(private config: ProductionConfig, readonly logger: Logger) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      // Test database connection
      try {
        const client = await this._pool.connect();
        this.logger.info('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        this.logger.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private requirePool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get orders(): OrderRepository {
    if (!this._orderRepository) {
      this._orderRepository = new PostgresOrderRepository(this.requirePool());
    }
    return this._orderRepository;
  }

  get identities(): IdentityResolver {
    if (!this._identityResolver) {
      this._identityResolver = new PostgresIdentityResolver(this.requirePool());
    }
    return this._identityResolver;
  }

  get notifications(): NotificationSink {
    if (!this._notificationSink) {
      this._notificationSink = new NodemailerNotificationSink(
        this.config.email,
        new PostgresCustomerDirectory(this.requirePool()),
        this.logger
      );
    }
    return this._notificationSink;
  }

  get events(): EventPublisher {
    if (!this._eventPublisher) {
      this._eventPublisher = new SnsEventPublisher(this.config.aws, this.logger);
    }
    return this._eventPublisher;
  }

  /**
   * Initialize the PostgreSQL pool
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    await this.getPool();
    this.logger.info('✅ All production effects initialized');
  }

  async close(): Promise<void> {
    this._notificationSink?.close();
    this._eventPublisher?.close();
    await this._pool?.end();
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(config: ProductionConfig, logger: Logger): Promise<ProductionEffects> {
    const effects = new EffectsFactory(config, logger);
    await effects.initialize();
    return effects;
  }
}

// Export a factory function
export async function makeAppEffects(
  config: ProductionConfig = loadConfigFromEnv(),
  logger: Logger = console
): Promise<ProductionEffects> {
  return EffectsFactory.make(config, logger);
}
