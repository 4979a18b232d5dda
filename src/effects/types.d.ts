// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type EmailConfig = {
    readonly host: string;
    readonly port: number;
    readonly from: string;
}

export type AwsConfig = {
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly eventsEndpoint: string;
    readonly orderEventsTopicArn: string;
}

export type DiscountConfig = {
    readonly vipRate: string;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly email: EmailConfig;
    readonly aws: AwsConfig;
    readonly discounts: DiscountConfig;
}
