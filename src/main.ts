/**
 * ORDER PLACEMENT RUNNER
 *
 * Places one order against the production effects:
 *
 *   node dist/main.js <orderId> <userId>
 */
import {loadConfigFromEnv, makeAppEffects} from './effects/EffectsFactory';
import {parseDiscountPolicy} from './pure/businessLogic';
import {placeOrder} from './pure/orderPlacement';

async function main() {
  const [orderId, userId] = process.argv.slice(2);
  if (!orderId || !userId) {
    console.error('Usage: place-order <orderId> <userId>');
    process.exitCode = 2;
    return;
  }

  const config = loadConfigFromEnv();
  const policy = parseDiscountPolicy(config.discounts.vipRate).caseOf({
    Left: message => {
      throw new Error(message);
    },
    Right: discountPolicy => discountPolicy,
  });

  console.log('📋 Configuration:');
  console.log('   - Database:', `${config.database.host}:${config.database.port}/${config.database.database}`);
  console.log('   - SMTP:', `${config.email.host}:${config.email.port}`);
  console.log('   - Order events topic:', config.aws.orderEventsTopicArn);
  console.log('   - VIP discount rate:', String(policy.vipRate));
  console.log('');

  const effects = await makeAppEffects(config);
  try {
    const actor = await effects.identities.resolve(userId);
    const result = await placeOrder(orderId, actor, policy)(effects);

    result.caseOf({
      Left: error => {
        console.error(`❌ ${error.kind}: ${error.message}`);
        process.exitCode = 1;
      },
      Right: receipt => {
        console.log(`✅ Order ${receipt.order.orderId} placed`);
        console.log(`   - Subtotal: $${receipt.subtotal.toFixed(2)}`);
        console.log(`   - Discount: -$${receipt.discount.toFixed(2)}`);
        console.log(`   - Total: $${receipt.total.toFixed(2)}`);
      },
    });
  } finally {
    await effects.close();
  }
}

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
