/**
 * Basic Gateway Example
 *
 * Connects every shard, prints dispatch events and sets a presence once ready.
 *
 * Run with: GATEWAY_TOKEN=... GATEWAY_API=https://api.example.com/v10 npm run example
 * Add DEBUG=shard-gateway:* to see connection logs.
 */

import { GatewayIntents, GatewayManager, RestGatewayInfoProvider } from '../src/index.ts';

async function main() {
  const token = process.env.GATEWAY_TOKEN;
  const baseUrl = process.env.GATEWAY_API;
  if (!token || !baseUrl) {
    console.error('Set GATEWAY_TOKEN and GATEWAY_API');
    process.exitCode = 1;
    return;
  }

  const manager = new GatewayManager({
    token,
    intents: GatewayIntents.Guilds | GatewayIntents.GuildMessages,
    gatewayInfo: new RestGatewayInfoProvider({ token, baseUrl }),
  });

  manager.on('state', (shard: number, state: string, previous: string) => {
    console.log(`shard ${shard}: ${previous} -> ${state}`);
  });
  manager.on('fatal', (shard: number, err: Error) => {
    console.error(`shard ${shard} stopped: ${err.message}`);
  });

  process.once('SIGINT', () => manager.disconnect());

  const events = manager.makeEventsStream();
  manager
    .connect()
    .then(() =>
      manager.updatePresence({
        since: null,
        activities: [{ name: 'the gateway', type: 3 }],
        status: 'online',
        afk: false,
      })
    )
    .catch((err: unknown) => console.error('presence update failed:', err));

  for await (const event of events) {
    console.log(`[${event.shard.index}] #${event.sequence} ${event.type}`);
  }
  console.log('All shards stopped');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
