import { Redis } from 'ioredis';
import type { Snapshot } from '../domain/types.js';
import { logger } from '../utils/logger.js';

export interface SnapshotPublisher {
  publish(channel: string, message: string): Promise<number>;
}

function attachLoggers(client: Redis, label: string) {
  client.on('ready',        () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',          () => logger.warn({ label }, 'redis end'));
  client.on('error',        (err) => logger.error({ label, err }, 'redis error'));
}

export function createPublisher(url: string): Redis {
  const client = new Redis(url, { maxRetriesPerRequest: null, enableAutoPipelining: true });
  attachLoggers(client, 'publisher');
  return client;
}

/** Listener for SnapshotHub that PUBLISHes every snapshot as JSON. */
export function redisSnapshotSink(pub: SnapshotPublisher, channel: string) {
  return (s: Snapshot) => {
    pub.publish(channel, JSON.stringify(s)).catch((err: unknown) => {
      logger.warn({ err, channel }, 'snapshot publish failed');
    });
  };
}

export async function shutdownPublisher(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ err }, 'redis quit failed; disconnecting');
    client.disconnect();
  }
}
