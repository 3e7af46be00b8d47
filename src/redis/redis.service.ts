import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;
  private readonly logger = new Logger(RedisService.name);

  constructor(config: ConfigService) {
    const url = config.get<string>('redis.url') ?? 'redis://localhost:6379';
    this.client = new Redis(url, { lazyConnect: true });
    this.client.on('error', (err) =>
      this.logger.error('Redis connection error', err),
    );
    this.client.on('connect', () => this.logger.log('Connected to Redis'));
  }

  /**
   * XADD with an approximate MAXLEN cap. Resolves to the entry id assigned
   * by Redis.
   */
  async appendToStream(
    key: string,
    maxLength: number,
    fields: Record<string, string>,
  ): Promise<string | null> {
    const fieldValues = Object.entries(fields).flat();
    return this.client.xadd(key, 'MAXLEN', '~', maxLength, '*', ...fieldValues);
  }

  async onModuleDestroy() {
    if (this.client.status === 'wait') {
      this.client.disconnect();
      return;
    }
    await this.client.quit();
  }
}
