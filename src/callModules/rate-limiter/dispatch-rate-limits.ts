import { Inject, Injectable, OnApplicationShutdown } from '@nestjs/common';

import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { RateLimiter } from './rate-limiter';

/**
 * Chooses the limiter a campaign run draws permits from. With
 * RATE_LIMIT_SCOPE=global every run shares one provider-wide budget;
 * otherwise each run builds its own from the campaign settings.
 *
 * The shared limiter is disposed at application shutdown, after every module
 * destroy hook, so runs that are still being cancelled keep drawing from it.
 */
@Injectable()
export class DispatchRateLimits implements OnApplicationShutdown {
  private global: RateLimiter | null = null;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  /** Undefined means "per campaign". */
  shared(): RateLimiter | undefined {
    if (this.config.rateLimitScope !== 'global') return undefined;
    this.global ??= new RateLimiter({ limit: this.config.globalRateLimitPerMinute, name: 'global' });
    return this.global;
  }

  onApplicationShutdown(): void {
    this.global?.dispose();
    this.global = null;
  }
}
