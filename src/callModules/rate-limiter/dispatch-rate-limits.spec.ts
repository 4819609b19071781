import { CampaignCancelledError } from '../../common/errors/call-errors';
import { loadAppConfig } from '../../config/app-config';
import { DispatchRateLimits } from './dispatch-rate-limits';

describe('DispatchRateLimits', () => {
  it('leaves each campaign to its own limiter by default', () => {
    const limits = new DispatchRateLimits(loadAppConfig({}));
    expect(limits.shared()).toBeUndefined();
  });

  it('hands every campaign the same limiter in global scope', async () => {
    const limits = new DispatchRateLimits(
      loadAppConfig({ RATE_LIMIT_SCOPE: 'global', GLOBAL_RATE_LIMIT_PER_MINUTE: '1' }),
    );
    const limiter = limits.shared();
    expect(limiter).toBeDefined();
    expect(limits.shared()).toBe(limiter);

    await limiter?.acquire();
    const waiting = limiter?.acquire();
    limits.onApplicationShutdown();
    await expect(waiting).rejects.toBeInstanceOf(CampaignCancelledError);
    expect(limits.shared()).not.toBe(limiter);
    limits.onApplicationShutdown();
  });
});
