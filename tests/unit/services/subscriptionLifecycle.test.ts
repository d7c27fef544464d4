import { describe, it, expect } from 'vitest';
import {
  accountStateFor,
  canTransition,
  fromProviderStatus,
} from '@/services/subscriptionLifecycle';

describe('subscription lifecycle', () => {
  it('allows the forward path and recovery transitions', () => {
    expect(canTransition('inactive', 'trialing')).toBe(true);
    expect(canTransition('trialing', 'active')).toBe(true);
    expect(canTransition('active', 'past_due')).toBe(true);
    expect(canTransition('past_due', 'active')).toBe(true);
    expect(canTransition('paused', 'active')).toBe(true);
    expect(canTransition('past_due', 'cancelled')).toBe(true);
  });

  it('treats cancelled as terminal', () => {
    expect(canTransition('cancelled', 'active')).toBe(false);
    expect(canTransition('cancelled', 'cancelled')).toBe(true);
  });

  it('rejects moving back into a trial', () => {
    expect(canTransition('active', 'trialing')).toBe(false);
    expect(canTransition('paused', 'past_due')).toBe(false);
  });

  it('maps the provider spelling of cancelled', () => {
    expect(fromProviderStatus('canceled')).toBe('cancelled');
    expect(fromProviderStatus('past_due')).toBe('past_due');
  });

  it('keeps paid tiers only while entitled', () => {
    expect(accountStateFor({ tier: 'pro', status: 'past_due' })).toEqual({ tier: 'pro', status: 'past_due' });
    expect(accountStateFor({ tier: 'pro', status: 'paused' })).toEqual({ tier: 'free', status: 'paused' });
    expect(accountStateFor({ tier: 'enterprise', status: 'cancelled' })).toEqual({
      tier: 'free',
      status: 'cancelled',
    });
  });
});
