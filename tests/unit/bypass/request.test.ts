import { describe, it, expect } from 'vitest';

import { parseBypassRequest } from '../../../src/bypass/request';

describe('parseBypassRequest', () => {
  it('returns null without a token', () => {
    expect(parseBypassRequest({})).toBeNull();
    expect(parseBypassRequest({ reason: 'Critical production hotfix' })).toBeNull();
  });

  it('returns null for a blank token', () => {
    expect(parseBypassRequest({ token: '   ', reason: 'Critical production hotfix' })).toBeNull();
  });

  it('keeps the token and reason as given', () => {
    expect(parseBypassRequest({ token: 'test-secret', reason: ' Critical production hotfix ' })).toEqual({
      token: 'test-secret',
      reason: ' Critical production hotfix ',
    });
  });

  it('defaults a missing reason to an empty string', () => {
    expect(parseBypassRequest({ token: 'test-secret' })).toEqual({ token: 'test-secret', reason: '' });
  });
});
