/**
 * @file Masking Utilities Tests
 * @description Unit tests for token fingerprints and secret registration.
 *
 * Coverage targets:
 * - tokenFingerprint(): 100%
 * - registerSecrets(): 100%
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as core from '@actions/core';
import { registerSecrets, tokenFingerprint } from '../../../src/utils/masking';

// Mock @actions/core
vi.mock('@actions/core', () => ({
  setSecret: vi.fn(),
}));

describe('masking utilities', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('tokenFingerprint', () => {
    it('keeps the first 12 hex characters of the SHA-256 digest', () => {
      expect(tokenFingerprint('abc')).toBe('sha256:ba7816bf8f01');
    });

    it('is stable for the same token', () => {
      expect(tokenFingerprint('test-secret')).toBe(tokenFingerprint('test-secret'));
      expect(tokenFingerprint('test-secret')).not.toBe(tokenFingerprint('test-secret-2'));
    });

    it('never contains the token', () => {
      expect(tokenFingerprint('test-secret')).not.toContain('test-secret');
    });

    it('returns empty string for empty input', () => {
      expect(tokenFingerprint('')).toBe('');
    });
  });

  describe('registerSecrets', () => {
    it('calls core.setSecret for each unique non-empty value', () => {
      registerSecrets(['test-secret', 'test-signing-key']);

      expect(core.setSecret).toHaveBeenCalledTimes(2);
      expect(core.setSecret).toHaveBeenCalledWith('test-secret');
      expect(core.setSecret).toHaveBeenCalledWith('test-signing-key');
    });

    it('skips empty and whitespace-only strings', () => {
      registerSecrets(['', '   ', 'test-secret']);

      expect(core.setSecret).toHaveBeenCalledTimes(1);
    });

    it('deduplicates values', () => {
      registerSecrets(['test-secret', 'test-secret']);

      expect(core.setSecret).toHaveBeenCalledTimes(1);
    });

    it('handles empty array', () => {
      registerSecrets([]);

      expect(core.setSecret).not.toHaveBeenCalled();
    });
  });
});
