import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as core from '@actions/core';

import { Logger } from '../../../src/utils/logger';

vi.mock('@actions/core', () => ({
  info: vi.fn(),
  debug: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
}));

describe('Logger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends debug output to core.debug by default', () => {
    new Logger().debug('loaded 3 findings');

    expect(core.debug).toHaveBeenCalledWith('loaded 3 findings');
    expect(core.info).not.toHaveBeenCalled();
  });

  it('prints debug output when verbose', () => {
    new Logger(true).debug('loaded 3 findings');

    expect(core.info).toHaveBeenCalledWith('[debug] loaded 3 findings');
    expect(core.debug).not.toHaveBeenCalled();
  });

  it('maps levels onto workflow commands', () => {
    const logger = new Logger();
    logger.warn('w');
    logger.error('e');

    expect(core.warning).toHaveBeenCalledWith('w');
    expect(core.error).toHaveBeenCalledWith('e');
  });
});
