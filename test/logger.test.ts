import { describe, expect, it } from 'vitest';
import { resolveLevel } from '../src/logger.js';

describe('resolveLevel', () => {
  it('reads GITPORT_LOG_LEVEL case-insensitively', () => {
    expect(resolveLevel({ GITPORT_LOG_LEVEL: 'DEBUG' })).toBe('debug');
    expect(resolveLevel({ GITPORT_LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(resolveLevel({ GITPORT_LOG_LEVEL: 'constructor' })).toBe('info');
    expect(resolveLevel({ GITPORT_LOG_LEVEL: 'toString' })).toBe('info');
  });

  it('turns on debug output under DEBUG=gitport', () => {
    expect(resolveLevel({ DEBUG: 'gitport' })).toBe('debug');
    expect(resolveLevel({ DEBUG: 'other' })).toBe('info');
  });
});
