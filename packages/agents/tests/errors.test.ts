// Tests for error helpers

import { describe, it, expect } from 'vitest';
import { ConfigError, TimeoutError, errorMessage } from '../utils/errors.js';

describe('errorMessage', () => {
  it('reads the message of an Error', () => {
    expect(errorMessage(new ConfigError('bad settings'))).toBe('bad settings');
    expect(errorMessage(new TimeoutError('trader', 500))).toBe('trader timed out after 500ms');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('plain failure')).toBe('plain failure');
    expect(errorMessage(42)).toBe('42');
  });
});
