import { describe, expect, it } from 'vitest';
import { UnpublishError, firstLines, isUnpublishError } from './errors.js';

describe('UnpublishError', () => {
  it('keeps the original message separately from the display message', () => {
    const error = new UnpublishError('TransportFault', 'refused\nIs the credential file x valid?', {
      originalMessage: 'refused',
      context: { endpoint: 'http://registry.test' },
    });

    expect(error.kind).toBe('TransportFault');
    expect(error.originalMessage).toBe('refused');
    expect(error.context).toEqual({ endpoint: 'http://registry.test' });
    expect(isUnpublishError(error)).toBe(true);
    expect(isUnpublishError(error, 'TransportFault')).toBe(true);
    expect(isUnpublishError(error, 'ConfigurationError')).toBe(false);
    expect(isUnpublishError(new Error('plain'))).toBe(false);
  });
});

describe('firstLines', () => {
  it('keeps the first two lines by default', () => {
    expect(firstLines('one\ntwo\nthree')).toBe('one\ntwo');
    expect(firstLines('only')).toBe('only');
  });
});
