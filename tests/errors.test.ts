/**
 * Error helper tests
 */

import { describe, it, expect } from 'vitest';
import { describeError, errorMessage, MissingArtifactError } from '../src/errors.js';

describe('errorMessage', () => {
  it('should use the message of an Error', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
  });

  it('should keep thrown values that are not errors', () => {
    expect(errorMessage('pkgbuild crashed')).toBe('pkgbuild crashed');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('describeError', () => {
  const error = new MissingArtifactError('No build output for: windows', {
    operation: 'assembleRelease',
    target: 'windows',
  });

  it('should print only the message by default', () => {
    expect(describeError(error)).toBe('No build output for: windows');
  });

  it('should add operation and context when verbose', () => {
    expect(describeError(error, true)).toBe(
      ['No build output for: windows', '  Operation: assembleRelease', '  Context: {"target":"windows"}'].join('\n'),
    );
  });

  it('should fall back to the message for foreign errors', () => {
    expect(describeError(new Error('boom'), true)).toBe('boom');
  });
});
