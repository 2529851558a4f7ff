/**
 * Export surface tests for @hawkline/crypto
 */

import { describe, it, expect } from 'vitest';
import * as crypto from '../src/index.js';

describe('@hawkline/crypto export surface', () => {
  it('exports both backends', () => {
    expect(crypto.nodeCryptoBackend.name).toBe('node');
    expect(crypto.nobleBackend.name).toBe('noble');
  });

  it('exports key and MAC types', () => {
    expect('Key' in crypto).toBe(true);
    expect('Mac' in crypto).toBe(true);
    expect('createCredentials' in crypto).toBe(true);
  });

  it('does not export a global backend setter', () => {
    expect('setBackend' in crypto).toBe(false);
    expect('setCryptographer' in crypto).toBe(false);
  });
});
