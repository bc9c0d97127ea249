/**
 * @file async.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import { anySignal, createDeferred, settlesWithin } from '../../../src/utils/async.js';

describe('async utils', () => {
  it('should resolve a deferred from outside', async () => {
    const deferred = createDeferred<string>();
    deferred.resolve('done');
    await expect(deferred.promise).resolves.toBe('done');
  });

  it('should report whether a promise settled in time', async () => {
    await expect(settlesWithin(Promise.resolve(), 50)).resolves.toBe(true);
    await expect(settlesWithin(Promise.reject(new Error('boom')), 50)).resolves.toBe(true);
    await expect(settlesWithin(new Promise(() => undefined), 20)).resolves.toBe(false);
  });

  it('should abort when any source aborts', () => {
    const first = new AbortController();
    const second = new AbortController();
    const combined = anySignal(first.signal, undefined, second.signal);

    expect(combined.aborted).toBe(false);
    second.abort();
    expect(combined.aborted).toBe(true);
  });
});
