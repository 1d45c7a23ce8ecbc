import { afterEach, describe, expect, it } from 'vitest';
import { ConfigStore, defaultConfigStore, getBaseURL, setBaseURL } from './store.js';

describe('ConfigStore', () => {
  it('defaults to an empty base URL', () => {
    expect(new ConfigStore().baseUrl).toBe('');
  });

  it('takes an initial base URL', () => {
    expect(new ConfigStore('https://example.com/api/').baseUrl).toBe('https://example.com/api/');
  });

  it('overwrites on every set without validating', () => {
    const store = new ConfigStore('https://example.com/api/');

    store.setBaseURL('not a url');
    expect(store.baseUrl).toBe('not a url');

    store.setBaseURL('https://other.example.com/');
    expect(store.baseUrl).toBe('https://other.example.com/');
  });
});

describe('process-wide base URL', () => {
  afterEach(() => {
    setBaseURL('');
  });

  it('is empty until set', () => {
    expect(getBaseURL()).toBe('');
  });

  it('writes through to the default store', () => {
    setBaseURL('https://example.com/api/');

    expect(getBaseURL()).toBe('https://example.com/api/');
    expect(defaultConfigStore.baseUrl).toBe('https://example.com/api/');
  });

  it('does not leak into separate stores', () => {
    const store = new ConfigStore();
    setBaseURL('https://example.com/api/');

    expect(store.baseUrl).toBe('');
  });
});
