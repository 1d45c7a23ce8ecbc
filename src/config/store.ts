/**
 * Holder of the base URL every request is resolved against.
 *
 * Intended use is one writer at start-up and many readers afterwards; nothing here
 * locks, so concurrent writers must coordinate themselves.
 */
export class ConfigStore {
  /** Base URL prefix; endpoints are appended to it verbatim. */
  #baseUrl: string;

  constructor(baseUrl = '') {
    this.#baseUrl = baseUrl;
  }

  /**
   * Overwrites the stored base URL. No validation happens here; an unusable value
   * surfaces as a `ConstructURLError` on the next request.
   */
  setBaseURL(url: string): void {
    this.#baseUrl = url;
  }

  /** Last value set, or `''` when never set. */
  get baseUrl(): string {
    return this.#baseUrl;
  }
}

/** Process-wide store read by every client constructed without its own. */
export const defaultConfigStore = new ConfigStore();

/**
 * Sets the process-wide base URL, e.g. `https://example.com/api/`.
 * Include the trailing separator: endpoints are concatenated as-is.
 */
export function setBaseURL(url: string): void {
  defaultConfigStore.setBaseURL(url);
}

/** Reads the process-wide base URL. */
export function getBaseURL(): string {
  return defaultConfigStore.baseUrl;
}
