/**
 * Runtime configuration for mock endpoint behavior
 * Can be updated via API during tests
 */

export interface MockConfig {
  /** Keys accepted in X-API-Key */
  apiKeys: string[];

  /** Added before every submit response */
  latencyMs: number;

  /** When set, every submit answers with this status regardless of input */
  forcedStatus: number | null;

  /** Disabled endpoint answers 503 */
  enabled: boolean;
}

export const defaultMockConfig: MockConfig = {
  apiKeys: ["test-key"],
  latencyMs: 0,
  forcedStatus: null,
  enabled: true,
};

export class MockSettings {
  private initial: MockConfig;
  private current: MockConfig;

  constructor(initial: Partial<MockConfig> = {}) {
    this.initial = { ...defaultMockConfig, ...initial };
    this.current = { ...this.initial };
  }

  get(): MockConfig {
    return { ...this.current, apiKeys: [...this.current.apiKeys] };
  }

  update(updates: Partial<MockConfig>): MockConfig {
    this.current = { ...this.current, ...updates };
    return this.get();
  }

  /** Back to the values the server was started with */
  reset(): MockConfig {
    this.current = { ...this.initial };
    return this.get();
  }
}
