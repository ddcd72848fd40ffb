import { vi } from 'vitest';
import { EngineConfig, parseConfig } from '../src/config/config';
import { ConfigSnapshot, StaticConfigurationSource, takeSnapshot } from '../src/config/configurationSource';

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function testConfig(raw: Record<string, unknown> = {}): EngineConfig {
  return parseConfig(raw, {});
}

export function testSnapshot(raw: Record<string, unknown> = {}): ConfigSnapshot {
  return takeSnapshot(new StaticConfigurationSource(testConfig(raw)));
}
