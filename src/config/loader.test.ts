/**
 * Tests for configuration loader (src/config/loader.ts)
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { readFileSync, existsSync } from 'fs';
import {
  findConfigFile,
  loadConfigFile,
  getConfigFromFile,
  validateRequiredConfig,
} from './loader.js';

vi.mock('fs', () => ({
  readFileSync: vi.fn(),
  existsSync: vi.fn(),
}));

describe('findConfigFile', () => {
  beforeEach(() => {
    vi.mocked(existsSync).mockReset();
  });

  it('should return exists: false when no config files found', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(findConfigFile()).toEqual({ path: '', exists: false });
  });

  it('should find tocnav.config.yml', () => {
    vi.mocked(existsSync).mockImplementation((p) => String(p).endsWith('tocnav.config.yml'));

    const result = findConfigFile();

    expect(result.exists).toBe(true);
    expect(result.path.endsWith('tocnav.config.yml')).toBe(true);
  });
});

describe('loadConfigFile', () => {
  beforeEach(() => {
    vi.mocked(existsSync).mockReset();
    vi.mocked(readFileSync).mockReset();
  });

  it('should report missing explicit file', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(loadConfigFile('/nowhere/tocnav.config.yaml')).toEqual({ _fromFile: false });
  });

  it('should parse and validate YAML', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue(
      'agent:\n  model: test-model\n  maxIterations: 4\ntools:\n  shell:\n    allowlist: [ls]\n'
    );

    const config = loadConfigFile('/cfg/tocnav.config.yaml');

    expect(config._fromFile).toBe(true);
    expect(config._source).toBe('/cfg/tocnav.config.yaml');
    expect(config.agent).toEqual({ model: 'test-model', maxIterations: 4 });
    expect(config.tools?.shell?.allowlist).toEqual(['ls']);
  });

  it('should ignore empty files', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('');

    expect(loadConfigFile('/cfg/tocnav.config.yaml')).toEqual({ _fromFile: false });
  });

  it('should ignore unparsable YAML', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('agent: [unclosed');

    expect(loadConfigFile('/cfg/tocnav.config.yaml')).toEqual({ _fromFile: false });
  });

  it('should reject values of the wrong type', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('agent:\n  maxIterations: ten\n');

    expect(loadConfigFile('/cfg/tocnav.config.yaml')).toEqual({ _fromFile: false });
  });
});

describe('getConfigFromFile', () => {
  it('should strip metadata', () => {
    expect(getConfigFromFile({ _fromFile: true, _source: '/x', search: { maxCandidates: 2 } }))
      .toEqual({ search: { maxCandidates: 2 } });
  });
});

describe('validateRequiredConfig', () => {
  it('should require an API key', () => {
    const result = validateRequiredConfig({}, {});

    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.field)).toEqual(['agent.apiKey']);
  });

  it('should require a model when a key comes from the environment', () => {
    const result = validateRequiredConfig({}, { ANTHROPIC_API_KEY: 'test-secret' });

    expect(result.errors.map(e => e.field)).toEqual(['agent.model']);
  });

  it('should reject a non-http base URL', () => {
    const result = validateRequiredConfig({
      agent: { apiKey: 'test-secret', model: 'm', apiBaseUrl: 'ftp://example.invalid' },
    }, {});

    expect(result.errors.map(e => e.field)).toEqual(['agent.apiBaseUrl']);
  });

  it('should accept a complete agent section', () => {
    expect(validateRequiredConfig({ agent: { apiKey: 'test-secret', model: 'm' } }, {}).valid).toBe(true);
  });
});
