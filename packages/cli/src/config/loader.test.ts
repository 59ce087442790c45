import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { resolve } from 'path';
import { loadConfig, loadConfigWithMeta, getConfigPath, ConfigError } from './loader.js';
import { CONFIG_TEMPLATE } from './schema.js';

describe('config loader', () => {
  let testDir = '';
  let configPath = '';

  beforeEach(() => {
    testDir = mkdtempSync(resolve(tmpdir(), 'colloquy-config-'));
    configPath = resolve(testDir, 'config.yaml');
    vi.stubEnv('OPENAI_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    if (testDir && existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it('writes the template when the file is missing', () => {
    const nested = resolve(testDir, 'nested', 'dir', 'config.yaml');

    const { config, initialized, apiKeySource } = loadConfigWithMeta({ configPath: nested });

    expect(initialized).toBe(true);
    expect(readFileSync(nested, 'utf-8')).toBe(CONFIG_TEMPLATE);
    expect(config.model).toBe('gpt-3.5-turbo');
    expect(config.temperature).toBe(1);
    expect(config.markdown).toBe(true);
    expect(config.multiline).toBe(false);
    expect(config.max_tokens).toBeUndefined();
    // the template placeholder is not a usable key
    expect(config.api_key).toBe('');
    expect(apiKeySource).toBe('none');
  });

  it('does not rewrite an existing file', () => {
    writeFileSync(configPath, 'model: gpt-4\n');
    const { initialized } = loadConfigWithMeta({ configPath });
    expect(initialized).toBe(false);
    expect(readFileSync(configPath, 'utf-8')).toBe('model: gpt-4\n');
  });

  it('merges file values over the defaults', () => {
    writeFileSync(configPath, `
api_key: "file-key"
model: gpt-4
temperature: 0.2
max_tokens: 500
markdown: false
multiline: true
endpoint: https://llm.internal.test/v1
timeout_ms: 30000
`);

    const { config, apiKeySource } = loadConfigWithMeta({ configPath });

    expect(config).toEqual({
      api_key: 'file-key',
      model: 'gpt-4',
      temperature: 0.2,
      max_tokens: 500,
      markdown: false,
      multiline: true,
      endpoint: 'https://llm.internal.test/v1',
      timeout_ms: 30000,
    });
    expect(apiKeySource).toBe('file');
  });

  it('treats an empty file as all defaults', () => {
    writeFileSync(configPath, '');
    const config = loadConfig({ configPath });
    expect(config.model).toBe('gpt-3.5-turbo');
    expect(config.endpoint).toBe('https://api.openai.com/v1');
    expect(config.timeout_ms).toBe(600000);
  });

  it('ignores keys set to null', () => {
    writeFileSync(configPath, 'model: gpt-4\nmax_tokens:\n');
    const config = loadConfig({ configPath });
    expect(config.model).toBe('gpt-4');
    expect(config.max_tokens).toBeUndefined();
  });

  it('resolves env references in values', () => {
    vi.stubEnv('MY_CHAT_KEY', 'from-env-ref');
    vi.stubEnv('MY_MODEL', 'gpt-4-32k');
    writeFileSync(configPath, 'api_key: env:MY_CHAT_KEY\nmodel: ${MY_MODEL}\n');

    const config = loadConfig({ configPath });

    expect(config.api_key).toBe('from-env-ref');
    expect(config.model).toBe('gpt-4-32k');
  });

  it('drops an unresolved env reference for the key', () => {
    writeFileSync(configPath, 'api_key: $COLLOQY_TEST_UNSET_VAR\n');
    const { config, apiKeySource } = loadConfigWithMeta({ configPath });
    expect(config.api_key).toBe('');
    expect(apiKeySource).toBe('none');
  });

  it('prefers OPENAI_API_KEY over the file', () => {
    vi.stubEnv('OPENAI_API_KEY', '  env-key \n');
    writeFileSync(configPath, 'api_key: file-key\n');

    const { config, apiKeySource } = loadConfigWithMeta({ configPath });

    expect(config.api_key).toBe('env-key');
    expect(apiKeySource).toBe('env');
  });

  it('prefers the flag over the environment', () => {
    vi.stubEnv('OPENAI_API_KEY', 'env-key');
    writeFileSync(configPath, 'api_key: file-key\n');

    const { config, apiKeySource } = loadConfigWithMeta({ configPath }, { apiKey: ' flag-key ' });

    expect(config.api_key).toBe('flag-key');
    expect(apiKeySource).toBe('flag');
  });

  it('applies model and multiline overrides', () => {
    writeFileSync(configPath, 'model: gpt-4\nmultiline: false\n');
    const config = loadConfig({ configPath }, { model: ' gpt-4-0613 ', multiline: true });
    expect(config.model).toBe('gpt-4-0613');
    expect(config.multiline).toBe(true);
  });

  it('keeps the file multiline flag when the override is absent', () => {
    writeFileSync(configPath, 'multiline: true\n');
    expect(loadConfig({ configPath }, { multiline: false }).multiline).toBe(true);
  });

  it('throws ConfigError on invalid YAML', () => {
    writeFileSync(configPath, 'model: [unclosed\n');
    expect(() => loadConfig({ configPath })).toThrow(ConfigError);
    expect(() => loadConfig({ configPath })).toThrow(`Failed to parse config file: ${configPath}`);
  });

  it('throws ConfigError on out-of-range values', () => {
    writeFileSync(configPath, 'temperature: 3\n');
    expect(() => loadConfig({ configPath })).toThrow(/Invalid config: temperature:/);
  });

  it('throws ConfigError on a non-string key', () => {
    writeFileSync(configPath, 'api_key: 12345\n');
    expect(() => loadConfig({ configPath })).toThrow(/Invalid config: api_key:/);
  });

  it('throws ConfigError on unknown keys', () => {
    writeFileSync(configPath, 'api-key: old-style\n');
    expect(() => loadConfig({ configPath })).toThrow(ConfigError);
  });

  it('throws ConfigError when the template cannot be written', () => {
    writeFileSync(resolve(testDir, 'blocker'), 'not a directory');
    const impossible = resolve(testDir, 'blocker', 'config.yaml');
    expect(() => loadConfig({ configPath: impossible })).toThrow(/Failed to create config file/);
  });
});

describe('getConfigPath', () => {
  it('defaults to ~/.colloquy/config.yaml', () => {
    expect(getConfigPath()).toMatch(/[\\/]\.colloquy[\\/]config\.yaml$/);
  });

  it('returns an explicit path unchanged', () => {
    expect(getConfigPath('/etc/colloquy.yaml')).toBe('/etc/colloquy.yaml');
  });
});
