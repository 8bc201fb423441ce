import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as path from 'path';

// Mock fs before importing the module under test
vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import * as fs from 'fs';
import {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG,
  deepMerge,
  defaultConfig,
  loadConfig,
  resolveConfigPath,
} from '../src/probe/config.js';

const configPath = path.resolve('/etc/probe/fetch-probe.json');

function withFile(contents: unknown) {
  vi.mocked(fs.existsSync).mockReturnValue(true);
  vi.mocked(fs.readFileSync).mockReturnValue(typeof contents === 'string' ? contents : JSON.stringify(contents));
}

beforeEach(() => {
  vi.resetAllMocks();
  vi.stubEnv(CONFIG_ENV_VAR, '');
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('loadConfig', () => {
  it('returns the default config when no config file exists', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    const config = loadConfig(configPath);

    expect(config.target).toEqual({ command: 'cargo', args: ['run', '--', 'mcp'], cwd: '.', env: {} });
    expect(config.timeouts).toEqual({ handshake_ms: 60000, call_ms: 20000, grace_ms: 5000 });
    expect(config.tool).toEqual({ name: 'fetch_web_content', timeout_seconds: 10 });
    expect(config.protocol_version).toBe('2024-11-05');
    expect(config.client).toEqual({ name: 'fetch-probe', version: '0.1.0' });
    expect(config.send_initialized_notification).toBe(false);
    expect(config.discover_tools).toBe(true);
    expect(config.strict_metadata).toBe(false);
    expect(config.skip_non_json_lines).toBe(false);
    expect(config.fail_on_error).toBe(true);
    expect(config.stderr_tail_lines).toBe(20);
    expect(config.scenarios.map((s) => [s.name, s.target, s.expected_fetch_method])).toEqual([
      ['Static HTML Test', 'https://httpbin.org/html', 'static'],
      ['JavaScript SPA Test', 'https://jsonplaceholder.typicode.com/', 'browser'],
    ]);
  });

  it('deep merges nested objects, keeping defaults for unset fields', () => {
    withFile({ timeouts: { call_ms: 5000 }, strict_metadata: true });

    const config = loadConfig(configPath);

    expect(config.timeouts).toEqual({ handshake_ms: 60000, call_ms: 5000, grace_ms: 5000 });
    expect(config.strict_metadata).toBe(true);
    expect(config.tool.name).toBe('fetch_web_content');
  });

  it('replaces the scenario list rather than merging it', () => {
    withFile({
      scenarios: [{ name: 'Local', target: 'http://localhost:8080/', expected_behavior_note: 'Anything' }],
    });

    const config = loadConfig(configPath);

    expect(config.scenarios).toEqual([
      { name: 'Local', target: 'http://localhost:8080/', expected_behavior_note: 'Anything' },
    ]);
  });

  it('resolves target.cwd against the directory of the config file', () => {
    withFile({ target: { command: './target/debug/fetcher', args: ['mcp'], cwd: '../server' } });

    const config = loadConfig(configPath);

    expect(config.target.command).toBe('./target/debug/fetcher');
    expect(config.target.args).toEqual(['mcp']);
    expect(config.target.cwd).toBe(path.resolve('/etc/server'));
  });

  it('falls back to defaults and warns on invalid JSON', () => {
    withFile('{ not json');

    const config = loadConfig(configPath);

    expect(config).toEqual(defaultConfig());
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.warn).mock.calls[0]?.[0]).toMatch(/^\[fetch-probe\] WARN Ignoring .*fetch-probe\.json: /);
  });

  it('falls back to defaults when the file is not an object', () => {
    withFile([1, 2, 3]);

    expect(loadConfig(configPath)).toEqual(defaultConfig());
    expect(console.warn).toHaveBeenCalledWith(`[fetch-probe] WARN Ignoring ${configPath}: expected a JSON object`);
  });

  it('rejects values that fail validation and names the field', () => {
    withFile({ tool: { timeout_seconds: 0 }, scenarios: [] });

    const config = loadConfig(configPath);

    expect(config.tool.timeout_seconds).toBe(10);
    expect(vi.mocked(console.warn).mock.calls[0]?.[0]).toBe(
      `[fetch-probe] WARN Ignoring ${configPath}: tool.timeout_seconds: Number must be greater than or equal to 1; ` +
        'scenarios: Array must contain at least 1 element(s)',
    );
  });

  it('rejects a scenario whose target is not a URL', () => {
    withFile({ scenarios: [{ name: 'Bad', target: 'not a url', expected_behavior_note: '' }] });

    const config = loadConfig(configPath);

    expect(config.scenarios).toHaveLength(2);
    expect(vi.mocked(console.warn).mock.calls[0]?.[0]).toContain('scenarios.0.target: Invalid url');
  });

  it('ignores prototype-polluting keys', () => {
    withFile(JSON.parse('{"__proto__": {"polluted": true}, "discover_tools": false}'));

    const config = loadConfig(configPath);

    expect(config.discover_tools).toBe(false);
    expect(Object.prototype).not.toHaveProperty('polluted');
  });

  it('never hands out the shared defaults object', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    const config = loadConfig(configPath);
    config.scenarios.pop();
    config.timeouts.call_ms = 1;

    expect(DEFAULT_CONFIG.scenarios).toHaveLength(2);
    expect(DEFAULT_CONFIG.timeouts.call_ms).toBe(20000);
  });
});

describe('resolveConfigPath', () => {
  it('prefers an explicit path, then the environment, then the working directory', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '/opt/probe.json');

    expect(resolveConfigPath('/tmp/explicit.json')).toBe(path.resolve('/tmp/explicit.json'));
    expect(resolveConfigPath()).toBe(path.resolve('/opt/probe.json'));

    vi.stubEnv(CONFIG_ENV_VAR, '');
    expect(resolveConfigPath()).toBe(path.resolve(process.cwd(), 'fetch-probe.json'));
  });
});

describe('deepMerge', () => {
  it('merges plain objects and replaces everything else', () => {
    const merged = deepMerge({ a: { x: 1, y: 2 }, list: [1, 2], keep: 'yes' }, { a: { y: 3 }, list: [9] });

    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: 'yes' });
  });
});
