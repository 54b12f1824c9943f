import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigLoader } from './loader';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';

vi.mock('fs');
vi.mock('os');

describe('ConfigLoader', () => {
  const mockHome = '/mock/home';
  const mockCwd = '/mock/cwd';
  const userPath = path.join(mockHome, '.constify', 'config.yaml');
  const repoPath = path.join(mockCwd, '.constify.yaml');

  function givenFiles(files: Record<string, string>) {
    vi.mocked(fs.existsSync).mockImplementation((p) => String(p) in files);
    vi.mocked(fs.readFileSync).mockImplementation((p) => files[String(p)] ?? '');
  }

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(os.homedir).mockReturnValue(mockHome);
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('load', () => {
    it('should load defaults when no files exist', () => {
      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });

      expect(config.provider).toEqual({
        type: 'openai',
        model: 'gpt-4',
        baseUrl: 'http://localhost:8000/v1',
        api_key_env: 'API_KEY',
        temperature: 0,
        maxTokens: 4096,
      });
      expect(config.run).toEqual({
        workers: 4,
        timeoutMs: 300_000,
        retries: 3,
        backoffMs: 1000,
        maxBackoffMs: 60_000,
        policy: 'overwrite',
      });
      expect(config.scan.extensions).toEqual(['.java']);
      expect(config.validation).toEqual({ onUnchanged: 'warn', onLiteralsDropped: 'warn' });
    });

    it('should load user config', () => {
      givenFiles({ [userPath]: yaml.dump({ provider: { model: 'llama3' } }) });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config.provider.model).toBe('llama3');
    });

    it('should respect precedence: flags > explicit > repo > user', () => {
      givenFiles({
        [userPath]: yaml.dump({ run: { workers: 1, retries: 9 } }),
        [repoPath]: yaml.dump({ run: { workers: 2 } }),
        '/explicit/config.yaml': yaml.dump({ run: { workers: 3 } }),
      });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: {},
        configPath: '/explicit/config.yaml',
        flags: { run: { workers: 4 } },
      });

      expect(config.run.workers).toBe(4);
      expect(config.run.retries).toBe(9);
    });

    it('should replace arrays instead of merging them', () => {
      givenFiles({
        [userPath]: yaml.dump({ scan: { extensions: ['.java', '.kt'] } }),
        [repoPath]: yaml.dump({ scan: { extensions: ['.scala'] } }),
      });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config.scan.extensions).toEqual(['.scala']);
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ configPath: '/missing.yaml', env: {} })).toThrow(
        /Config file not found/,
      );
    });

    it('should report invalid YAML', () => {
      givenFiles({ [repoPath]: 'run: [unclosed' });

      expect(() => ConfigLoader.load({ cwd: mockCwd, env: {} })).toThrow(
        /Error parsing YAML file/,
      );
    });

    it('should reject a file that is not a mapping', () => {
      givenFiles({ [repoPath]: '- just\n- a list\n' });

      expect(() => ConfigLoader.load({ cwd: mockCwd, env: {} })).toThrow(
        'Config file must contain a mapping: /mock/cwd/.constify.yaml',
      );
    });

    it('should list every validation issue', () => {
      givenFiles({ [repoPath]: yaml.dump({ run: { workers: 0, policy: 'yolo' } }) });

      expect(() => ConfigLoader.load({ cwd: mockCwd, env: {} })).toThrow(
        /Configuration validation failed:\n- run\.workers: .*\n- run\.policy: /,
      );
    });

    it('should resolve api_key_env when api_key is absent', () => {
      givenFiles({ [repoPath]: yaml.dump({ provider: { api_key_env: 'MY_KEY' } }) });

      const config = ConfigLoader.load({ cwd: mockCwd, env: { MY_KEY: 'test-secret' } });
      expect(config.provider.api_key).toBe('test-secret');
    });

    it('should prefer an explicit api_key over the environment', () => {
      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: { API_KEY: 'env-secret' },
        flags: { provider: { api_key: 'flag-secret' } },
      });
      expect(config.provider.api_key).toBe('flag-secret');
    });
  });

  describe('mergeConfigs', () => {
    it('should deep merge nested objects and skip undefined values', () => {
      const merged = ConfigLoader.mergeConfigs(
        { run: { workers: 2, retries: 3 }, provider: { model: 'a' } },
        { run: { workers: 8 }, provider: undefined },
      );

      expect(merged).toEqual({ run: { workers: 8, retries: 3 }, provider: { model: 'a' } });
    });
  });
});
