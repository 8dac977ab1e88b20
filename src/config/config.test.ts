import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  cleanConfig,
  configExists,
  loadConfig,
  resolveConfigPath,
  saveConfig,
} from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';

describe('config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lineage-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeRaw(content: string): void {
    fs.mkdirSync(path.dirname(resolveConfigPath(tmpDir)), { recursive: true });
    fs.writeFileSync(resolveConfigPath(tmpDir), content, 'utf-8');
  }

  it('round-trips the default config', () => {
    expect(configExists(tmpDir)).toBe(false);
    saveConfig(tmpDir, DEFAULT_CONFIG);

    expect(configExists(tmpDir)).toBe(true);
    expect(loadConfig(tmpDir)).toEqual(DEFAULT_CONFIG);
  });

  it('fills missing keys from defaults', () => {
    writeRaw(JSON.stringify({ traversal: { max_depth: 20 }, log: { level: 'debug' } }));

    const config = loadConfig(tmpDir);
    expect(config.traversal).toEqual({ ...DEFAULT_CONFIG.traversal, max_depth: 20 });
    expect(config.log).toEqual({ level: 'debug', file: null });
    expect(config.runs).toEqual(DEFAULT_CONFIG.runs);
  });

  it('throws ConfigNotFoundError when there is no config', () => {
    expect(() => loadConfig(tmpDir)).toThrow(ConfigNotFoundError);
  });

  it('rejects malformed JSON', () => {
    writeRaw('{ not json');
    expect(() => loadConfig(tmpDir)).toThrow(ConfigError);
  });

  it('names the offending key', () => {
    writeRaw(JSON.stringify({ traversal: { default_direction: 'sideways' } }));
    expect(() => loadConfig(tmpDir)).toThrow(/at traversal\.default_direction/);
  });

  it('rejects a default depth beyond the maximum', () => {
    writeRaw(JSON.stringify({ traversal: { default_depth: 5, max_depth: 4 } }));
    expect(() => loadConfig(tmpDir)).toThrow(
      'traversal.default_depth (5) exceeds traversal.max_depth (4)',
    );
  });

  it('removes the .lineage directory', () => {
    saveConfig(tmpDir, DEFAULT_CONFIG);
    cleanConfig(tmpDir);
    expect(fs.existsSync(path.join(tmpDir, '.lineage'))).toBe(false);
  });
});
