/**
 * config init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigLoader, validateConfig } from '@frontport/types';
import { initConfig } from '../init.js';

describe('config init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    // 各テストで独立したディレクトリを作成
    testDir = path.join(tmpdir(), `.test-frontport-init-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, '.frontport.json');
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルを生成できる', async () => {
    const createdPath = await initConfig({ cwd: testDir });

    expect(createdPath).toBe(configPath);
    const config: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(config).toEqual(ConfigLoader.getDefaultConfig());
  });

  it('著者名を指定できる', async () => {
    await initConfig({ cwd: testDir, author: 'Jane Doe' });

    const config = await ConfigLoader.load(configPath);
    expect(config.author).toBe('Jane Doe');
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    await initConfig({ cwd: testDir });

    await expect(initConfig({ cwd: testDir })).rejects.toThrow('Configuration file already exists');
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await initConfig({ cwd: testDir, author: 'First' });

    await initConfig({ cwd: testDir, author: 'Second', force: true });

    const config = await ConfigLoader.load(configPath);
    expect(config.author).toBe('Second');
  });

  it('生成された設定ファイルがバリデーションを通る', async () => {
    await initConfig({ cwd: testDir });

    const content = await fs.readFile(configPath, 'utf-8');
    expect(() => validateConfig(JSON.parse(content))).not.toThrow();
    expect(content.endsWith('}\n')).toBe(true);
  });
});
