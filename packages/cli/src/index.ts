#!/usr/bin/env node
/**
 * frontport CLI
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { executeConvert } from './commands/convert.js';
import { executeConfigInit } from './commands/config/init.js';
import { createProgram } from './program.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

const program = createProgram(packageJson.version, {
  convert: executeConvert,
  configInit: executeConfigInit,
});

// コマンドラインを解析
program.parse(process.argv);
