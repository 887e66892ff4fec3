import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { parse } from 'yaml';
import type { DocumentWriter, MetadataEnricher, RunConfig } from '@frontport/types';
import { DocumentConverter } from '../document-converter.js';
import { SchemaMapper } from '../../mapper/schema-mapper.js';
import { ModelEnricher } from '@frontport/enricher';

const TEST_DIR = path.join(tmpdir(), 'frontport-document-converter-test');

function createLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * メモリ上に書き込むDocumentWriter
 */
class MemoryWriter implements DocumentWriter {
  files = new Map<string, string>();
  dirs: string[] = [];

  async ensureDir(dir: string): Promise<void> {
    this.dirs.push(dir);
  }

  async write(filePath: string, content: string): Promise<void> {
    this.files.set(filePath, content);
  }
}

const noopEnricher: MetadataEnricher = {
  active: false,
  suggestDescription: async () => '',
  suggestTags: async () => [],
};

const run: RunConfig = {
  author: 'Anonymous',
  today: '2024-06-15',
  enrich: false,
  dryRun: false,
  delayMs: 0,
};

async function writeInput(name: string, content: string): Promise<string> {
  const filePath = path.join(TEST_DIR, name);
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

describe('DocumentConverter', () => {
  let writer: MemoryWriter;
  let logger: ReturnType<typeof createLogger>;
  let converter: DocumentConverter;

  beforeAll(async () => {
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  beforeEach(() => {
    writer = new MemoryWriter();
    logger = createLogger();
    converter = new DocumentConverter({
      run,
      mapper: new SchemaMapper({ enricher: noopEnricher, logger }),
      writer,
      logger,
    });
  });

  it('日付付きファイル名から公開日を取り、出力ファイル名から日付を除く', async () => {
    const inputPath = await writeInput(
      '2023-05-01-hello-world.md',
      '+++\ntitle = "Hello"\n+++\n\nHello body.\n'
    );

    const result = await converter.convertFile(inputPath, '/out/blog');

    expect(result).toEqual({ ok: true, inputPath, outputPath: path.join('/out/blog', 'hello-world.md') });
    expect(writer.files.get(path.join('/out/blog', 'hello-world.md'))).toBe(
      '---\ntitle: Hello\npubDate: 2023-05-01\nauthor: Anonymous\n---\n\nHello body.'
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('日付のないファイル名は実行日を使い、ファイル名を変えない', async () => {
    const inputPath = await writeInput('notes.md', '+++\ntitle = "Notes"\n+++\nSome notes');

    const result = await converter.convertFile(inputPath, '/out');

    expect(result.ok && result.outputPath).toBe(path.join('/out', 'notes.md'));
    const output = writer.files.get(path.join('/out', 'notes.md')) ?? '';
    expect(parse(output.split('---\n')[1])).toEqual({
      title: 'Notes',
      pubDate: '2024-06-15',
      author: 'Anonymous',
    });
    expect(logger.warn).toHaveBeenCalledWith(`Warning: Could not parse date from filename ${inputPath}`);
  });

  it('フロントマターがなければ失敗として何も書き込まない', async () => {
    const inputPath = await writeInput('2023-01-01-plain.md', '# No front matter\n');

    const result = await converter.convertFile(inputPath, '/out');

    expect(result).toEqual({ ok: false, inputPath, reason: 'Could not parse frontmatter' });
    expect(writer.files.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(`Warning: Could not parse frontmatter in ${inputPath}`);
  });

  it('TOMLが壊れていれば失敗として扱う', async () => {
    const inputPath = await writeInput('2023-01-02-broken.md', '+++\ntitle = "unterminated\n+++\nBody');

    const result = await converter.convertFile(inputPath, '/out');

    expect(result.ok).toBe(false);
    expect(writer.files.size).toBe(0);
    expect(logger.error).toHaveBeenCalledWith('Raw frontmatter content:');
  });

  it('値の形が想定と異なればその文書だけ失敗にする', async () => {
    const inputPath = await writeInput('2023-01-03-shape.md', '+++\ntitle = 42\n+++\nBody');

    const result = await converter.convertFile(inputPath, '/out');

    expect(result).toEqual({
      ok: false,
      inputPath,
      reason: 'Unexpected shape at "title": expected string, got number',
    });
    expect(logger.error).toHaveBeenCalledWith(
      `Error converting file ${inputPath}: Unexpected shape at "title": expected string, got number`
    );
  });

  it('読み込めないファイルは失敗として返す', async () => {
    const inputPath = path.join(TEST_DIR, 'missing.md');

    const result = await converter.convertFile(inputPath, '/out');

    expect(result.ok).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('書き込みエラーは失敗として返す', async () => {
    const inputPath = await writeInput('2023-01-04-write.md', '+++\ntitle = "W"\n+++\nBody');
    const failingWriter: DocumentWriter = {
      ensureDir: async () => {},
      write: async () => {
        throw new Error('EACCES: permission denied');
      },
    };
    const failing = new DocumentConverter({
      run,
      mapper: new SchemaMapper({ enricher: noopEnricher, logger }),
      writer: failingWriter,
      logger,
    });

    const result = await failing.convertFile(inputPath, '/out');

    expect(result).toEqual({ ok: false, inputPath, reason: 'EACCES: permission denied' });
  });

  it('description・tagsの元がなく補完も無効ならどちらのキーも出力しない', async () => {
    const inputPath = await writeInput('2023-02-01-bare.md', '+++\ntitle = "Bare"\n[extra]\nother = 1\n+++\nBody');

    await converter.convertFile(inputPath, '/out');

    const output = writer.files.get(path.join('/out', 'bare.md')) ?? '';
    expect(output).not.toContain('description:');
    expect(output).not.toContain('tags:');
  });

  it('Zolaの典型的なフロントマターを変換できる', async () => {
    const inputPath = await writeInput(
      '2023-03-10-typical.md',
      [
        '+++',
        'title = "Café notes"',
        'date = 2023-03-10',
        'description = "Ignored because lead wins"',
        '',
        '[taxonomies]',
        'tags = ["coffee", "travel"]',
        'categories = ["travel", "Life"]',
        '',
        '[extra]',
        'lead = "Notes from a café"',
        '+++',
        '',
        'First paragraph with ![photo](a.jpg).',
        '',
        '+++ not a delimiter for us +++',
        '',
      ].join('\n')
    );

    await converter.convertFile(inputPath, '/out');

    expect(writer.files.get(path.join('/out', 'typical.md'))).toBe(
      [
        '---',
        'title: Café notes',
        'pubDate: 2023-03-10',
        'author: Anonymous',
        'description: Notes from a café',
        'tags:',
        '- Life',
        '- coffee',
        '- travel',
        '---',
        '',
        'First paragraph with ![photo](a.jpg).',
        '',
        '+++ not a delimiter for us +++',
      ].join('\n')
    );
  });

  it('補完が無効なら同じ入力から同じ出力を得る', async () => {
    const inputPath = await writeInput('idempotent.md', '+++\ntitle = "Same"\n[taxonomies]\ntags = ["b", "a"]\n+++\nBody');

    await converter.convertFile(inputPath, '/first');
    await converter.convertFile(inputPath, '/second');

    const first = writer.files.get(path.join('/first', 'idempotent.md'));
    expect(first).toBeDefined();
    expect(writer.files.get(path.join('/second', 'idempotent.md'))).toBe(first);
  });

  it('補完の結果をタグとして小文字・重複なし・昇順で保存する', async () => {
    const generate = vi.fn(async (prompt: string, _maxTokens: number) =>
      prompt.startsWith('Suggest') ? 'a, b, B, c' : 'Generated.'
    );
    const enricher = new ModelEnricher({ generate }, {}, logger);
    const enriched = new DocumentConverter({
      run: { ...run, enrich: true },
      mapper: new SchemaMapper({ enricher, logger }),
      writer,
      logger,
    });
    const inputPath = await writeInput('2023-04-01-enrich.md', '+++\ntitle = "Enrich"\n+++\nBody');

    await enriched.convertFile(inputPath, '/out');

    const output = writer.files.get(path.join('/out', 'enrich.md')) ?? '';
    expect(parse(output.split('---\n')[1])).toEqual({
      title: 'Enrich',
      pubDate: '2023-04-01',
      author: 'Anonymous',
      description: 'Generated.',
      tags: ['a', 'b', 'c'],
    });
    expect(generate).toHaveBeenCalledTimes(2);
    expect(logger.log).toHaveBeenCalledWith('Generated tags: a, b, b, c');
  });
});
