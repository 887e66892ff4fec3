import { describe, it, expect } from 'vitest';
import { extractFrontMatter } from '../extractor.js';

describe('extractFrontMatter', () => {
  it('フロントマターと本文を切り出せる', () => {
    const text = '+++\ntitle = "Hello"\n+++\n\n# Heading\n\nBody text.\n';

    const result = extractFrontMatter(text);

    expect(result).toEqual({
      block: 'title = "Hello"',
      body: '# Heading\n\nBody text.',
    });
  });

  it('本文は前後の空白以外そのまま保持する', () => {
    const body = 'Line one  \n\n  indented\t\n```\ncode +  + +\n```\nÜnïcödé ✓';
    const text = `+++\ntitle = "x"\n+++\n\n\n${body}\n\n\n`;

    expect(extractFrontMatter(text)?.body).toBe(body);
  });

  it('本文中の区切り文字列で誤分割しない', () => {
    const text = '+++\ntitle = "A"\n+++\nBefore\n+++\nnot metadata\n+++\nAfter';

    const result = extractFrontMatter(text);

    expect(result?.block).toBe('title = "A"');
    expect(result?.body).toBe('Before\n+++\nnot metadata\n+++\nAfter');
  });

  it('区切りがなければnull', () => {
    expect(extractFrontMatter('# Just markdown\n')).toBeNull();
  });

  it('閉じ区切りがなければnull', () => {
    expect(extractFrontMatter('+++\ntitle = "x"\n\nBody')).toBeNull();
  });

  it('YAMLの区切りは対象外', () => {
    expect(extractFrontMatter('---\ntitle: x\n---\nBody')).toBeNull();
  });

  it('本文が空でも切り出せる', () => {
    expect(extractFrontMatter('+++\ntitle = "x"\n+++\n')).toEqual({ block: 'title = "x"', body: '' });
  });
});
