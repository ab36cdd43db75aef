import { describe, expect, it } from 'vitest';
import { InputError } from '@/lib/errors';
import { clampText, collapseWhitespace, normalize, normalizeToken, stripHtml, tokenize } from '@/lib/text';

describe('normalizeToken', () => {
  it('lowercases, trims and rewrites symbol-bearing skill names', () => {
    expect(normalizeToken('  Node.js & C++  ')).toBe('nodejs and cplusplus');
    expect(normalizeToken('C#')).toBe('csharp');
  });

  it('collapses punctuation runs into single spaces', () => {
    expect(normalizeToken('CI/CD -- pipelines!!')).toBe('ci cd pipelines');
  });

  it('keeps letters outside the Latin alphabet', () => {
    expect(normalizeToken('Français')).toBe('français');
    expect(normalizeToken('Инженер  данных!')).toBe('инженер данных');
    expect(normalizeToken('数据工程师 (北京)')).toBe('数据工程师 北京');
  });

  it('returns an empty string for whitespace', () => {
    expect(normalizeToken('   \n\t')).toBe('');
  });

  it('rejects non-text input', () => {
    expect(() => normalizeToken(JSON.parse('null'))).toThrow(InputError);
    expect(() => normalizeToken(JSON.parse('42'))).toThrow('Expected text, received number');
  });
});

describe('tokenize', () => {
  it('drops stopwords and duplicates, keeping first-seen order', () => {
    expect(tokenize('The Senior Python Developer, and the python team!')).toEqual([
      'senior',
      'python',
      'developer',
      'team',
    ]);
  });

  it('returns no tokens for empty or stopword-only text', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('the and of')).toEqual([]);
  });

  it('is insensitive to case and surrounding whitespace', () => {
    expect(tokenize('  Python ')).toEqual(tokenize('python'));
  });
});

describe('normalize', () => {
  it('returns the token set', () => {
    expect(normalize('SQL and sql on AWS')).toEqual(new Set(['sql', 'aws']));
  });
});

describe('stripHtml', () => {
  it('removes tags and decodes common entities', () => {
    expect(collapseWhitespace(stripHtml('<p>Build <b>APIs</b>&amp;tools</p>'))).toBe('Build APIs &tools');
    expect(collapseWhitespace(stripHtml('a<br/>b&nbsp;c &lt;d&gt;'))).toBe('a b c <d>');
  });
});

describe('clampText', () => {
  it('leaves short text alone and cuts long text with an ellipsis', () => {
    expect(clampText('  short  ', 10)).toBe('short');
    expect(clampText('abcdefghij', 4)).toBe('abcd…');
  });
});
