import { describe, it, expect } from 'vitest';
import {
  extractCodeBlock,
  extractCodeBlocks,
  detectFinal,
  truncate,
  formatResult,
  previewText,
} from './parser.js';

describe('extractCodeBlock', () => {
  it('returns the trimmed body of a javascript fence', () => {
    expect(extractCodeBlock('Let me look.\n```javascript\n  print(context.length)\n```\n')).toBe(
      'print(context.length)'
    );
  });

  it('accepts the js tag', () => {
    expect(extractCodeBlock('```js\nconst a = 1;\n```')).toBe('const a = 1;');
  });

  it('prefers tagged fences over earlier untagged ones', () => {
    const text = '```\nuntagged\n```\nthen\n```javascript\ntagged\n```';
    expect(extractCodeBlock(text)).toBe('tagged');
  });

  it('falls back to untagged fences', () => {
    expect(extractCodeBlock('text\n```\nprint(1)\n```')).toBe('print(1)');
  });

  it('returns null without a fence', () => {
    expect(extractCodeBlock('Just thinking out loud.')).toBeNull();
  });

  it('ignores fences tagged with another language', () => {
    expect(extractCodeBlock('```ruby\nx = 1\n```')).toBeNull();
  });

  it('returns every block in order', () => {
    expect(extractCodeBlocks('```js\na\n```\n```js\nb\n```')).toEqual(['a', 'b']);
  });
});

describe('detectFinal', () => {
  it('detects FINAL with its content', () => {
    expect(detectFinal('Here it is FINAL(42)')).toEqual({
      isFinal: true,
      kind: 'FINAL',
      content: '42',
    });
  });

  it('detects FINAL at the start of a line', () => {
    expect(detectFinal('Done.\nFINAL(The answer is yes)')).toEqual({
      isFinal: true,
      kind: 'FINAL',
      content: 'The answer is yes',
    });
  });

  it('gives FINAL_VAR precedence over FINAL', () => {
    expect(detectFinal('FINAL(y)\nFINAL_VAR(x)')).toEqual({
      isFinal: true,
      kind: 'FINAL_VAR',
      content: 'x',
    });
  });

  it('rejects FINALLY and FINAL ANSWER', () => {
    expect(detectFinal('... FINALLY done ...')).toEqual({ isFinal: false });
    expect(detectFinal('FINAL ANSWER: 3')).toEqual({ isFinal: false });
  });

  it('requires the parenthesis directly after the keyword', () => {
    expect(detectFinal('FINAL (3)')).toEqual({ isFinal: false });
  });

  it('requires whitespace or line start before the keyword', () => {
    expect(detectFinal('xFINAL(3)')).toEqual({ isFinal: false });
    expect(detectFinal('call_FINAL_VAR(x)')).toEqual({ isFinal: false });
  });

  it('ignores blank FINAL content', () => {
    expect(detectFinal('FINAL(   )')).toEqual({ isFinal: false });
  });

  it('trims FINAL content and allows newlines', () => {
    expect(detectFinal('FINAL( multi\nline )')).toEqual({
      isFinal: true,
      kind: 'FINAL',
      content: 'multi\nline',
    });
  });

  it('cuts FINAL content at the first closing parenthesis', () => {
    expect(detectFinal('FINAL(f(x) = 2)')).toEqual({ isFinal: true, kind: 'FINAL', content: 'f(x' });
  });

  it('accepts any JavaScript identifier in FINAL_VAR', () => {
    expect(detectFinal('FINAL_VAR($total)')).toEqual({ isFinal: true, kind: 'FINAL_VAR', content: '$total' });
    expect(detectFinal('FINAL_VAR(_row$2)')).toEqual({ isFinal: true, kind: 'FINAL_VAR', content: '_row$2' });
  });

  it('rejects FINAL_VAR with a non-identifier', () => {
    expect(detectFinal('FINAL_VAR(1st)')).toEqual({ isFinal: false });
    expect(detectFinal('FINAL_VAR(my var)')).toEqual({ isFinal: false });
  });
});

describe('truncate', () => {
  it('is the identity within the limit', () => {
    expect(truncate('abc', 5)).toBe('abc');
    expect(truncate('abcde', 5)).toBe('abcde');
  });

  it('cuts at the limit and reports the total length', () => {
    expect(truncate('a'.repeat(10), 5)).toBe(
      'aaaaa\n\n... [Output truncated. Total length: 10 chars]'
    );
  });

  it('backs up to a newline in the last 30% of the cut', () => {
    const text = `${'a'.repeat(8)}\n${'b'.repeat(15)}`;
    expect(truncate(text, 10)).toBe(
      'aaaaaaaa\n\n... [Output truncated. Total length: 24 chars]'
    );
  });

  it('keeps the full cut when the newline is early', () => {
    const text = `aa\n${'b'.repeat(12)}`;
    expect(truncate(text, 10)).toBe(
      'aa\nbbbbbbb\n\n... [Output truncated. Total length: 15 chars]'
    );
  });

  it('bounds the result by the limit plus the notice', () => {
    const text = 'x'.repeat(5000);
    const notice = '\n\n... [Output truncated. Total length: 5000 chars]';
    const result = truncate(text, 2000);
    expect(result.length).toBeLessThanOrEqual(2000 + notice.length);
    expect(result.endsWith(notice)).toBe(true);
  });

  it('is idempotent at the same limit', () => {
    const once = truncate(`${'line\n'.repeat(100)}`, 42);
    expect(truncate(once, 42)).toBe(once);
  });
});

describe('formatResult', () => {
  it('renders output', () => {
    expect(formatResult({ success: true, output: '4', error: null })).toBe(
      '**Output:**\n```\n4\n```'
    );
  });

  it('renders stderr for successful runs', () => {
    expect(formatResult({ success: true, output: '', error: 'warn' })).toBe(
      '**Stderr:**\n```\nwarn\n```'
    );
  });

  it('renders output and error for failed runs', () => {
    expect(formatResult({ success: false, output: 'partial', error: 'TypeError: x' })).toBe(
      '**Output:**\n```\npartial\n```\n\n**Error:**\n```\nTypeError: x\n```'
    );
  });

  it('renders sentinels when both are empty', () => {
    expect(formatResult({ success: true, output: '', error: null })).toBe(
      '*(Code executed successfully with no output)*'
    );
    expect(formatResult({ success: false, output: '', error: null })).toBe(
      '*(Execution failed with no output)*'
    );
  });
});

describe('previewText', () => {
  it('collapses blank runs and trims', () => {
    expect(previewText('  a\n\n\n\nb  ')).toBe('a\n\nb');
  });

  it('cuts long text with an ellipsis', () => {
    expect(previewText('abcdef', 3)).toBe('abc...');
  });
});
