import { describe, it, expect } from 'vitest';
import { renderMarkdown, renderReply } from './renderMarkdown.js';

describe('renderMarkdown', () => {
  it('renders bold text without the markers', () => {
    const result = renderMarkdown('**bold**');
    expect(result).toContain('bold');
    expect(result).not.toContain('**');
  });

  it('renders headers without the hash prefix', () => {
    const result = renderMarkdown('# Header');
    expect(result).toContain('Header');
    expect(result).not.toContain('# ');
  });

  it('keeps fenced code content', () => {
    const result = renderMarkdown('```python\nprint("hi")\n```');
    expect(result).toContain('print(');
    expect(result).not.toContain('```');
  });

  it('draws tables with box characters', () => {
    const result = renderMarkdown('| Name | Qty |\n|---|---|\n| pear | 3 |');
    expect(result).toContain('pear');
    expect(result).toMatch(/[─│┌┐└┘├┤┬┴┼]/);
  });

  it('drops trailing newlines', () => {
    expect(renderMarkdown('hello')).not.toMatch(/\n$/);
  });

  it('returns an empty string for empty input', () => {
    expect(renderMarkdown('')).toBe('');
  });
});

describe('renderReply', () => {
  it('returns trimmed plain text when markdown is off', () => {
    expect(renderReply('\n  **as is**  \n', { markdown: false })).toBe('**as is**');
  });

  it('formats markdown when enabled', () => {
    const result = renderReply('\n- one\n- two\n', { markdown: true });
    expect(result).toContain('one');
    expect(result).toContain('two');
  });
});
