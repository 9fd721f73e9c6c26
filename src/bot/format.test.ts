import { describe, it, expect } from 'vitest';
import { escapeHtml, markdownToTelegramHtml, splitMessage, stripToolBlocks } from './format.ts';

describe('stripToolBlocks', () => {
  it('removes tool calls and tidies the gap', () => {
    const text = 'Checking.\n```tool\n{"tool": "read_file", "path": "a"}\n```\nDone.';
    expect(stripToolBlocks(text)).toBe('Checking.\n\nDone.');
  });
});

describe('escapeHtml', () => {
  it('escapes the characters Telegram parses', () => {
    expect(escapeHtml('<a & b>')).toBe('&lt;a &amp; b&gt;');
  });
});

describe('markdownToTelegramHtml', () => {
  it('converts headings, emphasis, inline code and fences', () => {
    const markdown = '# Title\nUse **bold** and `x<y`\n```ts\nconst a = 1 < 2;\n```';
    expect(markdownToTelegramHtml(markdown)).toBe(
      '<b>Title</b>\n' +
        'Use <b>bold</b> and <code>x&lt;y</code>\n' +
        '<pre><code class="language-ts">const a = 1 &lt; 2;</code></pre>',
    );
  });

  it('turns list items into bullets', () => {
    expect(markdownToTelegramHtml('- item *one*\n  - nested')).toBe('• item <i>one</i>\n  • nested');
  });

  it('does not format inside inline code', () => {
    expect(markdownToTelegramHtml('run `**not bold**`')).toBe('run <code>**not bold**</code>');
  });

  it('closes an unterminated fence', () => {
    expect(markdownToTelegramHtml('```\nraw <tag>')).toBe('<pre><code>raw &lt;tag&gt;</code></pre>');
  });

  it('drops tool blocks before converting', () => {
    expect(markdownToTelegramHtml('Looking.\n```tool\n{"tool": "list_directory"}\n```')).toBe('Looking.');
  });
});

describe('splitMessage', () => {
  it('returns short text whole', () => {
    expect(splitMessage('short', 10)).toEqual(['short']);
  });

  it('splits on line boundaries', () => {
    expect(splitMessage('a'.repeat(10) + '\n' + 'b'.repeat(10), 15)).toEqual(['a'.repeat(10), 'b'.repeat(10)]);
  });

  it('cuts a line longer than the limit', () => {
    expect(splitMessage('x'.repeat(25), 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });

  it('packs several lines into one chunk', () => {
    expect(splitMessage('aa\nbb\ncc\ndd', 5)).toEqual(['aa\nbb', 'cc\ndd']);
  });
});
