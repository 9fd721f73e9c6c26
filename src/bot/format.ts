/**
 * Markdown → Telegram HTML and message splitting.
 * Covers the subset Telegram renders: pre/code, bold, italic, strikethrough, links.
 */

// Telegram rejects messages over 4096 characters; leave room for entities
export const TELEGRAM_CHUNK = 4000;

const TOOL_BLOCK = /```tool[ \t]*\r?\n[\s\S]+?\r?\n```/g;

/** Remove ```tool blocks; the chat user sees results, not the call protocol. */
export function stripToolBlocks(text: string): string {
  return text.replace(TOOL_BLOCK, '').replace(/\n{3,}/g, '\n\n').trim();
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function emphasis(escaped: string): string {
  return escaped
    .replace(/\*\*(.+?)\*\*/g, '<b>$1</b>')
    .replace(/(?<!\w)\*([^*\s][^*]*?)\*(?!\w)/g, '<i>$1</i>')
    .replace(/~~(.+?)~~/g, '<s>$1</s>')
    .replace(/\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g, '<a href="$2">$1</a>');
}

// Inline code is escaped but never formatted
function formatInline(text: string): string {
  return text
    .split(/(`[^`]+`)/)
    .map((part, i) => (i % 2 === 1 ? `<code>${escapeHtml(part.slice(1, -1))}</code>` : emphasis(escapeHtml(part))))
    .join('');
}

function codeBlock(lang: string, lines: string[]): string {
  const attr = lang ? ` class="language-${escapeHtml(lang)}"` : '';
  return `<pre><code${attr}>${escapeHtml(lines.join('\n'))}</code></pre>`;
}

export function markdownToTelegramHtml(markdown: string): string {
  const lines = stripToolBlocks(markdown).split('\n');
  const out: string[] = [];
  let inCode = false;
  let lang = '';
  let codeLines: string[] = [];

  for (const line of lines) {
    const fence = line.trimStart().startsWith('```');
    if (fence && !inCode) {
      inCode = true;
      lang = line.trim().slice(3).trim();
      codeLines = [];
      continue;
    }
    if (fence && inCode) {
      inCode = false;
      out.push(codeBlock(lang, codeLines));
      continue;
    }
    if (inCode) {
      codeLines.push(line);
      continue;
    }

    const heading = /^#{1,6}\s+(.+)$/.exec(line);
    if (heading?.[1] !== undefined) {
      out.push(`<b>${formatInline(heading[1])}</b>`);
      continue;
    }
    const bullet = /^(\s*)[-*+]\s+(.+)$/.exec(line);
    if (bullet?.[2] !== undefined) {
      out.push(`${bullet[1] ? '  ' : ''}• ${formatInline(bullet[2])}`);
      continue;
    }
    out.push(formatInline(line));
  }

  // Unclosed fence: render what we have
  if (inCode) out.push(codeBlock(lang, codeLines));

  return out.join('\n');
}

/**
 * Split on line boundaries into chunks of at most `maxLen` characters.
 * A single line longer than that is cut into hard pieces.
 */
export function splitMessage(text: string, maxLen = TELEGRAM_CHUNK): string[] {
  if (text.length <= maxLen) return [text];

  const parts: string[] = [];
  let current = '';

  for (const whole of text.split('\n')) {
    let line = whole;
    if (current.length + line.length + 1 > maxLen) {
      if (current) parts.push(current);
      while (line.length > maxLen) {
        parts.push(line.slice(0, maxLen));
        line = line.slice(maxLen);
      }
      current = line;
    } else {
      current = current ? `${current}\n${line}` : line;
    }
  }
  if (current) parts.push(current);

  return parts;
}
