/**
 * Content pane rendering
 * Markdown (directory summaries, .md files) gets headings, lists and inline
 * styles; everything else is shown line for line. Fenced code is highlighted
 * but never reflowed.
 */

import chalk from 'chalk';
import type { ContentFormat } from 'splitview-core';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

const HEADING_COLORS = [
  chalk.red.bold,
  chalk.yellow.bold,
  chalk.green.bold,
  chalk.cyan.bold,
  chalk.blue.bold,
  chalk.magenta.bold
];

export function renderContent(content: string, format: ContentFormat): string {
  return format === 'markdown' ? renderMarkdown(content) : renderPlainText(content);
}

export function renderMarkdown(content: string): string {
  return renderLines(content, renderMarkdownLine);
}

export function renderPlainText(content: string): string {
  return renderLines(content, line => line);
}

// Fences open and close on lines starting with ```; the lines between keep
// their text exactly, highlighting only adds colour
function renderLines(content: string, renderProse: (line: string) => string): string {
  const rendered: string[] = [];
  let language: string | null = null;

  for (const line of content.split('\n')) {
    if (line.startsWith('```')) {
      language = language === null ? line.slice(3).trim() : null;
      rendered.push(chalk.gray(line));
    } else if (language !== null) {
      rendered.push(highlightCode(line, language));
    } else {
      rendered.push(renderProse(line));
    }
  }

  return rendered.join('\n');
}

function renderMarkdownLine(line: string): string {
  const heading = line.match(/^(#{1,6})\s/);
  if (heading) {
    const level = heading[1]?.length ?? 1;
    const color = HEADING_COLORS[level - 1] ?? chalk.white;
    return color(line);
  }

  const bullet = line.match(/^(\s*)[-*+]\s(.*)$/);
  if (bullet) {
    return `${bullet[1] ?? ''}• ${renderInline(bullet[2] ?? '')}`;
  }

  if (line.startsWith('>')) {
    return chalk.gray('│ ') + renderInline(line.slice(1).trim());
  }

  if (/^---+$/.test(line)) {
    return chalk.gray('─'.repeat(40));
  }

  return renderInline(line);
}

function renderInline(text: string): string {
  return text
    .replace(/`([^`]+)`/g, chalk.bgGray.black(' $1 '))
    .replace(/\*\*([^*]+)\*\*/g, chalk.bold('$1'))
    .replace(/(?<!\w)__([^_]+)__(?!\w)/g, chalk.bold('$1'))
    .replace(/(?<![\w*])\*([^*\s][^*]*)\*(?![\w*])/g, chalk.italic('$1'))
    // Underscores inside identifiers are not emphasis
    .replace(/(?<!\w)_([^_\s][^_]*)_(?!\w)/g, chalk.italic('$1'))
    .replace(/\[([^\]]+)\]\(([^)]+)\)/g, chalk.underline.blue('$1') + chalk.gray(' ($2)'))
    .replace(/~~([^~]+)~~/g, chalk.strikethrough('$1'));
}

function highlightCode(line: string, language: string): string {
  switch (language.toLowerCase()) {
    case 'c':
    case 'h':
      return highlightC(line);
    case 'makefile':
    case 'make':
    case 'mk':
      return highlightMakefile(line);
    default:
      return chalk.gray(line);
  }
}

function highlightC(code: string): string {
  if (/^\s*#/.test(code)) {
    return chalk.magenta(code);
  }
  return code
    .replace(/\b(auto|break|case|char|const|continue|default|do|double|else|enum|extern|float|for|goto|if|int|long|register|return|short|signed|sizeof|static|struct|switch|typedef|union|unsigned|void|volatile|while)\b/g, chalk.blue('$1'))
    .replace(/\b(NULL|EOF|stdin|stdout|stderr)\b/g, chalk.yellow('$1'))
    .replace(/"([^"]*)"/g, chalk.green('"$1"'))
    .replace(/'([^']*)'/g, chalk.green("'$1'"))
    .replace(/\/\*.*?\*\/|\/\/.*$/g, chalk.gray('$&'));
}

function highlightMakefile(code: string): string {
  if (/^\s*#/.test(code)) {
    return chalk.gray(code);
  }
  return code
    .replace(/^([\w./%-]+)(\s*:)(?!=)/, chalk.blue('$1') + '$2')
    .replace(/^(\s*[\w.-]+)(\s*[:+?]?=)/, chalk.cyan('$1') + '$2')
    .replace(/\$[({]([^)}]+)[)}]/g, chalk.yellow('$&'))
    .replace(/\$[@<^?*]/g, chalk.yellow('$&'));
}

export function stripAnsiCodes(str: string): string {
  return str.replace(ANSI_PATTERN, '');
}

function isAnsi(token: string): boolean {
  return token.startsWith('\x1b[');
}

/**
 * Split a line into single characters and whole ANSI escape codes
 */
function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let last = 0;

  for (const match of line.matchAll(ANSI_PATTERN)) {
    const index = match.index ?? last;
    tokens.push(...Array.from(line.slice(last, index)), match[0]);
    last = index + match[0].length;
  }
  tokens.push(...Array.from(line.slice(last)));

  return tokens;
}

/**
 * Break a line at its last space before `width`, or mid-word when a word is
 * wider than the pane. Leading indentation is kept.
 */
function wrapLine(line: string, width: number): string[] {
  const rows: string[] = [];
  let current: string[] = [];
  let visible = 0;
  let breakAt = -1;

  for (const token of tokenize(line)) {
    if (isAnsi(token)) {
      current.push(token);
      continue;
    }

    if (visible >= width) {
      if (token === ' ') {
        rows.push(current.join(''));
        current = [];
        visible = 0;
        breakAt = -1;
        continue;
      }

      if (breakAt >= 0) {
        rows.push(current.slice(0, breakAt).join(''));
        current = current.slice(breakAt + 1);
      } else {
        rows.push(current.join(''));
        current = [];
      }
      visible = current.filter(part => !isAnsi(part)).length;
      breakAt = -1;
    }

    // Spaces before the first word are indentation, not break points
    if (token === ' ' && current.some(part => !isAnsi(part) && part !== ' ')) {
      breakAt = current.length;
    }
    current.push(token);
    visible++;
  }

  if (current.length > 0) {
    rows.push(current.join(''));
  }
  return rows;
}

export function wrapText(text: string, width: number): string[] {
  const limit = Math.max(width, 1);
  const lines: string[] = [];

  for (const line of text.split('\n')) {
    if (Array.from(stripAnsiCodes(line)).length <= limit) {
      lines.push(line);
    } else {
      lines.push(...wrapLine(line, limit));
    }
  }

  return lines;
}
