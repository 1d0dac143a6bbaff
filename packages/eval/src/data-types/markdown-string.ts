import { ValidationError } from '../errors.js';
import { NormalizedValue } from './base.js';

const HEADER = /^(#{1,6})[ \t]+/;
const LIST_ITEM = /^([ \t]*)[*+-][ \t]+(.*)$/;
const LINK = /\[([^\]]*)\]\(([^)]*)\)/g;

function normalizeLine(line: string): string {
  let text = line.replace(/[ \t]+$/, '').replace(HEADER, '$1 ');
  const item = LIST_ITEM.exec(text);
  if (item) text = `${item[1].length > 0 ? '  ' : ''}- ${item[2]}`;
  return text.replace(
    LINK,
    (_whole: string, label: string, href: string) => `[${label.trim().replace(/\s+/g, ' ')}](${href.trim()})`
  );
}

export function normalizeMarkdown(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(normalizeLine)
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class MarkdownValue extends NormalizedValue<string> {
  readonly kind = 'markdown' as const;

  parse(raw: unknown): MarkdownValue {
    return new MarkdownValue(raw, this.options);
  }

  protected normalize(raw: unknown): string {
    if (typeof raw !== 'string') {
      throw new ValidationError('MarkdownString only accepts string input');
    }
    return normalizeMarkdown(raw);
  }
}
