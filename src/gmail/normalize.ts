import { convert, type HtmlToTextOptions } from 'html-to-text';
import type { EmailRecord } from './record.js';

type NormalizableRecord = Pick<EmailRecord, 'plainText' | 'htmlText' | 'snippet'>;

const HTML_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'img', format: 'skip' },
    { selector: 'script', format: 'skip' },
    { selector: 'style', format: 'skip' },
    { selector: 'a', options: { ignoreHref: true } },
    ...['h1', 'h2', 'h3', 'h4', 'h5', 'h6'].map(selector => ({ selector, options: { uppercase: false } })),
    // Layout tables: one cell per line, so adjacent cells never run together.
    { selector: 'th', format: 'block', options: { leadingLineBreaks: 1, trailingLineBreaks: 1 } },
    { selector: 'td', format: 'block', options: { leadingLineBreaks: 1, trailingLineBreaks: 1 } }
  ]
};

export function htmlToPlain(html: string): string {
  return convert(html, HTML_OPTIONS)
    .replace(/\r\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

// plain text, else HTML stripped to text, else Gmail's snippet
export function displayText(record: NormalizableRecord): string {
  const plain = record.plainText.trim();
  if (plain) return plain;
  if (record.htmlText.trim()) {
    const text = htmlToPlain(record.htmlText);
    if (text) return text;
  }
  return record.snippet;
}
