import { PLACEHOLDER } from './templates.js';

export type Anchor = 'start' | 'end';

export interface TemplatePattern {
  anchor: Anchor;
  regex: RegExp;
}

export interface MatchSpan {
  start: number;
  end: number;
}

const IDENTIFIER = '[A-Za-z0-9_]+';
const ANY_WHITESPACE = '\\s*';

export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Turns template text into an anchored pattern. Whitespace runs match any amount
 * of whitespace (including none), PLACEHOLDER matches one or more identifier
 * characters, everything else matches literally.
 */
export function compileTemplate(template: string, anchor: Anchor): TemplatePattern {
  const body = template
    .split(/(\s+)/)
    .map(run => {
      if (run.length === 0) return '';
      if (/^\s+$/.test(run)) return ANY_WHITESPACE;
      return run.split(PLACEHOLDER).map(escapeRegExp).join(IDENTIFIER);
    })
    .join('');
  const source = anchor === 'start' ? `^${body}` : `${body}$`;
  return { anchor, regex: new RegExp(source) };
}

// Leftmost match; for an end-anchored pattern that is the widest one reaching the end.
export function matchTemplate(pattern: TemplatePattern, subject: string): MatchSpan | null {
  const m = pattern.regex.exec(subject);
  if (!m) return null;
  return { start: m.index, end: m.index + m[0].length };
}
