import { LanguageFamily, languageFamily } from './normalizer';

export type TokenType = 'word' | 'number' | 'string' | 'symbol' | 'comment';

export interface Token {
  type: TokenType;
  text: string;
  start: number;
  end: number;
}

/** `hash_comment` covers languages with `#` line comments and no parsed structure. */
export type LexMode = LanguageFamily | 'hash_comment' | 'prose';

const HASH_COMMENT_LANGUAGES = new Set(['ruby']);

export interface LexResult {
  tokens: Token[];
  /** Set when a string or block comment runs to the end of the input. */
  unterminated: boolean;
}

const MULTI_CHAR_OPERATORS = [
  '===',
  '!==',
  '**=',
  '>>=',
  '<<=',
  '...',
  '==',
  '!=',
  '<=',
  '>=',
  '&&',
  '||',
  '++',
  '--',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '&=',
  '|=',
  '^=',
  '**',
  '//',
  '->',
  '=>',
  '::',
  '<<',
  '>>',
  ':=',
  '??',
];

const WORD_START = /[\p{L}_$]/u;
const WORD_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;

function isLineStart(text: string, index: number): boolean {
  for (let i = index - 1; i >= 0; i -= 1) {
    const ch = text[i];
    if (ch === '\n') return true;
    if (ch !== ' ') return false;
  }
  return true;
}

function readQuoted(text: string, start: number, quote: string): { end: number; closed: boolean } {
  let i = start + quote.length;
  while (i < text.length) {
    if (quote.length === 1 && text[i] === '\\') {
      i += 2;
      continue;
    }
    if (text.startsWith(quote, i)) {
      return { end: i + quote.length, closed: true };
    }
    if (quote.length === 1 && quote !== '`' && text[i] === '\n') {
      return { end: i, closed: false };
    }
    i += 1;
  }
  return { end: text.length, closed: false };
}

/**
 * Splits text into word, number, string, symbol and comment tokens with their
 * character offsets. Whitespace produces no tokens.
 */
export function tokenize(text: string, mode: LexMode): LexResult {
  const tokens: Token[] = [];
  let unterminated = false;
  let i = 0;

  const push = (type: TokenType, start: number, end: number): void => {
    tokens.push({ type, text: text.slice(start, end), start, end });
  };

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if ((mode === 'python' || mode === 'hash_comment') && ch === '#') {
      const end = text.indexOf('\n', i);
      const stop = end === -1 ? text.length : end;
      push('comment', i, stop);
      i = stop;
      continue;
    }

    if (mode === 'c_family' && text.startsWith('//', i)) {
      const end = text.indexOf('\n', i);
      const stop = end === -1 ? text.length : end;
      push('comment', i, stop);
      i = stop;
      continue;
    }

    if (mode === 'c_family' && text.startsWith('/*', i)) {
      const close = text.indexOf('*/', i + 2);
      if (close === -1) unterminated = true;
      const stop = close === -1 ? text.length : close + 2;
      push('comment', i, stop);
      i = stop;
      continue;
    }

    if (mode !== 'prose' && (ch === '"' || ch === "'" || (mode === 'c_family' && ch === '`'))) {
      const triple = mode === 'python' && (text.startsWith('"""', i) || text.startsWith("'''", i));
      const quote = triple ? ch.repeat(3) : ch;
      const { end, closed } = readQuoted(text, i, quote);
      if (!closed) unterminated = true;
      push(triple && isLineStart(text, i) ? 'comment' : 'string', i, end);
      i = end;
      continue;
    }

    if (DIGIT.test(ch)) {
      let end = i + 1;
      while (end < text.length && /[0-9a-fA-FxXoObB_.]/.test(text[end])) end += 1;
      push('number', i, end);
      i = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < text.length && WORD_PART.test(text[end])) end += 1;
      push('word', i, end);
      i = end;
      continue;
    }

    const operator = mode === 'prose' ? undefined : MULTI_CHAR_OPERATORS.find((op) => text.startsWith(op, i));
    const width = operator?.length ?? 1;
    push('symbol', i, i + width);
    i += width;
  }

  return { tokens, unterminated };
}

export function lexModeFor(language: string | null): LexMode {
  if (language && HASH_COMMENT_LANGUAGES.has(language)) return 'hash_comment';
  return languageFamily(language) ?? 'prose';
}
