import { ParseError } from '../../common/errors/originality.errors';
import { MatchedSpan } from '../originality.types';
import { lineOf, lineStarts } from '../text/line-index';
import { LanguageFamily, languageFamily } from '../text/normalizer';
import { Token, tokenize } from '../text/tokenizer';
import { matchingBlocks, shouldSwap, similarityRatio } from './sequence-matcher';

export interface SkeletonToken {
  symbol: string;
  start: number;
  end: number;
}

export interface Skeleton {
  tokens: SkeletonToken[];
  parseFailed: boolean;
  failureReason: string | null;
}

export interface StructuralComparison {
  similarity: number;
  parseFailed: boolean;
  spans: MatchedSpan[];
}

interface Statement {
  tokens: Token[];
  depth: number;
}

const OPAQUE_SYMBOL = '<unparsed>';

const MODIFIERS = new Set([
  'async',
  'public',
  'private',
  'protected',
  'static',
  'export',
  'final',
  'abstract',
  'override',
  'readonly',
  'virtual',
  'inline',
  'pub',
]);

const STATEMENT_KEYWORDS = new Map<string, string>([
  ['def', 'FUNC'],
  ['function', 'FUNC'],
  ['func', 'FUNC'],
  ['fn', 'FUNC'],
  ['fun', 'FUNC'],
  ['class', 'CLASS'],
  ['struct', 'CLASS'],
  ['interface', 'CLASS'],
  ['enum', 'CLASS'],
  ['trait', 'CLASS'],
  ['impl', 'CLASS'],
  ['if', 'IF'],
  ['elif', 'ELIF'],
  ['else', 'ELSE'],
  ['for', 'FOR'],
  ['foreach', 'FOR'],
  ['while', 'WHILE'],
  ['do', 'WHILE'],
  ['loop', 'WHILE'],
  ['return', 'RETURN'],
  ['yield', 'YIELD'],
  ['try', 'TRY'],
  ['except', 'CATCH'],
  ['catch', 'CATCH'],
  ['finally', 'FINALLY'],
  ['raise', 'THROW'],
  ['throw', 'THROW'],
  ['import', 'IMPORT'],
  ['from', 'IMPORT'],
  ['using', 'IMPORT'],
  ['package', 'IMPORT'],
  ['with', 'WITH'],
  ['break', 'BREAK'],
  ['continue', 'CONTINUE'],
  ['pass', 'PASS'],
  ['switch', 'SWITCH'],
  ['match', 'SWITCH'],
  ['case', 'CASE'],
  ['default', 'CASE'],
  ['assert', 'ASSERT'],
  ['global', 'DECL'],
  ['nonlocal', 'DECL'],
  ['const', 'DECL'],
  ['let', 'DECL'],
  ['var', 'DECL'],
  ['val', 'DECL'],
]);

const PYTHON_COMPOUND = new Set([
  'def',
  'class',
  'if',
  'elif',
  'else',
  'for',
  'while',
  'try',
  'except',
  'finally',
  'with',
  'async',
  'match',
  'case',
]);

const OPERATOR_CATEGORIES = new Map<string, string>([
  ['+', 'arith'],
  ['-', 'arith'],
  ['*', 'arith'],
  ['/', 'arith'],
  ['%', 'arith'],
  ['**', 'arith'],
  ['//', 'arith'],
  ['++', 'arith'],
  ['--', 'arith'],
  ['==', 'compare'],
  ['!=', 'compare'],
  ['===', 'compare'],
  ['!==', 'compare'],
  ['<', 'compare'],
  ['>', 'compare'],
  ['<=', 'compare'],
  ['>=', 'compare'],
  ['&&', 'logical'],
  ['||', 'logical'],
  ['!', 'logical'],
  ['??', 'logical'],
  ['=', 'assign'],
  [':=', 'assign'],
  ['+=', 'assign'],
  ['-=', 'assign'],
  ['*=', 'assign'],
  ['/=', 'assign'],
  ['%=', 'assign'],
  ['**=', 'assign'],
  ['&=', 'assign'],
  ['|=', 'assign'],
  ['^=', 'assign'],
  ['<<=', 'assign'],
  ['>>=', 'assign'],
  ['&', 'bitwise'],
  ['|', 'bitwise'],
  ['^', 'bitwise'],
  ['~', 'bitwise'],
  ['<<', 'bitwise'],
  ['>>', 'bitwise'],
]);

const WORD_OPERATORS = new Map<string, string>([
  ['and', 'logical'],
  ['or', 'logical'],
  ['not', 'logical'],
  ['in', 'compare'],
  ['is', 'compare'],
  ['instanceof', 'compare'],
]);

const OPENERS = new Map<string, string>([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
]);
const CLOSERS = new Set([')', ']', '}']);

function checkBalanced(tokens: Token[]): void {
  const stack: string[] = [];
  for (const token of tokens) {
    if (token.type !== 'symbol') continue;
    const closer = OPENERS.get(token.text);
    if (closer) {
      stack.push(closer);
    } else if (CLOSERS.has(token.text)) {
      if (stack.pop() !== token.text) {
        throw new ParseError(`unbalanced '${token.text}' at offset ${token.start}`);
      }
    }
  }
  if (stack.length > 0) {
    throw new ParseError('unclosed bracket at end of input');
  }
}

function splitTopLevel(tokens: Token[], separator: string): Token[][] {
  const parts: Token[][] = [[]];
  let depth = 0;
  for (const token of tokens) {
    if (token.type === 'symbol' && OPENERS.has(token.text)) depth += 1;
    if (token.type === 'symbol' && CLOSERS.has(token.text)) depth -= 1;
    if (depth === 0 && token.type === 'symbol' && token.text === separator) {
      parts.push([]);
      continue;
    }
    parts[parts.length - 1].push(token);
  }
  return parts.filter((part) => part.length > 0);
}

function pythonStatements(text: string, tokens: Token[]): Statement[] {
  const starts = lineStarts(text);
  const logicalLines: Token[][] = [];
  let current: Token[] = [];
  let bracketDepth = 0;
  let lastLine = -1;

  for (const token of tokens) {
    const line = lineOf(starts, token.start);
    const continued = current.length > 0 && current[current.length - 1].text === '\\';
    if (current.length > 0 && line !== lastLine && bracketDepth === 0 && !continued) {
      logicalLines.push(current);
      current = [];
    }
    if (token.type === 'symbol' && OPENERS.has(token.text)) bracketDepth += 1;
    if (token.type === 'symbol' && CLOSERS.has(token.text)) bracketDepth -= 1;
    current.push(token);
    lastLine = line;
  }
  if (current.length > 0) logicalLines.push(current);

  const statements: Statement[] = [];
  const indents = [0];

  for (const lineTokens of logicalLines) {
    const tokensInLine = lineTokens.filter((token) => token.text !== '\\');
    if (tokensInLine.length === 0) continue;
    const first = tokensInLine[0];
    const indent = first.start - starts[lineOf(starts, first.start)];

    if (indent > indents[indents.length - 1]) {
      indents.push(indent);
    } else {
      while (indent < indents[indents.length - 1]) indents.pop();
      if (indent !== indents[indents.length - 1]) {
        throw new ParseError(`inconsistent dedent at offset ${first.start}`);
      }
    }
    const depth = indents.length - 1;

    const colon = findHeaderColon(tokensInLine);
    const softKeyword = first.text === 'match' || first.text === 'case';
    if (first.type === 'word' && PYTHON_COMPOUND.has(first.text) && !(softKeyword && colon === -1)) {
      if (colon === -1) {
        throw new ParseError(`missing ':' after '${first.text}' at offset ${first.start}`);
      }
      statements.push({ tokens: tokensInLine.slice(0, colon), depth });
      for (const part of splitTopLevel(tokensInLine.slice(colon + 1), ';')) {
        statements.push({ tokens: part, depth: depth + 1 });
      }
      continue;
    }

    for (const part of splitTopLevel(tokensInLine, ';')) {
      statements.push({ tokens: part, depth });
    }
  }

  return statements;
}

function findHeaderColon(tokens: Token[]): number {
  let depth = 0;
  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];
    if (token.type !== 'symbol') continue;
    if (OPENERS.has(token.text)) depth += 1;
    else if (CLOSERS.has(token.text)) depth -= 1;
    else if (depth === 0 && token.text === ':') return i;
  }
  return -1;
}

function endsValue(token: Token): boolean {
  return token.type !== 'symbol' || token.text === ')' || token.text === ']';
}

function cFamilyStatements(text: string, tokens: Token[]): Statement[] {
  const starts = lineStarts(text);
  const statements: Statement[] = [];
  let buffer: Token[] = [];
  let braceDepth = 0;
  let parenDepth = 0;
  let directiveLine = -1;

  const flush = (): void => {
    if (buffer.length > 0) statements.push({ tokens: buffer, depth: braceDepth });
    buffer = [];
  };

  for (const token of tokens) {
    const line = lineOf(starts, token.start);

    if (directiveLine !== -1) {
      if (line === directiveLine) {
        buffer.push(token);
        continue;
      }
      directiveLine = -1;
      flush();
    }

    if (token.text === '#' && parenDepth === 0 && text.slice(starts[line], token.start).trim() === '') {
      flush();
      directiveLine = line;
      buffer.push(token);
      continue;
    }

    const previous = buffer[buffer.length - 1];
    if (
      previous &&
      parenDepth === 0 &&
      lineOf(starts, previous.start) !== line &&
      endsValue(previous) &&
      token.type !== 'symbol'
    ) {
      flush();
    }

    if (token.type === 'symbol') {
      if (token.text === '(' || token.text === '[') parenDepth += 1;
      if (token.text === ')' || token.text === ']') parenDepth -= 1;

      if (parenDepth === 0 && token.text === ';') {
        flush();
        continue;
      }
      if (parenDepth === 0 && token.text === '{') {
        flush();
        braceDepth += 1;
        continue;
      }
      if (parenDepth === 0 && token.text === '}') {
        flush();
        braceDepth -= 1;
        continue;
      }
    }

    buffer.push(token);
  }
  flush();

  return statements;
}

function statementKind(tokens: Token[]): string {
  let index = 0;
  while (index < tokens.length - 1 && tokens[index].type === 'word' && MODIFIERS.has(tokens[index].text)) {
    index += 1;
  }
  const head = tokens[index];

  if (head.type === 'symbol' && (head.text === '@' || head.text === '#')) {
    return head.text === '@' ? 'DECORATOR' : 'DIRECTIVE';
  }
  if (head.type === 'word') {
    if (head.text === 'else' && tokens[index + 1]?.text === 'if') return 'ELIF';
    const keyword = STATEMENT_KEYWORDS.get(head.text);
    if (keyword) return keyword;
  }

  let depth = 0;
  for (const token of tokens) {
    if (token.type !== 'symbol') continue;
    if (OPENERS.has(token.text)) depth += 1;
    else if (CLOSERS.has(token.text)) depth -= 1;
    else if (depth === 0 && OPERATOR_CATEGORIES.get(token.text) === 'assign') return 'ASSIGN';
  }

  const second = tokens[index + 1];
  if (head.type === 'word' && second?.type === 'word' && !WORD_OPERATORS.has(second.text)) {
    return 'DECL';
  }
  if (tokens.some((token) => token.text === '(')) return 'CALL';
  return 'EXPR';
}

function isCallee(token: Token): boolean {
  return endsValue(token) && !(token.type === 'word' && STATEMENT_KEYWORDS.has(token.text));
}

function operatorSymbols(tokens: Token[], kind: string): string[] {
  const symbols: string[] = [];
  tokens.forEach((token, i) => {
    if (token.type === 'symbol') {
      const category = OPERATOR_CATEGORIES.get(token.text);
      if (category) symbols.push(`op:${category}`);
      const previous = tokens[i - 1];
      if (token.text === '(' && previous && kind !== 'FUNC' && kind !== 'CLASS' && isCallee(previous)) {
        symbols.push('op:call');
      }
    } else if (token.type === 'word') {
      const category = WORD_OPERATORS.get(token.text);
      if (category) symbols.push(`op:${category}`);
    }
  });
  return symbols;
}

function parseStatements(text: string, family: LanguageFamily): Statement[] {
  const { tokens, unterminated } = tokenize(text, family);
  if (unterminated) {
    throw new ParseError('unterminated string or comment');
  }
  const code = tokens.filter((token) => token.type !== 'comment');
  checkBalanced(code);
  const statements = family === 'python' ? pythonStatements(text, code) : cFamilyStatements(text, code);
  if (statements.length === 0) {
    throw new ParseError('no statements found');
  }
  return statements;
}

function failed(reason: string): Skeleton {
  return { tokens: [{ symbol: OPAQUE_SYMBOL, start: 0, end: 0 }], parseFailed: true, failureReason: reason };
}

/**
 * Reduces code to an ordered skeleton of statement kinds (with nesting depth)
 * and operator categories. Identifier names and literal values never reach the
 * skeleton. Never throws: unparsable input yields a single opaque token.
 */
export function fingerprint(text: string, language: string | null): Skeleton {
  const family = languageFamily(language);
  if (!family) {
    return failed(language ? `unsupported language: ${language}` : 'language not detected');
  }

  try {
    const tokens: SkeletonToken[] = [];
    for (const statement of parseStatements(text, family)) {
      const kind = statementKind(statement.tokens);
      const start = statement.tokens[0].start;
      const end = statement.tokens[statement.tokens.length - 1].end;
      tokens.push({ symbol: `${kind}@${statement.depth}`, start, end });
      for (const symbol of operatorSymbols(statement.tokens, kind)) {
        tokens.push({ symbol, start, end });
      }
    }
    return { tokens, parseFailed: false, failureReason: null };
  } catch (err) {
    if (err instanceof ParseError) return failed(err.message);
    throw err;
  }
}

export function compareSkeletons(a: Skeleton, b: Skeleton, minBlockTokens = 1): StructuralComparison {
  if (a.parseFailed || b.parseFailed) {
    return { similarity: 0, parseFailed: true, spans: [] };
  }

  const symbolsA = a.tokens.map((token) => token.symbol);
  const symbolsB = b.tokens.map((token) => token.symbol);
  const swap = shouldSwap(symbolsA, symbolsB);
  const [first, second] = swap ? [b, a] : [a, b];
  const blocks = matchingBlocks(
    swap ? symbolsB : symbolsA,
    swap ? symbolsA : symbolsB,
  );

  const spans: MatchedSpan[] = blocks
    .filter((block) => block.size >= minBlockTokens)
    .map((block) => {
      const left = {
        start: first.tokens[block.a].start,
        end: first.tokens[block.a + block.size - 1].end,
      };
      const right = {
        start: second.tokens[block.b].start,
        end: second.tokens[block.b + block.size - 1].end,
      };
      return swap ? { source: right, target: left } : { source: left, target: right };
    });

  return {
    similarity: similarityRatio(blocks, symbolsA.length, symbolsB.length),
    parseFailed: false,
    spans,
  };
}
