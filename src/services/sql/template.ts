/**
 * SQL Template Abstractor.
 *
 * Reduces a query to its skeleton: clause keywords, operators, function names
 * and join types survive in order; tables, columns and literals become typed
 * placeholders; aliases are dropped. Two queries are structurally equivalent
 * iff their token sequences are equal.
 *
 * All dialect handling lives here. The rest of the pipeline only compares
 * templates.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ParseError } from '../../types/errors.js';

const VocabularySchema = z.object({
  keywords: z.array(z.string()),
  function_keywords: z.array(z.string()),
  query_starts: z.array(z.string()),
  needs_operand: z.array(z.string()),
  clause_starts: z.array(z.string()),
});

const vocabulary = VocabularySchema.parse(
  JSON.parse(readFileSync(new URL('../../../data/sql_keywords.json', import.meta.url), 'utf-8'))
);

const KEYWORDS = new Set(vocabulary.keywords);
const FUNCTION_KEYWORDS = new Set(vocabulary.function_keywords);
const QUERY_STARTS = new Set(vocabulary.query_starts);
const NEEDS_OPERAND = new Set(vocabulary.needs_operand);
const CLAUSE_STARTS = new Set(vocabulary.clause_starts);

// Keywords after which a bare name is an alias
const OPERAND_END_KEYWORDS = new Set(['END', 'NULL', 'TRUE', 'FALSE']);

// A double-quoted token right after one of these is a string operand
const VALUE_OPERATORS = new Set(['=', '==', '<>', '!=', '<', '>', '<=', '>=']);
const VALUE_KEYWORDS = new Set(['LIKE', 'GLOB', 'REGEXP', 'MATCH', 'ESCAPE', 'BETWEEN', 'THEN', 'ELSE']);

// ============================================================================
// Types
// ============================================================================

export type Placeholder = '<TABLE>' | '<COL>' | '<NUM>' | '<STR>' | '<PARAM>';

export interface TemplateToken {
  readonly kind: 'keyword' | 'function' | 'type' | 'placeholder' | 'operator' | 'lparen' | 'rparen' | 'comma';
  readonly text: string;
}

export interface SqlTemplate {
  readonly tokens: readonly TemplateToken[];
  /** Rendered form, e.g. `SELECT COUNT(*) FROM <TABLE> WHERE <COL> = <STR>` */
  readonly text: string;
}

type LexemeKind =
  | 'word'
  | 'identifier'
  | 'quoted'
  | 'string'
  | 'number'
  | 'param'
  | 'operator'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'dot'
  | 'semicolon';

interface Lexeme {
  kind: LexemeKind;
  text: string;
  position: number;
}

// ============================================================================
// Lexer
// ============================================================================

const OPERATORS = ['<>', '!=', '<=', '>=', '==', '||', '<<', '>>', '=', '<', '>', '+', '-', '*', '/', '%', '&', '|', '~'];
const OPERATOR_ALIASES: Readonly<Record<string, string>> = { '!=': '<>', '==': '=' };
const PUNCTUATION: Readonly<Record<string, LexemeKind>> = {
  '(': 'lparen',
  ')': 'rparen',
  ',': 'comma',
  '.': 'dot',
  ';': 'semicolon',
};

const WHITESPACE = /\s/;
const DIGIT = /[0-9]/;
const WORD_START = /[\p{L}_]/u;
const WORD_PART = /[\p{L}\p{N}_$]/u;
const NUMBER = /0[xX][0-9a-fA-F]+|(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const PARAM = /\?\d*|\$\d+|[:@$][\p{L}_][\p{L}\p{N}_]*/uy;

/**
 * End offset (exclusive) of a quoted run starting at `start`. A doubled
 * quote character is an escaped quote.
 */
function closeQuote(sql: string, start: number, quote: string, what: string): number {
  let from = start + 1;
  for (;;) {
    const index = sql.indexOf(quote, from);
    if (index === -1) {
      throw new ParseError(`Unterminated ${what}`, start);
    }
    if (sql[index + 1] === quote) {
      from = index + 2;
      continue;
    }
    return index + 1;
  }
}

function lex(sql: string): Lexeme[] {
  const lexemes: Lexeme[] = [];
  let i = 0;

  while (i < sql.length) {
    const char = sql[i];
    const next = i + 1 < sql.length ? sql[i + 1] : '';

    if (WHITESPACE.test(char)) {
      i++;
      continue;
    }

    // Comments
    if (char === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end + 1;
      continue;
    }
    if (char === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      if (end === -1) {
        throw new ParseError('Unterminated block comment', i);
      }
      i = end + 2;
      continue;
    }

    if (char === "'") {
      const end = closeQuote(sql, i, char, 'string literal');
      lexemes.push({ kind: 'string', text: sql.slice(i, end), position: i });
      i = end;
      continue;
    }
    // Identifier or string literal depending on where it appears
    if (char === '"') {
      const end = closeQuote(sql, i, char, 'quoted text');
      lexemes.push({ kind: 'quoted', text: sql.slice(i + 1, end - 1), position: i });
      i = end;
      continue;
    }
    if (char === '`') {
      const end = closeQuote(sql, i, '`', 'quoted identifier');
      lexemes.push({ kind: 'identifier', text: sql.slice(i + 1, end - 1), position: i });
      i = end;
      continue;
    }
    if (char === '[') {
      const end = sql.indexOf(']', i + 1);
      if (end === -1) {
        throw new ParseError('Unterminated quoted identifier', i);
      }
      lexemes.push({ kind: 'identifier', text: sql.slice(i + 1, end), position: i });
      i = end + 1;
      continue;
    }

    if (DIGIT.test(char) || (char === '.' && DIGIT.test(next))) {
      NUMBER.lastIndex = i;
      const match = NUMBER.exec(sql);
      if (match) {
        lexemes.push({ kind: 'number', text: match[0], position: i });
        i += match[0].length;
        continue;
      }
    }

    if (WORD_START.test(char)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      lexemes.push({ kind: 'word', text: sql.slice(i, end), position: i });
      i = end;
      continue;
    }

    if (char === '?' || char === ':' || char === '@' || char === '$') {
      PARAM.lastIndex = i;
      const match = PARAM.exec(sql);
      if (match) {
        lexemes.push({ kind: 'param', text: match[0], position: i });
        i += match[0].length;
        continue;
      }
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      lexemes.push({ kind: punctuation, text: char, position: i });
      i++;
      continue;
    }

    const operator = OPERATORS.find((op) => sql.startsWith(op, i));
    if (operator) {
      lexemes.push({ kind: 'operator', text: operator, position: i });
      i += operator.length;
      continue;
    }

    throw new ParseError(`Unexpected character "${char}"`, i);
  }

  return lexemes;
}

// ============================================================================
// Statement checks
// ============================================================================

function upper(lexeme: Lexeme | undefined): string {
  return lexeme !== undefined && lexeme.kind === 'word' ? lexeme.text.toUpperCase() : '';
}

function needsOperand(lexeme: Lexeme): boolean {
  if (lexeme.kind === 'comma') return true;
  if (lexeme.kind === 'operator') return lexeme.text !== '*';
  return NEEDS_OPERAND.has(upper(lexeme));
}

/**
 * Reject input that is not exactly one query, and clauses with nothing in them.
 * Returns the lexemes with any trailing semicolon removed.
 */
function checkStatement(all: Lexeme[]): Lexeme[] {
  const semicolon = all.findIndex((lexeme) => lexeme.kind === 'semicolon');
  if (semicolon !== -1 && semicolon < all.length - 1) {
    throw new ParseError('Multiple statements are not supported', all[semicolon + 1].position);
  }
  const lexemes = semicolon === -1 ? all : all.slice(0, semicolon);

  if (lexemes.length === 0) {
    throw new ParseError('Query is empty');
  }

  const first = lexemes[0];
  if (first.kind !== 'lparen' && !QUERY_STARTS.has(upper(first))) {
    throw new ParseError(`Query must start with SELECT or WITH, found "${first.text}"`, first.position);
  }

  for (let i = 0; i < lexemes.length; i++) {
    const lexeme = lexemes[i];
    if (!needsOperand(lexeme)) continue;

    const next: Lexeme | undefined = lexemes[i + 1];
    const missing =
      next === undefined ||
      next.kind === 'rparen' ||
      next.kind === 'comma' ||
      CLAUSE_STARTS.has(upper(next));
    if (!missing) continue;

    const at = next === undefined ? lexeme.position : next.position;
    if (lexeme.kind === 'comma') {
      throw new ParseError('Trailing comma', lexeme.position);
    }
    if (upper(lexeme) === 'SELECT' && upper(next) === 'FROM') {
      throw new ParseError('SELECT list is empty', at);
    }
    throw new ParseError(
      next === undefined ? `Query ends after "${lexeme.text}"` : `Nothing between "${lexeme.text}" and "${next.text}"`,
      at
    );
  }

  return lexemes;
}

// ============================================================================
// Template walk
// ============================================================================

interface Frame {
  kind: 'root' | 'subquery' | 'group' | 'function' | 'cast';
  /** Clause keyword currently open at this depth */
  clause: string | null;
  /** The next bare name is a table reference */
  expectTable: boolean;
  /** Inside the FROM item list at this depth, including its ON and USING conditions */
  fromList: boolean;
  /** Parenthesized list after IN */
  valueList: boolean;
  /** Inside CAST after AS: words are type names */
  castType: boolean;
  position: number;
}

function isName(lexeme: Lexeme | undefined): boolean {
  if (lexeme === undefined) return false;
  if (lexeme.kind === 'identifier' || lexeme.kind === 'quoted') return true;
  return lexeme.kind === 'word' && !KEYWORDS.has(lexeme.text.toUpperCase());
}

/**
 * Whether the double-quoted lexeme at `index` stands where a value is
 * expected rather than a name.
 */
function isQuotedValue(lexemes: Lexeme[], index: number, frame: Frame): boolean {
  const previous: Lexeme | undefined = lexemes[index - 1];
  if (previous === undefined) return false;
  if (previous.kind === 'operator') return VALUE_OPERATORS.has(previous.text);
  if (frame.valueList && (previous.kind === 'lparen' || previous.kind === 'comma')) return true;
  const keyword = upper(previous);
  if (VALUE_KEYWORDS.has(keyword)) return true;
  return keyword === 'AND' && upper(lexemes[index - 3]) === 'BETWEEN';
}

function walk(lexemes: Lexeme[]): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  const frames: Frame[] = [
    { kind: 'root', clause: null, expectTable: false, fromList: false, valueList: false, castType: false, position: 0 },
  ];
  let opening: 'function' | 'cast' | null = null;

  const emit = (kind: TemplateToken['kind'], text: string): void => {
    tokens.push({ kind, text });
  };

  const endsOperand = (): boolean => {
    const last = tokens.length > 0 ? tokens[tokens.length - 1] : null;
    if (!last) return false;
    return (
      last.kind === 'placeholder' ||
      last.kind === 'rparen' ||
      (last.kind === 'keyword' && OPERAND_END_KEYWORDS.has(last.text))
    );
  };

  /**
   * Consume a possibly qualified name starting at `start`; returns the index
   * of its last lexeme.
   */
  const readName = (start: number, frame: Frame): number => {
    let end = start;
    let star = false;
    while (end + 1 < lexemes.length && lexemes[end + 1].kind === 'dot') {
      const part: Lexeme | undefined = lexemes[end + 2];
      if (part !== undefined && part.kind === 'operator' && part.text === '*') {
        star = true;
        end += 2;
        break;
      }
      if (part === undefined || (part.kind !== 'word' && part.kind !== 'identifier' && part.kind !== 'quoted')) {
        throw new ParseError('Expected a name after "."', lexemes[end + 1].position);
      }
      end += 2;
    }

    if (star) {
      emit('operator', '*');
    } else if (frame.expectTable) {
      emit('placeholder', '<TABLE>');
      frame.expectTable = false;
    } else if (end === start && endsOperand()) {
      // Bare alias, e.g. `FROM singer s` or `SELECT COUNT(*) total`
    } else {
      emit('placeholder', '<COL>');
    }
    return end;
  };

  for (let i = 0; i < lexemes.length; i++) {
    const lexeme = lexemes[i];
    const next: Lexeme | undefined = lexemes[i + 1];
    const frame = frames[frames.length - 1];

    switch (lexeme.kind) {
      case 'string':
        emit('placeholder', '<STR>');
        break;

      case 'number':
        emit('placeholder', '<NUM>');
        break;

      case 'param':
        emit('placeholder', '<PARAM>');
        break;

      case 'quoted':
        if (isQuotedValue(lexemes, i, frame)) {
          emit('placeholder', '<STR>');
        } else {
          i = readName(i, frame);
        }
        break;

      case 'operator':
        emit('operator', OPERATOR_ALIASES[lexeme.text] ?? lexeme.text);
        break;

      case 'comma':
        emit('comma', ',');
        if (frame.clause === 'FROM' || frame.clause === 'WITH' || frame.fromList) {
          frame.expectTable = true;
        }
        break;

      case 'lparen': {
        const kind = opening ?? (QUERY_STARTS.has(upper(next)) ? 'subquery' : 'group');
        opening = null;
        frames.push({
          kind,
          clause: kind === 'group' ? frame.clause : null,
          expectTable: kind === 'group' && frame.expectTable,
          fromList: false,
          valueList: kind === 'group' && upper(lexemes[i - 1]) === 'IN',
          castType: false,
          position: lexeme.position,
        });
        frame.expectTable = false;
        emit('lparen', '(');
        break;
      }

      case 'rparen':
        if (frames.length === 1) {
          throw new ParseError('Unbalanced ")"', lexeme.position);
        }
        frames.pop();
        emit('rparen', ')');
        break;

      case 'identifier':
        i = readName(i, frame);
        break;

      case 'word': {
        const word = lexeme.text.toUpperCase();
        const call = next !== undefined && next.kind === 'lparen';

        if (frame.kind === 'cast' && frame.castType) {
          emit('type', word);
        } else if (next !== undefined && next.kind === 'dot') {
          i = readName(i, frame);
        } else if (call && FUNCTION_KEYWORDS.has(word)) {
          emit('function', word);
          opening = word === 'CAST' ? 'cast' : 'function';
        } else if (KEYWORDS.has(word)) {
          if (word === 'AS' && frame.kind !== 'cast' && (isName(next) || next?.kind === 'string')) {
            // Alias: drop both AS and the name
            i++;
            break;
          }
          emit('keyword', word);
          trackClause(frame, word);
        } else if (call && !frame.expectTable) {
          emit('function', word);
          opening = 'function';
        } else {
          i = readName(i, frame);
        }
        break;
      }

      case 'dot':
        throw new ParseError('Unexpected "."', lexeme.position);

      case 'semicolon':
        throw new ParseError('Unexpected ";"', lexeme.position);
    }
  }

  if (frames.length > 1) {
    throw new ParseError('Unclosed "("', frames[frames.length - 1].position);
  }
  return tokens;
}

function trackClause(frame: Frame, keyword: string): void {
  if (frame.kind === 'cast') {
    if (keyword === 'AS') frame.castType = true;
    return;
  }
  if (frame.kind === 'function') return;

  switch (keyword) {
    case 'FROM':
    case 'JOIN':
      frame.clause = 'FROM';
      frame.expectTable = true;
      frame.fromList = true;
      break;
    case 'WITH':
      frame.clause = 'WITH';
      frame.expectTable = true;
      frame.fromList = false;
      break;
    case 'ON':
    case 'USING':
      frame.clause = keyword;
      frame.expectTable = false;
      break;
    case 'SELECT':
    case 'WHERE':
    case 'GROUP':
    case 'HAVING':
    case 'ORDER':
    case 'LIMIT':
    case 'UNION':
    case 'INTERSECT':
    case 'EXCEPT':
    case 'WINDOW':
    case 'VALUES':
      frame.clause = keyword;
      frame.expectTable = false;
      frame.fromList = false;
      break;
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Render tokens with SQL-like spacing: no space inside parentheses, before
 * commas, or between a function name and its argument list.
 */
export function renderTemplate(tokens: readonly TemplateToken[]): string {
  let text = '';
  tokens.forEach((token, index) => {
    const previous = index > 0 ? tokens[index - 1] : null;
    const glued =
      previous === null ||
      previous.kind === 'lparen' ||
      token.kind === 'rparen' ||
      token.kind === 'comma' ||
      (token.kind === 'lparen' && previous.kind === 'function');
    text += glued ? token.text : ` ${token.text}`;
  });
  return text;
}

/**
 * Abstract one SQL query into its structural template.
 *
 * @throws ParseError on malformed SQL or anything other than a single query
 */
export function abstractQuery(sql: string): SqlTemplate {
  const lexemes = checkStatement(lex(sql));
  const tokens = walk(lexemes);
  return { tokens, text: renderTemplate(tokens) };
}

/**
 * Structural equality of two templates.
 */
export function templatesEqual(a: SqlTemplate, b: SqlTemplate): boolean {
  if (a.tokens.length !== b.tokens.length) return false;
  return a.tokens.every(
    (token, index) => token.kind === b.tokens[index].kind && token.text === b.tokens[index].text
  );
}
