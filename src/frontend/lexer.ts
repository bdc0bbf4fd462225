import type { SourceSpan } from './ast.js';
import type { SourceFile } from './source.js';
import { posAtOffset, span } from './source.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

export const KEYWORDS = [
  'namespace',
  'include',
  'attribute',
  'root_type',
  'file_identifier',
  'file_extension',
  'enum',
  'union',
  'struct',
  'table',
  'rpc_service',
  'true',
  'false',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

export const PUNCTUATORS = ['{', '}', '(', ')', '[', ']', ';', ':', ',', '=', '.', '-', '+'] as const;

export type Punct = (typeof PUNCTUATORS)[number];

/**
 * Lexical tokens. `doc` tokens carry the text of one `///` line with the marker removed.
 */
export type Token =
  | { kind: 'ident'; text: string; span: SourceSpan }
  | { kind: 'keyword'; text: Keyword; span: SourceSpan }
  | { kind: 'int'; text: string; value: bigint; span: SourceSpan }
  | { kind: 'float'; text: string; value: number; span: SourceSpan }
  | { kind: 'string'; text: string; value: string; span: SourceSpan }
  | { kind: 'punct'; text: Punct; span: SourceSpan }
  | { kind: 'doc'; text: string; span: SourceSpan }
  | { kind: 'eof'; text: ''; span: SourceSpan };

const keywordSet: ReadonlySet<string> = new Set(KEYWORDS);
const punctSet: ReadonlySet<string> = new Set(PUNCTUATORS);

function isKeyword(text: string): text is Keyword {
  return keywordSet.has(text);
}

function isPunct(text: string): text is Punct {
  return punctSet.has(text);
}

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9';
const isIdentStart = (ch: string | undefined): boolean =>
  ch !== undefined && /[A-Za-z_]/.test(ch);
const isIdentPart = (ch: string | undefined): boolean =>
  ch !== undefined && /[A-Za-z0-9_]/.test(ch);

class LexFailure extends Error {
  constructor(
    readonly id: DiagnosticId,
    readonly offset: number,
    message: string,
  ) {
    super(message);
  }
}

/**
 * Describe a token for `expected X, found Y` messages.
 */
export function describeToken(t: Token): string {
  switch (t.kind) {
    case 'eof':
      return 'end of file';
    case 'string':
      return `string ${JSON.stringify(t.value)}`;
    case 'doc':
      return 'doc comment';
    case 'ident':
    case 'keyword':
    case 'int':
    case 'float':
    case 'punct':
      return `"${t.text}"`;
  }
}

/**
 * Tokenize schema text.
 *
 * Lexing stops at the first error: a single diagnostic is pushed and `undefined` is returned.
 * The returned stream always ends with an `eof` token.
 */
export function tokenize(file: SourceFile, diagnostics: Diagnostic[]): Token[] | undefined {
  const text = file.text;
  const tokens: Token[] = [];
  let i = 0;

  const readEscape = (start: number): { ch: string; next: number } => {
    const esc = text[start + 1];
    switch (esc) {
      case 'n':
        return { ch: '\n', next: start + 2 };
      case 't':
        return { ch: '\t', next: start + 2 };
      case 'r':
        return { ch: '\r', next: start + 2 };
      case 'b':
        return { ch: '\b', next: start + 2 };
      case 'f':
        return { ch: '\f', next: start + 2 };
      case '"':
      case "'":
      case '\\':
      case '/':
        return { ch: esc, next: start + 2 };
      case 'x': {
        const hex = /^[0-9A-Fa-f]{2}/.exec(text.slice(start + 2));
        if (!hex) throw new LexFailure(DiagnosticIds.LexUnexpectedChar, start, 'Invalid \\x escape');
        return { ch: String.fromCharCode(Number.parseInt(hex[0], 16)), next: start + 4 };
      }
      case 'u': {
        const hex = /^[0-9A-Fa-f]{4}/.exec(text.slice(start + 2));
        if (!hex) throw new LexFailure(DiagnosticIds.LexUnexpectedChar, start, 'Invalid \\u escape');
        return { ch: String.fromCharCode(Number.parseInt(hex[0], 16)), next: start + 6 };
      }
      default:
        throw new LexFailure(
          esc === undefined || esc === '\n'
            ? DiagnosticIds.LexUnterminatedString
            : DiagnosticIds.LexUnexpectedChar,
          start,
          esc === undefined || esc === '\n'
            ? 'Unterminated string literal'
            : `Unknown escape sequence "\\${esc}"`,
        );
    }
  };

  const lexNumber = (start: number): Token => {
    const hex = /^0[xX][0-9A-Fa-f]+/.exec(text.slice(start));
    if (hex) {
      const end = start + hex[0].length;
      if (isIdentPart(text[end])) {
        throw new LexFailure(DiagnosticIds.LexUnexpectedChar, end, `Unexpected character "${text[end]}"`);
      }
      i = end;
      return { kind: 'int', text: hex[0], value: BigInt(hex[0]), span: span(file, start, end) };
    }
    const dec = /^(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?/.exec(text.slice(start));
    if (!dec) {
      throw new LexFailure(DiagnosticIds.LexUnexpectedChar, start, `Unexpected character "${text[start]}"`);
    }
    const end = start + dec[0].length;
    if (isIdentPart(text[end])) {
      throw new LexFailure(DiagnosticIds.LexUnexpectedChar, end, `Unexpected character "${text[end]}"`);
    }
    i = end;
    const raw = dec[0];
    const s = span(file, start, end);
    if (/[.eE]/.test(raw)) return { kind: 'float', text: raw, value: Number(raw), span: s };
    return { kind: 'int', text: raw, value: BigInt(raw), span: s };
  };

  try {
    while (i < text.length) {
      const ch = text[i]!;

      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\uFEFF') {
        i++;
        continue;
      }

      if (ch === '/' && text[i + 1] === '/') {
        let end = text.indexOf('\n', i);
        if (end < 0) end = text.length;
        if (text[i + 2] === '/' && text[i + 3] !== '/') {
          let body = text.slice(i + 3, end).replace(/\r$/, '');
          if (body.startsWith(' ')) body = body.slice(1);
          tokens.push({ kind: 'doc', text: body, span: span(file, i, end) });
        }
        i = end;
        continue;
      }

      if (ch === '/' && text[i + 1] === '*') {
        const end = text.indexOf('*/', i + 2);
        if (end < 0) {
          throw new LexFailure(DiagnosticIds.LexUnterminatedComment, i, 'Unterminated block comment');
        }
        i = end + 2;
        continue;
      }

      if (ch === '"') {
        const start = i;
        let value = '';
        i++;
        while (true) {
          const c = text[i];
          if (c === undefined || c === '\n') {
            throw new LexFailure(DiagnosticIds.LexUnterminatedString, start, 'Unterminated string literal');
          }
          if (c === '"') {
            i++;
            break;
          }
          if (c === '\\') {
            const { ch: decoded, next } = readEscape(i);
            value += decoded;
            i = next;
            continue;
          }
          value += c;
          i++;
        }
        tokens.push({
          kind: 'string',
          text: text.slice(start, i),
          value,
          span: span(file, start, i),
        });
        continue;
      }

      if (isDigit(ch) || (ch === '.' && isDigit(text[i + 1]))) {
        tokens.push(lexNumber(i));
        continue;
      }

      if (isIdentStart(ch)) {
        const start = i;
        while (isIdentPart(text[i])) i++;
        const word = text.slice(start, i);
        const s = span(file, start, i);
        tokens.push(isKeyword(word) ? { kind: 'keyword', text: word, span: s } : { kind: 'ident', text: word, span: s });
        continue;
      }

      if (isPunct(ch)) {
        tokens.push({ kind: 'punct', text: ch, span: span(file, i, i + 1) });
        i++;
        continue;
      }

      throw new LexFailure(DiagnosticIds.LexUnexpectedChar, i, `Unexpected character "${ch}"`);
    }
  } catch (err) {
    if (!(err instanceof LexFailure)) throw err;
    const pos = posAtOffset(file, err.offset);
    diagnostics.push({
      id: err.id,
      severity: 'error',
      message: err.message,
      file: file.path,
      line: pos.line,
      column: pos.column,
    });
    return undefined;
  }

  tokens.push({ kind: 'eof', text: '', span: span(file, text.length, text.length) });
  return tokens;
}
