import { Position } from './position';
import { Token, TokenValue, keywordToken } from './token';

// maxStringLength is the longest string literal SPL accepts.
const maxStringLength = 15;

export class ScannerError extends Error {
  constructor(public pos: Position, public msg: string) {
    super(`${pos.toString()}: ${msg}`);
  }
}

export class Scanner {
  // rest of input
  rest: string;
  // token being scanned
  token: string = '';
  // current input position
  pos: Position;

  constructor(filename: string | null, src: string) {
    this.rest = src;
    this.pos = new Position(filename, 1, 1);
  }

  error(pos: Position, msg: string): never {
    throw new ScannerError(pos, msg);
  }

  // peekRune returns the next character in the input without consuming it,
  // or '' at end of input.
  peekRune(): string {
    return this.rest.length > 0 ? this.rest[0] : '';
  }

  // readRune consumes and returns the next character in the input.
  readRune(): string {
    if (this.rest.length === 0) {
      this.error(this.pos, 'internal scanner error: readRune at EOF');
    }
    const c = this.rest[0];
    this.rest = this.rest.slice(1);
    this.token += c;
    if (c === '\n') {
      this.pos.line++;
      this.pos.col = 1;
    } else {
      this.pos.col++;
    }
    return c;
  }

  startToken(val: TokenValue): void {
    this.token = '';
    val.pos = this.pos.copy();
  }

  endToken(val: TokenValue): void {
    val.raw = this.token;
  }

  // nextToken is called by the parser to obtain the next input token.
  // It returns the token value and sets val to the data associated with
  // the token.
  nextToken(val: TokenValue): Token {
    // skip spaces and comments
    while (true) {
      const c = this.peekRune();
      if (c === ' ' || c === '\t' || c === '\r' || c === '\n') {
        this.readRune();
        continue;
      }
      if (c === '/' && this.rest.startsWith('//')) {
        while (this.peekRune() !== '' && this.peekRune() !== '\n') {
          this.readRune();
        }
        continue;
      }
      break;
    }

    this.startToken(val);
    const c = this.peekRune();

    if (c === '') {
      this.endToken(val);
      return Token.EOF;
    }

    if (isLower(c)) {
      return this.scanName(val);
    }

    if (isDigit(c)) {
      return this.scanNumber(val);
    }

    if (c === '"') {
      return this.scanString(val);
    }

    this.readRune();
    this.endToken(val);
    switch (c) {
      case '>':
        return Token.GT;
      case '=':
        return Token.ASSIGN;
      case ';':
        return Token.SEMI;
      case '(':
        return Token.LPAREN;
      case ')':
        return Token.RPAREN;
      case '{':
        return Token.LBRACE;
      case '}':
        return Token.RBRACE;
    }
    this.error(val.pos, `unexpected input character ${JSON.stringify(c)}`);
  }

  // A name is a run of lower-case letters followed by a run of digits.
  scanName(val: TokenValue): Token {
    while (isLower(this.peekRune())) {
      this.readRune();
    }
    while (isDigit(this.peekRune())) {
      this.readRune();
    }
    this.endToken(val);
    return keywordToken.get(this.token) ?? Token.NAME;
  }

  // A number is either 0 or a digit sequence without a leading zero.
  scanNumber(val: TokenValue): Token {
    if (this.readRune() !== '0') {
      while (isDigit(this.peekRune())) {
        this.readRune();
      }
    }
    this.endToken(val);
    val.int = parseInt(this.token, 10);
    if (!Number.isSafeInteger(val.int)) {
      this.error(val.pos, `number ${this.token} is too large`);
    }
    return Token.NUMBER;
  }

  // A string holds at most fifteen letters and digits between double quotes.
  scanString(val: TokenValue): Token {
    this.readRune(); // consume opening quote
    while (isAlnum(this.peekRune())) {
      this.readRune();
    }
    if (this.peekRune() !== '"') {
      if (this.peekRune() === '' || this.peekRune() === '\n') {
        this.error(val.pos, 'unterminated string literal');
      }
      this.error(
        this.pos.copy(),
        `invalid character ${JSON.stringify(this.peekRune())} in string literal`
      );
    }
    this.readRune(); // consume closing quote
    this.endToken(val);
    val.string = this.token.slice(1, -1);
    if (val.string.length > maxStringLength) {
      this.error(
        val.pos,
        `string literal longer than ${maxStringLength} characters`
      );
    }
    return Token.STRING;
  }
}

function isLower(c: string): boolean {
  return c >= 'a' && c <= 'z' && c.length === 1;
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9' && c.length === 1;
}

function isAlnum(c: string): boolean {
  return isLower(c) || isDigit(c) || (c >= 'A' && c <= 'Z' && c.length === 1);
}
