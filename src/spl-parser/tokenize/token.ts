import { Position } from './position';

// A Token represents an SPL lexical token.
export enum Token {
  // illegal token
  ILLEGAL = 'illegal token',
  // end of file
  EOF = 'end of file',
  // user-defined name
  NAME = 'name',
  // number literal
  NUMBER = 'number',
  // string literal
  STRING = 'string literal',
  // >
  GT = '>',
  // =
  ASSIGN = '=',
  // ;
  SEMI = ';',
  // (
  LPAREN = '(',
  // )
  RPAREN = ')',
  // {
  LBRACE = '{',
  // }
  RBRACE = '}',

  // keywords
  GLOB = 'glob',
  PROC = 'proc',
  FUNC = 'func',
  MAIN = 'main',
  VAR = 'var',
  LOCAL = 'local',
  RETURN = 'return',
  HALT = 'halt',
  PRINT = 'print',
  WHILE = 'while',
  DO = 'do',
  UNTIL = 'until',
  IF = 'if',
  ELSE = 'else',

  // operator words
  EQ = 'eq',
  OR = 'or',
  AND = 'and',
  PLUS = 'plus',
  MINUS = 'minus',
  MULT = 'mult',
  DIV = 'div',
  NEG = 'neg',
  NOT = 'not',
}

// keywordToken records the special tokens for
// strings that would otherwise be names.
export const keywordToken = new Map<string, Token>([
  ['glob', Token.GLOB],
  ['proc', Token.PROC],
  ['func', Token.FUNC],
  ['main', Token.MAIN],
  ['var', Token.VAR],
  ['local', Token.LOCAL],
  ['return', Token.RETURN],
  ['halt', Token.HALT],
  ['print', Token.PRINT],
  ['while', Token.WHILE],
  ['do', Token.DO],
  ['until', Token.UNTIL],
  ['if', Token.IF],
  ['else', Token.ELSE],
  ['eq', Token.EQ],
  ['or', Token.OR],
  ['and', Token.AND],
  ['plus', Token.PLUS],
  ['minus', Token.MINUS],
  ['mult', Token.MULT],
  ['div', Token.DIV],
  ['neg', Token.NEG],
  ['not', Token.NOT],
]);

// A TokenValue holds the payload of the most recently scanned token.
export class TokenValue {
  raw: string = ''; // raw text of token
  int: number = 0; // decoded number
  string: string = ''; // decoded string, without quotes
  pos: Position = new Position(null, 0, 0); // start position of token
}
