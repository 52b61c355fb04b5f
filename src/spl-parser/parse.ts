import createDebug from 'debug';
import { readFileSync } from 'fs';
import { Err, Ok, Result } from 'ts-results';

import { CompileError, ErrorKind } from '../spl/errors';
import * as syntax from './syntax';
import { Position, Scanner, ScannerError, Token, TokenValue } from './tokenize';

const debug = createDebug('spl:parse');

// maxArity is the longest parameter, local or argument list SPL allows.
export const maxArity = 3;

// parse parses SPL source text and returns the corresponding syntax tree,
// or the first lexical or syntax error.
//
// If src is null, parse reads the file named by filename;
// otherwise filename is only used when recording position information.
export function parse(
  filename: string,
  src: string | null
): Result<syntax.File, CompileError> {
  const text = src ?? readFileSync(filename, 'utf8');
  const p = new Parser(new Scanner(filename, text));

  try {
    p.nextToken(); // read first lookahead token
    const f = p.parseFile();
    f.Path = filename;
    return Ok(f);
  } catch (e) {
    if (e instanceof ScannerError) {
      return Err(new CompileError(ErrorKind.Syntax, e.pos, e.msg));
    }
    throw e;
  }
}

class Parser {
  public input: Scanner;
  public tok: Token;
  public tokval: TokenValue;

  constructor(input: Scanner) {
    this.input = input;
    this.tok = Token.ILLEGAL;
    this.tokval = new TokenValue();
  }

  // nextToken advances the scanner and returns the position of the
  // previous token.
  nextToken(): Position {
    const oldpos = this.tokval.pos;
    this.tok = this.input.nextToken(this.tokval);
    debug('nextToken: %s %s', this.tok, this.tokval.pos);
    return oldpos;
  }

  // peek returns the lookahead token. Tests of the lookahead go through
  // peek, since nextToken changes tok behind any narrowing of this.tok.
  peek(): Token {
    return this.tok;
  }

  consume(t: Token): Position {
    if (this.peek() !== t) {
      this.input.error(this.tokval.pos, `got ${this.tok}, want ${t}`);
    }
    return this.nextToken();
  }

  // file = glob { names } proc { pdef* } func { fdef* } main { var { names } algo }
  parseFile(): syntax.File {
    const glob = this.consume(Token.GLOB);
    this.consume(Token.LBRACE);
    const globals = this.parseNames(Infinity, 'global variable');
    this.consume(Token.RBRACE);

    this.consume(Token.PROC);
    this.consume(Token.LBRACE);
    const procs: syntax.ProcDef[] = [];
    while (this.peek() === Token.NAME) {
      procs.push(this.parseProcDef());
    }
    this.consume(Token.RBRACE);

    this.consume(Token.FUNC);
    this.consume(Token.LBRACE);
    const funcs: syntax.FuncDef[] = [];
    while (this.peek() === Token.NAME) {
      funcs.push(this.parseFuncDef());
    }
    this.consume(Token.RBRACE);

    const main = this.parseMain();
    if (this.peek() !== Token.EOF) {
      this.input.error(this.tokval.pos, `got ${this.tok} after end of program`);
    }
    return new syntax.File('', glob, globals, procs, funcs, main);
  }

  // names = NAME*, at most max of them
  parseNames(max: number, what: string): syntax.Ident[] {
    const names: syntax.Ident[] = [];
    while (this.peek() === Token.NAME) {
      if (names.length === max) {
        this.input.error(
          this.tokval.pos,
          `at most ${max} ${what} names are allowed`
        );
      }
      names.push(this.parseIdent());
    }
    return names;
  }

  parseIdent(): syntax.Ident {
    if (this.peek() !== Token.NAME) {
      this.input.error(this.tokval.pos, `got ${this.tok}, want name`);
    }
    const name = this.tokval.raw;
    return new syntax.Ident(this.nextToken(), name);
  }

  // pdef = NAME ( names ) { local { names } algo }
  parseProcDef(): syntax.ProcDef {
    const name = this.parseIdent();
    const params = this.parseParams();
    this.consume(Token.LBRACE);
    const local = this.consume(Token.LOCAL);
    this.consume(Token.LBRACE);
    const locals = this.parseNames(maxArity, 'local');
    this.consume(Token.RBRACE);
    const algo = this.parseAlgo();
    const rbrace = this.consume(Token.RBRACE);
    return new syntax.ProcDef(
      name,
      params,
      new syntax.Body(local, locals, algo),
      rbrace
    );
  }

  // fdef = NAME ( names ) { local { names } [instr (; instr)* ;] return atom }
  parseFuncDef(): syntax.FuncDef {
    const name = this.parseIdent();
    const params = this.parseParams();
    this.consume(Token.LBRACE);
    const local = this.consume(Token.LOCAL);
    this.consume(Token.LBRACE);
    const locals = this.parseNames(maxArity, 'local');
    this.consume(Token.RBRACE);

    const algo: syntax.Stmt[] = [];
    if (this.peek() !== Token.RETURN) {
      algo.push(this.parseInstr());
      while (true) {
        this.consume(Token.SEMI);
        if (this.peek() === Token.RETURN) {
          break;
        }
        algo.push(this.parseInstr());
      }
    }
    const returnPos = this.consume(Token.RETURN);
    const result = this.parseAtom();
    const rbrace = this.consume(Token.RBRACE);
    return new syntax.FuncDef(
      name,
      params,
      new syntax.Body(local, locals, algo),
      returnPos,
      result,
      rbrace
    );
  }

  parseParams(): syntax.Ident[] {
    this.consume(Token.LPAREN);
    const params = this.parseNames(maxArity, 'parameter');
    this.consume(Token.RPAREN);
    return params;
  }

  // main = main { var { names } algo }
  parseMain(): syntax.MainProg {
    const main = this.consume(Token.MAIN);
    this.consume(Token.LBRACE);
    this.consume(Token.VAR);
    this.consume(Token.LBRACE);
    const vars = this.parseNames(Infinity, 'variable');
    this.consume(Token.RBRACE);
    const algo = this.parseAlgo();
    const rbrace = this.consume(Token.RBRACE);
    return new syntax.MainProg(main, vars, algo, rbrace);
  }

  // algo = instr (; instr)*
  parseAlgo(): syntax.Stmt[] {
    const algo = [this.parseInstr()];
    while (this.peek() === Token.SEMI) {
      this.nextToken(); // consume SEMI
      algo.push(this.parseInstr());
    }
    return algo;
  }

  // block = { algo }
  parseBlock(): [syntax.Stmt[], Position] {
    this.consume(Token.LBRACE);
    const algo = this.parseAlgo();
    return [algo, this.consume(Token.RBRACE)];
  }

  parseInstr(): syntax.Stmt {
    switch (this.peek()) {
      case Token.HALT:
        return new syntax.HaltStmt(this.nextToken());

      case Token.PRINT: {
        const pos = this.nextToken(); // consume PRINT
        if (this.peek() === Token.STRING) {
          const value = this.tokval.string;
          return new syntax.PrintStmt(
            pos,
            new syntax.StringLit(this.nextToken(), value)
          );
        }
        return new syntax.PrintStmt(pos, this.parseAtom());
      }

      case Token.WHILE: {
        const pos = this.nextToken(); // consume WHILE
        const cond = this.parseTerm();
        const [body, rbrace] = this.parseBlock();
        return new syntax.WhileStmt(pos, cond, body, rbrace);
      }

      case Token.DO: {
        const pos = this.nextToken(); // consume DO
        const [body] = this.parseBlock();
        const until = this.consume(Token.UNTIL);
        const cond = this.parseTerm();
        return new syntax.DoUntilStmt(pos, body, until, cond);
      }

      case Token.IF:
        return this.parseIfStmt();

      case Token.NAME:
        return this.parseNameStmt();
    }
    this.input.error(this.tokval.pos, `got ${this.tok}, want instruction`);
  }

  // if term { algo } [else { algo }]
  parseIfStmt(): syntax.IfStmt {
    const ifpos = this.nextToken(); // consume IF
    const cond = this.parseTerm();
    const [trueBody, rbrace] = this.parseBlock();
    if (this.peek() !== Token.ELSE) {
      return new syntax.IfStmt(ifpos, cond, trueBody, null, null, rbrace);
    }
    const elsePos = this.nextToken(); // consume ELSE
    const [falseBody, elseRbrace] = this.parseBlock();
    return new syntax.IfStmt(
      ifpos,
      cond,
      trueBody,
      elsePos,
      falseBody,
      elseRbrace
    );
  }

  // NAME ( input )
  // NAME = NAME ( input )
  // NAME = term
  parseNameStmt(): syntax.Stmt {
    const id = this.parseIdent();
    if (this.peek() === Token.LPAREN) {
      const [args, rparen] = this.parseInput();
      return new syntax.CallStmt(id, args, rparen);
    }

    const opPos = this.consume(Token.ASSIGN);
    if (this.peek() !== Token.NAME) {
      return new syntax.AssignStmt(id, opPos, this.parseTerm());
    }
    const name = this.parseIdent();
    if (this.peek() === Token.LPAREN) {
      const [args, rparen] = this.parseInput();
      return new syntax.CallAssignStmt(id, name, args, rparen);
    }
    return new syntax.AssignStmt(id, opPos, new syntax.VarRef(name));
  }

  // input = ( atom* ), at most maxArity atoms
  parseInput(): [syntax.Atom[], Position] {
    this.consume(Token.LPAREN);
    const args: syntax.Atom[] = [];
    while (this.peek() !== Token.RPAREN) {
      if (args.length === maxArity) {
        this.input.error(
          this.tokval.pos,
          `at most ${maxArity} arguments are allowed`
        );
      }
      args.push(this.parseAtom());
    }
    return [args, this.nextToken()];
  }

  // term = atom | ( unop term ) | ( term binop term )
  parseTerm(): syntax.Term {
    if (this.peek() !== Token.LPAREN) {
      return this.parseAtom();
    }
    const lparen = this.nextToken(); // consume LPAREN

    const unop = this.peek();
    switch (unop) {
      case Token.NEG:
      case Token.NOT: {
        this.nextToken(); // consume op
        const x = this.parseTerm();
        const rparen = this.consume(Token.RPAREN);
        return new syntax.UnaryExpr(lparen, unop, x, rparen);
      }
    }

    const x = this.parseTerm();
    const op = this.peek();
    switch (op) {
      case Token.EQ:
      case Token.GT:
      case Token.OR:
      case Token.AND:
      case Token.PLUS:
      case Token.MINUS:
      case Token.MULT:
      case Token.DIV: {
        const opPos = this.nextToken(); // consume op
        const y = this.parseTerm();
        const rparen = this.consume(Token.RPAREN);
        return new syntax.BinaryExpr(lparen, x, opPos, op, y, rparen);
      }
    }
    this.input.error(this.tokval.pos, `got ${op}, want binary operator`);
  }

  // atom = NAME | NUMBER
  parseAtom(): syntax.Atom {
    if (this.peek() === Token.NUMBER) {
      const raw = this.tokval.raw;
      const value = this.tokval.int;
      return new syntax.NumLit(this.nextToken(), raw, value);
    }
    if (this.peek() === Token.NAME) {
      return new syntax.VarRef(this.parseIdent());
    }
    this.input.error(this.tokval.pos, `got ${this.tok}, want name or number`);
  }
}
