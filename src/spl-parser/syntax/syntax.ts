import type { Binding } from '../../resolve/binding';
import { Type } from '../../typecheck/types';
import { Position, Token } from '../tokenize';

// A Node is a node in an SPL syntax tree.
export interface Node {
  // span returns the start and end position of the node.
  span(): [start: Position, end: Position];
}

// An Ident represents a user-defined name: a variable, procedure or function.
export class Ident implements Node {
  readonly kind = 'Ident';
  public NamePos: Position;
  public Name: string;
  public Binding: Binding | null = null; // set by resolver

  constructor(namePos: Position, name: string) {
    this.NamePos = namePos;
    this.Name = name;
  }

  public span(): [start: Position, end: Position] {
    const end = this.NamePos.copy();
    end.col += this.Name.length;
    return [this.NamePos, end];
  }
}

// A VarRef is an atom that reads a variable.
export class VarRef implements Node {
  readonly kind = 'VarRef';
  public Id: Ident;
  public Type: Type = Type.Unknown; // set by type checker

  constructor(id: Ident) {
    this.Id = id;
  }

  public span(): [start: Position, end: Position] {
    return this.Id.span();
  }
}

// A NumLit is a numeric literal atom.
export class NumLit implements Node {
  readonly kind = 'NumLit';
  public ValuePos: Position;
  public Raw: string;
  public Value: number;
  public Type: Type = Type.Unknown; // set by type checker

  constructor(valuePos: Position, raw: string, value: number) {
    this.ValuePos = valuePos;
    this.Raw = raw;
    this.Value = value;
  }

  public span(): [start: Position, end: Position] {
    const end = this.ValuePos.copy();
    end.col += this.Raw.length;
    return [this.ValuePos, end];
  }
}

export type Atom = VarRef | NumLit;

export type UnaryOp = Token.NEG | Token.NOT;

export type BinaryOp =
  | Token.EQ
  | Token.GT
  | Token.OR
  | Token.AND
  | Token.PLUS
  | Token.MINUS
  | Token.MULT
  | Token.DIV;

// A UnaryExpr represents a parenthesized unary expression: (Op X).
export class UnaryExpr implements Node {
  readonly kind = 'UnaryExpr';
  public Lparen: Position;
  public Op: UnaryOp;
  public X: Term;
  public Rparen: Position;
  public Type: Type = Type.Unknown;

  constructor(lparen: Position, op: UnaryOp, x: Term, rparen: Position) {
    this.Lparen = lparen;
    this.Op = op;
    this.X = x;
    this.Rparen = rparen;
  }

  public span(): [start: Position, end: Position] {
    return [this.Lparen, this.Rparen];
  }
}

// A BinaryExpr represents a parenthesized binary expression: (X Op Y).
export class BinaryExpr implements Node {
  readonly kind = 'BinaryExpr';
  public Lparen: Position;
  public X: Term;
  public OpPos: Position;
  public Op: BinaryOp;
  public Y: Term;
  public Rparen: Position;
  public Type: Type = Type.Unknown;

  constructor(
    lparen: Position,
    x: Term,
    opPos: Position,
    op: BinaryOp,
    y: Term,
    rparen: Position
  ) {
    this.Lparen = lparen;
    this.X = x;
    this.OpPos = opPos;
    this.Op = op;
    this.Y = y;
    this.Rparen = rparen;
  }

  public span(): [start: Position, end: Position] {
    return [this.Lparen, this.Rparen];
  }
}

export type Term = Atom | UnaryExpr | BinaryExpr;

// A StringLit is a quoted string, legal only as the operand of print.
export class StringLit implements Node {
  readonly kind = 'StringLit';
  public ValuePos: Position;
  public Value: string; // without quotes

  constructor(valuePos: Position, value: string) {
    this.ValuePos = valuePos;
    this.Value = value;
  }

  public span(): [start: Position, end: Position] {
    const end = this.ValuePos.copy();
    end.col += this.Value.length + 2;
    return [this.ValuePos, end];
  }
}

export type Output = Atom | StringLit;

// A HaltStmt stops the program: halt.
export class HaltStmt implements Node {
  readonly kind = 'HaltStmt';
  public Halt: Position;

  constructor(halt: Position) {
    this.Halt = halt;
  }

  public span(): [start: Position, end: Position] {
    const end = this.Halt.copy();
    end.col += 'halt'.length;
    return [this.Halt, end];
  }
}

// A PrintStmt represents print X.
export class PrintStmt implements Node {
  readonly kind = 'PrintStmt';
  public Print: Position;
  public X: Output;

  constructor(print: Position, x: Output) {
    this.Print = print;
    this.X = x;
  }

  public span(): [start: Position, end: Position] {
    return [this.Print, this.X.span()[1]];
  }
}

// A CallStmt invokes a procedure: Name(Args).
export class CallStmt implements Node {
  readonly kind = 'CallStmt';
  public Name: Ident;
  public Args: Atom[];
  public Rparen: Position;

  constructor(name: Ident, args: Atom[], rparen: Position) {
    this.Name = name;
    this.Args = args;
    this.Rparen = rparen;
  }

  public span(): [start: Position, end: Position] {
    return [this.Name.NamePos, this.Rparen];
  }
}

// A CallAssignStmt stores the result of a function: LHS = Name(Args).
export class CallAssignStmt implements Node {
  readonly kind = 'CallAssignStmt';
  public LHS: Ident;
  public Name: Ident;
  public Args: Atom[];
  public Rparen: Position;

  constructor(lhs: Ident, name: Ident, args: Atom[], rparen: Position) {
    this.LHS = lhs;
    this.Name = name;
    this.Args = args;
    this.Rparen = rparen;
  }

  public span(): [start: Position, end: Position] {
    return [this.LHS.NamePos, this.Rparen];
  }
}

// An AssignStmt stores the value of a term: LHS = RHS.
export class AssignStmt implements Node {
  readonly kind = 'AssignStmt';
  public LHS: Ident;
  public OpPos: Position;
  public RHS: Term;

  constructor(lhs: Ident, opPos: Position, rhs: Term) {
    this.LHS = lhs;
    this.OpPos = opPos;
    this.RHS = rhs;
  }

  public span(): [start: Position, end: Position] {
    return [this.LHS.NamePos, this.RHS.span()[1]];
  }
}

// A WhileStmt represents a while loop: while Cond { Body }.
export class WhileStmt implements Node {
  readonly kind = 'WhileStmt';
  public While: Position;
  public Cond: Term;
  public Body: Stmt[];
  public Rbrace: Position;

  constructor(whilePos: Position, cond: Term, body: Stmt[], rbrace: Position) {
    this.While = whilePos;
    this.Cond = cond;
    this.Body = body;
    this.Rbrace = rbrace;
  }

  public span(): [start: Position, end: Position] {
    return [this.While, this.Rbrace];
  }
}

// A DoUntilStmt represents a post-tested loop: do { Body } until Cond.
export class DoUntilStmt implements Node {
  readonly kind = 'DoUntilStmt';
  public Do: Position;
  public Body: Stmt[];
  public Until: Position;
  public Cond: Term;

  constructor(doPos: Position, body: Stmt[], until: Position, cond: Term) {
    this.Do = doPos;
    this.Body = body;
    this.Until = until;
    this.Cond = cond;
  }

  public span(): [start: Position, end: Position] {
    return [this.Do, this.Cond.span()[1]];
  }
}

// An IfStmt is a conditional: if Cond { TrueBody } else { FalseBody }.
// FalseBody is null when there is no else branch.
export class IfStmt implements Node {
  readonly kind = 'IfStmt';
  public If: Position;
  public Cond: Term;
  public TrueBody: Stmt[];
  public ElsePos: Position | null;
  public FalseBody: Stmt[] | null;
  public Rbrace: Position;

  constructor(
    ifPos: Position,
    cond: Term,
    trueBody: Stmt[],
    elsePos: Position | null,
    falseBody: Stmt[] | null,
    rbrace: Position
  ) {
    this.If = ifPos;
    this.Cond = cond;
    this.TrueBody = trueBody;
    this.ElsePos = elsePos;
    this.FalseBody = falseBody;
    this.Rbrace = rbrace;
  }

  public span(): [start: Position, end: Position] {
    return [this.If, this.Rbrace];
  }
}

export type Stmt =
  | HaltStmt
  | PrintStmt
  | CallStmt
  | CallAssignStmt
  | AssignStmt
  | WhileStmt
  | DoUntilStmt
  | IfStmt;

// A Body holds the locals and algorithm of a procedure or function.
export class Body implements Node {
  readonly kind = 'Body';
  public Local: Position;
  public Locals: Ident[];
  public Algo: Stmt[];

  constructor(local: Position, locals: Ident[], algo: Stmt[]) {
    this.Local = local;
    this.Locals = locals;
    this.Algo = algo;
  }

  public span(): [start: Position, end: Position] {
    if (this.Algo.length > 0) {
      return [this.Local, this.Algo[this.Algo.length - 1].span()[1]];
    }
    return [this.Local, this.Local];
  }
}

// A ProcDef defines a procedure: Name(Params) { local { ... } Algo }.
export class ProcDef implements Node {
  readonly kind = 'ProcDef';
  public Name: Ident;
  public Params: Ident[];
  public Body: Body;
  public Rbrace: Position;

  constructor(name: Ident, params: Ident[], body: Body, rbrace: Position) {
    this.Name = name;
    this.Params = params;
    this.Body = body;
    this.Rbrace = rbrace;
  }

  public span(): [start: Position, end: Position] {
    return [this.Name.NamePos, this.Rbrace];
  }
}

// A FuncDef defines a function:
// Name(Params) { local { ... } Algo; return Result }.
export class FuncDef implements Node {
  readonly kind = 'FuncDef';
  public Name: Ident;
  public Params: Ident[];
  public Body: Body;
  public Return: Position;
  public Result: Atom;
  public Rbrace: Position;

  constructor(
    name: Ident,
    params: Ident[],
    body: Body,
    returnPos: Position,
    result: Atom,
    rbrace: Position
  ) {
    this.Name = name;
    this.Params = params;
    this.Body = body;
    this.Return = returnPos;
    this.Result = result;
    this.Rbrace = rbrace;
  }

  public span(): [start: Position, end: Position] {
    return [this.Name.NamePos, this.Rbrace];
  }
}

export type Def = ProcDef | FuncDef;

// A MainProg is the entry point: main { var { Vars } Algo }.
export class MainProg implements Node {
  readonly kind = 'MainProg';
  public Main: Position;
  public Vars: Ident[];
  public Algo: Stmt[];
  public Rbrace: Position;

  constructor(main: Position, vars: Ident[], algo: Stmt[], rbrace: Position) {
    this.Main = main;
    this.Vars = vars;
    this.Algo = algo;
    this.Rbrace = rbrace;
  }

  public span(): [start: Position, end: Position] {
    return [this.Main, this.Rbrace];
  }
}

// A File represents a whole SPL program.
export class File implements Node {
  readonly kind = 'File';
  public Path: string;
  public Glob: Position;
  public Globals: Ident[];
  public Procs: ProcDef[];
  public Funcs: FuncDef[];
  public Main: MainProg;

  constructor(
    path: string,
    glob: Position,
    globals: Ident[],
    procs: ProcDef[],
    funcs: FuncDef[],
    main: MainProg
  ) {
    this.Path = path;
    this.Glob = glob;
    this.Globals = globals;
    this.Procs = procs;
    this.Funcs = funcs;
    this.Main = main;
  }

  public span(): [start: Position, end: Position] {
    return [this.Glob, this.Main.Rbrace];
  }
}
