import createDebug from 'debug';

import { SymbolTable } from '../resolve/binding';
import { ArityError, ErrorKind, ErrorList, InternalError } from '../spl/errors';
import * as syntax from '../spl-parser/syntax';
import { Position, Token } from '../spl-parser/tokenize';
import { Type, unify } from './types';

const debug = createDebug('spl:typecheck');

// File assigns a type to every term and atom of a resolved file and
// checks every contextual type rule. Like the resolver it walks the
// whole tree and returns every error it found.
export function File(file: syntax.File, table: SymbolTable): ErrorList {
  const c = new Checker(table);
  for (const def of file.Procs) {
    c.stmts(def.Body.Algo);
  }
  for (const def of file.Funcs) {
    c.stmts(def.Body.Algo);
    const t = c.atom(def.Result);
    c.expect(
      t,
      Type.Numeric,
      ErrorKind.InvalidReturn,
      def.Return,
      `return value of '${def.Name.Name}' must be numeric`
    );
  }
  c.stmts(file.Main.Algo);
  debug('%s: %d error(s)', file.Path, c.errors.length);
  return c.errors;
}

// operandType gives the operand type each binary operator requires.
const operandType: Record<syntax.BinaryOp, Type> = {
  [Token.PLUS]: Type.Numeric,
  [Token.MINUS]: Type.Numeric,
  [Token.MULT]: Type.Numeric,
  [Token.DIV]: Type.Numeric,
  [Token.EQ]: Type.Numeric,
  [Token.GT]: Type.Numeric,
  [Token.AND]: Type.Boolean,
  [Token.OR]: Type.Boolean,
};

// resultType gives the type each binary operator produces.
const resultType: Record<syntax.BinaryOp, Type> = {
  [Token.PLUS]: Type.Numeric,
  [Token.MINUS]: Type.Numeric,
  [Token.MULT]: Type.Numeric,
  [Token.DIV]: Type.Numeric,
  [Token.EQ]: Type.Boolean,
  [Token.GT]: Type.Boolean,
  [Token.AND]: Type.Boolean,
  [Token.OR]: Type.Boolean,
};

class Checker {
  table: SymbolTable;
  errors: ErrorList;

  constructor(table: SymbolTable) {
    this.table = table;
    this.errors = new ErrorList();
  }

  // expect reports an error of the given kind unless got unifies with want.
  expect(
    got: Type,
    want: Type,
    kind: ErrorKind,
    pos: Position,
    what: string
  ): void {
    if (unify(got, want) === null) {
      this.errors.errorf(kind, pos, `${what}, got ${got}`);
    }
  }

  stmts(stmts: syntax.Stmt[]): void {
    for (const stmt of stmts) {
      this.stmt(stmt);
    }
  }

  stmt(stmt: syntax.Stmt): void {
    switch (stmt.kind) {
      case 'HaltStmt':
        return;

      case 'PrintStmt':
        if (stmt.X.kind !== 'StringLit') {
          this.expect(
            this.atom(stmt.X),
            Type.Numeric,
            ErrorKind.TypeMismatch,
            stmt.Print,
            'print argument must be numeric'
          );
        }
        return;

      case 'CallStmt': {
        const name = stmt.Name.Name;
        const proc = this.table.lookupProc(name);
        if (proc === null) {
          if (this.table.lookupFunc(name) !== null) {
            this.errors.errorf(
              ErrorKind.TypeMismatch,
              stmt.Name.NamePos,
              `'${name}' is a function and cannot be called as a statement`
            );
          }
        } else {
          this.arity(stmt.Name, proc.params().length, stmt.Args.length);
        }
        this.args(name, stmt.Args);
        return;
      }

      case 'CallAssignStmt': {
        const name = stmt.Name.Name;
        const fn = this.table.lookupFunc(name);
        if (fn === null) {
          if (this.table.lookupProc(name) !== null) {
            this.errors.errorf(
              ErrorKind.TypeMismatch,
              stmt.Name.NamePos,
              `'${name}' is a procedure and does not return a value`
            );
          }
        } else {
          this.arity(stmt.Name, fn.params().length, stmt.Args.length);
        }
        this.args(name, stmt.Args);
        this.target(stmt.LHS);
        return;
      }

      case 'AssignStmt':
        this.target(stmt.LHS);
        this.expect(
          this.term(stmt.RHS),
          Type.Numeric,
          ErrorKind.TypeMismatch,
          stmt.OpPos,
          'assignment RHS must be numeric'
        );
        return;

      case 'WhileStmt':
        this.cond('while', stmt.While, stmt.Cond);
        this.stmts(stmt.Body);
        return;

      case 'DoUntilStmt':
        this.stmts(stmt.Body);
        this.cond('until', stmt.Until, stmt.Cond);
        return;

      case 'IfStmt':
        this.cond('if', stmt.If, stmt.Cond);
        this.stmts(stmt.TrueBody);
        if (stmt.FalseBody !== null) {
          this.stmts(stmt.FalseBody);
        }
        return;
    }
    const unreachable: never = stmt;
    throw new InternalError(`unexpected statement ${unreachable}`);
  }

  cond(keyword: string, pos: Position, cond: syntax.Term): void {
    this.expect(
      this.term(cond),
      Type.Boolean,
      ErrorKind.InvalidCondition,
      pos,
      `condition of '${keyword}' must be boolean`
    );
  }

  arity(name: syntax.Ident, expected: number, got: number): void {
    if (expected !== got) {
      this.errors.add(new ArityError(name.NamePos, name.Name, expected, got));
    }
  }

  args(name: string, args: syntax.Atom[]): void {
    args.forEach((arg, i) => {
      this.expect(
        this.atom(arg),
        Type.Numeric,
        ErrorKind.TypeMismatch,
        arg.span()[0],
        `argument ${i + 1} of '${name}' must be numeric`
      );
    });
  }

  // target checks that an assigned name holds a numeric variable.
  target(id: syntax.Ident): void {
    if (id.Binding !== null) {
      this.expect(
        id.Binding.type,
        Type.Numeric,
        ErrorKind.TypeMismatch,
        id.NamePos,
        `assignment target '${id.Name}' must be a numeric variable`
      );
    }
  }

  term(term: syntax.Term): Type {
    switch (term.kind) {
      case 'VarRef':
      case 'NumLit':
        return this.atom(term);

      case 'UnaryExpr': {
        const x = this.term(term.X);
        const want = term.Op === Token.NEG ? Type.Numeric : Type.Boolean;
        if (unify(x, want) === null) {
          this.errors.errorf(
            ErrorKind.TypeMismatch,
            term.Lparen,
            `operator '${term.Op}' expects a ${want} operand, got ${x}`
          );
        }
        term.Type = want;
        return want;
      }

      case 'BinaryExpr': {
        const x = this.term(term.X);
        const y = this.term(term.Y);
        const want = operandType[term.Op];
        if (unify(x, want) === null || unify(y, want) === null) {
          this.errors.errorf(
            ErrorKind.TypeMismatch,
            term.OpPos,
            `operator '${term.Op}' expects ${want} operands, got ${x} and ${y}`
          );
        }
        term.Type = resultType[term.Op];
        return term.Type;
      }
    }
  }

  atom(atom: syntax.Atom): Type {
    if (atom.kind === 'NumLit') {
      atom.Type = Type.Numeric;
    } else {
      // An unresolved name has already been reported by the resolver.
      atom.Type = atom.Id.Binding?.type ?? Type.Unknown;
    }
    return atom.Type;
  }
}
