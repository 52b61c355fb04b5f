import createDebug from 'debug';

import { InternalError } from '../spl/errors';
import * as syntax from '../spl-parser/syntax';
import { Token } from '../spl-parser/tokenize';
import {
  ArithOp,
  Cond,
  Expr,
  Insn,
  Module,
  Opcode,
  Operand,
  Routine,
  n,
  v,
} from './insn';
import { Names } from './names';

const debug = createDebug('spl:codegen');

const arithOps: Partial<Record<syntax.BinaryOp, ArithOp>> = {
  [Token.PLUS]: '+',
  [Token.MINUS]: '-',
  [Token.MULT]: '*',
  [Token.DIV]: '/',
};

// File generates the IIS of a type-checked file: the main program and
// one routine per procedure and function. Calls are left as CALL and
// CALLASSIGN instructions for the inliner.
//
// A main variable named like a global is a different variable, and
// inlined routines refer to the global by its own name, so it is
// renamed to M<n><name> throughout main.
export function File(file: syntax.File, names: Names = new Names()): Module {
  const g = new Generator(names);
  const globals = new Set(file.Globals.map((id) => id.Name));
  for (const id of file.Main.Vars) {
    if (globals.has(id.Name)) {
      g.vars.set(id.Name, names.temp('M', id.Name));
    }
  }
  const main = g.body(file.Main.Algo);
  g.vars.clear();

  const mod: Module = { main, procs: new Map(), funcs: new Map() };
  for (const def of file.Procs) {
    mod.procs.set(def.Name.Name, g.routine(def));
  }
  for (const def of file.Funcs) {
    mod.funcs.set(def.Name.Name, g.routine(def));
  }
  debug(
    'main: %d insns, %d procs, %d funcs',
    mod.main.length,
    mod.procs.size,
    mod.funcs.size
  );
  return mod;
}

export class Generator {
  names: Names;
  code: Insn[] = [];
  // vars renames source variables in the code being generated.
  vars = new Map<string, string>();

  constructor(names: Names) {
    this.names = names;
  }

  name(x: string): string {
    return this.vars.get(x) ?? x;
  }

  operand(atom: syntax.Atom): Operand {
    return atom.kind === 'VarRef' ? v(this.name(atom.Id.Name)) : n(atom.Value);
  }

  emit(insn: Insn): void {
    this.code.push(insn);
  }

  label(label: string): void {
    this.emit({ op: Opcode.LABEL, label });
  }

  jump(dest: string): void {
    this.emit({ op: Opcode.GOTO, dest });
  }

  // body generates stmts into a stream of their own.
  body(stmts: syntax.Stmt[]): Insn[] {
    const saved = this.code;
    this.code = [];
    this.stmts(stmts);
    const code = this.code;
    this.code = saved;
    return code;
  }

  routine(def: syntax.Def): Routine {
    return {
      name: def.Name.Name,
      params: def.Params.map((p) => p.Name),
      locals: def.Body.Locals.map((l) => l.Name),
      body: this.body(def.Body.Algo),
      result: def.kind === 'FuncDef' ? this.operand(def.Result) : null,
    };
  }

  stmts(stmts: syntax.Stmt[]): void {
    for (const stmt of stmts) {
      this.stmt(stmt);
    }
  }

  stmt(stmt: syntax.Stmt): void {
    switch (stmt.kind) {
      case 'HaltStmt':
        this.emit({ op: Opcode.HALT });
        return;

      case 'PrintStmt':
        if (stmt.X.kind === 'StringLit') {
          this.emit({
            op: Opcode.PRINT,
            value: { kind: 'str', text: stmt.X.Value },
          });
        } else {
          this.emit({ op: Opcode.PRINT, value: this.operand(stmt.X) });
        }
        return;

      case 'CallStmt':
        this.emit({
          op: Opcode.CALL,
          name: stmt.Name.Name,
          args: stmt.Args.map((a) => this.operand(a)),
        });
        return;

      case 'CallAssignStmt':
        this.emit({
          op: Opcode.CALLASSIGN,
          target: this.name(stmt.LHS.Name),
          name: stmt.Name.Name,
          args: stmt.Args.map((a) => this.operand(a)),
        });
        return;

      case 'AssignStmt':
        this.emit({
          op: Opcode.ASSIGN,
          target: this.name(stmt.LHS.Name),
          value: this.expr(stmt.RHS),
        });
        return;

      case 'IfStmt': {
        const then = this.names.label('T');
        const exit = this.names.label('X');
        this.ifTrue(stmt.Cond, then);
        if (stmt.FalseBody !== null) {
          this.stmts(stmt.FalseBody);
        }
        this.jump(exit);
        this.label(then);
        this.stmts(stmt.TrueBody);
        this.label(exit);
        return;
      }

      case 'WhileStmt': {
        const start = this.names.label('W');
        const body = this.names.label('WB');
        const exit = this.names.label('WX');
        this.label(start);
        this.ifTrue(stmt.Cond, body);
        this.jump(exit);
        this.label(body);
        this.stmts(stmt.Body);
        this.jump(start);
        this.label(exit);
        return;
      }

      case 'DoUntilStmt': {
        const start = this.names.label('D');
        const exit = this.names.label('DX');
        this.label(start);
        this.stmts(stmt.Body);
        this.ifTrue(stmt.Cond, exit);
        this.jump(start);
        this.label(exit);
        return;
      }
    }
    const unreachable: never = stmt;
    throw new InternalError(`unexpected statement ${unreachable}`);
  }

  // expr lowers a numeric term to an expression tree.
  expr(term: syntax.Term): Expr {
    switch (term.kind) {
      case 'VarRef':
      case 'NumLit':
        return this.operand(term);
      case 'UnaryExpr':
        if (term.Op !== Token.NEG) {
          throw new InternalError(
            `${term.Lparen}: boolean operator '${term.Op}' in numeric context`
          );
        }
        return { kind: 'neg', x: this.expr(term.X) };
      case 'BinaryExpr': {
        const op = arithOps[term.Op];
        if (op === undefined) {
          throw new InternalError(
            `${term.OpPos}: boolean operator '${term.Op}' in numeric context`
          );
        }
        return { kind: 'binary', op, x: this.expr(term.X), y: this.expr(term.Y) };
      }
    }
  }

  // comparison lowers an eq or > term to a Cond, or returns null if
  // term is not a comparison.
  comparison(term: syntax.Term): Cond | null {
    if (term.kind !== 'BinaryExpr') {
      return null;
    }
    switch (term.Op) {
      case Token.EQ:
        return { op: '=', x: this.expr(term.X), y: this.expr(term.Y) };
      case Token.GT:
        return { op: '>', x: this.expr(term.X), y: this.expr(term.Y) };
    }
    return null;
  }

  // ifTrue emits code that jumps to dest if cond holds and falls
  // through otherwise. No boolean value is ever stored: and/or
  // evaluate their right operand only when the left one does not
  // decide the result.
  ifTrue(cond: syntax.Term, dest: string): void {
    const cmp = this.comparison(cond);
    if (cmp !== null) {
      this.emit({ op: Opcode.IFGOTO, cond: cmp, dest });
      return;
    }
    if (cond.kind === 'UnaryExpr' && cond.Op === Token.NOT) {
      this.ifFalse(cond.X, dest);
      return;
    }
    if (cond.kind === 'BinaryExpr' && cond.Op === Token.AND) {
      const mid = this.names.label('M');
      const fail = this.names.label('F');
      this.ifTrue(cond.X, mid);
      this.jump(fail);
      this.label(mid);
      this.ifTrue(cond.Y, dest);
      this.label(fail);
      return;
    }
    if (cond.kind === 'BinaryExpr' && cond.Op === Token.OR) {
      this.ifTrue(cond.X, dest);
      this.ifTrue(cond.Y, dest);
      return;
    }
    throw new InternalError(
      `${cond.span()[0]}: numeric term used as a condition`
    );
  }

  // ifFalse emits code that jumps to dest if cond does not hold and
  // falls through otherwise.
  ifFalse(cond: syntax.Term, dest: string): void {
    const cmp = this.comparison(cond);
    if (cmp !== null) {
      const skip = this.names.label('S');
      this.emit({ op: Opcode.IFGOTO, cond: cmp, dest: skip });
      this.jump(dest);
      this.label(skip);
      return;
    }
    if (cond.kind === 'UnaryExpr' && cond.Op === Token.NOT) {
      this.ifTrue(cond.X, dest);
      return;
    }
    if (cond.kind === 'BinaryExpr' && cond.Op === Token.AND) {
      this.ifFalse(cond.X, dest);
      this.ifFalse(cond.Y, dest);
      return;
    }
    if (cond.kind === 'BinaryExpr' && cond.Op === Token.OR) {
      const done = this.names.label('O');
      this.ifTrue(cond.X, done);
      this.ifFalse(cond.Y, dest);
      this.label(done);
      return;
    }
    throw new InternalError(
      `${cond.span()[0]}: numeric term used as a condition`
    );
  }
}
