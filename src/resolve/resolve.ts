import createDebug from 'debug';

import { ErrorKind, ErrorList, InternalError } from '../spl/errors';
import * as syntax from '../spl-parser/syntax';
import { Position } from '../spl-parser/tokenize';
import { nearest } from '../utils/spell';
import { Binding, Category, Scope, SymbolTable } from './binding';

const debug = createDebug('spl:resolve');

// File resolves every name in file.
//
// It builds the scope tree, binds each declaration, checks the
// uniqueness, shadowing and Everywhere rules, and sets the Binding
// field of every identifier that refers to a variable, procedure or
// function. The returned list holds every error found; resolution
// never stops at the first one.
export function File(file: syntax.File): [SymbolTable, ErrorList] {
  const r = new Resolver();
  r.declare(file);
  r.checkEverywhere();
  r.resolve(file);
  debug('%s: %d error(s)', file.Path, r.errors.length);
  return [r.table, r.errors];
}

class Resolver {
  table: SymbolTable;
  env: Scope;
  errors: ErrorList;

  constructor() {
    this.table = new SymbolTable();
    this.env = this.table.main;
    this.errors = new ErrorList();
  }

  errorf(kind: ErrorKind, pos: Position, message: string): void {
    this.errors.errorf(kind, pos, message);
  }

  // bindVar binds id as a variable of scope, reporting a duplicate.
  bindVar(scope: Scope, id: syntax.Ident, isParam: boolean = false): void {
    const prev = scope.bindings.get(id.Name);
    if (prev !== undefined) {
      this.errorf(
        ErrorKind.NameRule,
        id.NamePos,
        `duplicate variable name '${id.Name}' in the same scope (first declared at ${prev.first.NamePos})`
      );
      return;
    }
    const bind = new Binding(Category.Variable, scope, id, isParam);
    scope.bind(bind);
    id.Binding = bind;
  }

  // bindDef binds the name of a procedure or function in its group.
  // It returns false for a duplicate.
  bindDef(group: Scope, category: Category, def: syntax.Def): boolean {
    const id = def.Name;
    const prev = group.bindings.get(id.Name);
    if (prev !== undefined) {
      this.errorf(
        ErrorKind.NameRule,
        id.NamePos,
        `duplicate ${category} name '${id.Name}' (first declared at ${prev.first.NamePos})`
      );
      return false;
    }
    const bind = new Binding(category, group, id, false, def);
    group.bind(bind);
    id.Binding = bind;
    return true;
  }

  // declareLocals creates the Local scope of def, seeded with its
  // parameters and then its locals. A local may not reuse a parameter name.
  declareLocals(def: syntax.Def): void {
    const scope = this.table.newLocal(def);
    for (const param of def.Params) {
      this.bindVar(scope, param, true);
    }
    for (const local of def.Body.Locals) {
      const prev = scope.bindings.get(local.Name);
      if (prev !== undefined && prev.isParam) {
        this.errorf(
          ErrorKind.NameRule,
          local.NamePos,
          `local variable '${local.Name}' shadows a parameter of '${def.Name.Name}'`
        );
        continue;
      }
      this.bindVar(scope, local);
    }
  }

  declare(file: syntax.File): void {
    for (const id of file.Globals) {
      this.bindVar(this.table.global, id);
    }
    for (const def of file.Procs) {
      this.bindDef(this.table.procs, Category.Procedure, def);
      this.declareLocals(def);
    }
    for (const def of file.Funcs) {
      this.bindDef(this.table.funcs, Category.Function, def);
      this.declareLocals(def);
    }
    for (const id of file.Main.Vars) {
      this.bindVar(this.table.main, id);
    }
  }

  // checkEverywhere reports every name that denotes more than one of
  // variable, procedure and function anywhere in the program.
  checkEverywhere(): void {
    const variables = new Map<string, Binding>();
    const scopes = [
      this.table.global,
      this.table.main,
      ...this.table.locals.values(),
    ];
    for (const scope of scopes) {
      for (const [name, bind] of scope.bindings) {
        if (!variables.has(name)) {
          variables.set(name, bind);
        }
      }
    }

    const clash = (a: Binding, b: Binding) => {
      this.errorf(
        ErrorKind.NameRule,
        b.first.NamePos,
        `'${b.name}' is declared both as a ${a.category} (at ${a.first.NamePos}) and as a ${b.category}`
      );
    };
    for (const [name, proc] of this.table.procs.bindings) {
      const v = variables.get(name);
      if (v !== undefined) {
        clash(v, proc);
      }
    }
    for (const [name, fn] of this.table.funcs.bindings) {
      const v = variables.get(name);
      if (v !== undefined) {
        clash(v, fn);
      }
      const proc = this.table.procs.bindings.get(name);
      if (proc !== undefined) {
        clash(proc, fn);
      }
    }

    for (const scope of [this.table.procs, this.table.funcs]) {
      for (const bind of scope.bindings.values()) {
        this.table.everywhere.bind(bind);
      }
    }
    for (const bind of variables.values()) {
      if (!this.table.everywhere.bindings.has(bind.name)) {
        this.table.everywhere.bind(bind);
      }
    }
  }

  resolve(file: syntax.File): void {
    for (const def of [...file.Procs, ...file.Funcs]) {
      const scope = this.table.locals.get(def);
      if (scope === undefined) {
        throw new InternalError(`no local scope for ${def.Name.Name}`);
      }
      this.env = scope;
      this.stmts(def.Body.Algo);
      if (def.kind === 'FuncDef') {
        this.atom(def.Result);
      }
    }
    this.env = this.table.main;
    this.stmts(file.Main.Algo);
  }

  // use resolves id as a reference to a variable visible from the
  // current scope: own parameters and locals (or main's variables),
  // then globals.
  use(id: syntax.Ident): void {
    const bind = this.env.lookup(id.Name);
    if (bind !== null) {
      id.Binding = bind;
      return;
    }
    const other =
      this.table.lookupProc(id.Name) ?? this.table.lookupFunc(id.Name);
    if (other !== null) {
      this.errorf(
        ErrorKind.Undeclared,
        id.NamePos,
        `'${id.Name}' is a ${other.category}, not a variable`
      );
      return;
    }
    this.undeclared(id, Category.Variable, this.env.visible());
  }

  // useCall resolves the name of a called procedure or function
  // against its group only; variables are never callable.
  useCall(id: syntax.Ident, category: Category): void {
    const [group, other] =
      category === Category.Procedure
        ? [this.table.procs, this.table.funcs]
        : [this.table.funcs, this.table.procs];
    const bind = group.bindings.get(id.Name);
    if (bind !== undefined) {
      id.Binding = bind;
      return;
    }
    const wrong = other.bindings.get(id.Name);
    if (wrong !== undefined) {
      this.errorf(
        ErrorKind.Undeclared,
        id.NamePos,
        `'${id.Name}' is a ${wrong.category}, not a ${category}`
      );
      return;
    }
    this.undeclared(id, category, [...group.bindings.keys()]);
  }

  undeclared(id: syntax.Ident, category: Category, candidates: string[]): void {
    let msg = `undeclared ${category} '${id.Name}'`;
    const hint = nearest(id.Name, candidates);
    if (hint !== '') {
      msg += ` (did you mean '${hint}'?)`;
    }
    this.errorf(ErrorKind.Undeclared, id.NamePos, msg);
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
          this.atom(stmt.X);
        }
        return;
      case 'CallStmt':
        this.useCall(stmt.Name, Category.Procedure);
        stmt.Args.forEach((arg) => this.atom(arg));
        return;
      case 'CallAssignStmt':
        this.use(stmt.LHS);
        this.useCall(stmt.Name, Category.Function);
        stmt.Args.forEach((arg) => this.atom(arg));
        return;
      case 'AssignStmt':
        this.use(stmt.LHS);
        this.term(stmt.RHS);
        return;
      case 'WhileStmt':
        this.term(stmt.Cond);
        this.stmts(stmt.Body);
        return;
      case 'DoUntilStmt':
        this.stmts(stmt.Body);
        this.term(stmt.Cond);
        return;
      case 'IfStmt':
        this.term(stmt.Cond);
        this.stmts(stmt.TrueBody);
        if (stmt.FalseBody !== null) {
          this.stmts(stmt.FalseBody);
        }
        return;
    }
    const unreachable: never = stmt;
    throw new InternalError(`unexpected statement ${unreachable}`);
  }

  term(term: syntax.Term): void {
    switch (term.kind) {
      case 'VarRef':
      case 'NumLit':
        this.atom(term);
        return;
      case 'UnaryExpr':
        this.term(term.X);
        return;
      case 'BinaryExpr':
        this.term(term.X);
        this.term(term.Y);
        return;
    }
  }

  atom(atom: syntax.Atom): void {
    if (atom.kind === 'VarRef') {
      this.use(atom.Id);
    }
  }
}
