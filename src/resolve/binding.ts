import * as syntax from '../spl-parser/syntax';
import { Type } from '../typecheck/types';

// The ScopeKind of a Scope indicates which names it may hold.
export enum ScopeKind {
  Everywhere,
  Global,
  ProcGroup,
  FuncGroup,
  Main,
  Local,
}

export const scopeNames = [
  'everywhere',
  'global',
  'procedure group',
  'function group',
  'main',
  'local',
];

export namespace ScopeKind {
  export function toString(val: ScopeKind): string {
    return scopeNames[val];
  }
}

// The Category of a Binding says what kind of entity a name denotes.
export enum Category {
  Variable = 'variable',
  Procedure = 'procedure',
  Function = 'function',
}

// A Binding contains resolver information about a declared name.
// The resolver populates the Binding field of each syntax.Ident that
// refers to it, tying together all identifiers that denote the same entity.
export class Binding {
  name: string;
  category: Category;
  scope: Scope;
  // first is the declaring identifier.
  first: syntax.Ident;
  // type is Numeric for every variable and Unknown otherwise:
  // SPL never stores a boolean.
  type: Type;
  // isParam is set for procedure and function parameters.
  isParam: boolean;
  // def is the definition of a procedure or function, null for variables.
  def: syntax.Def | null;

  constructor(
    category: Category,
    scope: Scope,
    first: syntax.Ident,
    isParam: boolean = false,
    def: syntax.Def | null = null
  ) {
    this.name = first.Name;
    this.category = category;
    this.scope = scope;
    this.first = first;
    this.type = category === Category.Variable ? Type.Numeric : Type.Unknown;
    this.isParam = isParam;
    this.def = def;
  }

  // params returns the ordered parameter names of a procedure or function.
  params(): string[] {
    return this.def === null ? [] : this.def.Params.map((p) => p.Name);
  }
}

// A Scope is a node of the scope tree. Names are unique within one scope.
export class Scope {
  kind: ScopeKind;
  parent: Scope | null; // null for the Everywhere scope
  owner: syntax.Def | null; // only for Local scopes
  bindings: Map<string, Binding>;
  children: Scope[];

  constructor(
    kind: ScopeKind,
    parent: Scope | null,
    owner: syntax.Def | null = null
  ) {
    this.kind = kind;
    this.parent = parent;
    this.owner = owner;
    this.bindings = new Map();
    this.children = [];
    parent?.children.push(this);
  }

  bind(b: Binding): void {
    this.bindings.set(b.name, b);
  }

  // lookup finds name in this scope or, failing that, its ancestors.
  // The Everywhere scope only records identity and is never searched.
  lookup(name: string): Binding | null {
    for (
      let s: Scope | null = this;
      s !== null && s.kind !== ScopeKind.Everywhere;
      s = s.parent
    ) {
      const b = s.bindings.get(name);
      if (b !== undefined) {
        return b;
      }
    }
    return null;
  }

  // visible returns every name lookup would find from this scope.
  visible(): string[] {
    const names: string[] = [];
    for (
      let s: Scope | null = this;
      s !== null && s.kind !== ScopeKind.Everywhere;
      s = s.parent
    ) {
      names.push(...s.bindings.keys());
    }
    return names;
  }

  toString(): string {
    if (this.owner !== null) {
      return `${ScopeKind.toString(this.kind)} scope of ${this.owner.Name.Name}`;
    }
    return `${ScopeKind.toString(this.kind)} scope`;
  }
}

// A SymbolTable is the scope tree of one program.
export class SymbolTable {
  everywhere: Scope;
  global: Scope;
  procs: Scope;
  funcs: Scope;
  main: Scope;
  // locals maps each definition to its Local scope.
  locals: Map<syntax.Def, Scope>;

  constructor() {
    this.everywhere = new Scope(ScopeKind.Everywhere, null);
    this.global = new Scope(ScopeKind.Global, this.everywhere);
    this.procs = new Scope(ScopeKind.ProcGroup, this.everywhere);
    this.funcs = new Scope(ScopeKind.FuncGroup, this.everywhere);
    this.main = new Scope(ScopeKind.Main, this.global);
    this.locals = new Map();
  }

  // newLocal creates the Local scope of def.
  newLocal(def: syntax.Def): Scope {
    const scope = new Scope(ScopeKind.Local, this.global, def);
    this.locals.set(def, scope);
    return scope;
  }

  lookupProc(name: string): Binding | null {
    return this.procs.bindings.get(name) ?? null;
  }

  lookupFunc(name: string): Binding | null {
    return this.funcs.bindings.get(name) ?? null;
  }
}
