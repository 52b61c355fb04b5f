// The intermediate instruction stream (IIS) is a flat list of
// instruction records. Jumps name their destination by label until
// the linearizer replaces each label with an address; nothing before
// the linearizer deals with text.

export enum Opcode {
  ASSIGN,
  PRINT,
  HALT,
  CALL,
  CALLASSIGN,
  IFGOTO,
  GOTO,
  LABEL,
}

const opcodeNames = new Map<Opcode, string>([
  [Opcode.ASSIGN, 'assign'],
  [Opcode.PRINT, 'print'],
  [Opcode.HALT, 'halt'],
  [Opcode.CALL, 'call'],
  [Opcode.CALLASSIGN, 'callassign'],
  [Opcode.IFGOTO, 'ifgoto'],
  [Opcode.GOTO, 'goto'],
  [Opcode.LABEL, 'label'],
]);

export namespace Opcode {
  export function String(c: Opcode): string {
    return opcodeNames.get(c) ?? `illegal op (${c})`;
  }
}

// An Operand is a variable name or a numeric constant.
export type Operand =
  | { kind: 'var'; name: string }
  | { kind: 'num'; value: number };

export type ArithOp = '+' | '-' | '*' | '/';
export type CmpOp = '=' | '>';

// An Expr is a numeric expression tree.
export type Expr =
  | Operand
  | { kind: 'neg'; x: Expr }
  | { kind: 'binary'; op: ArithOp; x: Expr; y: Expr };

// A Cond compares two numeric expressions.
export interface Cond {
  op: CmpOp;
  x: Expr;
  y: Expr;
}

// A Target is a label name before linearization and an address after.
export type Target = string | number;

export type Insn =
  | { op: Opcode.ASSIGN; target: string; value: Expr }
  | { op: Opcode.PRINT; value: Operand | { kind: 'str'; text: string } }
  | { op: Opcode.HALT }
  | { op: Opcode.CALL; name: string; args: Operand[] }
  | { op: Opcode.CALLASSIGN; target: string; name: string; args: Operand[] }
  | { op: Opcode.IFGOTO; cond: Cond; dest: Target }
  | { op: Opcode.GOTO; dest: Target }
  | { op: Opcode.LABEL; label: string };

export type Jump = Extract<Insn, { dest: Target }>;

export function isJump(insn: Insn): insn is Jump {
  return insn.op === Opcode.IFGOTO || insn.op === Opcode.GOTO;
}

export function v(name: string): Operand {
  return { kind: 'var', name };
}

export function n(value: number): Operand {
  return { kind: 'num', value };
}

// A Routine is the generated body of a procedure or function, ready
// to be copied into each call site.
export interface Routine {
  name: string;
  params: string[];
  locals: string[];
  body: Insn[];
  result: Operand | null; // the return atom; null for procedures
}

// A Module is the IIS of a whole program before inlining.
export interface Module {
  main: Insn[];
  procs: Map<string, Routine>;
  funcs: Map<string, Routine>;
}

// mapExpr rebuilds e with every variable renamed by f.
export function mapExpr(e: Expr, f: (name: string) => string): Expr {
  switch (e.kind) {
    case 'var':
      return v(f(e.name));
    case 'num':
      return e;
    case 'neg':
      return { kind: 'neg', x: mapExpr(e.x, f) };
    case 'binary':
      return { kind: 'binary', op: e.op, x: mapExpr(e.x, f), y: mapExpr(e.y, f) };
  }
}

export function mapOperand(o: Operand, f: (name: string) => string): Operand {
  return o.kind === 'var' ? v(f(o.name)) : o;
}

// formatExpr renders e in the target language. Compound expressions
// are fully parenthesized.
export function formatExpr(e: Expr): string {
  switch (e.kind) {
    case 'var':
      return e.name;
    case 'num':
      return String(e.value);
    case 'neg':
      return `-(${formatExpr(e.x)})`;
    case 'binary':
      return `(${formatExpr(e.x)} ${e.op} ${formatExpr(e.y)})`;
  }
}

// format renders insn as a line of the target language, without its
// address. Labels become REM lines so that they keep an address a
// jump can land on.
export function format(insn: Insn): string {
  switch (insn.op) {
    case Opcode.ASSIGN:
      return `${insn.target} = ${formatExpr(insn.value)}`;
    case Opcode.PRINT:
      if (insn.value.kind === 'str') {
        return `PRINT "${insn.value.text}"`;
      }
      return `PRINT ${formatExpr(insn.value)}`;
    case Opcode.HALT:
      return 'STOP';
    case Opcode.CALL:
      return `CALL ${insn.name}(${insn.args.map(formatExpr).join(' ')})`;
    case Opcode.CALLASSIGN:
      return `${insn.target} = CALL ${insn.name}(${insn.args.map(formatExpr).join(' ')})`;
    case Opcode.IFGOTO: {
      const { op, x, y } = insn.cond;
      return `IF ${formatExpr(x)} ${op} ${formatExpr(y)} THEN ${insn.dest}`;
    }
    case Opcode.GOTO:
      return `GOTO ${insn.dest}`;
    case Opcode.LABEL:
      return `REM ${insn.label}`;
  }
}

// formatModule renders mod as an indented listing: main first, then each
// procedure and function with its parameters, locals and return atom.
export function formatModule(mod: Module): string {
  const out = ['main:', ...mod.main.map((insn) => `  ${format(insn)}`)];
  const routine = (kind: string, r: Routine) => {
    let head = `${kind} ${r.name}(${r.params.join(' ')}) local(${r.locals.join(' ')})`;
    if (r.result !== null) {
      head += ` return ${formatExpr(r.result)}`;
    }
    out.push(`${head}:`, ...r.body.map((insn) => `  ${format(insn)}`));
  };
  for (const r of mod.procs.values()) {
    routine('proc', r);
  }
  for (const r of mod.funcs.values()) {
    routine('func', r);
  }
  return out.join('\n');
}
