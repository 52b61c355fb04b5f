import createDebug from 'debug';

import { ErrorKind, ErrorList, InternalError } from '../spl/errors';
import {
  Insn,
  Module,
  Opcode,
  Operand,
  Routine,
  Target,
  mapExpr,
  mapOperand,
} from './insn';
import { Names } from './names';

const debug = createDebug('spl:inline');

// defaultMaxDepth bounds how deeply calls are expanded inside one another.
// Every recursive SPL call expands forever under pure inlining, so a
// recursive program always reaches this bound and fails to compile.
export const defaultMaxDepth = 16;

// Main replaces every call in the main program of mod with a renamed
// copy of the callee's body and returns the call-free stream.
//
// The returned list reports calls to unknown routines and calls nested
// deeper than maxDepth; such calls are left in the stream unexpanded.
export function Main(
  mod: Module,
  names: Names,
  maxDepth: number = defaultMaxDepth
): [Insn[], ErrorList] {
  const inl = new Inliner(mod, names, maxDepth);
  inl.inline(mod.main, 0);
  debug('%d insns, %d expansion(s)', inl.out.length, inl.expansions);
  return [inl.out, inl.errors];
}

class Inliner {
  mod: Module;
  names: Names;
  maxDepth: number;
  out: Insn[] = [];
  errors: ErrorList = new ErrorList();
  expansions = 0;
  // After the depth limit is hit once, the compilation has failed
  // and further expansion would only multiply the same error.
  exhausted = false;

  constructor(mod: Module, names: Names, maxDepth: number) {
    this.mod = mod;
    this.names = names;
    this.maxDepth = maxDepth;
  }

  inline(code: Insn[], depth: number): void {
    for (const insn of code) {
      switch (insn.op) {
        case Opcode.CALL:
          this.call(insn, this.mod.procs.get(insn.name), 'procedure', depth);
          break;
        case Opcode.CALLASSIGN:
          this.call(insn, this.mod.funcs.get(insn.name), 'function', depth);
          break;
        default:
          this.out.push(insn);
      }
    }
  }

  call(
    insn: Extract<Insn, { op: Opcode.CALL | Opcode.CALLASSIGN }>,
    routine: Routine | undefined,
    what: string,
    depth: number
  ): void {
    if (routine === undefined) {
      this.errors.errorf(
        ErrorKind.Undeclared,
        null,
        `call to undeclared ${what} '${insn.name}'`
      );
      this.out.push(insn);
      return;
    }
    if (this.exhausted || depth >= this.maxDepth) {
      if (!this.exhausted) {
        this.errors.errorf(
          ErrorKind.RecursionLimit,
          null,
          `expanding '${insn.name}' exceeds the inlining depth limit of ${this.maxDepth}; recursive calls cannot be inlined`
        );
        this.exhausted = true;
      }
      this.out.push(insn);
      return;
    }
    const target = insn.op === Opcode.CALLASSIGN ? insn.target : null;
    this.expand(routine, insn.args, target, depth);
  }

  // expand emits one copy of routine: parameter bindings, the renamed
  // body with its own calls expanded, and for a function the store of
  // the return atom into target.
  expand(
    routine: Routine,
    args: Operand[],
    target: string | null,
    depth: number
  ): void {
    if (args.length !== routine.params.length) {
      throw new InternalError(
        `'${routine.name}' called with ${args.length} argument(s), expects ${routine.params.length}`
      );
    }
    this.expansions++;

    // Parameters and locals get names unique to this call site;
    // globals are shared and keep theirs.
    const rename = new Map<string, string>();
    for (const p of routine.params) {
      rename.set(p, this.names.temp('P', p));
    }
    for (const l of routine.locals) {
      rename.set(l, this.names.temp('L', l));
    }
    const relabel = new Map<string, string>();
    for (const insn of routine.body) {
      if (insn.op === Opcode.LABEL) {
        relabel.set(insn.label, this.names.relabel(insn.label));
      }
    }
    const name = (x: string) => rename.get(x) ?? x;
    const dest = (t: Target) =>
      typeof t === 'string' ? relabel.get(t) ?? t : t;

    routine.params.forEach((p, i) => {
      this.out.push({ op: Opcode.ASSIGN, target: name(p), value: args[i] });
    });
    this.inline(
      routine.body.map((insn) => renameInsn(insn, name, dest)),
      depth + 1
    );
    if (target !== null) {
      if (routine.result === null) {
        throw new InternalError(`procedure '${routine.name}' used as a function`);
      }
      this.out.push({
        op: Opcode.ASSIGN,
        target,
        value: mapOperand(routine.result, name),
      });
    }
  }
}

// renameInsn returns a copy of insn with variables renamed by name and
// jump labels by dest.
export function renameInsn(
  insn: Insn,
  name: (x: string) => string,
  dest: (t: Target) => Target
): Insn {
  switch (insn.op) {
    case Opcode.ASSIGN:
      return {
        op: insn.op,
        target: name(insn.target),
        value: mapExpr(insn.value, name),
      };
    case Opcode.PRINT:
      if (insn.value.kind === 'str') {
        return insn;
      }
      return { op: insn.op, value: mapOperand(insn.value, name) };
    case Opcode.HALT:
      return insn;
    case Opcode.CALL:
      return {
        op: insn.op,
        name: insn.name,
        args: insn.args.map((a) => mapOperand(a, name)),
      };
    case Opcode.CALLASSIGN:
      return {
        op: insn.op,
        target: name(insn.target),
        name: insn.name,
        args: insn.args.map((a) => mapOperand(a, name)),
      };
    case Opcode.IFGOTO:
      return {
        op: insn.op,
        cond: {
          op: insn.cond.op,
          x: mapExpr(insn.cond.x, name),
          y: mapExpr(insn.cond.y, name),
        },
        dest: dest(insn.dest),
      };
    case Opcode.GOTO:
      return { op: insn.op, dest: dest(insn.dest) };
    case Opcode.LABEL: {
      const label = dest(insn.label);
      if (typeof label !== 'string') {
        throw new InternalError(`label ${insn.label} renamed to an address`);
      }
      return { op: insn.op, label };
    }
  }
}
