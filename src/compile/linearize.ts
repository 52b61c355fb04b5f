import createDebug from 'debug';
import { Err, Ok, Result } from 'ts-results';

import { ErrorKind, ErrorList, InternalError } from '../spl/errors';
import { Insn, Opcode, Target, format } from './insn';

const debug = createDebug('spl:linearize');

export interface LinearizeOptions {
  // start is the address of the first instruction (integer >= 0).
  start: number;
  // step is the distance between consecutive addresses (integer > 0).
  step: number;
  // allowUnresolved keeps a jump to an unknown label pointing at the
  // label's name instead of failing.
  allowUnresolved: boolean;
}

export const defaultLinearizeOptions: LinearizeOptions = {
  start: 10,
  step: 10,
  allowUnresolved: false,
};

// A Line is one numbered instruction of the final program.
export class Line {
  addr: number;
  insn: Insn;

  constructor(addr: number, insn: Insn) {
    this.addr = addr;
    this.insn = insn;
  }

  toString(): string {
    return `${this.addr} ${format(this.insn)}`;
  }
}

// A Program is a linearized instruction stream: every instruction has an
// address and every jump names the address of its destination.
export class Program {
  lines: Line[];
  labels: Map<string, number>;

  constructor(lines: Line[], labels: Map<string, number>) {
    this.lines = lines;
    this.labels = labels;
  }

  // insns returns the resolved instructions in address order.
  insns(): Insn[] {
    return this.lines.map((l) => l.insn);
  }

  toString(): string {
    return this.lines.map((l) => l.toString()).join('\n');
  }
}

// Linearize numbers the instructions of a call-free stream and resolves
// every jump to the address of its label. A jump whose destination is
// already an address is kept as is, so linearizing a Program's insns
// again with the same options reproduces it.
export function Linearize(
  code: Insn[],
  options: Partial<LinearizeOptions> = {}
): Result<Program, ErrorList> {
  const opts: LinearizeOptions = { ...defaultLinearizeOptions, ...options };
  if (!Number.isInteger(opts.start) || opts.start < 0) {
    throw new RangeError(`start must be an integer >= 0, got ${opts.start}`);
  }
  if (!Number.isInteger(opts.step) || opts.step <= 0) {
    throw new RangeError(`step must be an integer > 0, got ${opts.step}`);
  }

  const addr = (i: number) => opts.start + i * opts.step;
  const labels = new Map<string, number>();
  code.forEach((insn, i) => {
    if (insn.op === Opcode.CALL || insn.op === Opcode.CALLASSIGN) {
      throw new InternalError(
        `${Opcode.String(insn.op)} of '${insn.name}' survived inlining`
      );
    }
    if (insn.op === Opcode.LABEL) {
      if (labels.has(insn.label)) {
        throw new InternalError(`label ${insn.label} bound twice`);
      }
      labels.set(insn.label, addr(i));
    }
  });

  const errors = new ErrorList();
  const resolve = (dest: Target, at: number): Target => {
    if (typeof dest === 'number') {
      return dest;
    }
    const target = labels.get(dest);
    if (target !== undefined) {
      return target;
    }
    if (!opts.allowUnresolved) {
      errors.errorf(
        ErrorKind.UnresolvedLabel,
        null,
        `jump at ${at} targets undefined label '${dest}'`
      );
    }
    return dest;
  };

  const lines = code.map((insn, i) => {
    switch (insn.op) {
      case Opcode.IFGOTO:
        return new Line(addr(i), {
          op: insn.op,
          cond: insn.cond,
          dest: resolve(insn.dest, addr(i)),
        });
      case Opcode.GOTO:
        return new Line(addr(i), {
          op: insn.op,
          dest: resolve(insn.dest, addr(i)),
        });
      default:
        return new Line(addr(i), insn);
    }
  });

  debug('%d lines, %d labels', lines.length, labels.size);
  if (errors.length > 0) {
    return Err(errors);
  }
  return Ok(new Program(lines, labels));
}
