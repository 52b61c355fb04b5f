import createDebug from 'debug';
import { readFileSync } from 'fs';
import { Err, Ok, Result } from 'ts-results';

import * as codegen from '../compile/codegen';
import * as inline from '../compile/inline';
import { Insn, Module } from '../compile/insn';
import {
  LinearizeOptions,
  Linearize,
  Program,
  defaultLinearizeOptions,
} from '../compile/linearize';
import { Names } from '../compile/names';
import { SymbolTable } from '../resolve/binding';
import * as resolve from '../resolve/resolve';
import { parse } from '../spl-parser';
import * as syntax from '../spl-parser/syntax';
import * as typecheck from '../typecheck/typecheck';
import { CompileError, ErrorKind, ErrorList } from './errors';

const debug = createDebug('spl:compile');

export interface CompileOptions extends LinearizeOptions {
  // maxDepth bounds the nesting of inlined calls.
  maxDepth: number;
}

export const defaultOptions: CompileOptions = {
  ...defaultLinearizeOptions,
  maxDepth: inline.defaultMaxDepth,
};

// A Compilation holds the product of every stage of one successful
// compilation.
export class Compilation {
  file: syntax.File;
  table: SymbolTable;
  module: Module;
  inlined: Insn[];
  program: Program;

  constructor(
    file: syntax.File,
    table: SymbolTable,
    module: Module,
    inlined: Insn[],
    program: Program
  ) {
    this.file = file;
    this.table = table;
    this.module = module;
    this.inlined = inlined;
    this.program = program;
  }
}

// compileFile reads and compiles the SPL program in the named file.
// A file that cannot be read is reported as an Input-Error.
export function compileFile(
  path: string,
  options: Partial<CompileOptions> = {}
): Result<Compilation, ErrorList> {
  let src: string;
  try {
    src = readFileSync(path, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e) {
      debug('%s: %s', path, e.message);
      return Err(
        new ErrorList([
          new CompileError(ErrorKind.Input, null, `cannot read ${path}: ${e.message}`),
        ])
      );
    }
    throw e;
  }
  return compileSource(path, src, options);
}

// compileSource compiles an SPL program. If src is null the program is
// read from filename.
//
// Each stage runs only if every earlier stage reported no errors; the
// result carries the errors of the first stage that reported any.
export function compileSource(
  filename: string,
  src: string | null,
  options: Partial<CompileOptions> = {}
): Result<Compilation, ErrorList> {
  const opts: CompileOptions = { ...defaultOptions, ...options };

  const parsed = parse(filename, src);
  if (parsed.err) {
    debug('%s: syntax error', filename);
    return Err(new ErrorList([parsed.val]));
  }
  const file = parsed.val;

  const [table, resolveErrors] = resolve.File(file);
  if (resolveErrors.length > 0) {
    debug('%s: %d resolve error(s)', filename, resolveErrors.length);
    return Err(resolveErrors);
  }

  const typeErrors = typecheck.File(file, table);
  if (typeErrors.length > 0) {
    debug('%s: %d type error(s)', filename, typeErrors.length);
    return Err(typeErrors);
  }

  const names = new Names();
  const mod = codegen.File(file, names);
  const [inlined, inlineErrors] = inline.Main(mod, names, opts.maxDepth);
  if (inlineErrors.length > 0) {
    debug('%s: %d inline error(s)', filename, inlineErrors.length);
    return Err(inlineErrors);
  }

  const linear = Linearize(inlined, opts);
  if (linear.err) {
    return Err(linear.val);
  }
  debug('%s: %d lines', filename, linear.val.lines.length);
  return Ok(new Compilation(file, table, mod, inlined, linear.val));
}
