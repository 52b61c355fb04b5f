export * from './spl/compile';
export * from './spl/errors';
export * as codegen from './compile/codegen';
export * as inline from './compile/inline';
export * from './compile/insn';
export * from './compile/linearize';
export { Names } from './compile/names';
export * from './resolve/binding';
export * as resolve from './resolve/resolve';
export { maxArity, parse } from './spl-parser/parse';
export * as syntax from './spl-parser/syntax';
export { Position } from './spl-parser/tokenize';
export * as typecheck from './typecheck/typecheck';
export { Type } from './typecheck/types';
