import { Position } from '../spl-parser/tokenize';

// The kinds of error a compilation can report to its user.
export enum ErrorKind {
  Syntax = 'Syntax-Error',
  NameRule = 'Name-Rule-Violation',
  Undeclared = 'Undeclared-Reference',
  TypeMismatch = 'Type-Mismatch',
  InvalidCondition = 'Invalid-Condition-Type',
  InvalidReturn = 'Invalid-Return',
  Arity = 'Arity-Mismatch',
  RecursionLimit = 'Recursion-Limit',
  UnresolvedLabel = 'Unresolved-Label',
  Input = 'Input-Error',
}

// A CompileError describes the nature and position of a user error.
export class CompileError {
  kind: ErrorKind;
  Pos: Position | null;
  Msg: string;

  constructor(kind: ErrorKind, pos: Position | null, msg: string) {
    this.kind = kind;
    this.Pos = pos;
    this.Msg = msg;
  }

  // Return a string representation of the error
  public Error(): string {
    if (this.Pos === null || !this.Pos.isValid()) {
      return `${this.kind}: ${this.Msg}`;
    }
    return `${this.Pos.toString()}: ${this.kind}: ${this.Msg}`;
  }
}

// An ArityError reports a call whose argument count differs from the
// callee's parameter count.
export class ArityError extends CompileError {
  expected: number;
  got: number;

  constructor(pos: Position, name: string, expected: number, got: number) {
    super(
      ErrorKind.Arity,
      pos,
      `'${name}' expects ${expected} argument(s), got ${got}`
    );
    this.expected = expected;
    this.got = got;
  }
}

// An ErrorList is a list of errors in the order they were reported.
export class ErrorList {
  errors: CompileError[];
  constructor(errors: CompileError[] = []) {
    this.errors = errors;
  }

  add(err: CompileError): void {
    this.errors.push(err);
  }

  errorf(kind: ErrorKind, pos: Position | null, msg: string): void {
    this.errors.push(new CompileError(kind, pos, msg));
  }

  get length(): number {
    return this.errors.length;
  }

  // ofKind returns the errors of the given kind.
  ofKind(kind: ErrorKind): CompileError[] {
    return this.errors.filter((e) => e.kind === kind);
  }

  // Return the first error message in the list
  public Error(): string {
    return this.errors.length > 0 ? this.errors[0].Error() : '';
  }

  toString(): string {
    return this.errors.map((e) => e.Error()).join('\n');
  }
}

// An InternalError reports a state that an earlier phase should have
// ruled out. It indicates a bug in the compiler, never a user error.
export class InternalError extends Error {
  constructor(msg: string) {
    super(`internal compiler error: ${msg}`);
    this.name = 'InternalError';
  }
}
