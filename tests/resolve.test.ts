import assert from 'assert';

import { Category, ScopeKind, SymbolTable } from '../src/resolve/binding';
import * as resolve from '../src/resolve/resolve';
import { ErrorKind, ErrorList } from '../src/spl/errors';
import { parse } from '../src/spl-parser';
import * as syntax from '../src/spl-parser/syntax';

function resolveSrc(src: string): [syntax.File, SymbolTable, ErrorList] {
  const res = parse('test.spl', src);
  if (res.err) {
    assert.fail(res.val.Error());
  }
  const [table, errors] = resolve.File(res.val);
  return [res.val, table, errors];
}

function messages(errors: ErrorList): string[] {
  return errors.errors.map((e) => e.Msg);
}

describe('test resolve', function () {
  it('reports a duplicate global', function () {
    const [, , errors] = resolveSrc(
      'glob { x x } proc { } func { } main { var { } halt }'
    );
    assert.equal(
      errors.toString(),
      "test.spl:1:10: Name-Rule-Violation: duplicate variable name 'x' in the same scope (first declared at test.spl:1:8)"
    );
  });

  it('reports a duplicate local', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { p ( ) { local { t t } halt } } func { } main { var { } halt }'
    );
    assert.equal(errors.length, 1);
    assert.equal(errors.errors[0].kind, ErrorKind.NameRule);
    assert.match(errors.errors[0].Msg, /^duplicate variable name 't'/);
  });

  it('reports a local that shadows a parameter', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { p ( a ) { local { a } halt } } func { } main { var { } halt }'
    );
    assert.deepEqual(messages(errors), [
      "local variable 'a' shadows a parameter of 'p'",
    ]);
  });

  it('reports a duplicate procedure', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { p ( ) { local { } halt } p ( ) { local { } halt } } func { } main { var { } halt }'
    );
    assert.equal(errors.length, 1);
    assert.match(errors.errors[0].Msg, /^duplicate procedure name 'p'/);
  });

  it('reports a name that is both a variable and a procedure', function () {
    const [, , errors] = resolveSrc(
      'glob { p } proc { p ( ) { local { } halt } } func { } main { var { } halt }'
    );
    assert.equal(
      errors.toString(),
      "test.spl:1:19: Name-Rule-Violation: 'p' is declared both as a variable (at test.spl:1:8) and as a procedure"
    );
  });

  it('reports a name that is both a procedure and a function', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { f ( ) { local { } halt } } func { f ( ) { local { } return 1 } } main { var { } halt }'
    );
    assert.equal(
      errors.toString(),
      "test.spl:1:51: Name-Rule-Violation: 'f' is declared both as a procedure (at test.spl:1:17) and as a function"
    );
  });

  it('suggests a close name for an undeclared variable', function () {
    const [, , errors] = resolveSrc(
      'glob { count } proc { } func { } main { var { } conut = 1 ; halt }'
    );
    assert.equal(errors.errors[0].kind, ErrorKind.Undeclared);
    assert.deepEqual(messages(errors), [
      "undeclared variable 'conut' (did you mean 'count'?)",
    ]);
  });

  it('hides procedure locals from the main program', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { p ( ) { local { t } t = 1 } } func { } main { var { } t = 2 ; halt }'
    );
    assert.deepEqual(messages(errors), ["undeclared variable 't'"]);
  });

  it('hides main variables from procedures', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { p ( ) { local { } m = 1 } } func { } main { var { m } p ( ) ; halt }'
    );
    assert.deepEqual(messages(errors), ["undeclared variable 'm'"]);
  });

  it('reports names used as the wrong kind of entity', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { p ( ) { local { } halt } } func { f ( ) { local { } return 1 } } ' +
        'main { var { x } p = 1 ; f ( ) ; x = p ( ) ; halt }'
    );
    assert.deepEqual(messages(errors), [
      "'p' is a procedure, not a variable",
      "'f' is a function, not a procedure",
      "'p' is a procedure, not a function",
    ]);
    assert.equal(errors.ofKind(ErrorKind.Undeclared).length, 3);
  });

  it('suggests a close name for an undeclared procedure', function () {
    const [, , errors] = resolveSrc(
      'glob { } proc { inc ( ) { local { } halt } } func { } main { var { } incr ( ) ; halt }'
    );
    assert.deepEqual(messages(errors), [
      "undeclared procedure 'incr' (did you mean 'inc'?)",
    ]);
  });

  it('binds every reference to its declaration', function () {
    const [file, table, errors] = resolveSrc(
      'glob { g } proc { p ( a ) { local { } g = a } } func { } main { var { } p ( 1 ) ; halt }'
    );
    assert.equal(errors.length, 0);

    const def = file.Procs[0];
    const local = table.locals.get(def);
    assert.ok(local !== undefined);
    assert.equal(local.kind, ScopeKind.Local);
    assert.equal(local.parent, table.global);
    assert.equal(local.toString(), 'local scope of p');
    assert.deepEqual(table.global.children, [table.main, local]);

    const stmt = def.Body.Algo[0];
    assert.ok(stmt instanceof syntax.AssignStmt);
    assert.equal(stmt.LHS.Binding?.scope, table.global);
    assert.ok(stmt.RHS instanceof syntax.VarRef);
    assert.equal(stmt.RHS.Id.Binding?.scope, local);
    assert.equal(stmt.RHS.Id.Binding?.isParam, true);

    const call = file.Main.Algo[0];
    assert.ok(call instanceof syntax.CallStmt);
    assert.equal(call.Name.Binding?.category, Category.Procedure);
    assert.deepEqual(call.Name.Binding?.params(), ['a']);
  });

  it('records every program-wide name in the Everywhere scope', function () {
    const [, table] = resolveSrc(
      'glob { g } proc { p ( a ) { local { } g = a } } func { } main { var { } p ( 1 ) ; halt }'
    );
    assert.deepEqual([...table.everywhere.bindings.keys()], ['p', 'g', 'a']);
  });

  it('keeps going after the first error', function () {
    const [, , errors] = resolveSrc(
      'glob { x x } proc { } func { } main { var { } y = 1 ; halt }'
    );
    assert.deepEqual(
      errors.errors.map((e) => e.kind),
      [ErrorKind.NameRule, ErrorKind.Undeclared]
    );
  });
});
