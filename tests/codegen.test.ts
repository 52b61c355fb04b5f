import assert from 'assert';

import * as codegen from '../src/compile/codegen';
import { Module, Opcode, format } from '../src/compile/insn';
import { Names } from '../src/compile/names';
import * as resolve from '../src/resolve/resolve';
import { InternalError } from '../src/spl/errors';
import { parse } from '../src/spl-parser';
import * as syntax from '../src/spl-parser/syntax';
import { Position } from '../src/spl-parser/tokenize';
import * as typecheck from '../src/typecheck/typecheck';

function gen(src: string): Module {
  const res = parse('test.spl', src);
  if (res.err) {
    assert.fail(res.val.Error());
  }
  const [table, errors] = resolve.File(res.val);
  assert.equal(errors.toString(), '');
  assert.equal(typecheck.File(res.val, table).toString(), '');
  return codegen.File(res.val, new Names());
}

function genMain(vars: string, algo: string): string[] {
  const mod = gen(`glob { } proc { } func { } main { var { ${vars} } ${algo} }`);
  return mod.main.map(format);
}

describe('test codegen', function () {
  it('lowers assignment and halt', function () {
    const mod = gen(
      'glob { x } proc { } func { } main { var { } x = 5; halt }'
    );
    assert.deepEqual(mod.main, [
      { op: Opcode.ASSIGN, target: 'x', value: { kind: 'num', value: 5 } },
      { op: Opcode.HALT },
    ]);
  });

  it('lowers arithmetic to expression trees', function () {
    assert.deepEqual(
      genMain('x y', 'x = ( neg ( x mult 2 ) ) ; y = ( ( x plus 1 ) div y )'),
      ['x = -((x * 2))', 'y = ((x + 1) / y)']
    );
  });

  it('lowers if with else', function () {
    assert.deepEqual(
      genMain('', 'if ( 1 eq 1 ) { print "T" } else { print "F" } ; halt'),
      [
        'IF 1 = 1 THEN T0001',
        'PRINT "F"',
        'GOTO X0002',
        'REM T0001',
        'PRINT "T"',
        'REM X0002',
        'STOP',
      ]
    );
  });

  it('lowers if without else', function () {
    assert.deepEqual(genMain('x', 'if ( x > 0 ) { print x }'), [
      'IF x > 0 THEN T0001',
      'GOTO X0002',
      'REM T0001',
      'PRINT x',
      'REM X0002',
    ]);
  });

  it('lowers while', function () {
    assert.deepEqual(genMain('x', 'while ( x > 0 ) { x = ( x minus 1 ) }'), [
      'REM W0001',
      'IF x > 0 THEN WB0002',
      'GOTO WX0003',
      'REM WB0002',
      'x = (x - 1)',
      'GOTO W0001',
      'REM WX0003',
    ]);
  });

  it('lowers do until', function () {
    assert.deepEqual(
      genMain('x', 'do { x = ( x plus 1 ) } until ( x eq 3 )'),
      [
        'REM D0001',
        'x = (x + 1)',
        'IF x = 3 THEN DX0002',
        'GOTO D0001',
        'REM DX0002',
      ]
    );
  });

  it('skips the right operand of and when the left one is false', function () {
    assert.deepEqual(
      genMain('x y', 'if ( ( x > 0 ) and ( y > 0 ) ) { halt }'),
      [
        'IF x > 0 THEN M0003',
        'GOTO F0004',
        'REM M0003',
        'IF y > 0 THEN T0001',
        'REM F0004',
        'GOTO X0002',
        'REM T0001',
        'STOP',
        'REM X0002',
      ]
    );
  });

  it('skips the right operand of or when the left one is true', function () {
    assert.deepEqual(
      genMain('x y', 'if ( ( x > 0 ) or ( y > 0 ) ) { halt }'),
      [
        'IF x > 0 THEN T0001',
        'IF y > 0 THEN T0001',
        'GOTO X0002',
        'REM T0001',
        'STOP',
        'REM X0002',
      ]
    );
  });

  it('inverts a negated comparison', function () {
    assert.deepEqual(genMain('x', 'if ( not ( x eq 0 ) ) { halt }'), [
      'IF x = 0 THEN S0003',
      'GOTO T0001',
      'REM S0003',
      'GOTO X0002',
      'REM T0001',
      'STOP',
      'REM X0002',
    ]);
  });

  it('jumps on false through a negated or', function () {
    assert.deepEqual(
      genMain('x y', 'if ( not ( ( x > 0 ) or ( y > 0 ) ) ) { halt }'),
      [
        'IF x > 0 THEN O0003',
        'IF y > 0 THEN S0004',
        'GOTO T0001',
        'REM S0004',
        'REM O0003',
        'GOTO X0002',
        'REM T0001',
        'STOP',
        'REM X0002',
      ]
    );
  });

  it('jumps on false through a negated and', function () {
    assert.deepEqual(
      genMain('x y', 'if ( not ( ( x > 0 ) and ( y > 0 ) ) ) { halt }'),
      [
        'IF x > 0 THEN S0003',
        'GOTO T0001',
        'REM S0003',
        'IF y > 0 THEN S0004',
        'GOTO T0001',
        'REM S0004',
        'GOTO X0002',
        'REM T0001',
        'STOP',
        'REM X0002',
      ]
    );
  });

  it('renames a main variable that shares a global name', function () {
    const mod = gen(`
      glob { x g }
      proc { }
      func { id ( a ) { local { } return a } }
      main { var { x y } x = 1 ; y = x ; g = id ( x ) ; x = id ( g ) ; print x ; halt }
    `);
    assert.deepEqual(mod.main.map(format), [
      'M1x = 1',
      'y = M1x',
      'g = CALL id(M1x)',
      'M1x = CALL id(g)',
      'PRINT M1x',
      'STOP',
    ]);
    const id = mod.funcs.get('id');
    assert.ok(id !== undefined);
    assert.deepEqual(id.result, { kind: 'var', name: 'a' });
  });

  it('generates routines and leaves calls in place', function () {
    const mod = gen(`
      glob { g }
      proc { inc ( a ) { local { t } t = ( a plus 1 ) ; g = t } }
      func { add ( a b ) { local { s } s = ( a plus b ) ; return s } }
      main { var { r } inc ( 1 ) ; r = add ( 2 3 ) ; halt }
    `);
    assert.deepEqual(mod.main.map(format), [
      'CALL inc(1)',
      'r = CALL add(2 3)',
      'STOP',
    ]);

    const inc = mod.procs.get('inc');
    assert.ok(inc !== undefined);
    assert.deepEqual(inc.params, ['a']);
    assert.deepEqual(inc.locals, ['t']);
    assert.deepEqual(inc.body.map(format), ['t = (a + 1)', 'g = t']);
    assert.equal(inc.result, null);

    const add = mod.funcs.get('add');
    assert.ok(add !== undefined);
    assert.deepEqual(add.params, ['a', 'b']);
    assert.deepEqual(add.result, { kind: 'var', name: 's' });
  });

  it('numbers the labels of main before those of routines', function () {
    const mod = gen(`
      glob { }
      proc { p ( n ) { local { } while ( n > 0 ) { n = ( n minus 1 ) } } }
      func { }
      main { var { } if ( 1 eq 1 ) { p ( 3 ) } }
    `);
    assert.deepEqual(mod.main.map(format), [
      'IF 1 = 1 THEN T0001',
      'GOTO X0002',
      'REM T0001',
      'CALL p(3)',
      'REM X0002',
    ]);
    const p = mod.procs.get('p');
    assert.ok(p !== undefined);
    assert.equal(format(p.body[0]), 'REM W0003');
  });

  it('refuses a numeric term as a condition', function () {
    const g = new codegen.Generator(new Names());
    const one = new syntax.NumLit(new Position(null, 1, 1), '1', 1);
    assert.throws(() => g.ifTrue(one, 'L0001'), InternalError);
    assert.throws(() => g.ifFalse(one, 'L0001'), InternalError);
  });
});
