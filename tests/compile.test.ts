import assert from 'assert';
import { Result } from 'ts-results';

import { Opcode, isJump } from '../src/compile/insn';
import { ArityError, ErrorKind, ErrorList } from '../src/spl/errors';
import { Compilation, CompileOptions, compileSource } from '../src/spl/compile';

function compileOk(src: string, options: Partial<CompileOptions> = {}): Compilation {
  const res = compileSource('test.spl', src, options);
  if (res.err) {
    assert.fail(res.val.toString());
  }
  return res.val;
}

function compileErr(res: Result<Compilation, ErrorList>): ErrorList {
  if (res.ok) {
    assert.fail('compilation succeeded');
  }
  return res.val;
}

const loop = `
glob { r }
proc { }
func { add ( a b ) { local { s } s = ( a plus b ) ; return s } }
main {
  var { i }
  i = 0 ;
  while ( 3 > i ) {
    r = add ( i 10 ) ;
    print r ;
    i = ( i plus 1 )
  } ;
  halt
}
`;

describe('test compile', function () {
  it('compiles the smallest program', function () {
    const c = compileOk(
      'glob { x } proc { } func { } main { var { } x = 5; halt }'
    );
    assert.equal(c.program.toString(), '10 x = 5\n20 STOP');
  });

  it('compiles if with else', function () {
    const c = compileOk(
      'glob { } proc { } func { } main { var { } if ( 1 eq 1 ) { print "T" } else { print "F" } ; halt }'
    );
    assert.deepEqual(c.program.toString().split('\n'), [
      '10 IF 1 = 1 THEN 40',
      '20 PRINT "F"',
      '30 GOTO 60',
      '40 REM T0001',
      '50 PRINT "T"',
      '60 REM X0002',
      '70 STOP',
    ]);
  });

  it('compiles loops around inlined calls', function () {
    const c = compileOk(loop);
    assert.deepEqual(c.program.toString().split('\n'), [
      '10 i = 0',
      '20 REM W0001',
      '30 IF 3 > i THEN 50',
      '40 GOTO 130',
      '50 REM WB0002',
      '60 P1a = i',
      '70 P2b = 10',
      '80 L3s = (P1a + P2b)',
      '90 r = L3s',
      '100 PRINT r',
      '110 i = (i + 1)',
      '120 GOTO 20',
      '130 REM WX0003',
      '140 STOP',
    ]);
  });

  it('keeps a main variable apart from the global it shadows', function () {
    const c = compileOk(
      'glob { x } proc { setg ( ) { local { } x = 1 } } func { } ' +
        'main { var { x } x = 5 ; setg ( ) ; print x ; halt }'
    );
    assert.deepEqual(c.program.toString().split('\n'), [
      '10 M1x = 5',
      '20 x = 1',
      '30 PRINT M1x',
      '40 STOP',
    ]);
  });

  it('lands every jump on its label', function () {
    const c = compileOk(loop);
    const byAddr = new Map(c.program.lines.map((l) => [l.addr, l.insn] as const));
    for (const insn of c.program.insns()) {
      if (!isJump(insn)) {
        continue;
      }
      assert.equal(typeof insn.dest, 'number');
      const target = byAddr.get(Number(insn.dest));
      assert.ok(target !== undefined && target.op === Opcode.LABEL);
      assert.equal(c.program.labels.get(target.label), insn.dest);
    }
  });

  it('passes start and step through', function () {
    const c = compileOk(
      'glob { x } proc { } func { } main { var { } x = 5; halt }',
      { start: 100, step: 1 }
    );
    assert.equal(c.program.toString(), '100 x = 5\n101 STOP');
  });

  it('starts every compilation afresh', function () {
    assert.equal(
      compileOk(loop).program.toString(),
      compileOk(loop).program.toString()
    );
  });

  it('keeps the output of every stage', function () {
    const c = compileOk(loop);
    assert.equal(c.file.Path, 'test.spl');
    assert.ok(c.table.lookupFunc('add') !== null);
    assert.ok(c.module.funcs.has('add'));
    assert.equal(c.inlined.length, c.program.lines.length);
  });

  it('stops after a syntax error', function () {
    const errors = compileErr(compileSource('test.spl', 'glob { x '));
    assert.equal(errors.length, 1);
    assert.equal(errors.errors[0].kind, ErrorKind.Syntax);
  });

  it('stops before type checking on name errors', function () {
    const errors = compileErr(
      compileSource(
        'test.spl',
        'glob { x x } proc { } func { } main { var { } x = ( 1 eq 1 ) ; halt }'
      )
    );
    assert.ok(errors.ofKind(ErrorKind.NameRule).length >= 1);
    assert.equal(errors.ofKind(ErrorKind.TypeMismatch).length, 0);
  });

  it('reports a boolean assignment', function () {
    const errors = compileErr(
      compileSource(
        'test.spl',
        'glob { x } proc { } func { } main { var { } x = ( 1 eq 1 ) ; halt }'
      )
    );
    assert.equal(errors.length, 1);
    assert.equal(errors.errors[0].kind, ErrorKind.TypeMismatch);
    assert.match(errors.errors[0].Msg, /^assignment RHS must be numeric/);
  });

  it('reports a call with the wrong number of arguments', function () {
    const errors = compileErr(
      compileSource(
        'test.spl',
        'glob { r } proc { } func { add ( a b ) { local { } return a } } main { var { } r = add ( 1 ) ; halt }'
      )
    );
    assert.equal(errors.length, 1);
    const err = errors.errors[0];
    assert.ok(err instanceof ArityError);
    assert.equal(err.expected, 2);
    assert.equal(err.got, 1);
  });

  it('rejects recursion', function () {
    const errors = compileErr(
      compileSource(
        'test.spl',
        'glob { } proc { p ( ) { local { } p ( ) } } func { } main { var { } p ( ) ; halt }',
        { maxDepth: 4 }
      )
    );
    assert.deepEqual(
      errors.errors.map((e) => e.kind),
      [ErrorKind.RecursionLimit]
    );
  });
});
