import assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';

import { isJump } from '../src/compile/insn';
import { ErrorKind } from '../src/spl/errors';
import { compileFile } from '../src/spl/compile';

describe('compile real world cases', function () {
  const directoryPath = path.join(__dirname, 'testcases');
  const caseFiles = fs.readdirSync(directoryPath);

  for (const file of caseFiles) {
    if (path.extname(file) !== '.spl') {
      continue;
    }
    const source = path.join(directoryPath, file);
    const expected = source.replace(/\.spl$/, '.bas');

    describe('compile ' + file, function () {
      it('compiles successfully', function () {
        const res = compileFile(source);
        assert.ok(res.ok, res.err ? res.val.toString() : '');
      });

      it('leaves no symbolic jump', function () {
        const res = compileFile(source);
        if (res.err) {
          assert.fail(res.val.toString());
        }
        for (const insn of res.val.program.insns()) {
          if (isJump(insn)) {
            assert.equal(typeof insn.dest, 'number');
          }
        }
      });

      if (fs.existsSync(expected)) {
        it('matches ' + path.basename(expected), function () {
          const res = compileFile(source);
          if (res.err) {
            assert.fail(res.val.toString());
          }
          assert.equal(
            res.val.program.toString(),
            fs.readFileSync(expected, 'utf8').trimEnd()
          );
        });
      }
    });
  }

  it('reports a file that cannot be read', function () {
    const source = path.join(directoryPath, 'missing.spl');
    const res = compileFile(source);
    if (res.ok) {
      assert.fail('compilation succeeded');
    }
    assert.equal(res.val.length, 1);
    const err = res.val.errors[0];
    assert.equal(err.kind, ErrorKind.Input);
    assert.equal(err.Pos, null);
    assert.ok(err.Msg.startsWith(`cannot read ${source}: ENOENT`));
    assert.ok(res.val.toString().startsWith('Input-Error: cannot read '));
  });
});
