#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { writeFileSync } from 'fs';
import * as path from 'path';

import { format, formatModule } from './compile/insn';
import { compileFile } from './spl/compile';

const version = '0.1.0';

interface CliOptions {
  output?: string;
  start: number;
  step: number;
  maxDepth: number;
  emit: 'basic' | 'ir' | 'inlined';
  allowUnresolved: boolean;
  stdout: boolean;
}

function integer(min: number): (value: string) => number {
  return (value) => {
    const n = Number(value);
    if (!/^\d+$/.test(value) || n < min) {
      throw new InvalidArgumentError(`expected an integer >= ${min}`);
    }
    return n;
  };
}

function main(): void {
  const program = new Command();

  program
    .name('splc')
    .description('Compile an SPL program to a line-numbered BASIC program.')
    .version(version)
    .argument('<input>', 'SPL source file')
    .option('-o, --output <file>', 'output file (default: input with .bas)')
    .option('--start <n>', 'address of the first line', integer(0), 10)
    .option('--step <n>', 'distance between line addresses', integer(1), 10)
    .option('--max-depth <n>', 'inlining depth limit', integer(1), 16)
    .addOption(
      new Option('--emit <stage>', 'what to write')
        .choices(['basic', 'ir', 'inlined'])
        .default('basic')
    )
    .option('--allow-unresolved', 'keep jumps to unknown labels', false)
    .option('--stdout', 'write to standard output', false);

  program.parse();
  const input = program.args[0];
  const opts = program.opts<CliOptions>();

  const res = compileFile(input, {
    start: opts.start,
    step: opts.step,
    maxDepth: opts.maxDepth,
    allowUnresolved: opts.allowUnresolved,
  });
  if (res.err) {
    console.error(res.val.toString());
    process.exitCode = 1;
    return;
  }

  const c = res.val;
  let text: string;
  switch (opts.emit) {
    case 'basic':
      text = c.program.toString();
      break;
    case 'ir':
      text = formatModule(c.module);
      break;
    case 'inlined':
      text = c.inlined.map(format).join('\n');
      break;
  }

  if (opts.stdout) {
    console.log(text);
    return;
  }
  const output =
    opts.output ??
    path.join(path.dirname(input), path.basename(input, path.extname(input)) + '.bas');
  writeFileSync(output, text + '\n');
}

main();
