import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { createProgram, main, type CliIO } from '../cli.js';
import { logger } from '../logger.js';

const calcPath = fileURLToPath(new URL('./fixtures/calc.json', import.meta.url));

interface FakeIO extends CliIO {
  out: string[];
  err: string[];
  exitCode: number | undefined;
}

function fakeIO(files: Record<string, string>): FakeIO {
  const io: FakeIO = {
    out: [],
    err: [],
    exitCode: undefined,
    readFile: path => {
      if (!(path in files)) throw new Error(`ENOENT: no such file, open '${path}'`);
      return files[path];
    },
    stdout: { write: chunk => io.out.push(chunk) },
    stderr: { write: chunk => io.err.push(chunk) },
    setExitCode: code => { io.exitCode = code; },
  };
  return io;
}

function run(io: CliIO, args: string[]): void {
  createProgram(io).exitOverride().parse(args, { from: 'user' });
}

describe('lexer-scan', () => {
  let errors: string[];

  beforeEach(() => {
    errors = [];
    vi.spyOn(logger, 'error').mockImplementation((message: unknown) => { errors.push(String(message)); });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('dumps every token of a lua file', () => {
    const io = fakeIO({ 'main.lua': 'print("hi")\n' });
    run(io, ['main.lua']);

    expect(io.out.join('')).toBe(
      '[#000 line 1] Identifier("print")\n' +
      '[#001 line 1] Symbol("(")\n' +
      '[#002 line 1] StringLiteral("hi")\n' +
      '[#003 line 1] Symbol(")")\n',
    );
    expect(io.exitCode).toBeUndefined();
    expect(errors).toEqual([]);
  });

  test('scan failure keeps the partial dump and exits with 1', () => {
    const io = fakeIO({ 'main.lua': 'x = "abc' });
    run(io, ['main.lua']);

    expect(io.out).toEqual([
      '[#000 line 1] Identifier("x")\n',
      '[#001 line 1] Symbol("=")\n',
      '[#002 line 1] StringLiteral("abc")\n',
    ]);
    expect(errors).toEqual(['main.lua:1:4 : unexpected end of file']);
    expect(io.exitCode).toBe(1);
  });

  test('unknown language exits with 2', () => {
    const io = fakeIO({ 'main.py': 'x' });
    run(io, ['main.py', '--language', 'python']);

    expect(errors).toEqual(['Unknown language "python", expected one of: lua']);
    expect(io.out).toEqual([]);
    expect(io.exitCode).toBe(2);
  });

  test('unreadable source exits with 2', () => {
    const io = fakeIO({});
    run(io, ['gone.lua']);

    expect(errors).toEqual(["ENOENT: no such file, open 'gone.lua'"]);
    expect(io.exitCode).toBe(2);
  });

  test('language file with sorted vocabulary', () => {
    const io = fakeIO({ 'pow.calc': 'let x = 2 ** 3 # pow' });
    run(io, ['pow.calc', '--config', calcPath, '--sort']);

    expect(io.out).toEqual([
      '[#000 line 1] Keyword("let")\n',
      '[#001 line 1] Identifier("x")\n',
      '[#002 line 1] Symbol("=")\n',
      '[#003 line 1] NumberLiteral("2", 2)\n',
      '[#004 line 1] Symbol("**")\n',
      '[#005 line 1] NumberLiteral("3", 3)\n',
      '[#006 line 1] Comment("# pow")\n',
    ]);
    expect(io.exitCode).toBeUndefined();
  });

  test('language file in listed order', () => {
    const io = fakeIO({ 'pow.calc': '2 ** 3' });
    run(io, ['pow.calc', '-c', calcPath]);

    expect(io.out).toEqual([
      '[#000 line 1] NumberLiteral("2", 2)\n',
      '[#001 line 1] Symbol("*")\n',
      '[#002 line 1] Symbol("*")\n',
      '[#003 line 1] NumberLiteral("3", 3)\n',
    ]);
  });

  test('missing file argument is a usage error', () => {
    const io = fakeIO({});

    expect(() => run(io, [])).toThrow("missing required argument 'file'");
    expect(io.err.join('')).toBe("error: missing required argument 'file'\n");
  });

  test('main reads node style argv', () => {
    const io = fakeIO({ 'a.lua': 'nil' });
    main(['node', 'lexer-scan', 'a.lua'], io);

    expect(io.out).toEqual(['[#000 line 1] Keyword("nil")\n']);
  });
});
