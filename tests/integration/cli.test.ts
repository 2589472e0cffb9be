/**
 * Integration tests for the CLI.
 *
 * Runs the CLI in-process against real files in a temporary directory and
 * against stdin streams.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rm, writeFile, mkdir } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCli } from '../../src/cli/app.js';
import { readStream } from '../../src/cli/input.js';
import type { CliIo } from '../../src/cli/types.js';
import { withErrorHandling } from '../../src/cli/utils/errorHandling.js';

const CARGO = `
[package]
name = "tomlraider"
version = "1.0.0"
authors = ["Ada", "Grace"]

[dependencies]
serde = { version = "1.0", features = ["derive"] }
`;

const PYPROJECT = `
[project]
name = "example"
version = "0.4.2"

[tool.pdm.dev-dependencies]
dev = ["ruff", "pre-commit"]

[tool.example]
strict = true
`;

describe('CLI Integration Tests', () => {
  let testDir: string;
  let out: string[];
  let err: string[];

  function createIo(stdin: Iterable<string> = []): CliIo {
    return {
      stdout: (text) => void out.push(text),
      stderr: (text) => void err.push(text),
      readStdin: () => readStream(Readable.from(stdin)),
    };
  }

  async function run(
    argv: string[],
    options: { env?: Record<string, string>; stdin?: Iterable<string> } = {}
  ): Promise<number> {
    const result = await runCli(argv, {
      env: options.env ?? {},
      cwd: testDir,
      io: createIo(options.stdin),
    });
    return result.exitCode;
  }

  beforeEach(async () => {
    testDir = join(tmpdir(), `tomlraider-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'Cargo.toml'), CARGO);
    await writeFile(join(testDir, 'pyproject.toml'), PYPROJECT);
    out = [];
    err = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('--file', () => {
    it('reads a property from a file relative to the working directory', async () => {
      expect(await run(['-f', 'Cargo.toml', 'package.version'])).toBe(0);
      expect(out).toEqual(['1.0.0\n']);
      expect(err).toEqual(['tomlraider: Reading property package.version from Cargo.toml...\n']);
    });

    it('reads an absolute path', async () => {
      expect(await run(['-q', '--file', join(testDir, 'Cargo.toml'), 'package.authors[1]'])).toBe(
        0
      );
      expect(out).toEqual(['Grace\n']);
    });

    it('renders tables as inline TOML and JSON', async () => {
      await run(['-q', '-f', 'Cargo.toml', 'dependencies.serde']);
      await run(['-q', '-j', '-f', 'Cargo.toml', 'dependencies.serde']);
      expect(out).toEqual([
        '{ version = "1.0", features = ["derive"] }\n',
        '{"version":"1.0","features":["derive"]}\n',
      ]);
    });

    it('renders arrays as words in shell format', async () => {
      await run(['-q', '-s', '-f', 'Cargo.toml', 'package.authors']);
      expect(out).toEqual(['Ada Grace\n']);
    });

    it('exits 1 for a missing file', async () => {
      expect(await run(['-f', 'missing.toml', 'a'])).toBe(1);
      expect(err).toEqual([
        'tomlraider: Reading property a from missing.toml...\n',
        'tomlraider: File not found: missing.toml\n',
      ]);
      expect(out).toEqual([]);
    });

    it('exits 1 when the path is a directory', async () => {
      await mkdir(join(testDir, 'conf.toml'));
      expect(await run(['-q', '-f', 'conf.toml', 'a'])).toBe(1);
    });

    it('exits 2 for a file that is not valid TOML', async () => {
      await writeFile(join(testDir, 'bad.toml'), '[package\nname = 1\n');
      expect(await run(['-f', 'bad.toml', 'package.name'])).toBe(2);
      expect(err[1]).toMatch(/^tomlraider: error decoding bad\.toml, Invalid TOML syntax: /);
    });
  });

  describe('--pyproject', () => {
    it('reads pyproject.toml from the working directory', async () => {
      expect(await run(['-p', 'tool.pdm.dev-dependencies.dev[1]'])).toBe(0);
      expect(out).toEqual(['pre-commit\n']);
      expect(err).toEqual([
        'tomlraider: Reading property tool.pdm.dev-dependencies.dev[1] from pyproject.toml...\n',
      ]);
    });

    it('reads pyproject.toml from MESON_SOURCE_ROOT', async () => {
      const root = join(testDir, 'meson-root');
      await mkdir(root);
      await writeFile(join(root, 'pyproject.toml'), '[project]\nversion = "9.9.9"\n');

      expect(await run(['-q', '-p', 'project.version'], { env: { MESON_SOURCE_ROOT: root } })).toBe(
        0
      );
      expect(out).toEqual(['9.9.9\n']);
    });

    it('exits 1 when pyproject.toml is missing', async () => {
      const empty = join(testDir, 'empty');
      await mkdir(empty);

      expect(await run(['-p', 'project.name'], { env: { MESON_SOURCE_ROOT: empty } })).toBe(1);
      expect(err[1]).toBe('tomlraider: <pyproject.toml> file not found\n');
    });

    it('prints booleans as 1 in shell format', async () => {
      await run(['-q', '-s', '-p', 'tool.example.strict']);
      expect(out).toEqual(['1\n']);
    });
  });

  describe('stdin', () => {
    it('reads the document from stdin in chunks', async () => {
      const chunks = ['[package]\nname = "toml', 'raider"\nversion = "1.0.0"\n'];
      expect(await run(['-q', 'package.name'], { stdin: chunks })).toBe(0);
      expect(out).toEqual(['tomlraider\n']);
    });

    it('reads stdin for -f -', async () => {
      expect(await run(['-f', '-', 'package.version'], { stdin: [CARGO] })).toBe(0);
      expect(err).toEqual(['tomlraider: Reading property package.version from stdin...\n']);
    });
  });

  describe('exit codes', () => {
    it.each<[string, number]>([
      ['package.version', 0],
      ['package..version', 3],
      ['package.name.first', 4],
      ['package.license', 5],
      ['package.authors[2]', 6],
    ])('exits for %s with %i', async (property, code) => {
      expect(await run(['-q', '-f', 'Cargo.toml', property])).toBe(code);
    });

    it('uses the same codes in --exists mode without output', async () => {
      expect(await run(['-e', '-q', '-f', 'Cargo.toml', 'package.authors[0]'])).toBe(0);
      expect(await run(['-e', '-q', '-f', 'Cargo.toml', 'package.authors[9]'])).toBe(6);
      expect(out).toEqual([]);
    });
  });

  describe('withErrorHandling', () => {
    let originalExitCode: typeof process.exitCode;

    beforeEach(() => {
      originalExitCode = process.exitCode;
    });

    afterEach(() => {
      process.exitCode = originalExitCode;
    });

    it('sets the process exit code from the command result', async () => {
      await withErrorHandling(() => runCli(['-q', '-f', 'Cargo.toml', 'nope'], {
        env: {},
        cwd: testDir,
        io: createIo(),
      }));
      expect(process.exitCode).toBe(5);
    });

    it('prints unexpected errors and sets exit code 1', async () => {
      const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      await withErrorHandling(() => {
        throw new TypeError('boom');
      });

      expect(process.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith('tomlraider: boom');
    });
  });
});
