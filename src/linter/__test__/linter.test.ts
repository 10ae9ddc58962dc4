/**
 * Linter tests
 *
 * Runs real files from a temporary directory with fake external checks and
 * colors turned off, then inspects the written output and the log stream.
 */
import chalk from 'chalk';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { Linter, render_config } from '../linter';
import { LogChannel, LogManager, consume_logs } from '../../runner';
import { REQUIRED_LINES, sbuild } from '../../__test__/fixtures';
import type { ExternalChecks, LintOptions, LogMessage } from '../../types';

const plain = new chalk.Instance({ level: 0 });

const DEFAULTS: LintOptions = { inplace: false, shellcheck: false, pkgver: false };

function fake_checks(overrides: Partial<ExternalChecks> = {}): ExternalChecks {
  return {
    shellcheck: vi.fn<ExternalChecks['shellcheck']>(async () => ({ ok: true, output: '' })),
    pkgver: vi.fn<ExternalChecks['pkgver']>(async () => ' 1.0.0\n'),
    ...overrides,
  };
}

function setup(options: Partial<LintOptions> = {}, checks: ExternalChecks = fake_checks()) {
  const channel = new LogChannel();
  const log = new LogManager(channel);
  const linter = new Linter(log.create_logger(), { ...DEFAULTS, ...options }, checks, plain);
  const logs = async (): Promise<string[]> => {
    const out: string[] = [];
    log.done();
    await consume_logs(channel, (m: Exclude<LogMessage, { kind: 'done' }>) => out.push(`${m.kind}:${m.message}`), true);
    return out;
  };
  return { linter, logs };
}

describe('Linter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sbuild-lint-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const file = join(dir, name);
    await writeFile(file, content, 'utf8');
    return file;
  }

  it('should write the validated document beside the source', async () => {
    const file = await write('demo.SBUILD', sbuild(...REQUIRED_LINES, 'foobar: 1'));
    const { linter, logs } = setup();

    const config = await linter.lint(file);

    expect(config?.get('pkg')).toBe('demo');
    const written = await readFile(`${file}.validated`, 'utf8');
    expect(written.startsWith('#!/SBUILD\n_disabled: false\npkg: demo\npkg_id: github.com.example.demo\n')).toBe(true);
    expect(written).not.toContain('foobar');

    const lines = await logs();
    expect(lines[0]).toBe(`info:Linting ${file}`);
    expect(lines).toContain("warn:foobar -> 'foobar' is not a valid field.");
    expect(lines).toContain('custom_error:1 warning(s) found during deserialization');
    expect(lines[lines.length - 1]).toBe(`success:${file}: SBUILD validation successful`);
  });

  it('should overwrite the source in place', async () => {
    const file = await write('demo.SBUILD', sbuild(...REQUIRED_LINES));
    const { linter } = setup({ inplace: true });

    const config = await linter.lint(file);

    expect(config).not.toBeNull();
    if (!config) return;
    expect(await readFile(file, 'utf8')).toBe(render_config(config));
  });

  it('should reject a file without the marker', async () => {
    const file = await write('demo.yaml', REQUIRED_LINES.join('\n'));
    const { linter, logs } = setup();

    expect(await linter.lint(file)).toBeNull();
    expect(await logs()).toContain(`error:${file}: file must start with '#!/SBUILD'`);
  });

  it('should report an unreadable file', async () => {
    const file = join(dir, 'missing.SBUILD');
    const { linter, logs } = setup();

    expect(await linter.lint(file)).toBeNull();
    const lines = await logs();
    expect(lines[1].startsWith(`error:Failed to read ${file}: `)).toBe(true);
  });

  it('should report invalid YAML', async () => {
    const file = await write('bad.SBUILD', '#!/SBUILD\npkg: "unterminated\n');
    const { linter, logs } = setup();

    expect(await linter.lint(file)).toBeNull();
    const lines = await logs();
    expect(lines[1].startsWith(`error:${file}: invalid YAML`)).toBe(true);
  });

  it('should log diagnostics with an excerpt and fail', async () => {
    const file = await write('dup.SBUILD', sbuild(...REQUIRED_LINES, 'pkg: "other"'));
    const { linter, logs } = setup();

    expect(await linter.lint(file)).toBeNull();
    const lines = await logs();
    expect(lines).toEqual([
      `info:Linting ${file}`,
      "error:pkg -> 'pkg' field is duplicated",
      'custom_error:' + ['    15 |   run: "echo building"', '  > 16 | pkg: "other"', '    17 | '].join('\n'),
      `error:${file}: 1 error(s) found during deserialization.`,
    ]);
  });

  it('should fail when shellcheck reports issues', async () => {
    const file = await write('demo.SBUILD', sbuild(...REQUIRED_LINES));
    const checks = fake_checks({
      shellcheck: vi.fn<ExternalChecks['shellcheck']>(async () => ({ ok: false, output: 'SC2086: quote this' })),
    });
    const { linter, logs } = setup({ shellcheck: true }, checks);

    expect(await linter.lint(file)).toBeNull();
    expect(checks.shellcheck).toHaveBeenCalledWith('echo building', 'sh', expect.any(AbortSignal));
    const lines = await logs();
    expect(lines.slice(-2)).toEqual([
      `error:${file}: shellcheck reported issues in x_exec.run`,
      'custom_error:SC2086: quote this',
    ]);
  });

  it('should write the trimmed version in pkgver mode', async () => {
    const file = await write('demo.SBUILD', sbuild(...REQUIRED_LINES));
    const checks = fake_checks();
    const { linter, logs } = setup({ pkgver: true }, checks);

    expect(await linter.lint(file)).not.toBeNull();
    expect(checks.pkgver).toHaveBeenCalledWith('echo 1.0.0', 'sh', expect.any(AbortSignal));
    expect(await readFile(`${file}.pkgver`, 'utf8')).toBe('1.0.0\n');
    expect(await logs()).toContain(`info:${file}: pkgver 1.0.0`);
  });

  it('should fail pkgver mode on empty output', async () => {
    const file = await write('demo.SBUILD', sbuild(...REQUIRED_LINES));
    const checks = fake_checks({ pkgver: vi.fn<ExternalChecks['pkgver']>(async () => '  \n') });
    const { linter, logs } = setup({ pkgver: true }, checks);

    expect(await linter.lint(file)).toBeNull();
    expect(await logs()).toContain(`error:${file}: pkgver script printed nothing`);
  });
});
