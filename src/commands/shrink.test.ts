import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as path from 'path';
import { shrinkCommand } from './shrink';
import { createFakeGhostscript, SHRUNK_CONTENT } from '../../tests/mocks/process-executor.mock';
import {
  createWorkspace,
  removeWorkspace,
  writePdf,
  exists,
  readText,
} from '../../tests/fixtures/pdf-files';

const config = { ghostscriptBinary: 'gs' };

describe('shrinkCommand', () => {
  let workspace: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    workspace = await createWorkspace();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await removeWorkspace(workspace);
  });

  it('should return 0 when every file is shrunk', async () => {
    const a = await writePdf(workspace, 'a.pdf');
    const b = await writePdf(workspace, 'b.pdf');
    const executor = createFakeGhostscript();

    const code = await shrinkCommand([a, b], {}, { executor, config });

    expect(code).toBe(0);
    expect(await readText(path.join(workspace, 'a.shrunk.pdf'))).toBe(SHRUNK_CONTENT);
    expect(await readText(path.join(workspace, 'b.shrunk.pdf'))).toBe(SHRUNK_CONTENT);
    expect(logSpy).toHaveBeenCalledWith('✅ Shrunk 2 files');
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should return 1 and summarize when one file fails', async () => {
    const a = await writePdf(workspace, 'a.pdf');
    const b = await writePdf(workspace, 'b.pdf');
    const out = path.join(workspace, 'out');
    const executor = createFakeGhostscript({ failFor: ['a.pdf'] });

    const code = await shrinkCommand([a, b], { subdir: out }, { executor, config });

    expect(code).toBe(1);
    expect(executor.run).toHaveBeenCalledTimes(2);
    expect(await readText(path.join(out, 'b.pdf'))).toBe(SHRUNK_CONTENT);
    expect(await exists(path.join(out, 'a.pdf'))).toBe(false);

    expect(logSpy).toHaveBeenCalledWith('✅ Shrunk 1 file');
    expect(errorSpy).toHaveBeenCalledWith('❌ 1 of 2 files failed:');

    const table = errorSpy.mock.calls
      .map((call) => String(call[0]))
      .find((line) => line.includes('DETAILS'));
    expect(table).toBeDefined();
    expect(table).toContain(a);
    expect(table).toContain('engine-exit');
    expect(table).toContain('gs exited with code 1');
  });

  it('should reject combined placement flags before processing any file', async () => {
    const a = await writePdf(workspace, 'a.pdf');
    const out = path.join(workspace, 'out');
    const executor = createFakeGhostscript();

    await expect(
      shrinkCommand([a], { inplace: true, subdir: out }, { executor, config })
    ).rejects.toThrow('Options --inplace, --subdir cannot be used together.');

    expect(executor.run).not.toHaveBeenCalled();
    expect(await exists(out)).toBe(false);
    expect(await exists(path.join(workspace, 'a.shrunk.pdf'))).toBe(false);
  });

  it('should return 1 when an input is missing', async () => {
    const missing = path.join(workspace, 'missing.pdf');
    const executor = createFakeGhostscript();

    const code = await shrinkCommand([missing], {}, { executor, config });

    expect(code).toBe(1);
    expect(executor.run).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('❌ 1 of 1 file failed:');
  });

  it('should only print commands on a dry run', async () => {
    const a = await writePdf(workspace, 'a.pdf');
    const executor = createFakeGhostscript();

    const code = await shrinkCommand([a], { dryRun: true, inplace: true }, { executor, config });

    expect(code).toBe(0);
    expect(executor.run).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0][0])).toMatch(/^gs -q /);
  });

  it('should pass the configured binary to the executor', async () => {
    const a = await writePdf(workspace, 'a.pdf');
    const executor = createFakeGhostscript();

    await shrinkCommand([a], {}, { executor, config: { ghostscriptBinary: 'gswin64c' } });

    expect(executor.run.mock.calls[0][0]).toBe('gswin64c');
  });

  it('should dump the parsed options with --debug', async () => {
    const a = await writePdf(workspace, 'a.pdf');
    const executor = createFakeGhostscript();

    await shrinkCommand([a], { subdir: 'out', debug: true, dryRun: true }, { executor, config });

    expect(errorSpy).toHaveBeenCalledWith('output mode: subdir = out');
    expect(errorSpy).toHaveBeenCalledWith('ghostscript: gs');
    expect(errorSpy).toHaveBeenCalledWith('log level: info');
  });

  it('should show the level picked from -vv in the --debug dump', async () => {
    const a = await writePdf(workspace, 'a.pdf');

    await shrinkCommand(
      [a],
      { verbose: 2, debug: true, dryRun: true },
      { executor: createFakeGhostscript(), config }
    );

    expect(errorSpy).toHaveBeenCalledWith('log level: trace');
  });
});
