import { describe, it, expect } from 'vitest';
import { runProcess, spawnExecutor } from './process-utils';

describe('runProcess()', () => {
  it('should collect stdout, stderr and the exit code', async () => {
    const result = await runProcess(process.execPath, [
      '-e',
      "process.stdout.write('o');process.stderr.write('e');process.exit(3)",
    ]);

    expect(result).toEqual({ exitCode: 3, signal: null, stdout: 'o', stderr: 'e' });
  });

  it('should report the signal when the program is killed', async () => {
    const result = await runProcess(process.execPath, ['-e', "process.kill(process.pid, 'SIGTERM')"]);

    expect(result.exitCode).toBeNull();
    expect(result.signal).toBe('SIGTERM');
  });

  it('should reject when the program does not exist', async () => {
    await expect(runProcess('pdfshrink-test-missing-binary', ['-q'])).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});

describe('spawnExecutor', () => {
  it('should run through runProcess', () => {
    expect(spawnExecutor.run).toBe(runProcess);
  });
});
