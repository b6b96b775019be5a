import { PassThrough } from 'node:stream';

import { describe, expect, it } from '@jest/globals';

import { runCli } from '../../src/cli/main.js';
import type { CliRuntime } from '../../src/cli/runtime.js';

function createCaptureRuntime() {
  const out: string[] = [];
  const err: string[] = [];
  const runtime: CliRuntime = {
    writeOut: (text: string) => out.push(text),
    writeErr: (text: string) => err.push(text),
    input: new PassThrough(),
    output: new PassThrough(),
    cwd: () => '/',
    env: {},
    exit: (code) => {
      throw new Error(`exit:${code}`);
    }
  };
  return {
    runtime,
    getStdout: () => out.join(''),
    getStderr: () => err.join('')
  };
}

describe('cli smoke', () => {
  it('--help returns 0 and prints help', async () => {
    const cap = createCaptureRuntime();
    const code = await runCli(['node', 'devshell', '--help'], {
      pkgName: 'devshell',
      cliVersion: '0.0.0-test',
      runtime: cap.runtime
    });
    expect(code).toBe(0);
    expect(cap.getStdout()).toContain('interactive development shell with project components preloaded');
    expect(cap.getStdout()).toContain('shell [options]');
    expect(cap.getStderr()).toBe('');
  });

  it('--version prints the version', async () => {
    const cap = createCaptureRuntime();
    const code = await runCli(['node', 'devshell', '--version'], {
      pkgName: 'devshell',
      cliVersion: '0.0.0-test',
      runtime: cap.runtime
    });
    expect(code).toBe(0);
    expect(cap.getStdout()).toBe('0.0.0-test\n');
  });

  it('unknown command returns non-zero and prints error', async () => {
    const cap = createCaptureRuntime();
    const code = await runCli(['node', 'devshell', 'definitely-not-a-command'], {
      pkgName: 'devshell',
      cliVersion: '0.0.0-test',
      runtime: cap.runtime
    });
    expect(code).toBeGreaterThan(0);
    expect(cap.getStderr().toLowerCase()).toContain('unknown command');
  });
});
