import { PassThrough, Writable } from 'node:stream';

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Command } from 'commander';

import { createShellCommand, toOptionMapping, type ShellCommandContext } from '../../src/cli/commands/shell.js';
import { createDefaultShellContext, registerShellCommands } from '../../src/cli/register/shell-command.js';
import type { CliRuntime } from '../../src/cli/runtime.js';
import { resolveProjectState } from '../../src/config/project-config.js';
import { createPlatform, type ShellSession } from '../../src/shell/bootstrap.js';
import { activeShellAgent } from '../../src/shell/shell-agent.js';
import { createCaptureLogger } from '../helpers/capture-logger.js';
import { makeTempDir, removeDir, writeComponent, writeFile } from '../helpers/temp-project.js';

function sink(): Writable {
  return new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback();
    }
  });
}

function createContext(root: string, runSession: (session: ShellSession) => Promise<void>) {
  const { logger, lines } = createCaptureLogger();
  const ctx: ShellCommandContext = {
    cwd: () => root,
    createPlatform: () =>
      createPlatform({
        streams: { input: new PassThrough(), output: sink() },
        distribution: {
          start: async (name) => ({ ok: true, node: `${name}@box` }),
          currentNode: () => 'nonode@nohost'
        },
        registrationDelayMs: 0
      }),
    createLogger: () => logger,
    loadProjectState: (rootDir) => resolveProjectState(rootDir),
    takeover: { pollIntervalMs: 5 },
    runSession,
    exit: (code) => {
      throw new Error(`exit:${code}`);
    }
  };
  return { ctx, lines };
}

describe('cli shell command', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeComponent(root, { name: 'myapp', version: '1.0.0' });
  });

  afterEach(() => {
    activeShellAgent()?.release();
    removeDir(root);
  });

  it('registers the shell command', () => {
    const program = new Command();
    const { ctx } = createContext(root, async () => {});
    registerShellCommands(program, { shell: ctx });
    expect(program.commands.some((c) => c.name() === 'shell')).toBe(true);
  });

  it('freezes the parsed options', () => {
    const mapping = toOptionMapping({ apps: 'a,b', root: '/tmp/ignored' });
    expect(mapping).toEqual({ apps: 'a,b' });
    expect(Object.isFrozen(mapping)).toBe(true);
  });

  it('boots the requested components and hands over to the session', async () => {
    const program = new Command();
    const runSession = jest.fn(async (_session: ShellSession) => {});
    const { ctx, lines } = createContext('/', runSession);
    createShellCommand(program, ctx);

    await program.parseAsync(['node', 'devshell', 'shell', '--root', root, '--apps', 'myapp', '--sname', 'dev'], {
      from: 'node'
    });

    expect(runSession).toHaveBeenCalledTimes(1);
    const session = runSession.mock.calls[0][0];
    expect(session.node).toBe('dev@box');
    expect(session.report.outcomes).toEqual([{ component: 'myapp', status: 'started' }]);
    expect(lines.error).toEqual([]);
    expect(lines.info).toEqual(['Booted myapp', 'Shell ready on dev@box: 1 started, 0 failed']);
    await session.controller.stopAll();
  });

  it('exits 1 with one error line when bootstrap fails', async () => {
    const program = new Command();
    const runSession = jest.fn(async (_session: ShellSession) => {});
    const { ctx, lines } = createContext(root, runSession);
    createShellCommand(program, ctx);

    await expect(
      program.parseAsync(['node', 'devshell', 'shell', '--name', 'a', '--sname', 'b'], { from: 'node' })
    ).rejects.toThrow('exit:1');
    expect(lines.error).toEqual(['ConfigurationError: Cannot have both short and long node names defined']);
    expect(runSession).not.toHaveBeenCalled();
  });

  it('prints the script stack when the script fails', async () => {
    writeFile(root, 'boot.js', 'exports.main = () => { throw new Error("bad script"); };\n');
    const program = new Command();
    const { ctx, lines } = createContext(root, async () => {});
    createShellCommand(program, ctx);

    await expect(program.parseAsync(['node', 'devshell', 'shell', '--script', 'boot.js'], { from: 'node' })).rejects.toThrow(
      'exit:1'
    );
    expect(lines.error).toHaveLength(2);
    expect(lines.error[0]).toBe(
      `ScriptExecutionError: Couldn't run shell script ${root}/boot.js - invoke: Error: bad script`
    );
    expect(lines.error[1]).toMatch(/^Stack: Error: bad script/);
  });

  it('exits 1 when the session fails', async () => {
    const program = new Command();
    const { ctx, lines } = createContext(root, async () => {
      throw new Error('terminal closed');
    });
    createShellCommand(program, ctx);

    await expect(program.parseAsync(['node', 'devshell', 'shell'], { from: 'node' })).rejects.toThrow('exit:1');
    expect(lines.error).toEqual(['Error: terminal closed']);
    expect(activeShellAgent()).toBeUndefined();
  });

  it('reads spinner and profile settings from the environment', () => {
    const runtime: CliRuntime = {
      writeOut: () => {},
      writeErr: () => {},
      input: new PassThrough(),
      output: new PassThrough(),
      cwd: () => root,
      env: { DEVSHELL_SPINNER: 'false', DEVSHELL_PROFILE: 'test' },
      exit: (code) => {
        throw new Error(`exit:${code}`);
      }
    };
    const ctx = createDefaultShellContext(runtime);

    expect(ctx.createSpinner).toBeUndefined();
    expect(ctx.loadProjectState(root).profile).toBe('test');
    expect(ctx.cwd()).toBe(root);
  });
});
