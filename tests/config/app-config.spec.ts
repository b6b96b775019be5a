import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';

import {
  applyConfig,
  consultConfig,
  parseConfigTerms,
  rereadConfig,
  type SettingsTarget
} from '../../src/config/app-config.js';
import { parseProjectConfig } from '../../src/config/project-config.js';
import type { ShellInputs } from '../../src/config/shell-config.js';
import { makeTempDir, removeDir, writeFile } from '../helpers/temp-project.js';

function recordingTarget() {
  const setEnv = jest.fn<SettingsTarget['setEnv']>();
  const target: SettingsTarget = { setEnv };
  return { target, setEnv };
}

describe('app config', () => {
  describe('parseConfigTerms', () => {
    it('reads component settings', () => {
      expect(parseConfigTerms('[{myapp,[{key,1},{name,"dev"}]}].')).toEqual([
        { component: 'myapp', settings: [['key', 1], ['name', 'dev']] }
      ]);
    });

    it('treats empty, empty-list and non-list text as no configuration', () => {
      expect(parseConfigTerms('')).toBeUndefined();
      expect(parseConfigTerms('[].')).toBeUndefined();
      expect(parseConfigTerms('{myapp, [{key, 1}]}.')).toBeUndefined();
    });

    it('skips malformed entries', () => {
      const text = '[{a,[{k,1}, bad, {x,y,z}]}, notatuple, {b, notalist}].';
      expect(parseConfigTerms(text)).toEqual([{ component: 'a', settings: [['k', 1]] }]);
    });

    it('honors only the first term', () => {
      expect(parseConfigTerms('[{a,[{k,1}]}]. [{b,[{k,2}]}].')).toEqual([{ component: 'a', settings: [['k', 1]] }]);
    });
  });

  describe('files', () => {
    let root: string;

    beforeEach(() => {
      root = makeTempDir();
    });

    afterEach(() => {
      removeDir(root);
    });

    it('returns nothing for an absent file', () => {
      const debug: string[] = [];
      expect(consultConfig(`${root}/missing.config`, (m) => debug.push(m))).toBeUndefined();
      expect(debug[1]).toMatch(/^No configuration read from .*missing\.config/);
    });

    it('returns nothing for a malformed file', () => {
      const file = writeFile(root, 'bad.config', '[{myapp, [{key, 1}');
      const debug: string[] = [];
      expect(consultConfig(file, (m) => debug.push(m))).toBeUndefined();
      expect(debug[1]).toBe(`Ignoring malformed configuration ${file}: expected ']' before end of input at line 1, column 19`);
    });

    it('applies the configured file relative to the project root', () => {
      writeFile(root, 'config/shell.config', '[{myapp,[{key,1}]}].\n');
      const inputs: ShellInputs = {
        options: { config: 'config/shell.config' },
        project: parseProjectConfig({}, 'test')
      };
      const { target, setEnv } = recordingTarget();

      expect(rereadConfig(target, inputs, root)).toBe(1);
      expect(setEnv).toHaveBeenCalledTimes(1);
      expect(setEnv).toHaveBeenCalledWith('myapp', 'key', 1);
    });

    it('applies nothing when no source names a file', () => {
      const inputs: ShellInputs = { options: {}, project: parseProjectConfig({}, 'test') };
      const { target, setEnv } = recordingTarget();
      expect(rereadConfig(target, inputs, root)).toBeUndefined();
      expect(setEnv).not.toHaveBeenCalled();
    });
  });

  it('counts every applied setting', () => {
    const { target, setEnv } = recordingTarget();
    const count = applyConfig(target, [
      { component: 'a', settings: [['x', 1], ['y', true]] },
      { component: 'b', settings: [] }
    ]);
    expect(count).toBe(2);
    expect(setEnv.mock.calls).toEqual([
      ['a', 'x', 1],
      ['a', 'y', true]
    ]);
  });
});
