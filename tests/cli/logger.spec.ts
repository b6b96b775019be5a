import { describe, expect, it } from '@jest/globals';

import { createCliLogger } from '../../src/cli/logger.js';
import { createSpinner } from '../../src/cli/spinner.js';
import { createStreamHandler, LogRouter } from '../../src/platform/log-router.js';

function routerWithLines() {
  const router = new LogRouter();
  const lines: string[] = [];
  router.addHandler(createStreamHandler('simple', (text) => lines.push(text)));
  return { router, lines };
}

describe('cli logger', () => {
  it('prefixes lines with the level symbol', () => {
    const { router, lines } = routerWithLines();
    const logger = createCliLogger(router);

    logger.success('saved');
    logger.error('broken');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('✓');
    expect(lines[0].endsWith(' saved\n')).toBe(true);
    expect(lines[1]).toContain('✗');
  });

  it('drops debug lines unless enabled', () => {
    const quiet = routerWithLines();
    createCliLogger(quiet.router).debug('hidden');
    expect(quiet.lines).toEqual([]);

    const verbose = routerWithLines();
    createCliLogger(verbose.router, { debug: true }).debug('shown');
    expect(verbose.lines).toHaveLength(1);
    expect(verbose.lines[0].endsWith(' shown\n')).toBe(true);
  });
});

describe('spinner without a terminal', () => {
  it('logs plain progress lines', async () => {
    const isTTY = process.stderr.isTTY;
    process.stderr.isTTY = false;
    try {
      const lines: string[] = [];
      const spinner = await createSpinner('Booting components', { log: (line) => lines.push(line) });
      spinner.text = 'Booting myapp (1/1)';
      spinner.succeed();
      spinner.fail('myapp failed');
      spinner.stop();

      expect(spinner.text).toBe('Booting myapp (1/1)');
      expect(lines).toEqual(['... Booting components', '✓ Booting myapp (1/1)', '✗ myapp failed']);
    } finally {
      process.stderr.isTTY = isTTY;
    }
  });
});
