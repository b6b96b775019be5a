import ora from 'ora';

export type Spinner = {
  start(text?: string): Spinner;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  info(text?: string): void;
  stop(): void;
  text: string;
};

/**
 * An animated spinner on a terminal; plain lines through `log` elsewhere.
 */
export async function createSpinner(text: string, options: { log?: (line: string) => void } = {}): Promise<Spinner> {
  if (process.stderr.isTTY) {
    const instance = ora({ text, stream: process.stderr });
    instance.start(text);
    return instance;
  }

  let currentText = text;
  const write = options.log ?? ((line: string) => console.log(line));
  const log = (prefix: string, msg?: string) => {
    const message = msg ?? currentText;
    if (!message) {
      return;
    }
    write(`${prefix} ${message}`);
  };

  const stub: Spinner = {
    start(msg?: string) {
      if (msg) {
        currentText = msg;
      }
      log('...', msg);
      return stub;
    },
    succeed(msg?: string) {
      log('✓', msg);
    },
    fail(msg?: string) {
      log('✗', msg);
    },
    warn(msg?: string) {
      log('⚠', msg);
    },
    info(msg?: string) {
      log('ℹ', msg);
    },
    stop() {
      /* no-op */
    },
    get text() {
      return currentText;
    },
    set text(value: string) {
      currentText = value;
    }
  };

  return stub.start(text);
}
