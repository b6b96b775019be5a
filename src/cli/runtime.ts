export type CliRuntime = {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  cwd: () => string;
  env: NodeJS.ProcessEnv;
  exit: (code: number) => never;
};

export function createNodeRuntime(): CliRuntime {
  return {
    writeOut: (text: string) => {
      process.stdout.write(text);
    },
    writeErr: (text: string) => {
      process.stderr.write(text);
    },
    input: process.stdin,
    output: process.stdout,
    cwd: () => process.cwd(),
    env: process.env,
    exit: (code: number) => process.exit(code)
  };
}
