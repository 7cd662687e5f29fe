/**
 * Process-facing side effects for commands, swappable in tests.
 */
export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
  /** Record the process exit code; does not terminate immediately. */
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => {
    process.stdout.write(`${message}\n`);
  },
  error: (message) => {
    process.stderr.write(`${message}\n`);
  },
  exit: (code) => {
    process.exitCode = code;
  },
};
