/**
 * Process-level effects the commands need, kept behind an interface so the
 * commands can run inside tests.
 */
export interface CliRuntime {
  env: NodeJS.ProcessEnv;
  setExitCode(code: number): void;
  /** Registers a Ctrl-C handler and returns a function that removes it */
  onInterrupt(handler: () => void): () => void;
}

export const processRuntime: CliRuntime = {
  env: process.env,
  setExitCode(code) {
    process.exitCode = code;
  },
  onInterrupt(handler) {
    process.on('SIGINT', handler);
    return () => {
      process.off('SIGINT', handler);
    };
  },
};
