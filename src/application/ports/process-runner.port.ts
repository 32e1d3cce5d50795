export type CapturedOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export interface ProcessRunnerPort {
  /**
   * Runs a command with inherited stdio. Rejects on a non-zero exit.
   */
  run(command: string, args: string[]): Promise<void>;
  /**
   * Runs a command and collects its output. Resolves with the exit code
   * instead of rejecting on a non-zero exit.
   */
  capture(command: string, args: string[]): Promise<CapturedOutput>;
}
