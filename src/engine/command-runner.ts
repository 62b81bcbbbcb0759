/**
 * Log line from a build step.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Request to run one `run` instruction against a staged rootfs.
 */
export type RunCommandRequest = {
  /** Command and arguments (exec form) */
  command: readonly string[];
  /** Host directory the rootfs lives in */
  rootfs: string;
  /** Working directory on the host (inside `rootfs`) */
  cwd: string;
  /** Image environment at this step */
  env: Readonly<Record<string, string>>;
  /** Execution timeout in milliseconds (undefined = no timeout) */
  timeoutMs?: number;
  /** Aborts the command (the process is killed) */
  signal?: AbortSignal;
}

/**
 * Result of a command execution.
 */
export type RunCommandResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** True when the command was cancelled through its signal */
  aborted: boolean;
  startedAt: Date;
  finishedAt: Date;
  /** Error message if the command could not run or was killed */
  error?: string;
}

/**
 * Abstract interface for executing build steps.
 *
 * Implementations:
 * - `HostCommandRunner`: runs the command on the host, with the staged rootfs as working tree
 * - Tests use in-process fakes that write into `cwd` directly
 */
export abstract class CommandRunner {
  /**
   * Verifies that the runner is available and functional.
   * @throws If the runner cannot execute commands
   */
  abstract check(): Promise<void>

  /**
   * Executes a command.
   * @param request - Command, rootfs, cwd, env and cancellation
   * @param onLogLine - Callback for real-time stdout/stderr logs
   */
  abstract run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult>
}
