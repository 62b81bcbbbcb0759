import {execa} from 'execa'
import type {OnLogLine} from './command-runner.js'
import {childEnv, streamLogs} from './shell-runner.js'

export type LaunchRequest = {
  command: readonly string[];
  cwd: string;
  /** Image env merged with launch-time overrides. */
  env: Readonly<Record<string, string>>;
}

export type ProcessExit = {
  /** `null` when the process was killed by a signal. */
  exitCode: number | null;
  signal?: string;
}

/** A running entrypoint process. */
export type ManagedProcess = {
  readonly pid?: number;
  /** Settles once, when the process has exited (never rejects). */
  readonly exited: Promise<ProcessExit>;
  kill(signal: NodeJS.Signals): void;
}

/**
 * Starts the image entrypoint.
 *
 * Implementations:
 * - `ExecaProcessLauncher`: host process via execa
 * - Tests use in-process fakes with a controllable exit
 */
export abstract class ProcessLauncher {
  /**
   * @throws If the process cannot be spawned
   */
  abstract launch(request: LaunchRequest, onLogLine: OnLogLine): Promise<ManagedProcess>
}

export class ExecaProcessLauncher extends ProcessLauncher {
  async launch(request: LaunchRequest, onLogLine: OnLogLine): Promise<ManagedProcess> {
    const [file, ...args] = request.command
    const proc = execa(file, args, {
      cwd: request.cwd,
      env: childEnv(request.env),
      extendEnv: false,
      reject: false,
      forceKillAfterDelay: 10_000
    })

    // Spawn failures surface here rather than as an exit code
    await new Promise<void>((resolve, reject) => {
      proc.once('spawn', () => {
        resolve()
      })
      proc.once('error', reject)
    })

    const exited = (async (): Promise<ProcessExit> => {
      await streamLogs(proc, onLogLine)
      const result = await proc
      return {exitCode: result.exitCode ?? null, signal: result.signal}
    })()

    return {
      pid: proc.pid,
      exited,
      kill(signal) {
        proc.kill(signal)
      }
    }
  }
}
