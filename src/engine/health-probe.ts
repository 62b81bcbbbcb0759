import {execa} from 'execa'
import {childEnv} from './shell-runner.js'

export type ProbeResult = {
  exitCode: number;
}

/**
 * Runs one healthcheck attempt. Exit code 0 means healthy.
 * Aborting `signal` must stop the attempt (the supervisor aborts on timeout).
 */
export type HealthProbe = {
  check(signal: AbortSignal): Promise<ProbeResult>;
}

/**
 * Probe that runs the healthcheck command in the image working directory
 * with the image environment.
 */
export class CommandProbe implements HealthProbe {
  constructor(
    private readonly command: readonly string[],
    private readonly cwd: string,
    private readonly env: Readonly<Record<string, string>>
  ) {}

  async check(signal: AbortSignal): Promise<ProbeResult> {
    const [file, ...args] = this.command
    const result = await execa(file, args, {
      cwd: this.cwd,
      env: childEnv(this.env),
      extendEnv: false,
      reject: false,
      cancelSignal: signal,
      forceKillAfterDelay: 1000,
      stdin: 'ignore',
      stdout: 'ignore',
      stderr: 'ignore'
    })

    return {exitCode: result.exitCode ?? 1}
  }
}
