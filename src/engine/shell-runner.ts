import process from 'node:process'
import {execa} from 'execa'
import {StratumError} from '../errors.js'
import {CommandRunner, type OnLogLine, type RunCommandRequest, type RunCommandResult} from './command-runner.js'

/**
 * Build a minimal environment for child processes.
 * Only PATH and HOME are kept from the host, so host secrets never leak into
 * build steps; the image environment is layered on top.
 */
export function childEnv(imageEnv: Readonly<Record<string, string>>): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME')) {
      env[key] = value
    }
  }

  return {...env, ...imageEnv}
}

/** The part of an execa subprocess that log streaming needs. */
export type LineSource = {
  iterable(options: {from: 'stdout' | 'stderr'}): AsyncIterable<unknown>;
}

/**
 * Stream stdout/stderr from a subprocess via iterables.
 */
export async function streamLogs(proc: LineSource, onLogLine: OnLogLine): Promise<void> {
  const stdoutDone = (async () => {
    for await (const line of proc.iterable({from: 'stdout'})) {
      onLogLine({stream: 'stdout', line: String(line)})
    }
  })()

  const stderrDone = (async () => {
    for await (const line of proc.iterable({from: 'stderr'})) {
      onLogLine({stream: 'stderr', line: String(line)})
    }
  })()

  await Promise.all([stdoutDone, stderrDone])
}

/**
 * Runs build steps as host processes whose working directory is inside the
 * staged rootfs. `STRATUM_ROOTFS` points at the rootfs root.
 */
export class HostCommandRunner extends CommandRunner {
  async check(): Promise<void> {
    try {
      await execa('sh', ['-c', 'true'], {env: childEnv({}), extendEnv: false})
    } catch (error) {
      throw new StratumError('SHELL_NOT_AVAILABLE', 'No POSIX shell available to run build steps', {cause: error})
    }
  }

  async run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult> {
    const startedAt = new Date()
    const [file, ...args] = request.command
    if (file === undefined) {
      return {exitCode: 1, aborted: false, startedAt, finishedAt: new Date(), error: 'empty command'}
    }

    try {
      const proc = execa(file, args, {
        cwd: request.cwd,
        env: childEnv({...request.env, STRATUM_ROOTFS: request.rootfs}),
        extendEnv: false,
        reject: false,
        timeout: request.timeoutMs,
        cancelSignal: request.signal,
        forceKillAfterDelay: 5000
      })

      await streamLogs(proc, onLogLine)
      const result = await proc
      return {
        exitCode: result.exitCode ?? (result.timedOut ? 124 : 127),
        aborted: result.isCanceled,
        startedAt,
        finishedAt: new Date(),
        error: result.failed && 'shortMessage' in result ? String(result.shortMessage) : undefined
      }
    } catch (error_) {
      return {
        exitCode: 1,
        aborted: request.signal?.aborted ?? false,
        startedAt,
        finishedAt: new Date(),
        error: error_ instanceof Error ? error_.message : String(error_)
      }
    }
  }
}
