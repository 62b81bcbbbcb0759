import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import type {Clock} from '../core/clock.js'
import type {Reporter, StratumEvent} from '../core/reporter.js'
import {CommandRunner, type OnLogLine, type RunCommandRequest, type RunCommandResult} from '../engine/command-runner.js'
import type {HealthProbe, ProbeResult} from '../engine/health-probe.js'
import {ProcessLauncher, type LaunchRequest, type ManagedProcess, type ProcessExit} from '../engine/process-launcher.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'stratum-test-'))
}

/** Writes files (relative path → content) under `root`. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, path)), {recursive: true})
    await writeFile(join(root, path), content, 'utf8')
  }
}

/**
 * Silent reporter: all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

export type RecordedLog = {
  source: string;
  stream: 'stdout' | 'stderr';
  line: string;
}

/**
 * Returns a reporter that records events and log lines for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: StratumEvent[]; logs: RecordedLog[]} {
  const events: StratumEvent[] = []
  const logs: RecordedLog[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log(source, stream, line) {
      logs.push({source, stream, line})
    }
  }

  return {reporter, events, logs}
}

// -- Build steps -------------------------------------------------------------

/**
 * Runner that interprets a tiny script language instead of spawning a shell:
 * - `write <path> <content...>` writes a file relative to the step's cwd
 * - `fail <code>` exits with that code
 * - `hang` waits until the step is aborted
 * - anything else succeeds without side effects
 *
 * Shell-form commands (`/bin/sh -c <script>`) and exec-form commands
 * (joined with spaces) are both accepted.
 */
export class ScriptRunner extends CommandRunner {
  readonly calls: RunCommandRequest[] = []
  private markHanging: () => void = () => undefined

  /** Resolves once a `hang` step is waiting for its abort. */
  readonly hanging = new Promise<void>(resolve => {
    this.markHanging = resolve
  })

  async check(): Promise<void> {/* always available */}

  async run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult> {
    this.calls.push(request)
    const startedAt = new Date()
    const script = request.command.length === 3 && request.command[0] === '/bin/sh' ? request.command[2] : request.command.join(' ')
    const [verb, ...args] = script.split(' ')
    onLogLine({stream: 'stdout', line: `> ${script}`})

    let exitCode = 0
    let aborted = false
    switch (verb) {
      case 'write': {
        const [path, ...content] = args
        await mkdir(dirname(join(request.cwd, path)), {recursive: true})
        await writeFile(join(request.cwd, path), content.join(' '), 'utf8')
        break
      }

      case 'fail': {
        exitCode = Number(args[0])
        onLogLine({stream: 'stderr', line: `failed with ${exitCode}`})
        break
      }

      case 'hang': {
        await new Promise<void>(resolve => {
          if (request.signal?.aborted) {
            resolve()
            return
          }

          request.signal?.addEventListener('abort', () => {
            resolve()
          }, {once: true})
          this.markHanging()
        })
        exitCode = 143
        aborted = true
        break
      }

      default: {
        break
      }
    }

    return {exitCode, aborted, startedAt, finishedAt: new Date()}
  }
}

// -- Supervision -------------------------------------------------------------

/**
 * Clock whose time only moves when a sleep completes. Sleeps complete on the
 * next turn of the event loop, so minutes of virtual time pass instantly.
 */
export class VirtualClock implements Clock {
  private current = 0

  now(): number {
    return this.current
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error('aborted'))
        return
      }

      const onAbort = () => {
        clearImmediate(immediate)
        reject(new Error('aborted'))
      }

      const immediate = setImmediate(() => {
        signal?.removeEventListener('abort', onAbort)
        this.current += ms
        resolve()
      })
      signal?.addEventListener('abort', onAbort, {once: true})
    })
  }
}

/** Managed process whose exit is driven by the test. */
export class FakeProcess implements ManagedProcess {
  readonly pid = 4242
  readonly kills: string[] = []
  readonly exited: Promise<ProcessExit>
  private resolveExit: (exit: ProcessExit) => void = () => undefined

  constructor() {
    this.exited = new Promise(resolve => {
      this.resolveExit = resolve
    })
  }

  exit(exitCode: number | null, signal?: string): void {
    this.resolveExit({exitCode, signal})
  }

  kill(signal: NodeJS.Signals): void {
    this.kills.push(signal)
    this.exit(null, signal)
  }
}

export class FakeLauncher extends ProcessLauncher {
  readonly requests: LaunchRequest[] = []
  readonly process = new FakeProcess()

  async launch(request: LaunchRequest, onLogLine: OnLogLine): Promise<ManagedProcess> {
    this.requests.push(request)
    onLogLine({stream: 'stdout', line: 'listening'})
    return this.process
  }
}

export type ProbeBehavior = 'ok' | 'fail' | 'hang' | 'throw'

/**
 * Probe whose answer depends on the virtual time of the attempt.
 */
export class ScriptedProbe implements HealthProbe {
  readonly attempts: Array<{at: number; signal: AbortSignal}> = []

  constructor(
    private readonly clock: Clock,
    private readonly behavior: (now: number) => ProbeBehavior
  ) {}

  async check(signal: AbortSignal): Promise<ProbeResult> {
    const at = this.clock.now()
    this.attempts.push({at, signal})
    switch (this.behavior(at)) {
      case 'ok': {
        return {exitCode: 0}
      }

      case 'fail': {
        return {exitCode: 1}
      }

      case 'throw': {
        throw new Error('probe crashed')
      }

      case 'hang': {
        return new Promise<ProbeResult>((_resolve, reject) => {
          signal.addEventListener('abort', () => {
            reject(new Error('probe aborted'))
          }, {once: true})
        })
      }
    }
  }
}

/** Yields to the event loop until `predicate` holds. */
export async function until(predicate: () => boolean, maxTurns = 10_000): Promise<void> {
  for (let turn = 0; turn < maxTurns; turn++) {
    if (predicate()) {
      return
    }

    await new Promise<void>(resolve => {
      setImmediate(resolve)
    })
  }

  throw new Error('Condition not reached')
}
