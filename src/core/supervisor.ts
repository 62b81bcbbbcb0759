import {ProcessExitedError, RuntimeError, StartPeriodExceededError, StratumError} from '../errors.js'
import {CommandProbe, type HealthProbe} from '../engine/health-probe.js'
import type {ManagedProcess, ProcessExit, ProcessLauncher} from '../engine/process-launcher.js'
import type {HealthState, Healthcheck, ImageDescriptor, ProcessHandle, StateTransition} from '../types.js'
import {type Clock, systemClock} from './clock.js'
import type {Reporter} from './reporter.js'

export type UnhealthyEvent = {
  image: string;
  /** Clock time the process became unhealthy. */
  at: number;
  consecutiveFailures: number;
  reason: 'retries-exhausted' | 'start-period-exceeded';
}

export type RemediationAction = 'ignore' | 'stop'

/** Decides what happens when the process turns unhealthy. */
export type RemediationPolicy = {
  onUnhealthy(event: UnhealthyEvent): RemediationAction | Promise<RemediationAction>;
}

/** Marks the process unhealthy and leaves it running. */
export const ignoreUnhealthy: RemediationPolicy = {
  onUnhealthy: () => 'ignore'
}

/** Terminates the process as soon as it turns unhealthy. */
export const stopWhenUnhealthy: RemediationPolicy = {
  onUnhealthy: () => 'stop'
}

export type SupervisorOptions = {
  image: ImageDescriptor;
  /** Host directory the entrypoint and the probe run in. */
  cwd: string;
  /** Launch-time environment; wins over the image env. */
  env?: Readonly<Record<string, string>>;
  launcher: ProcessLauncher;
  reporter: Reporter;
  /** Defaults to running the image healthcheck command. */
  probe?: HealthProbe;
  clock?: Clock;
  policy?: RemediationPolicy;
}

type ProbeOutcome =
  | {type: 'exit'; exitCode: number}
  | {type: 'timeout'}
  | {type: 'error'; error: unknown}

type Waiter = {
  state: HealthState;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Launches an image entrypoint and tracks its health.
 *
 * ```
 * Starting ──probe ok──▶ Ready ──▶ Healthy ◀──probe ok── Unhealthy
 *    │                               │                      ▲
 *    └─fail after start period───────┴──retries failures────┘
 * any state ──process exit / stop()──▶ Terminated
 * ```
 *
 * Without a healthcheck the process is Ready as soon as it has spawned.
 * Nothing is ever restarted; what happens to an unhealthy process is up to
 * the remediation policy.
 */
export class Supervisor {
  private handle: ProcessHandle = {state: 'Starting'}
  private readonly history: StateTransition[] = []
  private readonly reported: StratumError[] = []
  private readonly waiters: Waiter[] = []
  private readonly polling = new AbortController()
  private readonly clock: Clock
  private readonly policy: RemediationPolicy
  private process?: ManagedProcess
  private launching?: Promise<void>
  private signalled = false
  private started = false
  private stopped = false
  private readonly tasks: Array<Promise<void>> = []

  constructor(private readonly options: SupervisorOptions) {
    this.clock = options.clock ?? systemClock
    this.policy = options.policy ?? ignoreUnhealthy
  }

  get state(): ProcessHandle {
    return this.handle
  }

  /** Every state change so far, oldest first. */
  get transitions(): readonly StateTransition[] {
    return this.history
  }

  /** Runtime errors reported so far (start period exceeded, non-zero exit). */
  get errors(): readonly StratumError[] {
    return this.reported
  }

  get env(): Record<string, string> {
    return {...this.options.image.env, ...this.options.env}
  }

  /**
   * Launches the entrypoint and starts health polling.
   * @throws RuntimeError if the process cannot be spawned
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new StratumError('ALREADY_STARTED', `Supervisor for ${this.options.image.name} already started`)
    }

    if (this.stopped) {
      throw new StratumError('SUPERVISOR_STOPPED', `Supervisor for ${this.options.image.name} was stopped before start`)
    }

    this.started = true
    const {image, reporter} = this.options
    const command = [...image.entrypoint]
    const spawning = this.spawn(command)
    this.launching = spawning.then(() => undefined, () => undefined)
    const managed = await spawning
    reporter.emit({event: 'PROCESS_STARTED', image: image.name, command, pid: managed.pid})

    // stop() arrived while spawning
    if (this.stopped) {
      this.terminate(managed)
      this.tasks.push(managed.exited.then(exit => {
        this.onExit(exit)
      }))
      return
    }

    this.handle = {state: 'Starting', pid: managed.pid}

    this.tasks.push(managed.exited.then(exit => {
      this.onExit(exit)
    }))

    if (image.healthcheck) {
      this.tasks.push(this.pollHealth(image.healthcheck).catch((error: unknown) => {
        this.report(new RuntimeError('HEALTHCHECK_FAILED', 'Health polling stopped unexpectedly', {cause: error}))
      }))
    } else {
      this.transition({state: 'Ready', pid: managed.pid})
    }
  }

  /**
   * Cancels polling, sends SIGTERM and marks the process Terminated.
   * A process still being spawned is killed as soon as it exists.
   * Resolves once the process has exited. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (!this.stopped && this.handle.state !== 'Terminated') {
      this.stopped = true
      this.polling.abort()
      if (this.process) {
        this.terminate(this.process)
      }

      this.transition({state: 'Terminated', pid: this.handle.pid, exitCode: null, signal: 'SIGTERM'})
    }

    await this.launching
    await this.process?.exited
  }

  /**
   * Resolves when the process enters `state` (immediately if it already has).
   * Rejects if the process terminates first.
   */
  async waitFor(state: HealthState): Promise<void> {
    if (this.handle.state === state || this.history.some(t => t.to === state)) {
      return
    }

    if (this.handle.state === 'Terminated') {
      throw new RuntimeError('PROCESS_TERMINATED', `Process terminated before reaching ${state}`)
    }

    return new Promise<void>((resolve, reject) => {
      this.waiters.push({state, resolve, reject})
    })
  }

  /**
   * Resolves with the final state once the process has terminated and
   * background tasks have settled.
   */
  async wait(): Promise<Extract<ProcessHandle, {state: 'Terminated'}>> {
    await this.waitFor('Terminated')
    await Promise.all(this.tasks)
    const {handle} = this
    if (handle.state !== 'Terminated') {
      throw new RuntimeError('PROCESS_TERMINATED', 'Process state changed after termination')
    }

    return handle
  }

  private async spawn(command: string[]): Promise<ManagedProcess> {
    const {image, reporter} = this.options
    try {
      this.process = await this.options.launcher.launch({command, cwd: this.options.cwd, env: this.env}, ({stream, line}) => {
        reporter.log(image.name, stream, line)
      })
      return this.process
    } catch (error) {
      this.polling.abort()
      this.transition({state: 'Terminated', exitCode: null})
      throw new RuntimeError('LAUNCH_FAILED', `Failed to launch ${command.join(' ')}`, {cause: error})
    }
  }

  // -- Health polling --------------------------------------------------------

  private async pollHealth(healthcheck: Healthcheck): Promise<void> {
    const {signal} = this.polling
    const launchedAt = this.clock.now()
    const probe = this.options.probe ?? new CommandProbe(healthcheck.command, this.options.cwd, this.env)
    let failures = 0

    while (!signal.aborted) {
      try {
        await this.clock.sleep(healthcheck.intervalMs, signal)
      } catch (error) {
        if (signal.aborted) {
          return
        }

        throw error
      }

      const outcome = await this.runProbe(probe, healthcheck.timeoutMs)
      if (signal.aborted || this.handle.state === 'Terminated') {
        return
      }

      if (outcome.type === 'exit' && outcome.exitCode === 0) {
        failures = 0
        this.onProbeSuccess()
        continue
      }

      failures++
      this.options.reporter.emit({
        event: 'PROBE_FAILED',
        image: this.options.image.name,
        exitCode: outcome.type === 'exit' ? outcome.exitCode : undefined,
        timedOut: outcome.type === 'timeout',
        consecutiveFailures: failures
      })

      await this.onProbeFailure(healthcheck, failures, this.clock.now() - launchedAt)
    }
  }

  /**
   * Races one probe against its timeout. The loser is aborted, as is the
   * probe when the supervisor stops.
   */
  private async runProbe(probe: HealthProbe, timeoutMs: number): Promise<ProbeOutcome> {
    const controller = new AbortController()
    const onStop = () => {
      controller.abort()
    }

    this.polling.signal.addEventListener('abort', onStop, {once: true})
    try {
      return await Promise.race([
        probe.check(controller.signal).then(
          (result): ProbeOutcome => ({type: 'exit', exitCode: result.exitCode}),
          (error: unknown): ProbeOutcome => ({type: 'error', error})
        ),
        this.clock.sleep(timeoutMs, controller.signal).then(
          (): ProbeOutcome => ({type: 'timeout'}),
          (error: unknown): ProbeOutcome => ({type: 'error', error})
        )
      ])
    } finally {
      controller.abort()
      this.polling.signal.removeEventListener('abort', onStop)
    }
  }

  private onProbeSuccess(): void {
    const {pid} = this.handle
    if (this.handle.state === 'Starting') {
      this.transition({state: 'Ready', pid})
      this.transition({state: 'Healthy', pid})
    } else if (this.handle.state === 'Unhealthy') {
      this.transition({state: 'Healthy', pid})
    }
  }

  private async onProbeFailure(healthcheck: Healthcheck, failures: number, elapsedMs: number): Promise<void> {
    const {pid} = this.handle
    if (this.handle.state === 'Starting' && elapsedMs >= healthcheck.startPeriodMs) {
      this.transition({state: 'Unhealthy', pid})
      this.report(new StartPeriodExceededError(healthcheck.startPeriodMs))
      await this.remediate(failures, 'start-period-exceeded')
    } else if (this.handle.state === 'Healthy' && failures >= healthcheck.retries) {
      this.transition({state: 'Unhealthy', pid})
      await this.remediate(failures, 'retries-exhausted')
    }
  }

  private async remediate(failures: number, reason: UnhealthyEvent['reason']): Promise<void> {
    const action = await this.policy.onUnhealthy({
      image: this.options.image.name,
      at: this.clock.now(),
      consecutiveFailures: failures,
      reason
    })

    if (action === 'stop') {
      await this.stop()
    }
  }

  // -- Lifecycle -------------------------------------------------------------

  private onExit(exit: ProcessExit): void {
    const {image, reporter} = this.options
    this.polling.abort()
    reporter.emit({event: 'PROCESS_EXITED', image: image.name, exitCode: exit.exitCode, signal: exit.signal})

    if (this.stopped || this.handle.state === 'Terminated') {
      return
    }

    this.transition({state: 'Terminated', pid: this.handle.pid, exitCode: exit.exitCode, signal: exit.signal})
    if (exit.exitCode !== 0) {
      this.report(new ProcessExitedError(exit.exitCode, exit.signal))
    }
  }

  private terminate(managed: ManagedProcess): void {
    if (!this.signalled) {
      this.signalled = true
      managed.kill('SIGTERM')
    }
  }

  private report(error: StratumError): void {
    this.reported.push(error)
    this.options.reporter.emit({event: 'RUNTIME_ERROR', image: this.options.image.name, code: error.code, message: error.message})
  }

  private transition(next: ProcessHandle): void {
    const from = this.handle.state
    if (from === next.state) {
      return
    }

    const at = this.clock.now()
    this.handle = Object.freeze({...next})
    this.history.push({from, to: next.state, at})
    this.options.reporter.emit({event: 'STATE_CHANGED', image: this.options.image.name, from, to: next.state, at})

    for (const waiter of [...this.waiters]) {
      if (waiter.state === next.state) {
        waiter.resolve()
      } else if (next.state === 'Terminated') {
        waiter.reject(new RuntimeError('PROCESS_TERMINATED', `Process terminated before reaching ${waiter.state}`))
      } else {
        continue
      }

      this.waiters.splice(this.waiters.indexOf(waiter), 1)
    }
  }
}
