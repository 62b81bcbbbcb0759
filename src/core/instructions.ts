import {ValidationError} from '../errors.js'
import type {Healthcheck, Instruction} from '../types.js'
import {parseDuration} from './utils.js'

export const defaultHealthcheck = {
  intervalMs: 30_000,
  timeoutMs: 30_000,
  startPeriodMs: 0,
  retries: 3
} as const

export type HealthcheckOptions = {
  interval?: string | number;
  timeout?: string | number;
  startPeriod?: string | number;
  retries?: string | number;
}

/** Shell-form command, run through `/bin/sh -c`. */
export function shellCommand(script: string): string[] {
  return ['/bin/sh', '-c', script]
}

/**
 * Builds a frozen healthcheck. Only types are checked here; positivity is
 * enforced by the assembler so that it can report the owning stage.
 */
export function createHealthcheck(command: readonly string[], options: HealthcheckOptions = {}): Healthcheck {
  if (command.length === 0) {
    throw new ValidationError('Healthcheck command must not be empty')
  }

  const retries = options.retries === undefined ? defaultHealthcheck.retries : Number(options.retries)
  if (!Number.isInteger(retries)) {
    throw new ValidationError(`Healthcheck retries must be an integer, got "${options.retries}"`)
  }

  return Object.freeze({
    command: Object.freeze([...command]),
    intervalMs: options.interval === undefined ? defaultHealthcheck.intervalMs : parseDuration(options.interval),
    timeoutMs: options.timeout === undefined ? defaultHealthcheck.timeoutMs : parseDuration(options.timeout),
    startPeriodMs: options.startPeriod === undefined ? defaultHealthcheck.startPeriodMs : parseDuration(options.startPeriod),
    retries
  })
}

/**
 * Parses `8001`, `"8001"` or `"8001/tcp"`.
 * @throws ValidationError for anything outside 1-65535
 */
export function parsePort(value: unknown): number {
  const text = typeof value === 'number' ? String(value) : (typeof value === 'string' ? value.trim() : '')
  const match = /^(\d+)(?:\/(tcp|udp))?$/i.exec(text)
  const port = match ? Number(match[1]) : Number.NaN
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new ValidationError(`Invalid port: ${JSON.stringify(value)}`)
  }

  return port
}

/** Deep-freezes an instruction so it cannot change after parsing. */
export function freezeInstruction<T extends Instruction>(instruction: T): T {
  for (const value of Object.values(instruction)) {
    if (Array.isArray(value)) {
      Object.freeze(value)
    }
  }

  return Object.freeze(instruction)
}

/** One-line display form, Dockerfile-style. */
export function describeInstruction(instruction: Instruction): string {
  switch (instruction.kind) {
    case 'env': {
      return `ENV ${instruction.name}=${instruction.value}`
    }

    case 'run': {
      return `RUN ${displayCommand(instruction.command)}`
    }

    case 'copy': {
      const from = instruction.from === undefined ? '' : `--from=${instruction.from} `
      return `COPY ${from}${instruction.sources.join(' ')} ${instruction.destination}`
    }

    case 'expose': {
      return `EXPOSE ${instruction.port}`
    }

    case 'healthcheck': {
      return instruction.healthcheck ? `HEALTHCHECK ${displayCommand(instruction.healthcheck.command)}` : 'HEALTHCHECK NONE'
    }

    case 'entrypoint': {
      return `ENTRYPOINT ${JSON.stringify(instruction.command)}`
    }

    case 'workdir': {
      return `WORKDIR ${instruction.path}`
    }
  }
}

function displayCommand(command: readonly string[]): string {
  if (command.length === 3 && command[0] === '/bin/sh' && command[1] === '-c') {
    return command[2]
  }

  return JSON.stringify(command)
}
