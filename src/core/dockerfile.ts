import {ValidationError} from '../errors.js'
import type {Instruction, Stage} from '../types.js'
import {createHealthcheck, freezeInstruction, parsePort, shellCommand, type HealthcheckOptions} from './instructions.js'

type LogicalLine = {
  line: number;
  keyword: string;
  rest: string;
}

type StageBuilder = {
  name: string;
  from: string;
  instructions: Instruction[];
  /** Exec-form ENTRYPOINT declared in this stage; CMD arguments are appended to it. */
  entrypoint?: {command: string[]; exec: boolean};
}

/**
 * Parses the Dockerfile subset stratum understands into stage declarations.
 *
 * Supported: FROM, ENV, WORKDIR, RUN, COPY, EXPOSE, HEALTHCHECK, CMD and
 * ENTRYPOINT, with `#` comments and `\` line continuations. CMD and
 * ENTRYPOINT both set the entrypoint; CMD after an exec-form ENTRYPOINT in
 * the same stage supplies its arguments.
 */
export function parseDockerfile(content: string): Stage[] {
  const stages: StageBuilder[] = []

  for (const logical of logicalLines(content)) {
    if (logical.keyword === 'FROM') {
      stages.push(parseFrom(logical, stages.length))
      continue
    }

    const current = stages.at(-1)
    if (!current) {
      throw lineError(logical, `${logical.keyword} before the first FROM`)
    }

    current.instructions.push(...parseInstruction(logical, current))
  }

  return stages.map(stage => Object.freeze({
    name: stage.name,
    from: stage.from,
    instructions: Object.freeze(stage.instructions.map(instruction => freezeInstruction(instruction)))
  }))
}

function logicalLines(content: string): LogicalLine[] {
  const result: LogicalLine[] = []
  const physical = content.split(/\r?\n/)
  let buffer = ''
  let startLine = 0

  for (const [index, raw] of physical.entries()) {
    const trimmed = raw.trim()
    if (trimmed.startsWith('#') || (trimmed === '' && buffer === '')) {
      continue
    }

    if (buffer === '') {
      startLine = index + 1
    }

    if (trimmed.endsWith('\\')) {
      buffer += trimmed.slice(0, -1).trimEnd() + ' '
      continue
    }

    buffer += trimmed
    pushLogical(result, buffer, startLine)
    buffer = ''
  }

  if (buffer.trim() !== '') {
    pushLogical(result, buffer, startLine)
  }

  return result
}

function pushLogical(result: LogicalLine[], text: string, line: number): void {
  const match = /^(\S+)\s*(.*)$/s.exec(text.trim())
  if (match) {
    result.push({line, keyword: match[1].toUpperCase(), rest: match[2].trim()})
  }
}

function lineError(logical: LogicalLine, message: string): ValidationError {
  return new ValidationError(`Dockerfile line ${logical.line}: ${message}`)
}

function parseFrom(logical: LogicalLine, index: number): StageBuilder {
  const words = logical.rest.split(/\s+/).filter(word => word !== '' && !word.startsWith('--'))
  if (words.length === 1) {
    return {name: String(index), from: words[0], instructions: []}
  }

  if (words.length === 3 && words[1].toUpperCase() === 'AS') {
    return {name: words[2], from: words[0], instructions: []}
  }

  throw lineError(logical, `invalid FROM "${logical.rest}"`)
}

function parseInstruction(logical: LogicalLine, stage: StageBuilder): Instruction[] {
  switch (logical.keyword) {
    case 'ENV': {
      return parseEnv(logical)
    }

    case 'WORKDIR': {
      if (logical.rest === '') {
        throw lineError(logical, 'WORKDIR requires a path')
      }

      return [{kind: 'workdir', path: logical.rest}]
    }

    case 'RUN': {
      return [{kind: 'run', command: parseCommand(logical).command}]
    }

    case 'COPY': {
      return [parseCopy(logical)]
    }

    case 'EXPOSE': {
      return logical.rest.split(/\s+/).filter(Boolean).map((port): Instruction => ({kind: 'expose', port: wrapLine(logical, () => parsePort(port))}))
    }

    case 'HEALTHCHECK': {
      return [parseHealthcheck(logical)]
    }

    case 'ENTRYPOINT': {
      const parsed = parseCommand(logical)
      stage.entrypoint = parsed
      return [{kind: 'entrypoint', command: parsed.command}]
    }

    case 'CMD': {
      const parsed = parseCommand(logical)
      if (stage.entrypoint?.exec) {
        return [{kind: 'entrypoint', command: [...stage.entrypoint.command, ...parsed.command]}]
      }

      if (stage.entrypoint) {
        // A shell-form ENTRYPOINT ignores CMD.
        return []
      }

      return [{kind: 'entrypoint', command: parsed.command}]
    }

    default: {
      throw lineError(logical, `unsupported instruction ${logical.keyword}`)
    }
  }
}

function wrapLine<T>(logical: LogicalLine, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    if (error instanceof ValidationError) {
      throw lineError(logical, error.message)
    }

    throw error
  }
}

function parseCommand(logical: LogicalLine, text = logical.rest): {command: string[]; exec: boolean} {
  if (text === '') {
    throw lineError(logical, `${logical.keyword} requires a command`)
  }

  if (text.startsWith('[')) {
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new ValidationError(`Dockerfile line ${logical.line}: invalid JSON array`, {cause: error})
    }

    if (!Array.isArray(parsed) || parsed.length === 0 || !parsed.every((item): item is string => typeof item === 'string')) {
      throw lineError(logical, 'exec form must be a non-empty JSON array of strings')
    }

    return {command: parsed, exec: true}
  }

  return {command: shellCommand(text), exec: false}
}

function parseEnv(logical: LogicalLine): Instruction[] {
  const tokens = tokenize(logical.rest)
  if (tokens.length === 0) {
    throw lineError(logical, 'ENV requires a name and value')
  }

  if (!tokens[0].includes('=')) {
    // Legacy `ENV NAME value with spaces` form
    const [name] = tokens
    const value = logical.rest.slice(logical.rest.indexOf(name) + name.length).trim()
    return [{kind: 'env', name, value}]
  }

  return tokens.map((token): Instruction => {
    const separator = token.indexOf('=')
    if (separator <= 0) {
      throw lineError(logical, `invalid ENV pair "${token}"`)
    }

    return {kind: 'env', name: token.slice(0, separator), value: token.slice(separator + 1)}
  })
}

/** Splits on whitespace, honouring double and single quotes and backslash escapes. */
function tokenize(text: string): string[] {
  const tokens: string[] = []
  let current = ''
  let quote: string | undefined
  let inToken = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]
    if (quote) {
      if (char === quote) {
        quote = undefined
      } else if (char === '\\' && quote === '"' && i + 1 < text.length) {
        current += text[++i]
      } else {
        current += char
      }
    } else if (char === '"' || char === '\'') {
      quote = char
      inToken = true
    } else if (char === '\\' && i + 1 < text.length) {
      current += text[++i]
      inToken = true
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current)
        current = ''
        inToken = false
      }
    } else {
      current += char
      inToken = true
    }
  }

  if (inToken) {
    tokens.push(current)
  }

  return tokens
}

function parseFlags(logical: LogicalLine, words: string[]): {flags: Map<string, string>; rest: string[]} {
  const flags = new Map<string, string>()
  let index = 0
  while (index < words.length && words[index].startsWith('--')) {
    const match = /^--([\w-]+)=(.*)$/.exec(words[index])
    if (!match) {
      throw lineError(logical, `invalid flag "${words[index]}"`)
    }

    flags.set(match[1], match[2])
    index++
  }

  return {flags, rest: words.slice(index)}
}

function parseCopy(logical: LogicalLine): Instruction {
  const {flags, rest} = parseFlags(logical, logical.rest.split(/\s+/).filter(Boolean))
  let paths = rest
  const joined = rest.join(' ')
  if (joined.startsWith('[')) {
    paths = parseCommand(logical, joined).command
  }

  if (paths.length < 2) {
    throw lineError(logical, 'COPY requires at least one source and a destination')
  }

  const from = flags.get('from')
  return {
    kind: 'copy',
    sources: paths.slice(0, -1),
    destination: paths.at(-1) ?? '.',
    ...(from === undefined ? {} : {from})
  }
}

function parseHealthcheck(logical: LogicalLine): Instruction {
  if (logical.rest.toUpperCase() === 'NONE') {
    return {kind: 'healthcheck', healthcheck: null}
  }

  const match = /^((?:--[\w-]+=\S+\s+)*)CMD\s+(.+)$/is.exec(logical.rest)
  if (!match) {
    throw lineError(logical, 'expected HEALTHCHECK [OPTIONS] CMD command, or HEALTHCHECK NONE')
  }

  const {flags} = parseFlags(logical, match[1].split(/\s+/).filter(Boolean))
  const options: HealthcheckOptions = {}
  for (const [flag, value] of flags) {
    switch (flag) {
      case 'interval': {
        options.interval = value
        break
      }

      case 'timeout': {
        options.timeout = value
        break
      }

      case 'start-period': {
        options.startPeriod = value
        break
      }

      case 'retries': {
        options.retries = value
        break
      }

      default: {
        throw lineError(logical, `unsupported HEALTHCHECK option --${flag}`)
      }
    }
  }

  const {command} = parseCommand(logical, match[2].trim())
  return {kind: 'healthcheck', healthcheck: wrapLine(logical, () => createHealthcheck(command, options))}
}
