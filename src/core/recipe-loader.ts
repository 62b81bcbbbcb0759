import {readFile, stat} from 'node:fs/promises'
import {basename, dirname, extname, join, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {Instruction, Recipe, Stage} from '../types.js'
import {parseDockerfile} from './dockerfile.js'
import {createHealthcheck, freezeInstruction, parsePort, shellCommand, type HealthcheckOptions} from './instructions.js'
import {slugify} from './utils.js'

/** File names looked up, in order, when a directory is given. */
export const recipeFilenames = ['stratum.yml', 'stratum.yaml', 'stratum.json', 'Dockerfile']

const instructionKeys = new Set(['env', 'workdir', 'run', 'copy', 'expose', 'healthcheck', 'entrypoint'])

/**
 * Finds the recipe file for a path that is either a recipe file or a
 * directory containing one.
 * @throws ValidationError if no recipe file exists
 */
export async function resolveRecipeFile(pathOrDir: string): Promise<string> {
  const absolute = resolve(pathOrDir)
  let isDirectory: boolean
  try {
    isDirectory = (await stat(absolute)).isDirectory()
  } catch (error) {
    throw new ValidationError(`Recipe not found: ${pathOrDir}`, {cause: error})
  }

  if (!isDirectory) {
    return absolute
  }

  for (const filename of recipeFilenames) {
    const candidate = join(absolute, filename)
    try {
      await stat(candidate)
      return candidate
    } catch {
      continue
    }
  }

  throw new ValidationError(`No recipe found in ${pathOrDir} (looked for ${recipeFilenames.join(', ')})`)
}

export class RecipeLoader {
  async load(filePath: string): Promise<Recipe> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  /**
   * Parses a recipe. Dockerfiles are recognised by name (`Dockerfile`,
   * `*.Dockerfile`, `Dockerfile.*`); anything else is YAML or JSON.
   * @param filePath - Used for format detection, default name and root directory
   */
  parse(content: string, filePath: string): Recipe {
    const root = dirname(resolve(filePath))
    const defaultName = slugify(basename(root)) || 'image'

    if (isDockerfile(filePath)) {
      return freezeRecipe({name: defaultName, stages: parseDockerfile(content), root})
    }

    const input = parseRecipeFile(content, filePath)
    if (!isRecord(input)) {
      throw new ValidationError('Invalid recipe: expected an object with "stages"')
    }

    if (input.name !== undefined && typeof input.name !== 'string') {
      throw new ValidationError('Invalid recipe: "name" must be a string')
    }

    const name = input.name ? slugify(input.name) : defaultName
    if (!Array.isArray(input.stages) || input.stages.length === 0) {
      throw new ValidationError('Invalid recipe: stages must be a non-empty array')
    }

    const stages = input.stages.map((stage: unknown, index: number) => this.resolveStage(stage, index))
    return freezeRecipe({name, stages, root})
  }

  private resolveStage(input: unknown, index: number): Stage {
    if (!isRecord(input)) {
      throw new ValidationError(`Invalid stage #${index}: expected an object`)
    }

    const name = input.name ?? String(index)
    if (typeof name !== 'string' || !/^[\w.-]+$/.test(name)) {
      throw new ValidationError(`Invalid stage #${index}: name must contain only alphanumeric characters, dots, dashes, and underscores`)
    }

    if (typeof input.from !== 'string' || input.from === '') {
      throw new ValidationError(`Invalid stage ${name}: "from" is required`)
    }

    const definitions = input.instructions ?? []
    if (!Array.isArray(definitions)) {
      throw new ValidationError(`Invalid stage ${name}: instructions must be an array`)
    }

    const instructions = definitions.flatMap((definition: unknown, i: number) => {
      try {
        return this.resolveInstruction(definition)
      } catch (error) {
        if (error instanceof ValidationError) {
          throw new ValidationError(`Invalid stage ${name}, instruction #${i}: ${error.message}`, {cause: error})
        }

        throw error
      }
    })

    return {name, from: input.from, instructions}
  }

  private resolveInstruction(definition: unknown): Instruction[] {
    if (!isRecord(definition)) {
      throw new ValidationError('expected an object with a single instruction key')
    }

    const keys = Object.keys(definition)
    if (keys.length !== 1 || !instructionKeys.has(keys[0])) {
      throw new ValidationError(`expected exactly one of ${[...instructionKeys].join(', ')}, got ${keys.join(', ') || 'nothing'}`)
    }

    const [key] = keys
    const value = definition[key]
    switch (key) {
      case 'env': {
        if (!isRecord(value)) {
          throw new ValidationError('env must be a map of names to values')
        }

        return Object.entries(value).map(([name, entry]): Instruction => {
          if (typeof entry !== 'string' && typeof entry !== 'number' && typeof entry !== 'boolean') {
            throw new ValidationError(`env ${name} must be a scalar`)
          }

          return {kind: 'env', name, value: String(entry)}
        })
      }

      case 'workdir': {
        return [{kind: 'workdir', path: requireString(value, 'workdir')}]
      }

      case 'run': {
        return [{kind: 'run', command: parseCommand(value, 'run')}]
      }

      case 'copy': {
        return [parseCopy(value)]
      }

      case 'expose': {
        const ports: unknown[] = Array.isArray(value) ? value : [value]
        return ports.map((port): Instruction => ({kind: 'expose', port: parsePort(port)}))
      }

      case 'healthcheck': {
        return [parseHealthcheck(value)]
      }

      default: {
        return [{kind: 'entrypoint', command: parseCommand(value, 'entrypoint')}]
      }
    }
  }
}

export function isDockerfile(filePath: string): boolean {
  const name = basename(filePath)
  return name === 'Dockerfile' || name.startsWith('Dockerfile.') || name.endsWith('.Dockerfile') || name.endsWith('.dockerfile')
}

export function parseRecipeFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  try {
    if (ext === '.json') {
      return JSON.parse(content)
    }

    return parseYaml(content)
  } catch (error) {
    throw new ValidationError(`Failed to parse ${basename(filePath)}`, {cause: error})
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError(`${field} must be a non-empty string`)
  }

  return value
}

/** A string is shell form; an array is exec form. */
function parseCommand(value: unknown, field: string): string[] {
  if (typeof value === 'string' && value.trim() !== '') {
    return shellCommand(value)
  }

  if (Array.isArray(value) && value.length > 0 && value.every((item): item is string => typeof item === 'string')) {
    return [...value]
  }

  throw new ValidationError(`${field} must be a command string or a non-empty array of strings`)
}

function parseCopy(value: unknown): Instruction {
  if (!isRecord(value)) {
    throw new ValidationError('copy must be an object with sources and destination')
  }

  const sources = typeof value.sources === 'string' ? [value.sources] : value.sources
  if (!Array.isArray(sources) || sources.length === 0 || !sources.every((item): item is string => typeof item === 'string' && item !== '')) {
    throw new ValidationError('copy.sources must be a path or a non-empty array of paths')
  }

  const destination = requireString(value.destination, 'copy.destination')
  if (value.from === undefined) {
    return {kind: 'copy', sources: [...sources], destination}
  }

  return {kind: 'copy', sources: [...sources], destination, from: requireString(value.from, 'copy.from')}
}

function parseHealthcheck(value: unknown): Instruction {
  if (value === 'none' || value === 'NONE' || value === null) {
    return {kind: 'healthcheck', healthcheck: null}
  }

  if (!isRecord(value)) {
    throw new ValidationError('healthcheck must be "none" or an object with a command')
  }

  const options: HealthcheckOptions = {
    interval: durationOption(value.interval, 'interval'),
    timeout: durationOption(value.timeout, 'timeout'),
    startPeriod: durationOption(value.startPeriod, 'startPeriod'),
    retries: durationOption(value.retries, 'retries')
  }

  return {kind: 'healthcheck', healthcheck: createHealthcheck(parseCommand(value.command, 'healthcheck.command'), options)}
}

function durationOption(value: unknown, field: string): string | number | undefined {
  if (value === undefined || typeof value === 'string' || typeof value === 'number') {
    return value
  }

  throw new ValidationError(`healthcheck.${field} must be a string or a number`)
}

function freezeRecipe(recipe: {name: string; stages: Stage[]; root: string}): Recipe {
  return Object.freeze({
    name: recipe.name,
    root: recipe.root,
    stages: Object.freeze(recipe.stages.map(stage => Object.freeze({
      name: stage.name,
      from: stage.from,
      instructions: Object.freeze(stage.instructions.map(instruction => freezeInstruction({...instruction})))
    })))
  })
}
