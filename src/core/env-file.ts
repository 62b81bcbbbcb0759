import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'
import {ValidationError} from '../errors.js'

const envNamePattern = /^[A-Za-z_]\w*$/

export function isEnvName(name: string): boolean {
  return envNamePattern.test(name)
}

/**
 * Reads launch-time environment overrides from a dotenv file.
 * @throws ValidationError if the file cannot be read or defines an invalid name
 */
export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    throw new ValidationError(`Cannot read env file ${filePath}`, {cause: error})
  }

  const env = parse(content)
  for (const name of Object.keys(env)) {
    if (!isEnvName(name)) {
      throw new ValidationError(`${filePath}: invalid environment variable name "${name}"`)
    }
  }

  return env
}
