/**
 * External command execution for scanners
 */

import { execFile } from 'node:child_process'
import { promisify } from 'node:util'

const execFileAsync = promisify(execFile)

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

export interface CommandOptions {
  signal?: AbortSignal
}

/**
 * Runs a program and resolves with its stdout
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<string>

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined
}

function errorStderr(err: unknown): string {
  if (err instanceof Error && 'stderr' in err && typeof err.stderr === 'string') {
    return err.stderr.trim()
  }
  return ''
}

/**
 * Run a program without a shell
 *
 * A program that is not installed yields empty output. A non-zero exit
 * rejects with the exit code and the first line of stderr.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  try {
    const { stdout } = await execFileAsync(command, [...args], {
      encoding: 'utf8',
      maxBuffer: MAX_OUTPUT_BYTES,
      windowsHide: true,
      signal: options.signal
    })
    return stdout
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return ''
    }
    if (err instanceof Error && err.name === 'AbortError') {
      throw err
    }

    const code = errorCode(err)
    const stderr = errorStderr(err).split('\n')[0]
    const status = typeof code === 'number' ? `exited with code ${code}` : 'failed'
    throw new Error(`${command} ${args.join(' ')} ${status}${stderr ? `: ${stderr}` : ''}`, { cause: err })
  }
}
