// src/main/core/input/exec.ts
import { execFile } from 'node:child_process'
import { promisify } from 'node:util'

const execFileAsync = promisify(execFile)

const COMMAND_TIMEOUT_MS = 10_000

/**
 * Runs a helper program and returns its trimmed stdout. Rejects on a non-zero
 * exit code, a missing binary or a timeout.
 */
export async function runCommand(command: string, args: readonly string[]): Promise<string> {
  const { stdout } = await execFileAsync(command, [...args], {
    encoding: 'utf8',
    timeout: COMMAND_TIMEOUT_MS,
    windowsHide: true,
  })
  return stdout.trim()
}
