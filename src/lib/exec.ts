import { type StdioOptions, spawnSync } from 'node:child_process'
import * as debug from './debug'

export interface RunOptions {
  cwd?: string
  /** Inherit stdin/stdout/stderr so the operator sees (and can answer) the tool directly. */
  inheritStdio?: boolean
  /** Stream stdout to the terminal but capture stderr for error reporting. */
  streamStdout?: boolean
  /** Captured stdout carries a credential; keep it out of the debug log. */
  secret?: boolean
}

export interface RunResult {
  ok: boolean
  status: number
  stdout: string
  stderr: string
}

export function commandExists(command: string): boolean {
  const result = spawnSync('sh', ['-lc', `command -v ${shellEscape(command)}`], {
    stdio: ['pipe', 'pipe', 'pipe'],
  })
  return result.status === 0
}

function stdioFor(options: RunOptions): StdioOptions {
  if (options.inheritStdio) return 'inherit'
  if (options.streamStdout) return ['inherit', 'inherit', 'pipe']
  return ['pipe', 'pipe', 'pipe']
}

export function run(
  command: string,
  args: string[],
  options: RunOptions = {},
): RunResult {
  debug.log(`[exec] ${command} ${args.join(' ')}${options.cwd ? ` (cwd: ${options.cwd})` : ''}`)

  const result = spawnSync(command, args, {
    cwd: options.cwd,
    stdio: stdioFor(options),
    encoding: 'utf-8',
  })

  const stdout = typeof result.stdout === 'string' ? result.stdout : ''
  const stderr = typeof result.stderr === 'string' ? result.stderr : ''
  const status = result.status ?? 1
  debug.logCommand(command, args, { status, stdout: options.secret ? null : stdout, stderr })

  if (result.error) {
    debug.log(`[exec] ${command} failed to spawn: ${result.error.message}`)
  }

  return {
    ok: status === 0 && !result.error,
    status,
    stdout,
    stderr: stderr || (result.error ? result.error.message : ''),
  }
}

export function shellEscape(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}
