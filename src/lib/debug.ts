import { appendFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import pc from 'picocolors'

let _enabled = false
let _logPath: string | null = null

const SECRET_PATTERNS: Array<[RegExp, string]> = [
  [/(https?:\/\/[^:/\s]+:)[^@\s]+@/g, '$1<redacted>@'],
  [/\b(gh[pousr]_)[A-Za-z0-9]+/g, '$1<redacted>'],
  [/\b(github_pat_)[A-Za-z0-9_]+/g, '$1<redacted>'],
]

/**
 * Enable debug mode and create the log file in the current working directory.
 * Returns the path to the log file.
 */
export function enable(): string {
  _enabled = true
  _logPath = join(process.cwd(), 'cloud-agent-debug.log')
  writeFileSync(
    _logPath,
    `cloud-agent debug log (${new Date().toISOString()})\n${'='.repeat(60)}\n\n`,
  )
  return _logPath
}

export function isEnabled(): boolean {
  return _enabled
}

export function getLogPath(): string | null {
  return _logPath
}

function timestamp(): string {
  return new Date().toTimeString().slice(0, 8)
}

/** Mask credentials embedded in URLs and GitHub tokens. */
export function redact(text: string): string {
  return SECRET_PATTERNS.reduce(
    (acc, [pattern, replacement]) => acc.replace(pattern, replacement),
    text,
  )
}

/** Write a message to the debug log file only. */
export function log(message: string): void {
  if (!_enabled || !_logPath) return
  appendFileSync(_logPath, `[${timestamp()}] ${redact(message)}\n`)
}

/**
 * Log a command execution. Errors from failed commands are also printed to console.
 * `stdout: null` marks output that carried a secret and is never written.
 */
export function logCommand(
  cmd: string,
  args: string[],
  result: { status: number | null; stdout: string | null; stderr: string },
): void {
  if (!_enabled || !_logPath) return

  const lines = [`$ ${cmd} ${args.join(' ')}`, `exit code: ${result.status}`]
  if (result.stdout === null) lines.push('stdout: <withheld>')
  else if (result.stdout.trim()) lines.push(`stdout:\n${result.stdout.trim()}`)
  if (result.stderr.trim()) lines.push(`stderr:\n${result.stderr.trim()}`)
  log(lines.join('\n'))

  if (result.status !== 0) {
    const errorOutput = result.stderr.trim() || (result.stdout ?? '').trim()
    if (errorOutput) {
      process.stderr.write(`${pc.dim('[debug]')} ${pc.red(redact(errorOutput))}\n`)
    }
  }
}
