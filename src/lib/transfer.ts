import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import type { Transport } from './types'

/** Shell form of a guest path relative to the SSH user's home. */
export function homePath(remotePath: string): string {
  return `~/${remotePath}`
}

/**
 * Copy an in-memory secret to the guest without it ever appearing on a
 * command line. The local copy lives in a private temp directory that is
 * removed whatever happens.
 */
export function uploadSecret(
  transport: Transport,
  content: string,
  remotePath: string,
  mode = 0o600,
): void {
  const dir = mkdtempSync(path.join(tmpdir(), 'cloud-agent-'))
  try {
    const local = path.join(dir, 'payload')
    writeFileSync(local, content, { mode: 0o600 })
    const staging = `.cloud-agent-upload-${path.basename(remotePath)}`
    transport.copyTo(local, staging)
    const target = homePath(remotePath)
    const parent = path.posix.dirname(remotePath)
    const steps = [
      ...(parent === '.' ? [] : [`mkdir -p ${homePath(parent)}`]),
      `mv ${homePath(staging)} ${target}`,
      `chmod ${mode.toString(8)} ${target}`,
    ]
    transport.exec(steps.join(' && '))
  } finally {
    rmSync(dir, { recursive: true, force: true })
  }
}
