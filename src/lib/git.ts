import { execSync } from 'node:child_process'

export const FALLBACK_GIT_IDENTITY = {
  name: 'Cloud Agent',
  email: 'cloud-agent@localhost',
}

function exec(cmd: string): string {
  return execSync(cmd, {
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
  }).trim()
}

export function isInsideGitRepo(): boolean {
  try {
    exec('git rev-parse --is-inside-work-tree')
    return true
  } catch {
    return false
  }
}

export function getOriginUrl(): string | null {
  try {
    return exec('git remote get-url origin') || null
  } catch {
    return null
  }
}

function readConfig(key: string): string {
  try {
    return exec(`git config ${key}`)
  } catch {
    return ''
  }
}

/** The operator's git identity, used for commits made on the guest. */
export function getGitIdentity(): { name: string; email: string } {
  return {
    name: readConfig('user.name') || FALLBACK_GIT_IDENTITY.name,
    email: readConfig('user.email') || FALLBACK_GIT_IDENTITY.email,
  }
}
