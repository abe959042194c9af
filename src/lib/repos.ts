import { ConfigurationError, errorMessage } from './errors'
import { shellEscape } from './exec'
import { getOriginUrl, isInsideGitRepo } from './git'
import type { Transport } from './types'
import * as ui from './ui'

export const WORKSPACE_DIR = '/workspace'

const REPO_URL_PATTERN = /^(git@[^:\s]+:\S+|ssh:\/\/\S+|https?:\/\/\S+)$/

export function validateRepoUrl(url: string): string {
  const trimmed = url.trim()
  if (!REPO_URL_PATTERN.test(trimmed)) {
    throw new ConfigurationError(
      `Invalid repository URL "${url}". Use git@host:org/repo.git, ssh://, https:// or http://.`,
    )
  }
  return trimmed
}

/** `git@github.com:org/app.git` → `app`. */
export function extractRepoName(url: string): string {
  const lastSegment = url.replace(/\/+$/, '').split(/[/:]/).pop() ?? ''
  const name = lastSegment.replace(/\.git$/, '')
  if (!name || name === '.' || name === '..') {
    throw new ConfigurationError(`Cannot derive a directory name from "${url}".`)
  }
  return name
}

/** Positional repositories, or the origin of the current checkout when none were given. */
export function resolveRepositories(args: readonly string[]): string[] {
  if (args.length > 0) return args.map(validateRepoUrl)

  const origin = isInsideGitRepo() ? getOriginUrl() : null
  if (!origin) {
    ui.info('No repositories given and no git origin detected. Usage: ca https://github.com/user/repo.git')
    return []
  }
  ui.info(`Using origin of the current repository: ${origin}`)
  return [validateRepoUrl(origin)]
}

export function cloneOrPullCommand(url: string): string {
  const dir = shellEscape(extractRepoName(url))
  return [
    `cd ${WORKSPACE_DIR}`,
    `if [ -d ${dir} ]; then cd ${dir} && git pull; else git clone ${shellEscape(url)} ${dir}; fi`,
  ].join(' && ')
}

/** Clone each repository into the guest workspace, or pull when already present. */
export function syncRepositories(transport: Transport, repos: readonly string[]): void {
  if (repos.length === 0) return

  ui.step('Cloning repositories to the VM...')
  try {
    transport.exec(`sudo chmod 777 ${WORKSPACE_DIR} 2>/dev/null || true`)
  } catch (err) {
    ui.warn(`Could not open up ${WORKSPACE_DIR}: ${errorMessage(err)}`)
  }

  for (const repo of repos) {
    const name = extractRepoName(repo)
    ui.info(`Syncing ${name}...`)
    transport.exec(cloneOrPullCommand(repo))
  }
  ui.success('All repositories synced')
}
