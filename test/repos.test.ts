import { beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('../src/lib/git', () => ({
  isInsideGitRepo: vi.fn(),
  getOriginUrl: vi.fn(),
}))

vi.mock('../src/lib/ui', () => ({
  info: vi.fn(),
  step: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
}))

import { ConfigurationError } from '../src/lib/errors'
import * as git from '../src/lib/git'
import {
  cloneOrPullCommand,
  extractRepoName,
  resolveRepositories,
  syncRepositories,
  validateRepoUrl,
} from '../src/lib/repos'
import { fakeTransport } from './fakes'

describe('repository URLs', () => {
  it('accepts ssh and http(s) remotes', () => {
    for (const url of [
      'git@github.com:org/app.git',
      'ssh://git@github.com/org/app.git',
      'https://github.com/org/app.git',
      'http://git.internal/org/app',
    ]) {
      expect(validateRepoUrl(url)).toBe(url)
    }
  })

  it('rejects anything else', () => {
    expect(() => validateRepoUrl('/home/jane/app')).toThrow(ConfigurationError)
    expect(() => validateRepoUrl('ftp://example.com/app.git')).toThrow(ConfigurationError)
  })

  it('derives the directory name', () => {
    expect(extractRepoName('git@github.com:org/app.git')).toBe('app')
    expect(extractRepoName('https://github.com/org/tool/')).toBe('tool')
    expect(extractRepoName('git@github.com:solo.git')).toBe('solo')
  })
})

describe('resolveRepositories', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('uses positional arguments when given', () => {
    expect(resolveRepositories(['https://github.com/org/app.git'])).toEqual([
      'https://github.com/org/app.git',
    ])
    expect(git.isInsideGitRepo).not.toHaveBeenCalled()
  })

  it('falls back to the origin of the current checkout', () => {
    vi.mocked(git.isInsideGitRepo).mockReturnValue(true)
    vi.mocked(git.getOriginUrl).mockReturnValue('git@github.com:org/app.git')
    expect(resolveRepositories([])).toEqual(['git@github.com:org/app.git'])
  })

  it('returns nothing outside a git repository', () => {
    vi.mocked(git.isInsideGitRepo).mockReturnValue(false)
    expect(resolveRepositories([])).toEqual([])
    expect(git.getOriginUrl).not.toHaveBeenCalled()
  })
})

describe('syncRepositories', () => {
  it('opens up the workspace then clones or pulls each repository', () => {
    const transport = fakeTransport()

    syncRepositories(transport, ['git@github.com:org/app.git'])

    expect(transport.exec.mock.calls.map(([command]) => command)).toEqual([
      'sudo chmod 777 /workspace 2>/dev/null || true',
      "cd /workspace && if [ -d 'app' ]; then cd 'app' && git pull; else git clone 'git@github.com:org/app.git' 'app'; fi",
    ])
  })

  it('does nothing without repositories', () => {
    const transport = fakeTransport()
    syncRepositories(transport, [])
    expect(transport.exec).not.toHaveBeenCalled()
  })

  it('builds the same command for reuse', () => {
    expect(cloneOrPullCommand('https://github.com/org/tool')).toBe(
      "cd /workspace && if [ -d 'tool' ]; then cd 'tool' && git pull; else git clone 'https://github.com/org/tool' 'tool'; fi",
    )
  })

  it('propagates clone failures', () => {
    const transport = fakeTransport()
    transport.exec.mockImplementation((command: string) => {
      if (command.includes('git clone')) throw new Error('Repository not found')
      return ''
    })
    expect(() => syncRepositories(transport, ['https://github.com/org/missing.git'])).toThrow(
      'Repository not found',
    )
  })
})
