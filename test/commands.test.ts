import { runCommand } from 'citty'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { RuntimeContext } from '../src/lib/runtime/context'
import { fakeInfra, fakeProvider, fakeRuntime, makeConfig } from './fakes'

vi.mock('../src/lib/runtime/context', () => ({
  createRuntime: vi.fn(),
}))

vi.mock('../src/lib/ui', () => ({
  intro: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  fatal: vi.fn(),
  step: vi.fn(),
  success: vi.fn(),
  prompts: {
    confirm: vi.fn(),
    isCancel: vi.fn(() => false),
  },
}))

// Mock process.exit to prevent test termination
const mockExit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

import deployCommand from '../src/commands/deploy'
import startCommand from '../src/commands/start'
import terminateCommand from '../src/commands/terminate'
import tfCommand from '../src/commands/tf'
import { flagsFrom } from '../src/commands/shared'
import { agentNames } from '../src/lib/agents'
import { UnknownAgentError } from '../src/lib/errors'
import { createRuntime } from '../src/lib/runtime/context'
import * as ui from '../src/lib/ui'

function useRuntime(ctx: RuntimeContext) {
  vi.mocked(createRuntime).mockReturnValue(ctx)
}

describe('commands', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  describe('terminate', () => {
    it('asks for confirmation and stops when declined', async () => {
      const infra = fakeInfra({ state: true })
      useRuntime(fakeRuntime({ infra }).ctx)
      vi.mocked(ui.prompts.confirm).mockResolvedValue(false)

      await runCommand(terminateCommand, { rawArgs: [] })

      expect(ui.prompts.confirm).toHaveBeenCalledWith({
        message: 'Terminate jane-doe-cloud-agent and clean up its resources?',
        initialValue: false,
      })
      expect(infra.destroy).not.toHaveBeenCalled()
      expect(ui.info).toHaveBeenCalledWith('Cancelled.')
    })

    it('skips the prompt with --yes', async () => {
      const infra = fakeInfra({ state: true })
      useRuntime(fakeRuntime({ infra }).ctx)

      await runCommand(terminateCommand, { rawArgs: ['--yes'] })

      expect(ui.prompts.confirm).not.toHaveBeenCalled()
      expect(infra.destroy).toHaveBeenCalledTimes(1)
      expect(ui.success).toHaveBeenCalledWith('All resources destroyed')
    })

    it('falls back to deleting the instance', async () => {
      const provider = fakeProvider()
      useRuntime(fakeRuntime({ provider }).ctx)
      vi.mocked(ui.prompts.confirm).mockResolvedValue(true)

      await runCommand(terminateCommand, { rawArgs: [] })

      expect(provider.deleteInstance).toHaveBeenCalledWith('jane-doe-cloud-agent', 'us-central1-a')
      expect(ui.success).toHaveBeenCalledWith('jane-doe-cloud-agent deleted')
    })
  })

  it('exits 1 with one message when a verb fails', async () => {
    const { ctx } = fakeRuntime()
    vi.mocked(ctx.ask).mockResolvedValue(null)
    useRuntime({ ...ctx, config: makeConfig({ usernameOverride: null, localUser: 'jdoe' }) })

    await runCommand(startCommand, { rawArgs: [] })

    expect(ui.fatal).toHaveBeenCalledTimes(1)
    expect(ui.fatal).toHaveBeenCalledWith(
      'Start failed: First and last name are required to name the VM.',
    )
    expect(mockExit).toHaveBeenCalledWith(1)
  })

  it('stops tf on an unknown agent before any provisioning', async () => {
    vi.mocked(createRuntime).mockImplementation(() => {
      throw new UnknownAgentError('gemini', agentNames())
    })

    await runCommand(tfCommand, { rawArgs: ['--agent', 'gemini'] })

    expect(ui.fatal).toHaveBeenCalledWith(
      'Terraform re-apply failed: Unknown agent "gemini". Available agents: auggie, claude, codex',
    )
    expect(mockExit).toHaveBeenCalledWith(1)
  })

  it('passes flags to the runtime', async () => {
    const provider = fakeProvider()
    useRuntime(fakeRuntime({ provider }).ctx)

    await runCommand(startCommand, { rawArgs: ['--zone', 'asia-east1-a', '--skip-creds'] })

    expect(createRuntime).toHaveBeenCalledWith(
      expect.objectContaining({ zone: 'asia-east1-a', skipCreds: true, forceCreate: false }),
    )
    expect(ui.success).toHaveBeenCalledWith('Started jane-doe-cloud-agent')
  })

  it('maps kebab-case flags onto configuration fields', () => {
    expect(
      flagsFrom({ 'machine-type': 'e2-small', 'ssh-key': '~/.ssh/work', 'force-create': true }),
    ).toMatchObject({ machineType: 'e2-small', sshKey: '~/.ssh/work', forceCreate: true, skipCreate: false })
  })
})
