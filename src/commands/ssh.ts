import { defineCommand } from 'citty'
import { openShell } from '../lib/lifecycle'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'ssh',
    description: 'Open a tmux session on your VM',
  },
  args: configArgs,
  run: async ({ args }) => {
    let exitCode = 0
    await runVerb('SSH failed', args, async (ctx) => {
      exitCode = await openShell(ctx)
    })
    return process.exit(exitCode)
  },
})
