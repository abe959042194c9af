import { defineCommand } from 'citty'
import { startVm } from '../lib/lifecycle'
import * as ui from '../lib/ui'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'start',
    description: 'Start your stopped VM',
  },
  args: configArgs,
  run: async ({ args }) => {
    await runVerb('Start failed', args, async (ctx) => {
      const identity = await startVm(ctx)
      ui.success(`Started ${identity.name}`)
    })
  },
})
