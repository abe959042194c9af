import { defineCommand } from 'citty'
import { stopVm } from '../lib/lifecycle'
import * as ui from '../lib/ui'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'stop',
    description: 'Stop your VM (the disk is kept)',
  },
  args: configArgs,
  run: async ({ args }) => {
    await runVerb('Stop failed', args, async (ctx) => {
      const identity = await stopVm(ctx)
      ui.success(`Stopped ${identity.name}`)
    })
  },
})
