import { defineCommand } from 'citty'
import { createOnly } from '../lib/lifecycle'
import * as ui from '../lib/ui'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'create-vm',
    description: 'Provision the VM without transferring credentials or repositories',
  },
  args: configArgs,
  run: async ({ args }) => {
    ui.intro('create-vm')
    await runVerb('VM creation failed', args, async (ctx) => {
      const identity = await createOnly(ctx)
      ui.outro(`${identity.name} is ready. Run ca to deploy repositories.`)
    })
  },
})
