import { defineCommand } from 'citty'
import { identityFor, terminateVm } from '../lib/lifecycle'
import * as ui from '../lib/ui'
import { prompts } from '../lib/ui'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'terminate',
    description: 'Delete your VM and its resources',
  },
  args: {
    ...configArgs,
    yes: {
      type: 'boolean',
      alias: 'y',
      description: 'Skip the confirmation prompt',
      default: false,
    },
  },
  run: async ({ args }) => {
    await runVerb('Terminate failed', args, async (ctx) => {
      const identity = await identityFor(ctx)

      if (!args.yes) {
        const confirmed = await prompts.confirm({
          message: `Terminate ${identity.name} and clean up its resources?`,
          initialValue: false,
        })
        if (prompts.isCancel(confirmed) || !confirmed) {
          ui.info('Cancelled.')
          return
        }
      }

      const path = terminateVm(ctx, identity)
      ui.success(
        path === 'terraform-destroy' ? 'All resources destroyed' : `${identity.name} deleted`,
      )
    })
  },
})
