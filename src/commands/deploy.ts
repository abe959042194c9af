import { defineCommand } from 'citty'
import { deploy } from '../lib/lifecycle'
import * as ui from '../lib/ui'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'deploy',
    description: 'Create the VM if needed, transfer credentials and clone repositories (default)',
  },
  args: configArgs,
  run: async ({ args }) => {
    ui.intro('deploy')
    await runVerb('Deploy failed', args, (ctx) => deploy(ctx, args._))
  },
})
