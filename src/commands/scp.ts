import { defineCommand } from 'citty'
import { copyFiles } from '../lib/lifecycle'
import * as ui from '../lib/ui'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'scp',
    description: 'Copy files to or from the VM; prefix remote paths with vm:',
  },
  args: {
    ...configArgs,
    src: {
      type: 'positional',
      description: 'Source path (vm:/path for the VM)',
      required: false,
    },
    dst: {
      type: 'positional',
      description: 'Destination path (vm:/path for the VM)',
      required: false,
    },
  },
  run: async ({ args }) => {
    await runVerb('Copy failed', args, async (ctx) => {
      await copyFiles(ctx, args.src ?? '', args.dst ?? '')
      ui.success('Copy complete')
    })
  },
})
