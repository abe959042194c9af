import { defineCommand } from 'citty'
import { reapplyConfig } from '../lib/lifecycle'
import * as ui from '../lib/ui'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'tf',
    description: 'Re-apply the Terraform configuration (allow-list, permissions, labels)',
  },
  args: configArgs,
  run: async ({ args }) => {
    ui.intro('tf')
    await runVerb('Terraform re-apply failed', args, reapplyConfig)
  },
})
