import { defineCommand } from 'citty'
import { listVms } from '../lib/lifecycle'
import { configArgs, runVerb } from './shared'

export default defineCommand({
  meta: {
    name: 'list',
    description: 'List cloud agent VMs in the project',
  },
  args: configArgs,
  run: async ({ args }) => {
    await runVerb('Listing VMs failed', args, listVms)
  },
})
