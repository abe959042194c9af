import { defineCommand } from 'citty'
import { DEFAULT_AGENT } from '../lib/config'
import { listAgents } from '../lib/agents'
import { colors } from '../lib/ui'

export default defineCommand({
  meta: {
    name: 'agents',
    description: 'List supported coding agents and their local status',
  },
  run: async () => {
    const agents = listAgents()
    const nameW = Math.max(6, ...agents.map((agent) => agent.name.length)) + 2
    const displayW = Math.max(5, ...agents.map((agent) => agent.displayName.length)) + 2

    console.log(colors.dim(`${'AGENT'.padEnd(nameW)}${'NAME'.padEnd(displayW)}STATUS`))
    for (const agent of agents) {
      const status = !agent.isInstalledLocally()
        ? colors.yellow('not installed')
        : agent.isAuthenticated()
          ? colors.green('ready')
          : colors.yellow('not logged in')
      const suffix = agent.name === DEFAULT_AGENT ? colors.dim(' (default)') : ''
      console.log(`${agent.name.padEnd(nameW)}${agent.displayName.padEnd(displayW)}${status}${suffix}`)
    }
  },
})
