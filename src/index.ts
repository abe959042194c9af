import { defineCommand, runMain } from 'citty'
import agents from './commands/agents'
import createVm from './commands/create-vm'
import deploy from './commands/deploy'
import help from './commands/help'
import list from './commands/list'
import scp from './commands/scp'
import ssh from './commands/ssh'
import start from './commands/start'
import stop from './commands/stop'
import terminate from './commands/terminate'
import tf from './commands/tf'
import { routeToVerb, stripDebugFlag } from './lib/argv'
import * as debug from './lib/debug'

// Parse global debug flags before citty processes argv.
const parsed = stripDebugFlag(process.argv.slice(2))
const rawArgs = routeToVerb(parsed.args)

if (parsed.debug) {
  const logPath = debug.enable()
  debug.log(`cloud-agent v${__VERSION__}`)
  debug.log(`args: ${rawArgs.join(' ')}`)
  debug.log(`cwd: ${process.cwd()}`)
  debug.log(`node: ${process.version}`)
  debug.log(`platform: ${process.platform} ${process.arch}`)
  debug.log(`log file: ${logPath}`)
}

const main = defineCommand({
  meta: {
    name: 'ca',
    version: __VERSION__,
    description: 'Deploy AI coding agents to your own ephemeral GCP VM.',
  },
  subCommands: {
    deploy,
    'create-vm': createVm,
    list,
    start,
    stop,
    terminate,
    ssh,
    scp,
    tf,
    agents,
    help,
  },
})

void runMain(main, { rawArgs })
