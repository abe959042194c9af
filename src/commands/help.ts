import { defineCommand } from 'citty'
import { colors } from '../lib/ui'

export const USAGE = `Usage: ca [command] [options] [repos...]

Commands:
  deploy [repos...]  Create the VM if needed, transfer credentials, clone repos (default)
  create-vm          Provision the VM only
  list               List cloud agent VMs
  start | stop       Start or stop your VM
  terminate [--yes]  Delete your VM
  ssh                Open a tmux session on your VM
  scp <src> <dst>    Copy files; prefix remote paths with vm:
  tf                 Re-apply Terraform with the current settings
  agents             List supported agents
  help               Show this help

Examples:
  ca https://github.com/user/repo.git
  AGENT=claude ca git@github.com:org/repo.git
  PERMISSIONS=compute,storage ca tf
  ca scp ./notes.txt vm:/workspace/

Run ca <command> --help for the options of one command. Add --debug to any
command to write cloud-agent-debug.log in the current directory.`

export default defineCommand({
  meta: {
    name: 'help',
    description: 'Show help information',
  },
  run: async () => {
    console.log(`${colors.bold(`cloud-agent v${__VERSION__}`)}\n\n${USAGE}`)
  },
})
