import { ProvisioningError } from '../errors'
import { run } from '../exec'
import type { Transport, VmConnectionInfo } from '../types'

export const SSH_OPTIONS = ['-o', 'StrictHostKeyChecking=accept-new', '-o', 'ConnectTimeout=10']

export const TMUX_SESSION = 'tmux attach-session 2>/dev/null || tmux new-session'

export function remoteTarget(connection: VmConnectionInfo): string {
  return `${connection.sshUser}@${connection.externalIp}`
}

/** Replace a leading `vm:` with `user@ip:`; any other argument is a local path. */
export function rewriteScpPath(value: string, connection: VmConnectionInfo): string {
  return value.startsWith('vm:') ? `${remoteTarget(connection)}:${value.slice(3)}` : value
}

export function sshArgs(connection: VmConnectionInfo, command: string, tty = false): string[] {
  return [
    '-i',
    connection.sshKeyPath,
    ...SSH_OPTIONS,
    ...(tty ? ['-t'] : []),
    remoteTarget(connection),
    command,
  ]
}

export function scpArgs(
  connection: VmConnectionInfo,
  src: string,
  dst: string,
  recursive = false,
): string[] {
  return ['-i', connection.sshKeyPath, ...SSH_OPTIONS, ...(recursive ? ['-r'] : []), src, dst]
}

export function createSshTransport(connection: VmConnectionInfo): Transport {
  return {
    connection,

    exec(command) {
      const result = run('ssh', sshArgs(connection, command))
      if (!result.ok) {
        throw new ProvisioningError(`Remote command failed on ${connection.externalIp}.`, result.stderr)
      }
      return result.stdout
    },

    copyTo(localPath, remotePath) {
      const result = run('scp', scpArgs(connection, localPath, `${remoteTarget(connection)}:${remotePath}`))
      if (!result.ok) {
        throw new ProvisioningError(`Copy to ${connection.externalIp} failed.`, result.stderr)
      }
    },

    copy(src, dst, options = {}) {
      const result = run(
        'scp',
        scpArgs(connection, rewriteScpPath(src, connection), rewriteScpPath(dst, connection), options.recursive),
        { inheritStdio: true },
      )
      if (!result.ok) {
        throw new ProvisioningError('scp failed.', result.stderr)
      }
    },

    interactive(command) {
      return run('ssh', sshArgs(connection, command, true), { inheritStdio: true }).status
    },
  }
}
