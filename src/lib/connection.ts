import { ConfigurationError, VmNotFoundError } from './errors'
import { sshUserFor } from './identity'
import type { ComputeProvider, InfraTool, VmConnectionInfo, VmIdentity } from './types'

export interface ConnectionSources {
  identity: VmIdentity
  zone: string
  sshKeyPath: string | null
  infra: InfraTool
  provider: ComputeProvider
}

/** Terraform outputs when the local state describes this VM, the provider otherwise. */
export function resolveConnection(sources: ConnectionSources): VmConnectionInfo {
  const { identity, infra, provider } = sources
  if (!sources.sshKeyPath) {
    throw new ConfigurationError(
      'No SSH key found. Set SSH_KEY or create one with: ssh-keygen -t ed25519 -f ~/.ssh/cloud-agent',
    )
  }

  let externalIp: string | null = null
  let internalIp: string | null = null
  if (infra.hasState() && infra.output('vm_name') === identity.name) {
    externalIp = infra.output('cloud_agent_ip')
    internalIp = infra.output('cloud_agent_internal_ip')
  }

  if (!externalIp) {
    const described = provider.describeAddresses(identity.name, sources.zone)
    if (!described || !described.externalIp) {
      throw new VmNotFoundError(identity.name, 'Deploy it first or check that it is running.')
    }
    externalIp = described.externalIp
    internalIp = described.internalIp
  }

  return {
    externalIp,
    internalIp: internalIp ?? '',
    sshUser: sshUserFor(identity),
    sshKeyPath: sources.sshKeyPath,
  }
}
