export interface VmIdentity {
  /** Provider-legal instance name, e.g. `jane-doe-cloud-agent`. */
  name: string
  /** Label value used for bookkeeping, e.g. `jane_doe`. */
  owner: string
}

/** Host CIDRs allowed to reach the guest's SSH port. Never empty once built. */
export type AllowedIpSet = readonly string[]

export type ExistenceSource = 'LOCAL_STATE' | 'PROVIDER_QUERY' | 'NONE'

export interface VmExistenceRecord {
  exists: boolean
  source: ExistenceSource
}

export interface VmConnectionInfo {
  externalIp: string
  internalIp: string
  sshUser: string
  sshKeyPath: string
}

export type CredentialKind = 'git-ssh-key' | 'git-pat' | `agent:${string}`

export type CredentialSource = { path: string } | { value: string }

export interface CredentialEntry {
  source: CredentialSource
  /** Path relative to the guest user's home directory. */
  remotePath: string
  mode: number
}

export type CredentialBundle = Map<CredentialKind, CredentialEntry>

export interface InstanceAddresses {
  externalIp: string
  internalIp: string
}

/** The cloud provider's control-plane CLI. */
export interface ComputeProvider {
  getDefaultProject(): string | null
  /** Prints the instance table for every VM carrying the purpose label. */
  listInstances(purposeLabel: string): void
  findInstancesByName(name: string): string[]
  describeAddresses(name: string, zone: string): InstanceAddresses | null
  startInstance(name: string, zone: string): void
  stopInstance(name: string, zone: string): void
  deleteInstance(name: string, zone: string): void
}

/** The infrastructure-as-code tool and its local state. */
export interface InfraTool {
  readonly workDir: string
  hasState(): boolean
  writeVariables(content: string): void
  init(): void
  apply(): void
  destroy(): void
  output(name: string): string | null
}

/** Direct key-based shell and file copy to the guest. */
export interface Transport {
  readonly connection: VmConnectionInfo
  exec(command: string): string
  copyTo(localPath: string, remotePath: string): void
  copy(src: string, dst: string, options?: { recursive?: boolean }): void
  interactive(command: string): number
}
