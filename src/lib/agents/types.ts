import type { Transport } from '../types'

/** Everything the orchestrator needs to know about one coding agent. */
export interface AgentDescriptor {
  name: string
  displayName: string
  /** Where the credential lands on the guest, relative to the SSH user's home. */
  remoteCredentialPath: string
  /** Command that starts the agent inside the guest. */
  remoteRunCommand: string
  /** How the guest bootstrap (or the operator) installs the agent CLI. */
  remoteInstallInstructions: string
  loginInstructions: string
  isInstalledLocally(): boolean
  isAuthenticated(home?: string): boolean
  /** The serialized local credential, or `null` when the operator is not logged in. */
  extractCredential(home?: string): string | null
  transferCredential(transport: Transport, credential: string): void
}
