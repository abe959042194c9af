/**
 * Fatal problems with flags, environment or local setup. Raised before any
 * cloud resource is touched whenever possible.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class UnknownAgentError extends ConfigurationError {
  readonly agent: string
  readonly available: string[]

  constructor(agent: string, available: string[]) {
    super(`Unknown agent "${agent}". Available agents: ${available.join(', ')}`)
    this.name = 'UnknownAgentError'
    this.agent = agent
    this.available = available
  }
}

export class MissingIdentityError extends ConfigurationError {
  constructor(message = 'First and last name are required to name the VM.') {
    super(message)
    this.name = 'MissingIdentityError'
  }
}

export class NetworkDetectionError extends Error {
  constructor(
    message = 'Could not detect your public IP address. It is required to restrict SSH access in the firewall.',
  ) {
    super(message)
    this.name = 'NetworkDetectionError'
  }
}

/** Terraform or gcloud failed. `output` holds the tool's own diagnostics. */
export class ProvisioningError extends Error {
  readonly output: string

  constructor(message: string, output = '') {
    const trimmed = output.trim()
    super(trimmed ? `${message}\n${trimmed}` : message)
    this.name = 'ProvisioningError'
    this.output = trimmed
  }
}

export class VmNotFoundError extends Error {
  readonly vmName: string

  constructor(vmName: string, hint?: string) {
    super(hint ? `VM "${vmName}" not found. ${hint}` : `VM "${vmName}" not found.`)
    this.name = 'VmNotFoundError'
    this.vmName = vmName
  }
}

/** Non-fatal: reported to the operator, never thrown out of the credential fan-out. */
export class CredentialTransferWarning extends Error {
  readonly kind: string

  constructor(kind: string, message: string) {
    super(message)
    this.name = 'CredentialTransferWarning'
    this.kind = kind
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
