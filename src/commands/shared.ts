import type { ConfigFlags } from '../lib/config'
import * as debug from '../lib/debug'
import { errorMessage } from '../lib/errors'
import { type RuntimeContext, createRuntime } from '../lib/runtime/context'
import * as ui from '../lib/ui'

/** Flags every verb understands. Each one falls back to the environment variable named in its description. */
export const configArgs = {
  agent: { type: 'string', description: 'Coding agent: auggie, claude or codex (AGENT)' },
  project: { type: 'string', description: 'GCP project id (PROJECT_ID)' },
  zone: { type: 'string', description: 'GCP zone (ZONE, default us-central1-a)' },
  region: { type: 'string', description: 'GCP region (REGION, default derived from zone)' },
  'machine-type': { type: 'string', description: 'Machine type (MACHINE_TYPE, default n2-standard-4)' },
  'cluster-name': { type: 'string', description: 'GKE cluster to configure kubectl for (CLUSTER_NAME)' },
  'cluster-zone': { type: 'string', description: 'Zone of that cluster (CLUSTER_ZONE)' },
  'ssh-key': { type: 'string', description: 'Private SSH key (SSH_KEY, default auto-detected)' },
  'github-token': { type: 'string', description: 'GitHub PAT (GITHUB_TOKEN or GITHUB_TOKEN_FILE)' },
  'skip-deletion': { type: 'string', description: 'skip_deletion label: yes or no (SKIP_DELETION)' },
  permissions: { type: 'string', description: 'Service account permissions, e.g. compute,storage or admin (PERMISSIONS)' },
  ip: { type: 'string', description: 'Additional IP or CIDR allowed to SSH (ADDITIONAL_IP)' },
  username: { type: 'string', description: 'Override the name used for the VM (USERNAME)' },
  company: { type: 'string', description: 'Suffix for the owner label (COMPANY)' },
  'force-create': { type: 'boolean', description: 'Create the VM even if it exists (FORCE_CREATE)' },
  'skip-create': { type: 'boolean', description: 'Never create; fail if the VM is missing (SKIP_CREATE)' },
  'skip-creds': { type: 'boolean', description: 'Do not transfer credentials (SKIP_CREDS)' },
} as const

function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key]
  return typeof value === 'string' ? value : undefined
}

function booleanArg(args: Record<string, unknown>, key: string): boolean {
  return args[key] === true
}

export function flagsFrom(args: Record<string, unknown>): ConfigFlags {
  return {
    agent: stringArg(args, 'agent'),
    project: stringArg(args, 'project'),
    zone: stringArg(args, 'zone'),
    region: stringArg(args, 'region'),
    machineType: stringArg(args, 'machine-type'),
    clusterName: stringArg(args, 'cluster-name'),
    clusterZone: stringArg(args, 'cluster-zone'),
    sshKey: stringArg(args, 'ssh-key'),
    githubToken: stringArg(args, 'github-token'),
    skipDeletion: stringArg(args, 'skip-deletion'),
    permissions: stringArg(args, 'permissions'),
    ip: stringArg(args, 'ip'),
    username: stringArg(args, 'username'),
    company: stringArg(args, 'company'),
    forceCreate: booleanArg(args, 'force-create'),
    skipCreate: booleanArg(args, 'skip-create'),
    skipCreds: booleanArg(args, 'skip-creds'),
  }
}

export function reportFailure(label: string, err: unknown): void {
  const message = `${label}: ${errorMessage(err)}`
  if (debug.isEnabled()) {
    debug.log(`ERROR: ${message}`)
    ui.fatal(message, `Debug log: ${debug.getLogPath()}`)
  } else {
    ui.fatal(message)
  }
}

/**
 * Build the runtime from the parsed flags and run one verb. Any error ends the
 * process with exit code 1 after a single message.
 */
export async function runVerb(
  label: string,
  args: Record<string, unknown>,
  action: (ctx: RuntimeContext) => Promise<void> | void,
): Promise<void> {
  try {
    const ctx = createRuntime(flagsFrom(args))
    await action(ctx)
  } catch (err) {
    reportFailure(label, err)
    return process.exit(1)
  }
}
