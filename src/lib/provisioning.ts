import { existsSync, readFileSync } from 'node:fs'
import type { Config } from './config'
import { ConfigurationError, VmNotFoundError } from './errors'
import { sshUserFor } from './identity'
import type { Fetcher } from './network'
import { buildAllowedIps } from './network'
import type {
  AllowedIpSet,
  ComputeProvider,
  InfraTool,
  VmExistenceRecord,
  VmIdentity,
} from './types'
import * as ui from './ui'

export const ADMIN_ROLES = [
  'roles/compute.admin',
  'roles/container.admin',
  'roles/storage.admin',
  'roles/iam.serviceAccountUser',
]

const PERMISSION_ROLES: Record<string, string> = {
  compute: 'roles/compute.admin',
  gke: 'roles/container.admin',
  storage: 'roles/storage.admin',
  network: 'roles/compute.networkAdmin',
  bigquery: 'roles/bigquery.admin',
  bq: 'roles/bigquery.admin',
  iam: 'roles/iam.serviceAccountUser',
  logging: 'roles/logging.admin',
  pubsub: 'roles/pubsub.admin',
  sql: 'roles/cloudsql.admin',
  secrets: 'roles/secretmanager.admin',
  dns: 'roles/dns.admin',
  run: 'roles/run.admin',
  functions: 'roles/cloudfunctions.admin',
}

export interface RoleMapping {
  roles: string[]
  unknown: string[]
}

/**
 * Short permission names to IAM roles. `admin` wins over everything else;
 * the result keeps first-seen order without duplicates.
 */
export function mapPermissions(permissions: readonly string[]): RoleMapping {
  const names = permissions.map((entry) => entry.trim().toLowerCase()).filter(Boolean)
  if (names.includes('admin')) {
    return { roles: [...ADMIN_ROLES], unknown: [] }
  }

  const roles: string[] = []
  const unknown: string[] = []
  for (const name of names) {
    const role = Object.hasOwn(PERMISSION_ROLES, name) ? PERMISSION_ROLES[name] : undefined
    if (!role) {
      if (!unknown.includes(name)) unknown.push(name)
      continue
    }
    if (!roles.includes(role)) roles.push(role)
  }
  return { roles, unknown }
}

export function knownPermissions(): string[] {
  return ['admin', ...Object.keys(PERMISSION_ROLES)]
}

/** Quote a value as an HCL string literal, neutralising interpolation sequences. */
export function hclString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/\$\{/g, () => '$${')
    .replace(/%\{/g, '%%{')
  return `"${escaped}"`
}

export function hclList(values: readonly string[]): string {
  return `[${values.map(hclString).join(', ')}]`
}

export interface SshHardening {
  username: string
  publicKey: string
}

/** Read the `.pub` next to the SSH key. Empty values disable hardening on the guest. */
export function readSshHardening(sshKeyPath: string | null, identity: VmIdentity): SshHardening {
  const publicKeyPath = sshKeyPath ? `${sshKeyPath}.pub` : null
  if (publicKeyPath && existsSync(publicKeyPath)) {
    const username = sshUserFor(identity)
    ui.info(`SSH will be restricted to user ${username} with key ${publicKeyPath}`)
    return { username, publicKey: readFileSync(publicKeyPath, 'utf-8').trim() }
  }
  ui.warn('No SSH public key found. SSH will not be hardened to a specific user.')
  return { username: '', publicKey: '' }
}

export interface VariableValues {
  projectId: string
  region: string
  zone: string
  machineType: string
  clusterName: string
  clusterZone: string
  vmName: string
  owner: string
  skipDeletion: 'yes' | 'no'
  serviceAccountRoles: readonly string[]
  allowedIps: AllowedIpSet
  sshUsername: string
  sshPublicKey: string
}

export function renderVariables(values: VariableValues): string {
  if (values.allowedIps.length === 0) {
    throw new ConfigurationError('Refusing to render an empty SSH allow-list.')
  }
  const rows: Array<[string, string]> = [
    ['project_id', hclString(values.projectId)],
    ['region', hclString(values.region)],
    ['zone', hclString(values.zone)],
    ['machine_type', hclString(values.machineType)],
    ['cluster_name', hclString(values.clusterName)],
    ['cluster_zone', hclString(values.clusterZone)],
    ['vm_name', hclString(values.vmName)],
    ['owner', hclString(values.owner)],
    ['skip_deletion', hclString(values.skipDeletion)],
    ['service_account_roles', hclList(values.serviceAccountRoles)],
    ['allowed_ips', hclList(values.allowedIps)],
    ['ssh_username', hclString(values.sshUsername)],
    ['ssh_public_key', hclString(values.sshPublicKey)],
  ]
  const width = Math.max(...rows.map(([key]) => key.length))
  return `${rows.map(([key, value]) => `${key.padEnd(width)} = ${value}`).join('\n')}\n`
}

export type ProvisioningDecision = 'NeedsCreate' | 'Reuse'

export function decideProvisioning(
  config: Pick<Config, 'forceCreate' | 'skipCreate'>,
  identity: VmIdentity,
  existence: () => VmExistenceRecord,
): ProvisioningDecision {
  if (config.forceCreate && config.skipCreate) {
    throw new ConfigurationError('Choose only one of --force-create or --skip-create.')
  }
  if (config.forceCreate) return 'NeedsCreate'

  const record = existence()
  if (config.skipCreate) {
    if (!record.exists) {
      throw new VmNotFoundError(identity.name, 'Remove --skip-create to create it.')
    }
    return 'Reuse'
  }
  return record.exists ? 'Reuse' : 'NeedsCreate'
}

export interface ProvisioningContext {
  config: Config
  identity: VmIdentity
  infra: InfraTool
  provider: ComputeProvider
  fetcher?: Fetcher
  sleep: (ms: number) => Promise<void>
}

export function resolveProjectId(config: Config, provider: ComputeProvider): string {
  const projectId = config.projectId ?? provider.getDefaultProject()
  if (!projectId) {
    throw new ConfigurationError(
      'No GCP project configured. Pass --project, set PROJECT_ID or run: gcloud config set project <id>',
    )
  }
  return projectId
}

/** Assemble the variable file from the current configuration and a fresh allow-list. */
export async function prepareVariables(ctx: ProvisioningContext): Promise<string> {
  const { config, identity } = ctx
  const projectId = resolveProjectId(config, ctx.provider)

  const { roles, unknown } = mapPermissions(config.permissions)
  if (unknown.length > 0) {
    ui.warn(
      `Ignoring unknown permissions: ${unknown.join(', ')}. Known: ${knownPermissions().join(', ')}`,
    )
  }

  const allowedIps = await buildAllowedIps({
    additionalIp: config.additionalIp,
    timeoutMs: config.ipLookupTimeoutMs,
    fetcher: ctx.fetcher,
  })
  const hardening = readSshHardening(config.sshKeyPath, identity)

  return renderVariables({
    projectId,
    region: config.region,
    zone: config.zone,
    machineType: config.machineType,
    clusterName: config.clusterName,
    clusterZone: config.clusterZone,
    vmName: identity.name,
    owner: identity.owner,
    skipDeletion: config.skipDeletion,
    serviceAccountRoles: roles,
    allowedIps,
    sshUsername: hardening.username,
    sshPublicKey: hardening.publicKey,
  })
}

export async function createVm(ctx: ProvisioningContext): Promise<void> {
  const { infra, identity } = ctx
  infra.writeVariables(await prepareVariables(ctx))

  ui.step('Initializing Terraform...')
  infra.init()
  ui.step(`Applying Terraform (creating ${identity.name})...`)
  infra.apply()
  ui.success(`VM ${identity.name} created`)

  const seconds = ctx.config.bootWaitSeconds
  if (seconds > 0) {
    await ui.waitFor(
      `Waiting ${seconds}s for the VM to boot and run its startup script`,
      'Boot wait finished',
      () => ctx.sleep(seconds * 1000),
    )
  }
}

/** Re-render variables from the current environment and apply over existing state. */
export async function reapply(ctx: ProvisioningContext): Promise<void> {
  if (!ctx.infra.hasState()) {
    throw new VmNotFoundError(ctx.identity.name, 'No Terraform state found. Create the VM first with: ca <repo>')
  }
  ctx.infra.writeVariables(await prepareVariables(ctx))
  ui.step('Applying Terraform...')
  ctx.infra.apply()
  ui.success('Terraform apply complete')
}
