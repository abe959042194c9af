import fs from 'node:fs'
import { homedir, userInfo } from 'node:os'
import path from 'node:path'
import { ConfigurationError } from './errors'
import { defaultStateDir, expandHome } from './paths'

export const DEFAULT_AGENT = 'auggie'
export const DEFAULT_ZONE = 'us-central1-a'
export const DEFAULT_MACHINE_TYPE = 'n2-standard-4'
export const DEFAULT_BOOT_WAIT_SECONDS = 90
export const DEFAULT_IP_LOOKUP_TIMEOUT_MS = 5000

/** Candidate keys under ~/.ssh, most specific first. */
export const SSH_KEY_CANDIDATES = ['cloud-agent', 'id_ed25519', 'id_rsa']

export interface Config {
  agent: string
  projectId: string | null
  region: string
  zone: string
  machineType: string
  clusterName: string
  clusterZone: string
  skipDeletion: 'yes' | 'no'
  permissions: string[]
  additionalIp: string | null
  usernameOverride: string | null
  company: string | null
  localUser: string
  sshKeyPath: string | null
  githubToken: string | null
  githubTokenFile: string | null
  forceCreate: boolean
  skipCreate: boolean
  skipCreds: boolean
  stateDir: string
  bootWaitSeconds: number
  ipLookupTimeoutMs: number
}

/** Raw flag values as parsed by citty; every one of them may also come from the environment. */
export interface ConfigFlags {
  agent?: string
  project?: string
  region?: string
  zone?: string
  machineType?: string
  clusterName?: string
  clusterZone?: string
  skipDeletion?: string
  permissions?: string
  ip?: string
  username?: string
  company?: string
  sshKey?: string
  githubToken?: string
  forceCreate?: boolean
  skipCreate?: boolean
  skipCreds?: boolean
}

type Env = Record<string, string | undefined>

function pick(flag: string | undefined, env: string | undefined): string | null {
  const value = flag ?? env
  if (value === undefined) return null
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}

function isTruthy(value: string | undefined): boolean {
  if (!value) return false
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())
}

function nonNegativeNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number (got "${value}").`)
  }
  return parsed
}

export function normalizeSkipDeletion(value: string | null): 'yes' | 'no' {
  if (!value) return 'yes'
  return ['no', 'false', '0', 'off'].includes(value.toLowerCase()) ? 'no' : 'yes'
}

export function parsePermissionList(value: string | null): string[] {
  if (!value) return []
  return value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean)
}

/** `us-central1-a` → `us-central1`. */
export function regionFromZone(zone: string): string {
  const index = zone.lastIndexOf('-')
  return index > 0 ? zone.slice(0, index) : zone
}

export function detectSshKey(home = homedir()): string | null {
  for (const candidate of SSH_KEY_CANDIDATES) {
    const keyPath = path.join(home, '.ssh', candidate)
    if (fs.existsSync(keyPath)) return keyPath
  }
  return null
}

function localUsername(env: Env): string {
  if (env.USER) return env.USER
  try {
    return userInfo().username
  } catch {
    return ''
  }
}

/**
 * Build the single configuration object for this invocation.
 * Precedence: flag, then environment variable, then default.
 */
export function resolveConfig(flags: ConfigFlags = {}, env: Env = process.env): Config {
  const zone = pick(flags.zone, env.ZONE) ?? DEFAULT_ZONE
  const explicitKey = pick(flags.sshKey, env.SSH_KEY)
  const tokenFile = pick(undefined, env.GITHUB_TOKEN_FILE)

  const forceCreate = Boolean(flags.forceCreate) || isTruthy(env.FORCE_CREATE)
  const skipCreate = Boolean(flags.skipCreate) || isTruthy(env.SKIP_CREATE)
  if (forceCreate && skipCreate) {
    throw new ConfigurationError('Choose only one of --force-create or --skip-create.')
  }

  return {
    agent: (pick(flags.agent, env.AGENT) ?? DEFAULT_AGENT).toLowerCase(),
    projectId: pick(flags.project, env.PROJECT_ID),
    region: pick(flags.region, env.REGION) ?? regionFromZone(zone),
    zone,
    machineType: pick(flags.machineType, env.MACHINE_TYPE) ?? DEFAULT_MACHINE_TYPE,
    clusterName: pick(flags.clusterName, env.CLUSTER_NAME) ?? '',
    clusterZone: pick(flags.clusterZone, env.CLUSTER_ZONE) ?? zone,
    skipDeletion: normalizeSkipDeletion(pick(flags.skipDeletion, env.SKIP_DELETION)),
    permissions: parsePermissionList(pick(flags.permissions, env.PERMISSIONS)),
    additionalIp: pick(flags.ip, env.ADDITIONAL_IP),
    usernameOverride: pick(flags.username, env.USERNAME),
    company: pick(flags.company, env.COMPANY),
    localUser: localUsername(env),
    sshKeyPath: explicitKey ? expandHome(explicitKey) : detectSshKey(),
    githubToken: pick(flags.githubToken, env.GITHUB_TOKEN),
    githubTokenFile: tokenFile ? expandHome(tokenFile) : null,
    forceCreate,
    skipCreate,
    skipCreds: Boolean(flags.skipCreds) || isTruthy(env.SKIP_CREDS),
    stateDir: env.CLOUD_AGENT_HOME ? expandHome(env.CLOUD_AGENT_HOME) : defaultStateDir(),
    bootWaitSeconds: nonNegativeNumber('BOOT_WAIT_SECONDS', env.BOOT_WAIT_SECONDS, DEFAULT_BOOT_WAIT_SECONDS),
    ipLookupTimeoutMs: nonNegativeNumber(
      'IP_LOOKUP_TIMEOUT_MS',
      env.IP_LOOKUP_TIMEOUT_MS,
      DEFAULT_IP_LOOKUP_TIMEOUT_MS,
    ),
  }
}
