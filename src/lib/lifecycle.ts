import type { AgentDescriptor } from './agents'
import { checkPrerequisites } from './agents'
import { resolveConnection } from './connection'
import { fanOutCredentials, selectGitAuth } from './credentials'
import { ConfigurationError, errorMessage } from './errors'
import { resolveExistence } from './existence'
import { deriveIdentity } from './identity'
import { createVm, decideProvisioning, reapply } from './provisioning'
import { WORKSPACE_DIR, resolveRepositories, syncRepositories } from './repos'
import type { RuntimeContext } from './runtime/context'
import { TMUX_SESSION, remoteTarget } from './transport/ssh'
import type { Transport, VmIdentity } from './types'
import * as ui from './ui'

export const PURPOSE_LABEL = 'cloud-agent'

export function identityFor(ctx: RuntimeContext): Promise<VmIdentity> {
  const { config } = ctx
  return deriveIdentity(
    {
      localUser: config.localUser,
      usernameOverride: config.usernameOverride,
      company: config.company,
    },
    ctx.ask,
  )
}

function provisioningContext(ctx: RuntimeContext, identity: VmIdentity) {
  return {
    config: ctx.config,
    identity,
    infra: ctx.infra,
    provider: ctx.provider,
    fetcher: ctx.fetcher,
    sleep: ctx.sleep,
  }
}

function connect(ctx: RuntimeContext, identity: VmIdentity): Transport {
  return ctx.connect(
    resolveConnection({
      identity,
      zone: ctx.config.zone,
      sshKeyPath: ctx.config.sshKeyPath,
      infra: ctx.infra,
      provider: ctx.provider,
    }),
  )
}

export function readySummary(transport: Transport, agent: AgentDescriptor): string {
  const { connection } = transport
  return [
    'Connect (with tmux):',
    '  ca ssh',
    '',
    'Or manually:',
    `  ssh -i ${connection.sshKeyPath} ${remoteTarget(connection)}`,
    '',
    'Start working:',
    `  cd ${WORKSPACE_DIR}/<repo-name>`,
    `  ${agent.remoteRunCommand}`,
    '',
    'VM management:',
    '  ca list       # List VMs',
    '  ca stop       # Stop VM',
    '  ca start      # Start VM',
    '  ca terminate  # Delete VM',
  ].join('\n')
}

function showWorkspace(transport: Transport): void {
  try {
    ui.note(transport.exec(`ls -la ${WORKSPACE_DIR}/`).trimEnd(), 'Workspace')
  } catch (err) {
    ui.warn(`Could not list ${WORKSPACE_DIR}: ${errorMessage(err)}`)
  }
}

/** Ensure the VM exists, then push credentials and repositories to it. */
export async function deploy(ctx: RuntimeContext, repoArgs: readonly string[]): Promise<void> {
  const { config, agent } = ctx
  const repos = resolveRepositories(repoArgs)
  const identity = await identityFor(ctx)

  ui.info(`VM name: ${identity.name}  owner: ${identity.owner}  agent: ${agent.displayName}`)
  if (!config.skipCreds) checkPrerequisites(agent)

  const decision = decideProvisioning(config, identity, () =>
    resolveExistence(identity, ctx.infra, ctx.provider),
  )
  if (decision === 'NeedsCreate') {
    await createVm(provisioningContext(ctx, identity))
  } else {
    ui.info(`VM already exists: ${identity.name}`)
  }

  const transport = connect(ctx, identity)
  if (!config.skipCreds) {
    fanOutCredentials(transport, {
      gitAuth: selectGitAuth(config),
      agent,
      agentCredential: agent.extractCredential(),
    })
  }
  syncRepositories(transport, repos)

  showWorkspace(transport)
  ui.note(readySummary(transport, agent), 'Cloud agent ready')
}

/** Provision unconditionally; no credentials, no repositories. */
export async function createOnly(ctx: RuntimeContext): Promise<VmIdentity> {
  const identity = await identityFor(ctx)
  await createVm(provisioningContext(ctx, identity))
  return identity
}

export async function reapplyConfig(ctx: RuntimeContext): Promise<void> {
  const identity = await identityFor(ctx)
  await reapply(provisioningContext(ctx, identity))
}

export function listVms(ctx: RuntimeContext): void {
  ctx.provider.listInstances(PURPOSE_LABEL)
}

export async function startVm(ctx: RuntimeContext): Promise<VmIdentity> {
  const identity = await identityFor(ctx)
  ui.step(`Starting ${identity.name}...`)
  ctx.provider.startInstance(identity.name, ctx.config.zone)
  return identity
}

export async function stopVm(ctx: RuntimeContext): Promise<VmIdentity> {
  const identity = await identityFor(ctx)
  ui.step(`Stopping ${identity.name}...`)
  ctx.provider.stopInstance(identity.name, ctx.config.zone)
  return identity
}

export type TerminationPath = 'terraform-destroy' | 'provider-delete'

/** Destroy through Terraform when local state exists, otherwise delete the instance directly. */
export function terminateVm(ctx: RuntimeContext, identity: VmIdentity): TerminationPath {
  if (ctx.infra.hasState()) {
    ui.step('Running terraform destroy...')
    ctx.infra.destroy()
    return 'terraform-destroy'
  }
  ui.step('No Terraform state found, deleting the instance with gcloud...')
  ctx.provider.deleteInstance(identity.name, ctx.config.zone)
  return 'provider-delete'
}

export async function openShell(ctx: RuntimeContext): Promise<number> {
  const identity = await identityFor(ctx)
  return connect(ctx, identity).interactive(TMUX_SESSION)
}

export async function copyFiles(ctx: RuntimeContext, src: string, dst: string): Promise<void> {
  if (!src || !dst) {
    throw new ConfigurationError(
      'Usage: ca scp <src> <dst>. Prefix remote paths with "vm:", e.g. ca scp ./notes.txt vm:/workspace/',
    )
  }
  const identity = await identityFor(ctx)
  connect(ctx, identity).copy(src, dst, { recursive: true })
}
