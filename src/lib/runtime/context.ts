import type { AgentDescriptor } from '../agents'
import { resolveAgent } from '../agents'
import { createGcloudProvider } from '../cloud/gcloud'
import { type Config, type ConfigFlags, resolveConfig } from '../config'
import type { AskText } from '../identity'
import { askWithPrompt } from '../identity'
import { createTerraform } from '../infra/terraform'
import type { Fetcher } from '../network'
import { createSshTransport } from '../transport/ssh'
import type { ComputeProvider, InfraTool, Transport, VmConnectionInfo } from '../types'

/** Everything a lifecycle verb needs, resolved once per invocation. */
export interface RuntimeContext {
  config: Config
  agent: AgentDescriptor
  provider: ComputeProvider
  infra: InfraTool
  connect(connection: VmConnectionInfo): Transport
  sleep(ms: number): Promise<void>
  ask: AskText
  fetcher?: Fetcher
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function createRuntime(
  flags: ConfigFlags = {},
  env: Record<string, string | undefined> = process.env,
): RuntimeContext {
  const config = resolveConfig(flags, env)
  // Every verb refuses an unknown agent before touching the network or the cloud.
  const agent = resolveAgent(config.agent)
  return {
    config,
    agent,
    provider: createGcloudProvider(config.projectId),
    infra: createTerraform(config.stateDir),
    connect: createSshTransport,
    sleep,
    ask: askWithPrompt,
  }
}
