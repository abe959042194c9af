import { UnknownAgentError } from '../errors'
import * as ui from '../ui'
import { auggie } from './auggie'
import { claude } from './claude'
import { codex } from './codex'
import type { AgentDescriptor } from './types'

export type { AgentDescriptor } from './types'

const REGISTRY = new Map<string, AgentDescriptor>(
  [auggie, claude, codex].map((agent) => [agent.name, agent]),
)

export function listAgents(): AgentDescriptor[] {
  return [...REGISTRY.values()]
}

export function agentNames(): string[] {
  return [...REGISTRY.keys()]
}

export function resolveAgent(name: string): AgentDescriptor {
  const agent = REGISTRY.get(name.trim().toLowerCase())
  if (!agent) throw new UnknownAgentError(name, agentNames())
  return agent
}

/**
 * Warn (never fail) when the agent CLI is missing locally or not logged in.
 * Returns whether both checks passed.
 */
export function checkPrerequisites(agent: AgentDescriptor): boolean {
  if (!agent.isInstalledLocally()) {
    ui.warn(`${agent.displayName} CLI not found locally. Install it with: ${agent.remoteInstallInstructions}`)
    return false
  }
  if (!agent.isAuthenticated()) {
    ui.warn(`${agent.displayName} is not logged in. ${agent.loginInstructions}`)
    return false
  }
  ui.success(`${agent.displayName} CLI found and logged in`)
  return true
}
