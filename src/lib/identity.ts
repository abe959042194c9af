import { MissingIdentityError } from './errors'
import type { VmIdentity } from './types'
import * as ui from './ui'

export const VM_NAME_SUFFIX = '-cloud-agent'

const MAX_VM_NAME_LENGTH = 63
const MAX_LABEL_LENGTH = 63

export interface IdentityInput {
  localUser: string
  usernameOverride?: string | null
  company?: string | null
}

/** Asks the operator for one value; `null` when the prompt was cancelled. */
export type AskText = (message: string) => Promise<string | null>

/**
 * Instance names: a leading letter, then lowercase letters, digits and
 * hyphens, at most 63 characters, no trailing hyphen.
 */
export function normalizeVmName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/^[^a-z]+/, '')
    .slice(0, MAX_VM_NAME_LENGTH)
    .replace(/-+$/, '')
}

/** Label values: lowercase letters, digits and underscores, at most 63 characters. */
export function normalizeOwner(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .slice(0, MAX_LABEL_LENGTH)
}

export function splitHumanName(username: string): { first: string; last: string } | null {
  const index = username.indexOf('.')
  if (index <= 0 || index === username.length - 1) return null
  return { first: username.slice(0, index), last: username.slice(index + 1) }
}

/** The hardened SSH user on the guest, e.g. `jane-doe` for `jane-doe-cloud-agent`. */
export function sshUserFor(identity: VmIdentity): string {
  return identity.name.endsWith(VM_NAME_SUFFIX)
    ? identity.name.slice(0, -VM_NAME_SUFFIX.length)
    : identity.name
}

export const askWithPrompt: AskText = async (message) => {
  const answer = await ui.prompts.text({ message })
  if (ui.prompts.isCancel(answer)) return null
  return answer
}

async function askHumanName(localUser: string, ask: AskText) {
  ui.warn(`Cannot determine owner from $USER (${localUser || 'unset'}). Expected firstname.lastname.`)
  const first = (await ask('First name'))?.trim() ?? ''
  if (!first) throw new MissingIdentityError()
  const last = (await ask('Last name'))?.trim() ?? ''
  if (!last) throw new MissingIdentityError()
  return { first, last }
}

export async function deriveIdentity(
  input: IdentityInput,
  ask: AskText = askWithPrompt,
): Promise<VmIdentity> {
  let owner: string
  let name: string

  if (input.usernameOverride) {
    owner = normalizeOwner(input.usernameOverride)
    name = normalizeVmName(`${input.usernameOverride}${VM_NAME_SUFFIX}`)
  } else {
    const parts = splitHumanName(input.localUser) ?? (await askHumanName(input.localUser, ask))
    owner = normalizeOwner(`${parts.first}_${parts.last}`)
    name = normalizeVmName(`${parts.first}.${parts.last}${VM_NAME_SUFFIX}`)
  }

  if (input.company) {
    owner = normalizeOwner(`${owner}_${input.company}`)
  }

  if (!name || name === VM_NAME_SUFFIX.slice(1)) {
    throw new MissingIdentityError(`Cannot derive a VM name from "${input.usernameOverride ?? input.localUser}".`)
  }

  return { name, owner }
}
