import * as debug from './debug'
import type { ComputeProvider, InfraTool, VmExistenceRecord, VmIdentity } from './types'

/**
 * Local provisioning state is trusted first; the provider is only asked when
 * the state is missing or belongs to a different VM. A VM deleted out of band
 * after the state was written still reports `LOCAL_STATE`.
 */
export function resolveExistence(
  identity: VmIdentity,
  infra: InfraTool,
  provider: ComputeProvider,
): VmExistenceRecord {
  if (infra.hasState()) {
    const recorded = infra.output('vm_name')
    debug.log(`[existence] state records vm_name=${recorded ?? '<none>'}`)
    if (recorded === identity.name) {
      return { exists: true, source: 'LOCAL_STATE' }
    }
  }

  const matches = provider.findInstancesByName(identity.name)
  if (matches.includes(identity.name)) {
    return { exists: true, source: 'PROVIDER_QUERY' }
  }
  return { exists: false, source: 'NONE' }
}
