import { ProvisioningError } from '../errors'
import { run } from '../exec'
import type { ComputeProvider, InstanceAddresses } from '../types'

export const LIST_FORMAT =
  'table(name,zone,status,labels.owner,labels.skip_deletion,networkInterfaces[0].accessConfigs[0].natIP:label=EXTERNAL_IP)'

const ADDRESS_FORMAT =
  'value(networkInterfaces[0].accessConfigs[0].natIP,networkInterfaces[0].networkIP)'


export function parseAddresses(output: string): InstanceAddresses | null {
  const [externalIp = '', internalIp = ''] = output.trim().split(/[\s;]+/)
  if (!externalIp && !internalIp) return null
  return { externalIp, internalIp }
}

/**
 * `gcloud` CLI backed provider. Mutating calls stream their output to the
 * terminal. Instance calls target `projectId` when one is configured,
 * otherwise gcloud's active project.
 */
export function createGcloudProvider(projectId: string | null = null): ComputeProvider {
  const scope = projectId ? [`--project=${projectId}`] : []

  function gcloud(args: string[], failure: string, interactive = false): string {
    const result = run('gcloud', [...args, ...scope], interactive ? { inheritStdio: true } : {})
    if (!result.ok) throw new ProvisioningError(failure, result.stderr)
    return result.stdout
  }

  return {
    getDefaultProject() {
      const result = run('gcloud', ['config', 'get-value', 'project'])
      const value = result.ok ? result.stdout.trim() : ''
      return value && value !== '(unset)' ? value : null
    },

    listInstances(purposeLabel) {
      gcloud(
        ['compute', 'instances', 'list', `--filter=labels.purpose=${purposeLabel}`, `--format=${LIST_FORMAT}`],
        'Failed to list VMs.',
        true,
      )
    },

    findInstancesByName(name) {
      const output = gcloud(
        ['compute', 'instances', 'list', `--filter=name=${name}`, '--format=value(name)'],
        'Failed to query VMs.',
      )
      return output.split('\n').map((line) => line.trim()).filter(Boolean)
    },

    describeAddresses(name, zone) {
      const result = run('gcloud', [
        'compute',
        'instances',
        'describe',
        name,
        `--zone=${zone}`,
        `--format=${ADDRESS_FORMAT}`,
        ...scope,
      ])
      return result.ok ? parseAddresses(result.stdout) : null
    },

    startInstance(name, zone) {
      gcloud(['compute', 'instances', 'start', name, `--zone=${zone}`], `Failed to start ${name}.`, true)
    },

    stopInstance(name, zone) {
      gcloud(['compute', 'instances', 'stop', name, `--zone=${zone}`], `Failed to stop ${name}.`, true)
    },

    deleteInstance(name, zone) {
      gcloud(
        ['compute', 'instances', 'delete', name, `--zone=${zone}`, '--quiet'],
        `Failed to delete ${name}.`,
        true,
      )
    },
  }
}
