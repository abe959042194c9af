import fs from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

let resolvedTemplateDir: string | null = null

/**
 * Default directory for terraform.tfvars, terraform.tfstate and the copied
 * templates. Only a path; it is created on the first Terraform write.
 */
export function defaultStateDir(home = homedir()): string {
  return path.join(home, '.cloud-agent', 'terraform')
}

export function getStatePath(stateDir: string): string {
  return path.join(stateDir, 'terraform.tfstate')
}

export function getVariablesPath(stateDir: string): string {
  return path.join(stateDir, 'terraform.tfvars')
}

/**
 * The bundled `terraform/` directory. Searched upwards from this module so it
 * resolves both from `src/lib` and from the bundled `dist/index.js`.
 */
export function getTemplateDir(): string {
  if (resolvedTemplateDir) return resolvedTemplateDir

  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (;;) {
    const candidate = path.join(dir, 'terraform')
    if (fs.existsSync(path.join(candidate, 'main.tf'))) {
      resolvedTemplateDir = candidate
      return candidate
    }
    const parent = path.dirname(dir)
    if (parent === dir) break
    dir = parent
  }
  throw new Error('Terraform templates not found next to the cloud-agent installation.')
}

export function expandHome(value: string): string {
  if (value === '~') return homedir()
  if (value.startsWith('~/')) return path.join(homedir(), value.slice(2))
  return value
}
