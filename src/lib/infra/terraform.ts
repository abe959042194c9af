import { copyFileSync, existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs'
import path from 'node:path'
import * as debug from '../debug'
import { ProvisioningError } from '../errors'
import { run } from '../exec'
import { getStatePath, getTemplateDir, getVariablesPath } from '../paths'
import type { InfraTool } from '../types'

const TEMPLATE_FILES = /\.(tf|sh)$/

/** Refresh the shipped templates in the working directory. Never touches state or variables. */
export function syncTemplates(templateDir: string, workDir: string): string[] {
  mkdirSync(workDir, { recursive: true })
  const copied: string[] = []
  for (const entry of readdirSync(templateDir)) {
    if (!TEMPLATE_FILES.test(entry)) continue
    copyFileSync(path.join(templateDir, entry), path.join(workDir, entry))
    copied.push(entry)
  }
  debug.log(`[terraform] synced templates into ${workDir}: ${copied.join(', ')}`)
  return copied
}

export function createTerraform(workDir: string, templateDir: () => string = getTemplateDir): InfraTool {
  function terraform(args: string[], failure: string): void {
    syncTemplates(templateDir(), workDir)
    const result = run('terraform', args, { cwd: workDir, streamStdout: true })
    if (!result.ok) throw new ProvisioningError(failure, result.stderr)
  }

  return {
    workDir,

    hasState() {
      return existsSync(getStatePath(workDir))
    },

    writeVariables(content) {
      mkdirSync(workDir, { recursive: true })
      writeFileSync(getVariablesPath(workDir), content, { mode: 0o600 })
    },

    init() {
      terraform(['init', '-input=false'], 'terraform init failed.')
    },

    apply() {
      terraform(['apply', '-auto-approve', '-input=false'], 'terraform apply failed.')
    },

    destroy() {
      terraform(['destroy', '-auto-approve', '-input=false'], 'terraform destroy failed.')
    },

    output(name) {
      if (!existsSync(workDir)) return null
      const result = run('terraform', ['output', '-raw', name], { cwd: workDir })
      const value = result.stdout.trim()
      return result.ok && value ? value : null
    },
  }
}
