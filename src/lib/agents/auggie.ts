import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { commandExists, run } from '../exec'
import { uploadSecret } from '../transfer'
import type { AgentDescriptor } from './types'

const SESSION_FILE = '.augment/session.json'

/** `auggie tokens print` decorates the JSON session with prose; keep only the object. */
export function parseTokenOutput(output: string): string | null {
  const match = output.match(/\{.*\}/)
  return match ? match[0] : null
}

function readSessionFile(home: string): string | null {
  const file = path.join(home, SESSION_FILE)
  if (!existsSync(file)) return null
  const content = readFileSync(file, 'utf-8').trim()
  return content || null
}

export const auggie: AgentDescriptor = {
  name: 'auggie',
  displayName: 'Auggie (Augment Code)',
  remoteCredentialPath: SESSION_FILE,
  remoteRunCommand: 'auggie',
  remoteInstallInstructions: 'npm install -g @augmentcode/auggie',
  loginInstructions: "Run 'auggie login' locally first.",

  isInstalledLocally() {
    return commandExists('auggie')
  },

  isAuthenticated(home = homedir()) {
    return this.extractCredential(home) !== null
  },

  extractCredential(home = homedir()) {
    if (commandExists('auggie')) {
      const result = run('auggie', ['tokens', 'print'], { secret: true })
      const token = result.ok ? parseTokenOutput(result.stdout) : null
      if (token) return token
    }
    return readSessionFile(home)
  },

  transferCredential(transport, credential) {
    uploadSecret(transport, `${credential}\n`, SESSION_FILE)
  },
}
