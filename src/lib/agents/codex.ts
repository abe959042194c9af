import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { commandExists } from '../exec'
import { uploadSecret } from '../transfer'
import type { AgentDescriptor } from './types'

const CONFIG_FILE = '.codex/config.toml'

export const codex: AgentDescriptor = {
  name: 'codex',
  displayName: 'Codex (OpenAI)',
  remoteCredentialPath: CONFIG_FILE,
  remoteRunCommand: 'codex',
  remoteInstallInstructions: 'npm install -g @openai/codex',
  loginInstructions: "Run 'codex' locally and complete the login flow first, or set OPENAI_API_KEY.",

  isInstalledLocally() {
    return commandExists('codex')
  },

  isAuthenticated(home = homedir()) {
    return existsSync(path.join(home, CONFIG_FILE))
  },

  extractCredential(home = homedir()) {
    const file = path.join(home, CONFIG_FILE)
    return existsSync(file) ? readFileSync(file, 'utf-8') : null
  },

  transferCredential(transport, credential) {
    uploadSecret(transport, credential, CONFIG_FILE)
  },
}
