import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { commandExists } from '../exec'
import { uploadSecret } from '../transfer'
import type { AgentDescriptor } from './types'

const SETTINGS_FILE = '.claude.json'

export const claude: AgentDescriptor = {
  name: 'claude',
  displayName: 'Claude Code (Anthropic)',
  remoteCredentialPath: SETTINGS_FILE,
  remoteRunCommand: 'claude',
  remoteInstallInstructions: 'npm install -g @anthropic-ai/claude-code',
  loginInstructions: "Run 'claude' locally and complete the login flow first.",

  isInstalledLocally() {
    return commandExists('claude')
  },

  isAuthenticated(home = homedir()) {
    return this.extractCredential(home) !== null
  },

  // The whole settings file travels; it is only usable once it holds an OAuth account.
  extractCredential(home = homedir()) {
    const file = path.join(home, SETTINGS_FILE)
    if (!existsSync(file)) return null
    const content = readFileSync(file, 'utf-8')
    return content.includes('"oauthAccount"') ? content : null
  },

  transferCredential(transport, credential) {
    uploadSecret(transport, credential, SETTINGS_FILE)
    transport.exec('mkdir -p ~/.claude')
  },
}
