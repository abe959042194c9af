export const VERBS = [
  'deploy',
  'create-vm',
  'list',
  'start',
  'stop',
  'terminate',
  'ssh',
  'scp',
  'tf',
  'agents',
  'help',
] as const

export const DEFAULT_VERB = 'deploy'

const TOP_LEVEL_FLAGS = new Set(['--help', '-h', '--version', '-v'])

/** Remove every `--debug`; returns whether one was present. */
export function stripDebugFlag(args: string[]): { args: string[]; debug: boolean } {
  const rest = args.filter((arg) => arg !== '--debug')
  return { args: rest, debug: rest.length !== args.length }
}

/**
 * Route anything that does not start with a verb to `deploy`, so `ca <repo>`
 * and a bare `ca` both deploy. Top-level help and version stay with the root.
 */
export function routeToVerb(args: string[]): string[] {
  const [first] = args
  if (first === undefined) return [DEFAULT_VERB]
  if (TOP_LEVEL_FLAGS.has(first)) return args
  if ((VERBS as readonly string[]).includes(first)) return args
  return [DEFAULT_VERB, ...args]
}
