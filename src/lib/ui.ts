import * as p from '@clack/prompts'
import pc from 'picocolors'

export function intro(verb?: string) {
  const title = verb ? `cloud-agent v${__VERSION__} · ${verb}` : `cloud-agent v${__VERSION__}`
  p.intro(pc.bgCyan(pc.black(` ${title} `)))
}

export function success(message: string) {
  p.log.success(message)
}

export function warn(message: string) {
  p.log.warn(pc.yellow(message))
}

export function info(message: string) {
  p.log.info(message)
}

export function step(message: string) {
  p.log.step(message)
}

export function note(message: string, title?: string) {
  p.note(message, title)
}

export function outro(message: string) {
  p.outro(message)
}

/**
 * The one message a failed verb prints. Goes to stderr, unlike the clack
 * log helpers which always write to stdout.
 */
export function fatal(message: string, hint?: string | null) {
  const lines = [`${pc.red('■')}  ${pc.red(message)}`]
  if (hint) lines.push(`   ${pc.dim(hint)}`)
  process.stderr.write(`${lines.join('\n')}\n`)
}

/** Show a spinner while `task` runs, e.g. the boot wait after `terraform apply`. */
export async function waitFor(message: string, done: string, task: () => Promise<void>) {
  const spinner = p.spinner()
  spinner.start(message)
  try {
    await task()
  } finally {
    spinner.stop(done)
  }
}

export { p as prompts, pc as colors }
