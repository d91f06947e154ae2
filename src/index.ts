import { Command } from 'commander'
import { registerDeployCommand } from './commands/deploy'
import { registerValidateContractsCommand } from './commands/validate-contracts'
import { isColorMode, setColorMode } from './utils/colors'
import { errorMessage } from './utils/errors'
import { logger } from './utils/logger'

const VERSION: string = '0.1.0'

/**
 * Apply output flags before Commander parses, so early logs already honour them.
 */
function applyGlobalFlags(argv: readonly string[]): void {
  if (argv.includes('--verbose')) logger.setLevel('debug')
  if (argv.includes('--quiet')) logger.setLevel('error')
  if (argv.includes('--json')) logger.setJsonOnly(true)
  if (argv.includes('--no-emoji')) logger.setNoEmoji(true)
  if (argv.includes('--compact-json')) logger.setJsonCompact(true)
  if (argv.includes('--timestamps')) logger.setTimestamps(true)
  const colorIx = argv.findIndex((a) => a === '--color')
  const mode: string | undefined = colorIx !== -1 ? argv[colorIx + 1] : undefined
  setColorMode(mode !== undefined && isColorMode(mode) ? mode : 'auto')
}

function main(): void {
  const program: Command = new Command()
  program.name('lambda-pack')
  program.description('Package and deploy Lambda functions, and check their contract bundle')
  program.version(VERSION)
  program.option('--verbose', 'Verbose output (prints underlying commands)')
  program.option('--quiet', 'Error-only output')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--compact-json', 'Compact JSON (one line)')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  applyGlobalFlags(process.argv)
  registerDeployCommand(program)
  registerValidateContractsCommand(program)
  program.parseAsync(process.argv)
    .catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
    })
}

main()
