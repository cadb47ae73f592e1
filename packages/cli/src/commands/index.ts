/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/keyline.ts for non-interactive use.
 */

import { program } from 'commander'
import { createCheckCommand } from './check.js'
import { createParseCommand } from './parse.js'
import { createLogCommand } from './log.js'

program
  .name('keyline')
  .description(
    'Keyline — command-language front end for terminal application configuration.\n' +
    'Run without arguments in a terminal for an interactive prompt.',
  )
  .version('0.1.0')

program.addCommand(createCheckCommand())
program.addCommand(createParseCommand())
program.addCommand(createLogCommand())

export { program }
