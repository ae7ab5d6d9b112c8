#!/usr/bin/env tsx
import { Command } from 'commander'
import { resolveCommand } from './commands/resolve.js'
import { checksumCommand } from './commands/checksum.js'
import { packagesCommand } from './commands/packages.js'
import { verifyCommand } from './commands/verify.js'

const program = new Command()

program
  .name('msgdef')
  .description('Resolve nested message definitions into self-contained schemas')
  .version('0.1.0')

program
  .command('resolve <type>')
  .description('Print the flattened definition of a message type')
  .option('--root <dir>', 'Project root containing msgdef.yaml')
  .option('--checksum', 'Compute the MD5 checksum of the expanded schema')
  .option('--json', 'Output the schema identity as JSON')
  .option('--verbose', 'Log every resolved dependency to stderr')
  .action(async (type, options) => {
    const result = await resolveCommand(type, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('checksum <type>')
  .description('Print the MD5 checksum of a message type')
  .option('--root <dir>', 'Project root containing msgdef.yaml')
  .option('--expect <checksum>', 'Fail unless the checksum matches')
  .option('--verbose', 'Log every resolved dependency to stderr')
  .action(async (type, options) => {
    const result = await checksumCommand(type, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('packages')
  .description('List the message packages visible from the project')
  .option('--root <dir>', 'Project root containing msgdef.yaml')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const result = await packagesCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('verify <package>')
  .description('Check that every message of a package parses and resolves')
  .option('--root <dir>', 'Project root containing msgdef.yaml')
  .option('--json', 'Output as JSON')
  .action(async (pkg, options) => {
    const result = await verifyCommand(pkg, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.passed) {
      process.exit(1)
    }
  })

await program.parseAsync()
