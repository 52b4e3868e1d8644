#!/usr/bin/env node
import { parseArgs, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv, ENV_VARS } from './config/config-loader.js'
import { getConfigPath } from './config/config-service.js'
import { reportCommand } from './cli/commands/index.js'
import { createFormatter } from './cli/output.js'

const runCliCommand = async (action: CommandAction) => {
  const { format, quiet, config: configPath } = action.options
  const formatter = createFormatter(format, quiet)

  // Load config with env var support
  const { config, missing } = await loadConfigWithEnv(configPath)
  if (!config) {
    const missingVars = missing.join(', ')
    return formatter.error(
      `Missing required configuration: ${missingVars}`,
      `Set ${ENV_VARS.LEDGER} or add "ledgerPath" to ${configPath ?? getConfigPath()}.`
    )
  }

  switch (action.command) {
    case 'report':
      await reportCommand(action.options, config)
      break
  }
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCliCommand(action)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

void main()
