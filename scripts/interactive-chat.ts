import 'dotenv/config'
import readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import {
  colors,
  createTerminalIO,
  describeError,
  runConsoleSession,
  runSingleQuery,
} from '../src/cli/console-session'
import { LLM_PROVIDERS } from '../src/constants'
import { createS3Agent } from '../src/lib/agents'
import {
  type AppConfig,
  applySettings,
  loadConfig,
  SessionSettingsSchema,
} from '../src/lib/config'
import { ConfigurationError } from '../src/lib/errors'
import { type AppLogLevel, createAppLogger } from '../src/lib/logger'
import { startServer } from '../src/web/server'

// --- Configuration Loading ---
async function loadCliArgs() {
  const args = hideBin(process.argv)
  const processedArgs = args[0] === '--' ? args.slice(1) : args

  return await yargs(processedArgs)
    .option('ui', {
      type: 'boolean',
      description: 'Start the web interface instead of the console chat',
      default: false,
    })
    .option('query', {
      alias: 'q',
      type: 'string',
      description:
        'Execute a single query and exit without starting the interactive chat.',
    })
    .option('region', {
      alias: 'r',
      type: 'string',
      description: 'AWS region. Defaults to AWS_REGION or us-east-1.',
    })
    .option('profile', {
      alias: 'p',
      type: 'string',
      description: 'The AWS profile to use for credentials',
    })
    .option('provider', {
      type: 'string',
      description: 'Language model provider',
      choices: LLM_PROVIDERS,
    })
    .option('model', {
      type: 'string',
      description: 'Language model id for the chosen provider',
    })
    .option('max-steps', {
      type: 'number',
      description: 'Maximum tool invocations per question',
    })
    .option('debug', {
      type: 'boolean',
      description: 'Enable debug output for troubleshooting',
      default: false,
    })
    .help()
    .alias('help', 'h').argv
}

type CliArgs = Awaited<ReturnType<typeof loadCliArgs>>

function buildConfig(argv: CliArgs): AppConfig {
  const base = loadConfig(process.env)
  const settings = SessionSettingsSchema.safeParse({
    awsRegion: argv.region,
    llmProvider: argv.provider,
    llmModelId: argv.model,
  })
  if (!settings.success) {
    throw new ConfigurationError(
      `Invalid command line options: ${settings.error.issues.map((issue) => issue.message).join('; ')}`
    )
  }
  const config = applySettings(base, settings.data)

  const maxSteps = argv.maxSteps
  if (maxSteps !== undefined && (!Number.isInteger(maxSteps) || maxSteps < 1)) {
    throw new ConfigurationError('--max-steps must be a positive integer')
  }

  // Tool logs would interleave with the chat, so the console is quieter unless asked
  let logLevel: AppLogLevel = config.logLevel
  if (argv.debug) {
    logLevel = 'debug'
  } else if (!argv.ui && !process.env.LOG_LEVEL) {
    logLevel = 'warn'
  }

  return {
    ...config,
    aws: { ...config.aws, profile: argv.profile ?? config.aws.profile },
    agent: { ...config.agent, maxSteps: maxSteps ?? config.agent.maxSteps },
    logLevel,
  }
}

// --- Main Execution ---
async function main() {
  const argv = await loadCliArgs()
  const config = buildConfig(argv)
  const logger = createAppLogger('S3Assistant', config.logLevel)

  if (argv.debug) {
    console.log(`${colors.dim}[DEBUG] Debug mode enabled.${colors.reset}`)
  }

  if (argv.ui) {
    await startServer(config, logger)
    return
  }

  const agent = createS3Agent(config, { logger })
  const rl = readline.createInterface({ input, output, terminal: true })
  const io = createTerminalIO(rl, output)

  process.on('SIGINT', () => {
    rl.close()
  })

  if (argv.query) {
    const ok = await runSingleQuery({ agent, config, io }, argv.query)
    rl.close()
    process.exit(ok ? 0 : 1)
  }

  await runConsoleSession({ agent, config, io })
  rl.close()
  process.exit(0)
}

try {
  await main()
} catch (error: unknown) {
  console.error(
    `${colors.red}\nUnhandled error during script execution:${colors.brightRed}`,
    describeError(error),
    colors.reset
  )
  process.exit(1)
}
