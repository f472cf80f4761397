import chalk from 'chalk'
import { Command, InvalidArgumentError, Option } from 'commander'
import {
  authenticate,
  type ClientOptions,
  columnsOf,
  ConfigurationError,
  createSession,
  DEFAULT_API_VERSION,
  ForceClient,
  type ForceRecord,
  LOGIN_ENV_VARS,
  loadLoginOptionsFromEnv,
  type SessionContext,
  toRows,
} from 'forcequery'

export type OutputFormat = 'json' | 'csv'

export interface ConnectionOptions {
  token?: string
  instanceUrl?: string
  apiVersion?: string
  loginUrl?: string
  insecure?: boolean
  debug?: boolean
  timeout?: number
}

export interface OutputOptions extends ConnectionOptions {
  format?: OutputFormat
}

function parseTimeout(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.')
  }
  return parsed
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function toCsv(records: ForceRecord[]): string {
  const columns = columnsOf(records)
  return [columns, ...toRows(records, columns)]
    .map((row) => row.map(csvField).join(','))
    .join('\n')
}

export function formatRecords(records: ForceRecord[], format: OutputFormat = 'json'): string {
  return format === 'csv' ? toCsv(records) : JSON.stringify(records, null, 2)
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

function clientOptionsFrom(options: ConnectionOptions): ClientOptions {
  return {
    debug: Boolean(options.debug),
    rejectUnauthorized: !options.insecure,
    timeout: options.timeout,
  }
}

/**
 * Uses --token/--instance-url when given, otherwise signs in with the
 * FORCE_* credentials from the environment.
 */
export async function resolveSession(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<SessionContext> {
  if (options.token || options.instanceUrl) {
    if (!options.token || !options.instanceUrl) {
      throw new ConfigurationError('--token and --instance-url must be given together')
    }
    return createSession(
      options.token,
      options.instanceUrl,
      options.apiVersion || env[LOGIN_ENV_VARS.apiVersion] || DEFAULT_API_VERSION
    )
  }

  const loginOptions = loadLoginOptionsFromEnv(env, {
    loginUrl: options.loginUrl,
    apiVersion: options.apiVersion,
  })
  return authenticate(loginOptions, clientOptionsFrom(options))
}

export async function runLogin(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const session = await resolveSession(options, env)
  return JSON.stringify(session, null, 2)
}

export async function runQuery(
  soql: string,
  options: OutputOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const session = await resolveSession(options, env)
  const client = new ForceClient(session, clientOptionsFrom(options))
  return formatRecords(await client.query(soql), options.format)
}

export async function runMore(
  nextRecordsUrl: string,
  options: OutputOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  if (!options.token || !options.instanceUrl) {
    throw new ConfigurationError('more needs --token and --instance-url from the earlier query')
  }
  const session = await resolveSession(options, env)
  const client = new ForceClient(session, clientOptionsFrom(options))
  return formatRecords(await client.queryMore(nextRecordsUrl), options.format)
}

function withErrorHandling<A extends unknown[]>(action: (...args: A) => Promise<string>) {
  return async (...args: A) => {
    try {
      console.log(await action(...args))
    } catch (error) {
      console.error(chalk.red(`❌ ${formatError(error)}`))
      process.exitCode = 1
    }
  }
}

function addConnectionOptions(command: Command): Command {
  return command
    .option('--api-version <version>', 'REST API version, e.g. 58.0')
    .option('--login-url <url>', 'OAuth login URL (use https://test.salesforce.com for sandboxes)')
    .option('--insecure', 'Skip TLS certificate verification')
    .option('--debug', 'Log request URLs and raw responses')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseTimeout)
}

function addOutputOptions(command: Command): Command {
  return addConnectionOptions(command)
    .option('--token <token>', 'Access token of an existing session')
    .option('--instance-url <url>', 'Instance URL of an existing session')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(['json', 'csv']).default('json')
    )
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command()

  program
    .name('forcequery')
    .description('Run SOQL queries against Force.com and print every page of results')
    .version('0.1.0')

  addConnectionOptions(
    program.command('login').description('Sign in with FORCE_* credentials and print the session')
  ).action(withErrorHandling((options: ConnectionOptions) => runLogin(options, env)))

  addOutputOptions(
    program.command('query <soql>').description('Run a SOQL query and print all records')
  ).action(
    withErrorHandling((soql: string, options: OutputOptions) => runQuery(soql, options, env))
  )

  addOutputOptions(
    program
      .command('more <nextRecordsUrl>')
      .description('Fetch the remaining records of an earlier query')
  ).action(
    withErrorHandling((nextRecordsUrl: string, options: OutputOptions) =>
      runMore(nextRecordsUrl, options, env)
    )
  )

  return program
}
