import { authenticate } from './auth'
import { type ClientOptions, type LoginOptions, resolveClientOptions } from './config'
import type { ForceRecord } from './decode'
import { ConfigurationError } from './errors'
import { buildSoqlPath, fetchPage } from './query'
import type { SessionContext } from './session'

export class ForceClient {
  private readonly session: SessionContext
  private readonly options: ClientOptions

  constructor(session: SessionContext, options: ClientOptions = {}) {
    resolveClientOptions(options)
    this.session = session
    this.options = options
  }

  /**
   * Sign in with the OAuth password grant and return a client for the session
   */
  static async login(loginOptions: LoginOptions, options: ClientOptions = {}): Promise<ForceClient> {
    const session = await authenticate(loginOptions, options)
    return new ForceClient(session, options)
  }

  /**
   * Run a SOQL query and return every matching record, across all pages
   */
  async query(soql: string): Promise<ForceRecord[]> {
    if (!soql || soql.trim() === '') {
      throw new ConfigurationError(
        'SOQL query is required (e.g. SELECT Id, Name FROM Account LIMIT 10)'
      )
    }
    return fetchPage(this.session, buildSoqlPath(this.session.apiVersion, soql), this.options)
  }

  /**
   * Continue a previous query from its nextRecordsUrl
   */
  async queryMore(nextRecordsUrl: string): Promise<ForceRecord[]> {
    if (!nextRecordsUrl || nextRecordsUrl.trim() === '') {
      throw new ConfigurationError(
        'nextRecordsUrl is required. Use the value returned by a previous query.'
      )
    }
    return fetchPage(this.session, nextRecordsUrl.trim(), this.options)
  }

  getSession(): SessionContext {
    return this.session
  }
}
