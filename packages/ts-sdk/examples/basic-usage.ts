import {
  createSession,
  ForceClient,
  ForceError,
  loadLoginOptionsFromEnv,
  ServiceError,
  toRows,
  columnsOf,
} from '../src/index'

// Example 1: Sign in from FORCE_* environment variables and run a query
async function basicExample() {
  try {
    const client = await ForceClient.login(loadLoginOptionsFromEnv())
    const accounts = await client.query('SELECT Id, Name, Industry FROM Account')

    console.log(`✅ Fetched ${accounts.length} accounts`)
    console.log(columnsOf(accounts).join('\t'))
    for (const row of toRows(accounts)) {
      console.log(row.join('\t'))
    }
  } catch (error) {
    if (error instanceof ServiceError) {
      console.error('Service rejected the query:', error.code, error.serviceMessage)
    } else if (error instanceof ForceError) {
      console.error('SDK Error:', error.message, 'Code:', error.code)
    } else {
      console.error('Unexpected error:', error)
    }
  }
}

// Example 2: Reuse a token obtained elsewhere, with tracing and a timeout
async function existingSessionExample() {
  const session = createSession(
    process.env.FORCE_ACCESS_TOKEN ?? '',
    process.env.FORCE_INSTANCE_URL ?? '',
    '58.0'
  )
  const client = new ForceClient(session, { debug: true, timeout: 60000 })

  try {
    const contacts = await client.query(
      "SELECT Id, LastName, Account.Name FROM Contact WHERE CreatedDate = LAST_N_DAYS:30"
    )
    console.log('Contacts:', contacts)
  } catch (error) {
    console.error('Error:', error)
  }
}

// Run examples
if (require.main === module) {
  console.log('🚀 Running forcequery SDK examples\n')

  basicExample()
    .then(() => console.log('\n✅ Basic example completed'))
    .catch(console.error)

  existingSessionExample()
    .then(() => console.log('\n✅ Existing session example completed'))
    .catch(console.error)
}
