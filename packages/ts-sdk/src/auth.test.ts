import fetch from 'node-fetch'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { jsonResponse, mockResponse } from './__test-utils__/responses'
import { authenticate } from './auth'
import { AuthenticationError, ConfigurationError } from './errors'

vi.mock('node-fetch', () => ({
  default: vi.fn(),
}))

const mockFetch = vi.mocked(fetch)

const loginOptions = {
  username: 'user@example.com',
  password: 'test-password',
  clientId: 'test-client-id',
  clientSecret: 'test-client-secret',
}

describe('authenticate', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should exchange credentials for a session', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        access_token: 'test-access-token',
        instance_url: 'https://na1.example.com',
        token_type: 'Bearer',
      })
    )

    const session = await authenticate(loginOptions)

    expect(session).toEqual({
      credential: 'test-access-token',
      baseURL: 'https://na1.example.com/',
      apiVersion: '35.0',
    })
    expect(Object.isFrozen(session)).toBe(true)
  })

  it('should post the password grant as a form', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ access_token: 'test-access-token', instance_url: 'https://na1.example.com' })
    )

    await authenticate(loginOptions)

    const [url, init] = mockFetch.mock.calls[0]
    expect(url).toBe('https://login.salesforce.com/services/oauth2/token')
    expect(init?.method).toBe('POST')
    expect(String(init?.body)).toBe(
      'grant_type=password&client_id=test-client-id&client_secret=test-client-secret&username=user%40example.com&password=test-password'
    )
  })

  it('should not double the separator for a login URL with a trailing slash', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ access_token: 'test-access-token', instance_url: 'https://cs1.example.com/' })
    )

    const session = await authenticate({
      ...loginOptions,
      loginUrl: 'https://test.salesforce.com/',
      apiVersion: '58.0',
    })

    expect(mockFetch.mock.calls[0][0]).toBe('https://test.salesforce.com/services/oauth2/token')
    expect(session.baseURL).toBe('https://cs1.example.com/')
    expect(session.apiVersion).toBe('58.0')
  })

  it('should surface the error description of a rejected login', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ error: 'invalid_grant', error_description: 'authentication failure' }, 400)
    )

    const error = await authenticate(loginOptions).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AuthenticationError)
    expect(error).toMatchObject({
      message: 'authentication failure',
      code: 'invalid_grant',
      status: 400,
    })
  })

  it('should fail on an HTTP error without a JSON body', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse('<html>down</html>', 500))

    await expect(authenticate(loginOptions)).rejects.toThrow(
      'Login failed with HTTP 500: Internal Server Error'
    )
  })

  it('should fail when the token response is incomplete', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 'test-access-token' }))

    await expect(authenticate(loginOptions)).rejects.toThrow(
      'Token response is missing access_token or instance_url'
    )
  })

  it('should reject API versions older than 20.0 before sending anything', async () => {
    await expect(authenticate({ ...loginOptions, apiVersion: '19.0' })).rejects.toBeInstanceOf(
      ConfigurationError
    )
    expect(mockFetch).not.toHaveBeenCalled()
  })
})
