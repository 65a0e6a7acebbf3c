/**
 * Unit tests for the version resolver
 */

import { describe, it } from 'node:test'
import { CHANNELS } from '../../config/channels'
import { ErrorCodes } from '../../core/error-handler'
import {
  VersionResolver,
  decodeReleaseMetadata,
} from '../../core/version-resolver'
import { Channel } from '../../types'
import {
  assertDeepEqual,
  assertEqual,
  assertRejectsWithCode,
  assertThrowsWithCode,
} from '../utils/assertions'
import { createFetchStub } from '../utils/fetch-stub'

const BASE_URL = 'https://api.test'

const STABLE_RELEASE = {
  url: 'https://example.com/nvda_2024.1.exe',
  version: '2024.1',
}

describe('VersionResolver', () => {
  describe('getEndpointUrl', () => {
    it('should join the base URL and the channel document', () => {
      const resolver = new VersionResolver({ baseUrl: BASE_URL })
      assertEqual(
        resolver.getEndpointUrl(Channel.Alpha),
        'https://api.test/alpha.json',
        'Alpha endpoint',
      )
    })

    it('should not double the slash after the base URL', () => {
      const resolver = new VersionResolver({ baseUrl: 'https://api.test/v1/' })
      assertEqual(
        resolver.getEndpointUrl(Channel.Win7),
        'https://api.test/v1/win7.json',
        'Win7 endpoint',
      )
    })
  })

  describe('resolve', () => {
    it('should request exactly <channel>.json for every channel', async () => {
      for (const channel of CHANNELS) {
        const endpoint = `${BASE_URL}/${channel}.json`
        const stub = createFetchStub({
          [endpoint]: { json: { ...STABLE_RELEASE, version: channel } },
        })
        const resolver = new VersionResolver({
          baseUrl: BASE_URL,
          fetch: stub.fetch,
        })

        const metadata = await resolver.resolve(channel)

        assertDeepEqual(stub.requests, [endpoint], `Request for ${channel}`)
        assertEqual(metadata.channel, channel, 'Channel carried through')
      }
    })

    it('should return the URL and version from the response', async () => {
      const stub = createFetchStub({
        [`${BASE_URL}/stable.json`]: {
          json: { ...STABLE_RELEASE, hash: 'abc123' },
        },
      })
      const resolver = new VersionResolver({
        baseUrl: BASE_URL,
        fetch: stub.fetch,
      })

      const metadata = await resolver.resolve(Channel.Stable)

      assertDeepEqual(
        metadata,
        {
          channel: Channel.Stable,
          url: 'https://example.com/nvda_2024.1.exe',
          version: '2024.1',
          hash: 'abc123',
        },
        'Resolved metadata',
      )
    })

    it('should fail with HTTP_STATUS_ERROR on 404', async () => {
      const stub = createFetchStub({})
      const resolver = new VersionResolver({
        baseUrl: BASE_URL,
        fetch: stub.fetch,
      })

      const error = await assertRejectsWithCode(
        () => resolver.resolve(Channel.Beta),
        ErrorCodes.HTTP_STATUS_ERROR,
        '404 should be an HTTP status error',
      )
      assertEqual(error.context?.status, 404, 'Status recorded')
    })

    it('should fail with NETWORK_ERROR when the request cannot be sent', async () => {
      const stub = createFetchStub({
        [`${BASE_URL}/stable.json`]: { error: new TypeError('fetch failed') },
      })
      const resolver = new VersionResolver({
        baseUrl: BASE_URL,
        fetch: stub.fetch,
      })

      await assertRejectsWithCode(
        () => resolver.resolve(Channel.Stable),
        ErrorCodes.NETWORK_ERROR,
        'Transport failure should be a network error',
      )
    })

    it('should fail with DECODE_ERROR on a body that is not JSON', async () => {
      const stub = createFetchStub({
        [`${BASE_URL}/stable.json`]: { text: '<html>maintenance</html>' },
      })
      const resolver = new VersionResolver({
        baseUrl: BASE_URL,
        fetch: stub.fetch,
      })

      const error = await assertRejectsWithCode(
        () => resolver.resolve(Channel.Stable),
        ErrorCodes.DECODE_ERROR,
        'HTML body should be a decode error',
      )
      assertEqual(
        error.message,
        'Unexpected response from https://api.test/stable.json: response is not valid JSON',
        'Decode message',
      )
    })

    it('should fail with DECODE_ERROR and make one request when url is missing', async () => {
      const stub = createFetchStub({
        [`${BASE_URL}/stable.json`]: { json: { version: '2024.1' } },
      })
      const resolver = new VersionResolver({
        baseUrl: BASE_URL,
        fetch: stub.fetch,
      })

      await assertRejectsWithCode(
        () => resolver.resolve(Channel.Stable),
        ErrorCodes.DECODE_ERROR,
        'Missing url should be a decode error',
      )
      assertEqual(stub.requests.length, 1, 'Only the metadata request')
    })
  })
})

describe('decodeReleaseMetadata', () => {
  const source = 'https://api.test/stable.json'

  function decodeMessage(value: unknown): string {
    return assertThrowsWithCode(
      () => decodeReleaseMetadata(Channel.Stable, value, source),
      ErrorCodes.DECODE_ERROR,
      'Should be a decode error',
    ).message
  }

  it('should reject values that are not objects', () => {
    assertEqual(
      decodeMessage([STABLE_RELEASE]),
      `Unexpected response from ${source}: expected a JSON object`,
      'Array rejected',
    )
    assertEqual(
      decodeMessage(null),
      `Unexpected response from ${source}: expected a JSON object`,
      'null rejected',
    )
  })

  it('should name the missing field', () => {
    assertEqual(
      decodeMessage({ version: '2024.1' }),
      `Unexpected response from ${source}: missing "url" field`,
      'url missing',
    )
    assertEqual(
      decodeMessage({ url: STABLE_RELEASE.url }),
      `Unexpected response from ${source}: missing "version" field`,
      'version missing',
    )
    assertEqual(
      decodeMessage({ url: '', version: '2024.1' }),
      `Unexpected response from ${source}: missing "url" field`,
      'empty url',
    )
  })

  it('should reject non-http download URLs', () => {
    assertEqual(
      decodeMessage({ url: 'file:///etc/passwd', version: '1' }),
      `Unexpected response from ${source}: "url" is not an http(s) URL: file:///etc/passwd`,
      'file URL rejected',
    )
  })

  it('should reject a hash that is not a string', () => {
    assertEqual(
      decodeMessage({ ...STABLE_RELEASE, hash: 42 }),
      `Unexpected response from ${source}: "hash" must be a string`,
      'numeric hash rejected',
    )
  })

  it('should treat a blank or missing hash as absent', () => {
    const withBlank = decodeReleaseMetadata(
      Channel.Stable,
      { ...STABLE_RELEASE, hash: '  ' },
      source,
    )
    assertEqual(withBlank.hash, null, 'Blank hash')

    const withNull = decodeReleaseMetadata(
      Channel.Stable,
      { ...STABLE_RELEASE, hash: null },
      source,
    )
    assertEqual(withNull.hash, null, 'null hash')
  })

  it('should trim values and ignore extra fields', () => {
    const metadata = decodeReleaseMetadata(
      Channel.Beta,
      {
        url: ' https://example.com/nvda_2024.2beta1.exe ',
        version: ' 2024.2beta1 ',
        released: '2024-05-01',
      },
      source,
    )
    assertDeepEqual(
      metadata,
      {
        channel: Channel.Beta,
        url: 'https://example.com/nvda_2024.2beta1.exe',
        version: '2024.2beta1',
        hash: null,
      },
      'Trimmed metadata',
    )
  })
})
