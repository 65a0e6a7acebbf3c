/**
 * HTTP Client
 *
 * Thin wrapper over the platform fetch that maps transport failures and
 * non-success responses onto NvdlError codes. No retries, no fallback
 * registries: the first failure ends the invocation.
 */

import {
  createHttpStatusError,
  createNetworkError,
  logDebug,
} from './error-handler'

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export const defaultFetch: FetchFn = (url, init) => fetch(url, init)

/**
 * GET a URL and return the response only if its status is 2xx
 */
export async function requestOk(
  url: string,
  fetchFn: FetchFn,
  userAgent: string,
): Promise<Response> {
  logDebug(`GET ${url}`)

  let response: Response
  try {
    response = await fetchFn(url, {
      headers: { 'User-Agent': userAgent },
      redirect: 'follow',
    })
  } catch (error) {
    throw createNetworkError(url, error)
  }

  logDebug(`Response from ${url}`, { status: response.status })

  if (!response.ok) {
    throw createHttpStatusError(url, response.status, response.statusText)
  }

  return response
}
