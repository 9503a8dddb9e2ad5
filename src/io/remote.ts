import { StructuralInputError, errorMessage } from '../utils/errors.js'

export interface FetchOptions {
  /** Fetch implementation (default: the global `fetch`) */
  fetch?: typeof fetch
}

/**
 * Fetches an ODS JSON document from `url`.
 *
 * @throws {StructuralInputError} On a non-2xx response or a body that is
 *   not JSON
 */
export async function fetchOdsDocument(
  url: string,
  options: FetchOptions = {}
): Promise<unknown> {
  const doFetch = options.fetch ?? fetch
  const response = await doFetch(url)
  if (!response.ok) {
    throw new StructuralInputError(`HTTP ${response.status} from ${url}`, { url })
  }
  try {
    return await response.json()
  } catch (error) {
    throw new StructuralInputError(`invalid JSON from ${url} (${errorMessage(error)})`, {
      url,
    })
  }
}
