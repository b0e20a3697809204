/** Retrieves raw playlist text for a manifest URL. */
export type ManifestFetcher = (url: string) => Promise<string>;

/**
 * Build a fetcher backed by the global fetch, with a per-request timeout.
 */
export function createManifestFetcher(options: {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}): ManifestFetcher {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (url: string) => {
    const response = await fetchImpl(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(
        `Failed to fetch M3U playlist: ${response.status} ${response.statusText}`
      );
    }

    return response.text();
  };
}
