/**
 * Interface for retrieving page markup.
 * Implementations reject with a `FetchError` describing the failure kind.
 */
export interface IFetcher {
  /**
   * Fetch a URL and decode its body as UTF-8
   * @param url The URL to fetch
   * @param timeoutSeconds Time after which the request fails as a transport error
   */
  fetch(url: string, timeoutSeconds: number): Promise<string>;
}
