import { ScrapeError, toError } from '../errors.js';
import log from '../logger.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

const USER_AGENT = 'incident-logs/1.0';

export class IncidentLogClient {
  constructor(private readonly fetchImpl: FetchFn = (url, init) => fetch(url, init)) {}

  async fetchPage(url: string): Promise<string> {
    log.verbose('Fetching %s', url);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8'
        },
        redirect: 'follow'
      });
    } catch (error) {
      throw new ScrapeError(`Unable to retrieve ${url}: ${toError(error).message}`, { cause: error });
    }

    if (!response.ok) {
      throw new ScrapeError(`Unable to retrieve ${url}: HTTP ${response.status} ${response.statusText}`.trim());
    }
    return response.text();
  }
}
