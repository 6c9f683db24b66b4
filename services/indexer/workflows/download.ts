import { DownloadError, toError } from '../../../shared/domain/errors.js';
import { HtmlPage } from '../../../shared/infrastructure/HtmlPage.js';
import { IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { getLogger } from '../../../shared/infrastructure/logging.js';

/**
 * Download an HTML page. The page's URL is the URL after redirects.
 * @throws DownloadError when the request fails or the status is not 2xx
 */
export async function downloadHtml(url: string, httpClient: IHttpClient, signal?: AbortSignal): Promise<HtmlPage> {
  let response;
  try {
    response = await httpClient.get(url, { signal });
  } catch (error: unknown) {
    throw new DownloadError(url, undefined, toError(error));
  }

  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new DownloadError(url, response.statusCode);
  }

  getLogger().debug(`Downloaded ${url} in ${response.timeTaken}ms`, 'downloadHtml');
  return new HtmlPage(response.body, response.finalUrl);
}
