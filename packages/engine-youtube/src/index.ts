/**
 * @touch/engine-youtube
 *
 * Remote media fetcher for URL inputs, built on yt-dlp.
 */

export {
  YtDlpFetcher,
  videoIdOf,
  ytDlpArgs,
  type YtDlpFetcherOptions,
  type YtDlpRunner,
} from './fetcher.js';
