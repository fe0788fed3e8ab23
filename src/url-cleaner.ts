/** Query parameters CI providers append for analytics */
export const TRACKING_PARAMS = ['utm_campaign', 'utm_medium', 'utm_source'] as const;

/**
 * Remove tracking query parameters from a URL.
 *
 * Other parameters are kept, though they may be re-encoded. A `?` left
 * with nothing after it is dropped. Input that does not parse as a URL is
 * returned unchanged.
 */
export function stripTrackingParams(input: string): string {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return input;
  }

  for (const param of TRACKING_PARAMS) {
    url.searchParams.delete(param);
  }
  url.search = url.searchParams.toString();

  return url.toString();
}
