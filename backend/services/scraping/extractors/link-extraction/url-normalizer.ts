import { log } from "backend/utils/log";

/**
 * Resolve an item link found on a source page.
 * Absolute URLs pass through as-is (only HTML entities decoded), root-relative
 * and protocol-relative links are joined to the source origin, other relative
 * paths are resolved against the source URL. Anything unresolvable falls back
 * to the source URL itself.
 */
export function resolveItemUrl(href: string | undefined, sourceUrl: string): string {
  if (!href) return sourceUrl;

  const cleanLink = href.trim().replace(/&amp;/g, '&');
  if (!cleanLink || cleanLink.startsWith('#') || /^(javascript|mailto|tel|data):/i.test(cleanLink)) {
    return sourceUrl;
  }

  if (/^https?:\/\//i.test(cleanLink)) {
    try {
      new URL(cleanLink);
      return cleanLink;
    } catch (urlError) {
      log(`[LinkExtractor] Invalid absolute URL: ${cleanLink} - ${urlError}`, "scraper-error", 'warn');
      return sourceUrl;
    }
  }

  let sourceObject: URL;
  try {
    sourceObject = new URL(sourceUrl);
  } catch (error) {
    log(`[LinkExtractor] Invalid source URL: ${sourceUrl} - ${error}`, "scraper-error", 'warn');
    return sourceUrl;
  }

  if (cleanLink.startsWith('//')) {
    return resolveOrFallback(`${sourceObject.protocol}${cleanLink}`, sourceUrl);
  }

  if (cleanLink.startsWith('/')) {
    return resolveOrFallback(`${sourceObject.protocol}//${sourceObject.host}${cleanLink}`, sourceUrl);
  }

  try {
    return new URL(cleanLink, sourceObject).toString();
  } catch {
    return sourceUrl;
  }
}

function resolveOrFallback(candidate: string, sourceUrl: string): string {
  try {
    return new URL(candidate).toString();
  } catch (urlError) {
    log(`[LinkExtractor] Generated invalid URL "${candidate}" - ${urlError}`, "scraper-error", 'warn');
    return sourceUrl;
  }
}
