// Helper functions for post-processing research reports

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g;
const TRAILING_PUNCTUATION = /[).,;:!?'*]+$/;
const ASSET_EXTENSION = /\.(css|js|png|jpe?g|gif|svg|ico|woff2?)$/i;

function isContentUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    if (parsed.hostname.endsWith('google.com') && parsed.pathname.startsWith('/search')) {
      return false;
    }
    return !ASSET_EXTENSION.test(parsed.pathname);
  } catch {
    return false;
  }
}

// Unique source URLs in order of first appearance
export function extractCitations(content: string, maxLinks: number = 50): string[] {
  const urls = (content.match(URL_PATTERN) || [])
    .map((url) => url.replace(TRAILING_PUNCTUATION, ''))
    .filter(isContentUrl);

  return [...new Set(urls)].slice(0, maxLinks);
}

export function countWords(content: string): number {
  const trimmed = content.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
