import CryptoJS from 'crypto-js';

/**
 * SHA-256 hex digest of the URL's UTF-8 bytes.
 */
export function hashUrl(url: string): string {
  return CryptoJS.SHA256(CryptoJS.enc.Utf8.parse(url)).toString(CryptoJS.enc.Hex);
}

/**
 * Remembers canonical URLs seen during one digest build.
 */
export class UrlDeduplicator {
  private readonly seen = new Set<string>();

  /** Reports whether the URL was already seen; records it when it was not. */
  isDuplicate(url: string): boolean {
    const hash = hashUrl(url);
    if (this.seen.has(hash)) {
      return true;
    }
    this.seen.add(hash);
    return false;
  }

  get size(): number {
    return this.seen.size;
  }
}
