/**
 * Normalized URLs that have been dequeued. Only ever grows.
 */
export class VisitedSet {
  private readonly urls = new Set<string>();

  has(url: string): boolean {
    return this.urls.has(url);
  }

  /** Check-then-insert in one step. False when the URL was already visited. */
  claim(url: string): boolean {
    if (this.urls.has(url)) {
      return false;
    }
    this.urls.add(url);
    return true;
  }
}
