/**
 * Ordered, de-duplicated photo URL list with a hard cap.
 * Dedup is by exact URL string.
 */
export class PhotoCollector {
  private readonly seen = new Set<string>();
  private readonly urls: string[] = [];

  constructor(private readonly limit: number) {}

  add(candidate: string): void {
    const url = candidate.trim();
    if (!url || this.isFull() || this.seen.has(url)) return;
    this.seen.add(url);
    this.urls.push(url);
  }

  isFull(): boolean {
    return this.urls.length >= this.limit;
  }

  toArray(): string[] {
    return [...this.urls];
  }
}
