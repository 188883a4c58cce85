/**
 * Informational messages of a run, grouped by the migration or seeder that
 * produced them, in the order the sources first reported.
 */
export class NoticeCollector {
  private readonly notices = new Map<string, string[]>();

  add(source: string, notice: unknown): void {
    const messages = toMessages(notice);
    if (messages.length === 0) {
      return;
    }

    const existing = this.notices.get(source);
    if (existing) {
      existing.push(...messages);
    } else {
      this.notices.set(source, messages);
    }
  }

  entries(): Array<[string, string[]]> {
    return [...this.notices.entries()];
  }

  isEmpty(): boolean {
    return this.notices.size === 0;
  }

  clear(): void {
    this.notices.clear();
  }
}

function toMessages(notice: unknown): string[] {
  if (typeof notice === 'string') {
    return notice.length > 0 ? [notice] : [];
  }

  if (Array.isArray(notice)) {
    return notice.filter((item): item is string => typeof item === 'string' && item.length > 0);
  }

  return [];
}
