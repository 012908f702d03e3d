/**
 * Anchor table: element ids seen during a conversion and their titles,
 * used to label cross references.
 */
export class AnchorTable {
  private readonly titles = new Map<string, string | undefined>();

  register(id: string, title?: string): void {
    const existing = this.titles.get(id);
    this.titles.set(id, title ?? existing);
  }

  titleFor(id: string): string | undefined {
    return this.titles.get(id);
  }
}
