export class StatusLineBuilder {
  public output = '';
  public visibleLength = 0;

  public constructor(private readonly columns: number) {}

  /** Append text, cut off at the line width. */
  public text(s: string): this {
    const room = this.columns - this.visibleLength;
    if (room <= 0) {
      return this;
    }
    const part = s.slice(0, room);
    this.output += part;
    this.visibleLength += part.length;
    return this;
  }

  /**
   * Pad to the full width, ending with `right` when it fits in the remaining space.
   * A block that does not fit is dropped rather than truncated.
   */
  public fill(right = ''): string {
    const gap = this.columns - this.visibleLength - right.length;
    if (gap >= 0) {
      this.output += ' '.repeat(gap) + right;
    } else {
      this.output += ' '.repeat(this.columns - this.visibleLength);
    }
    this.visibleLength = this.columns;
    return this.output;
  }
}
