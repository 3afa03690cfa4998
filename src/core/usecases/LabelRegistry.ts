/**
 * Hands out benchmark labels that are unique within one invocation.
 */
export class LabelRegistry {
  private used = new Set<string>();

  /**
   * Returns `label` the first time, then `label (2)`, `label (3)`, ...
   */
  claim(label: string): string {
    let candidate = label;
    for (let n = 2; this.used.has(candidate); n++) {
      candidate = `${label} (${n})`;
    }
    this.used.add(candidate);
    return candidate;
  }
}
