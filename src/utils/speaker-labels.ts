/**
 * Maps provider-internal speaker tags (spk_0, spk_1, ...) to canonical
 * labels in first-seen order: SPEAKER_00, SPEAKER_01, ...
 */
export class SpeakerLabelMap {
  private readonly labels = new Map<string, string>();

  resolve(providerLabel: string): string {
    let canonical = this.labels.get(providerLabel);
    if (!canonical) {
      canonical = `SPEAKER_${String(this.labels.size).padStart(2, '0')}`;
      this.labels.set(providerLabel, canonical);
    }
    return canonical;
  }

  get size(): number {
    return this.labels.size;
  }

  entries(): [string, string][] {
    return Array.from(this.labels.entries());
  }
}
