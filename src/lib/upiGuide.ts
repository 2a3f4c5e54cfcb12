import type { ContentStore } from './contentStore.js';
import type { UpiGuideEntry } from '../types/content.js';

export class UpiGuide {
  constructor(private readonly store: ContentStore) {}

  getGuide(topic: string): UpiGuideEntry | null {
    const key = topic.toLowerCase();
    return Object.hasOwnProperty.call(this.store.upiGuides, key) ? this.store.upiGuides[key] : null;
  }

  availableTopics(): string[] {
    return Object.keys(this.store.upiGuides);
  }

  allGuides(): Record<string, UpiGuideEntry> {
    return { ...this.store.upiGuides };
  }
}
