import { describe, it, expect, beforeEach } from 'vitest';
import { ContentStore } from '../lib/contentStore.js';
import { UpiGuide } from '../lib/upiGuide.js';

describe('UpiGuide', () => {
  let guide: UpiGuide;

  beforeEach(() => {
    guide = new UpiGuide(ContentStore.load());
  });

  it('lists topics in table order', () => {
    expect(guide.availableTopics()).toEqual(['setup', 'security', 'disputes', 'limits']);
  });

  it('returns a guide by slug, ignoring case', () => {
    const security = guide.getGuide('SECURITY');
    expect(security?.topic).toBe('UPI Security Best Practices');
    expect(security?.steps).toHaveLength(7);
    expect(security?.steps[0]).toBe('1. NEVER share your UPI PIN with anyone - not even bank officials');
    expect(security?.warnings).toHaveLength(2);
  });

  it('defaults missing warnings to an empty list', () => {
    expect(guide.getGuide('setup')?.warnings).toEqual([]);
  });

  it('returns null for unknown topics', () => {
    expect(guide.getGuide('refunds')).toBeNull();
    expect(guide.getGuide('constructor')).toBeNull();
  });

  it('returns a fresh record from allGuides()', () => {
    const first = guide.allGuides();
    delete first.setup;
    expect(Object.keys(guide.allGuides())).toHaveLength(4);
  });
});
