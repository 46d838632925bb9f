import { describe, expect, it } from 'vitest';
import { priorityFromKeywords, refineSuggestions } from '../classifier/keywordRules.js';

describe('priorityFromKeywords', () => {
  it.each([
    ['We suffered data loss overnight', 'critical'],
    ['This is urgent, please restore my files', 'critical'],
    ['There is no workaround and our deadline is Friday', 'high'],
    ['Minor cosmetic glitch in the footer', 'low'],
    ['Feature request: export to CSV', 'low'],
    ['How do I change my display name?', 'medium'],
  ])('%s -> %s', (description, expected) => {
    expect(priorityFromKeywords(description)).toBe(expected);
  });
});

describe('refineSuggestions', () => {
  it('moves a general guess to technical when the text mentions an API', () => {
    expect(
      refineSuggestions('The API returns a 500 on every call', {
        suggested_category: 'general',
        suggested_priority: 'high',
      })
    ).toEqual({ suggested_category: 'technical', suggested_priority: 'high' });
  });

  it('moves a technical guess to billing for refund wording', () => {
    expect(
      refineSuggestions('I need a refund for last month', {
        suggested_category: 'technical',
        suggested_priority: 'low',
      })
    ).toEqual({ suggested_category: 'billing', suggested_priority: 'low' });
  });

  it('keeps a technical guess when technical keywords are present', () => {
    expect(
      refineSuggestions('Webhook to my account settings page times out with logs attached', {
        suggested_category: 'technical',
        suggested_priority: 'medium',
      })
    ).toEqual({ suggested_category: 'technical', suggested_priority: 'medium' });
  });

  it('never fills in a null field', () => {
    expect(
      refineSuggestions('Full outage since 9am', {
        suggested_category: null,
        suggested_priority: null,
      })
    ).toEqual({ suggested_category: null, suggested_priority: null });
  });
});
