import type { ClassifyResponse, TicketPriority } from '@support-desk/shared';

const TECHNICAL_KEYWORDS =
  /\b(api|webhook|endpoint|500|502|503|server\s*error|integration|bug|crash|timeout|logs)\b/i;
const ACCOUNT_KEYWORDS =
  /\b(login|log\s*in|password|reset\s*password|unlock|account|permission|profile|access|locked\s*out)\b/i;
const BILLING_KEYWORDS =
  /\b(charge|charged|refund|invoice|payment|subscription|billed|billing|duplicate\s*charge)\b/i;
// Outage wording beats account wording ("can't log in because the platform is down")
const OUTAGE_KEYWORDS =
  /\b(outage|system\s*down|platform\s*down|been\s+down|is\s+down|full\s+outage|data\s*loss|breach)\b/i;

const CRITICAL_PRIORITY_KEYWORDS =
  /\b(outage|down\s*for|system\s*down|platform\s*down|been\s+down|full\s+outage|data\s*loss|breach|security\s*incident|urgent|restore|backup)\b/i;
const HIGH_PRIORITY_KEYWORDS =
  /\b(no\s*workaround|blocking|deadline|can't\s*access|cannot\s*access|as\s*soon\s*as\s*possible)\b/i;
const LOW_PRIORITY_KEYWORDS =
  /\b(minor|cosmetic|not\s*urgent|feature\s*request|would\s*be\s*nice|small\s*issue)\b/i;

export function priorityFromKeywords(description: string): TicketPriority {
  if (CRITICAL_PRIORITY_KEYWORDS.test(description)) return 'critical';
  if (HIGH_PRIORITY_KEYWORDS.test(description)) return 'high';
  if (LOW_PRIORITY_KEYWORDS.test(description)) return 'low';
  return 'medium';
}

/**
 * Corrects common model slips using keyword cues in the description.
 * Only fields the model actually supplied are touched; a null stays null.
 */
export function refineSuggestions(description: string, suggestion: ClassifyResponse): ClassifyResponse {
  let category = suggestion.suggested_category;
  let priority = suggestion.suggested_priority;

  const looksTechnical = TECHNICAL_KEYWORDS.test(description);
  const looksOutage = OUTAGE_KEYWORDS.test(description);

  if (category === 'technical' && !looksTechnical) {
    if (ACCOUNT_KEYWORDS.test(description)) {
      category = 'account';
    } else if (BILLING_KEYWORDS.test(description)) {
      category = 'billing';
    }
  } else if (category === 'general' && looksTechnical) {
    category = 'technical';
  }
  if (category !== null && looksOutage) {
    category = 'technical';
  }

  if (priority === 'medium') {
    priority = priorityFromKeywords(description);
  }
  if (priority !== null && looksOutage) {
    priority = 'critical';
  }

  return { suggested_category: category, suggested_priority: priority };
}
