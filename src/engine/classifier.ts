import type { PolicyCategory, ReasonClass } from '../types';
import type { EngineConfig } from './types';

type KeywordConfig = Pick<EngineConfig, 'keywordsPromotional' | 'keywordsContract'>;

function mentions(text: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => {
    const keyword = k.trim().toLowerCase();
    return keyword.length > 0 && text.includes(keyword);
  });
}

// Promotional keywords win when a reason mentions both.
export function classifyReason(reason: unknown, keywords: KeywordConfig): ReasonClass {
  const text = typeof reason === 'string' ? reason.toLowerCase() : '';
  if (mentions(text, keywords.keywordsPromotional)) return 'Promotional';
  if (mentions(text, keywords.keywordsContract)) return 'Contract';
  return 'Other';
}

export function categoryOf(reasonClass: ReasonClass): PolicyCategory {
  switch (reasonClass) {
    case 'Promotional':
      return 'promotional';
    case 'Contract':
      return 'contract';
    case 'Other':
      return 'other';
  }
}
