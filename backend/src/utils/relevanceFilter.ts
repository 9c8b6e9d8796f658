import { LoadedDocument, RelevanceMatch } from '../types';
import { tokenize } from './textUtils';

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'about', 'what', 'how', 'can', 'you', 'are',
  'does', 'get', 'many', 'much', 'any', 'our', 'your', 'this', 'that', 'there',
  'when', 'where', 'who', 'why', 'will', 'should', 'would', 'could', 'have', 'has',
  'please', 'tell', 'know', 'from', 'into', 'than', 'then', 'them', 'they', 'was'
]);

const MIN_KEYWORD_LENGTH = 3;

export interface RelevanceOptions {
  maxMatches?: number;
  minMatchedTerms?: number;
}

/** Lowercased query keywords, stop-words removed, first occurrence order. */
export function extractKeywords(query: string): string[] {
  const seen = new Set<string>();
  for (const token of tokenize(query)) {
    if (token.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(token)) {
      seen.add(token);
    }
  }
  return [...seen];
}

export class RelevanceFilter {
  private readonly maxMatches: number;
  private readonly minMatchedTerms: number;

  constructor(options: RelevanceOptions = {}) {
    this.maxMatches = options.maxMatches ?? 3;
    this.minMatchedTerms = options.minMatchedTerms ?? 1;
  }

  /**
   * Scores every document by keyword overlap with the query, weighting rare
   * keywords higher, and returns the best matches first. Ties keep the order
   * the documents were given in.
   */
  select(query: string, documents: LoadedDocument[]): RelevanceMatch[] {
    const keywords = extractKeywords(query);
    if (keywords.length === 0 || documents.length === 0) {
      return [];
    }

    const indexed = documents.map(document => ({
      document,
      contentTokens: new Set(tokenize(document.rawText)),
      nameTokens: new Set(tokenize(document.name))
    }));

    const documentFrequency = new Map<string, number>();
    for (const keyword of keywords) {
      const df = indexed.filter(d => d.contentTokens.has(keyword) || d.nameTokens.has(keyword)).length;
      documentFrequency.set(keyword, df);
    }

    const total = documents.length;
    const matches: RelevanceMatch[] = [];
    for (const { document, contentTokens, nameTokens } of indexed) {
      const matchedTerms: string[] = [];
      let score = 0;
      for (const keyword of keywords) {
        const inName = nameTokens.has(keyword);
        if (!inName && !contentTokens.has(keyword)) continue;

        const df = documentFrequency.get(keyword) ?? 1;
        score += 1 + Math.log(total / df) + (inName ? 1 : 0);
        matchedTerms.push(keyword);
      }

      if (matchedTerms.length >= this.minMatchedTerms) {
        matches.push({
          documentName: document.name,
          score: Math.round(score * 1000) / 1000,
          matchedTerms,
          document
        });
      }
    }

    // Array.prototype.sort is stable, so equal scores keep enumeration order
    return matches.sort((a, b) => b.score - a.score).slice(0, this.maxMatches);
  }
}
