import { AnswerResult, CitedSource, RelevanceMatch } from '../types';
import { AnalyticsRecorder, classifyQuery } from './analyticsRecorder';
import { CredentialStore } from './credentialStore';
import { DocumentStore } from './documentStore';
import { GatewayFailure, QueryFailed, ValidationError } from './errors';
import { LlmGateway } from './openaiService';
import { PromptAssembler } from './promptAssembler';
import { RelevanceFilter, extractKeywords } from './relevanceFilter';
import { SessionManager } from './sessionManager';
import { toDisplayName } from './textUtils';

const HIGHLIGHT_LENGTH = 200;

export interface SupportAssistantDeps {
  credentials: CredentialStore;
  sessions: SessionManager;
  documents: DocumentStore;
  filter: RelevanceFilter;
  assembler: PromptAssembler;
  gateway: LlmGateway;
  analytics: AnalyticsRecorder;
}

function buildHighlight(text: string, keywords: string[]): string {
  const lines = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && keywords.some(k => line.toLowerCase().includes(k)));
  const preview = lines.length > 0 ? lines.slice(0, 2).join('\n') : text.slice(0, HIGHLIGHT_LENGTH);
  return preview.length > HIGHLIGHT_LENGTH ? `${preview.slice(0, HIGHLIGHT_LENGTH)}...` : preview;
}

function isReferenced(answer: string, match: RelevanceMatch): boolean {
  const nameParts = match.documentName.toLowerCase().split('_').filter(part => part.length > 2);
  if (nameParts.some(part => answer.includes(part))) {
    return true;
  }

  const keySentences = match.document.rawText
    .toLowerCase()
    .split('.')
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 20)
    .slice(0, 3);

  return keySentences.some(sentence => {
    const words = sentence.split(/\s+/).filter(word => word.length > 4);
    if (words.length < 2) return false;
    const found = words.filter(word => answer.includes(word)).length;
    return found >= words.length * 0.6;
  });
}

/**
 * Keeps only the matched documents the answer actually draws on: the
 * document name is mentioned, or most long words of one of its opening
 * sentences show up in the answer.
 */
export function citedSources(answer: string, matches: RelevanceMatch[], keywords: string[]): CitedSource[] {
  const lowerAnswer = answer.toLowerCase();
  return matches
    .filter(match => isReferenced(lowerAnswer, match))
    .map(match => ({
      document: match.documentName,
      displayName: toDisplayName(match.documentName),
      highlight: buildHighlight(match.document.rawText, keywords)
    }));
}

export class SupportAssistant {
  constructor(private readonly deps: SupportAssistantDeps) {}

  /** Clears the transcript once any query in flight for this session has finished. */
  async reset(token: string | undefined): Promise<void> {
    const { sessions } = this.deps;
    const session = sessions.resolve(token);
    await sessions.runExclusive(session.token, async () => {
      sessions.reset(session.token);
    });
  }

  async ask(token: string | undefined, rawQuery: string): Promise<AnswerResult> {
    const { sessions, credentials } = this.deps;
    const session = sessions.resolve(token);
    const query = rawQuery.trim();
    if (query.length === 0) {
      throw new ValidationError('Query cannot be empty');
    }
    const user = credentials.lookup(session.username);

    return sessions.runExclusive(session.token, async () => {
      const { documents, filter, assembler, gateway, analytics } = this.deps;
      const startTime = Date.now();
      const elapsed = () => (Date.now() - startTime) / 1000;

      const loaded = await documents.loadAll();
      const matches = filter.select(query, loaded);
      console.log(`[assistant] ${user.username}: "${query}" matched [${matches.map(m => m.documentName).join(', ')}]`);

      const transcript = session.transcript;
      const payload = assembler.build(query, matches, transcript, user);

      let answer: string;
      try {
        answer = (await gateway.ask(payload)).text;
      } catch (error) {
        if (!(error instanceof GatewayFailure)) {
          throw error;
        }
        analytics.record({
          timestamp: new Date().toISOString(),
          userId: user.username,
          department: user.department,
          query,
          responseLength: 0,
          documentsUsed: [],
          processingTime: elapsed(),
          queryType: classifyQuery(query),
          status: 'error',
          errorKind: error.kind
        });
        throw new QueryFailed(query, error.kind);
      }

      const included = matches.filter(m => payload.documents.includes(m.documentName));
      const sources = citedSources(answer, included, extractKeywords(query));
      const processingTime = elapsed();

      if (!sessions.appendExchange(session.token, query, answer)) {
        console.warn(`[assistant] Session for ${user.username} ended before the answer arrived`);
      }
      analytics.record({
        timestamp: new Date().toISOString(),
        userId: user.username,
        department: user.department,
        query,
        responseLength: answer.length,
        documentsUsed: sources.map(s => s.document),
        processingTime,
        queryType: classifyQuery(query),
        status: 'success'
      });

      return {
        query,
        answer,
        sources,
        processingTime,
        droppedTurns: payload.droppedTurns,
        droppedDocuments: payload.droppedDocuments
      };
    });
  }
}
