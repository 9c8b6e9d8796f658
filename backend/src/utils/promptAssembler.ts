import { PromptMessage, PromptPayload, RelevanceMatch, Turn, User } from '../types';

const INSTRUCTIONS = `You are an internal company assistant helping employees find information quickly and accurately.
Answer using the company documents provided below. They are complete documents, not excerpts.
- Reference the specific document, section, policy or procedure your answer relies on.
- Quote directly from the documents when citing specific details.
- Keep the conversational context and refer back to the earlier discussion when relevant.
- If the information is not in the provided documents, say so clearly and suggest who to contact.`;

export const NO_SOURCE_NOTICE =
  'No specific source document was found for this question. Say that no company document covers it, answer only from general knowledge where that is safe, and suggest who the employee could contact.';

export interface PromptAssemblerOptions {
  historyTurns?: number;
  ceilingBytes?: number;
}

export function payloadSize(messages: PromptMessage[]): number {
  return Buffer.byteLength(JSON.stringify(messages), 'utf8');
}

function cleanDocumentText(text: string): string {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n');
}

export class PromptAssembler {
  private readonly historyTurns: number;
  private readonly ceilingBytes: number;

  constructor(options: PromptAssemblerOptions = {}) {
    this.historyTurns = options.historyTurns ?? 10;
    this.ceilingBytes = options.ceilingBytes ?? 120000;
  }

  /**
   * Builds the chat payload. When it is over the size ceiling, the oldest
   * history turns go first, then the lowest-scoring documents. Every step
   * shrinks the payload; a step that would not is skipped and truncation
   * stops. The current query is always kept, even if the result is still
   * over the ceiling.
   */
  build(query: string, matches: RelevanceMatch[], transcript: Turn[], user: User): PromptPayload {
    let documents = [...matches].sort((a, b) => b.score - a.score);
    let history = this.historyTurns > 0 ? transcript.slice(-this.historyTurns) : [];
    let droppedTurns = 0;
    let droppedDocuments = 0;

    let messages = this.compose(query, documents, history, user);
    let size = payloadSize(messages);
    while (size > this.ceilingBytes) {
      if (history.length > 0) {
        history = history.slice(1);
        droppedTurns++;
        messages = this.compose(query, documents, history, user);
        size = payloadSize(messages);
        continue;
      }
      if (documents.length === 0) {
        break;
      }
      // The no-source notice can outweigh a small last document
      const remaining = documents.slice(0, -1);
      const candidate = this.compose(query, remaining, history, user);
      const candidateSize = payloadSize(candidate);
      if (candidateSize >= size) {
        break;
      }
      documents = remaining;
      droppedDocuments++;
      messages = candidate;
      size = candidateSize;
    }

    if (droppedTurns > 0 || droppedDocuments > 0) {
      console.warn(`[prompt] Payload over ${this.ceilingBytes} bytes: dropped ${droppedTurns} turn(s), ${droppedDocuments} document(s)`);
    }

    return {
      messages,
      documents: documents.map(d => d.documentName),
      droppedTurns,
      droppedDocuments
    };
  }

  private compose(query: string, documents: RelevanceMatch[], history: Turn[], user: User): PromptMessage[] {
    const sections = [
      INSTRUCTIONS,
      `You are talking to ${user.displayName} (${user.position || 'Employee'}, ${user.department}).`
    ];

    if (documents.length === 0) {
      sections.push(NO_SOURCE_NOTICE);
    } else {
      const blocks = documents.map(
        (match, i) => `Document_${i + 1} - ${match.documentName}:\n${cleanDocumentText(match.document.rawText)}`
      );
      sections.push(`Complete company documents provided:\n\n${blocks.join('\n\n')}`);
    }

    const messages: PromptMessage[] = [{ role: 'system', content: sections.join('\n\n') }];
    for (const turn of history) {
      messages.push({ role: turn.speaker, content: turn.text });
    }
    messages.push({ role: 'user', content: query });
    return messages;
  }
}
