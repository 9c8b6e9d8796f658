import { AppConfig } from './config';
import { AnalyticsRecorder } from './utils/analyticsRecorder';
import { CredentialStore } from './utils/credentialStore';
import { DocumentStore } from './utils/documentStore';
import { CompletionProvider, LlmGateway, OpenAIProvider } from './utils/openaiService';
import { PromptAssembler } from './utils/promptAssembler';
import { RelevanceFilter } from './utils/relevanceFilter';
import { SessionManager } from './utils/sessionManager';
import { SupportAssistant } from './utils/supportAssistant';

export interface AppServices {
  credentials: CredentialStore;
  sessions: SessionManager;
  documents: DocumentStore;
  analytics: AnalyticsRecorder;
  assistant: SupportAssistant;
  cookieMaxAgeMs: number;
}

export interface ServiceOverrides {
  credentials?: CredentialStore;
  provider?: CompletionProvider;
  now?: () => number;
}

/**
 * Builds the process-wide stores once. Request handlers receive them by
 * reference through createApp.
 */
export async function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Promise<AppServices> {
  const credentials = overrides.credentials ?? (await CredentialStore.fromFile(config.usersFile));
  const maxLifetimeMs = config.sessionMaxHours * 60 * 60 * 1000;
  const sessions = new SessionManager({
    idleTimeoutMs: config.sessionIdleMinutes * 60 * 1000,
    maxLifetimeMs,
    now: overrides.now
  });
  const documents = new DocumentStore(config.documentsDir);
  const analytics = new AnalyticsRecorder();

  const provider = overrides.provider ?? new OpenAIProvider({
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    maxTokens: config.llmMaxTokens,
    timeoutMs: config.llmTimeoutMs
  });
  if (!overrides.provider && !config.openaiApiKey) {
    console.warn('[config] OPENAI_API_KEY is not set; chat requests will fail until it is configured');
  }

  const assistant = new SupportAssistant({
    credentials,
    sessions,
    documents,
    filter: new RelevanceFilter({ maxMatches: config.maxMatches }),
    assembler: new PromptAssembler({
      historyTurns: config.historyTurns,
      ceilingBytes: config.payloadCeilingBytes
    }),
    gateway: new LlmGateway(provider),
    analytics
  });

  return { credentials, sessions, documents, analytics, assistant, cookieMaxAgeMs: maxLifetimeMs };
}
