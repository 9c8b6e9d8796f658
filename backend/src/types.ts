export type Role = 'admin' | 'employee';

export interface User {
  username: string;
  employeeId: string;
  displayName: string;
  email: string;
  department: string;
  position: string;
  role: Role;
  passwordHash: string;
  isActive: boolean;
}

// User as exposed over the API (never carries the hash)
export type PublicUser = Omit<User, 'passwordHash'>;

export type Speaker = 'user' | 'assistant';

export interface Turn {
  readonly speaker: Speaker;
  readonly text: string;
  readonly timestamp: string;
}

export interface Session {
  token: string;
  username: string;
  createdAt: number;
  lastSeenAt: number;
  transcript: Turn[];
}

export interface DocumentInfo {
  name: string;
  displayName: string;
  fileName: string;
  type: string;
  sizeKb: number;
  modified: string;
}

export interface LoadedDocument {
  name: string;
  fileName: string;
  path: string;
  extension: string;
  rawText: string;
  byteSize: number;
  modified: string;
}

export interface RelevanceMatch {
  documentName: string;
  score: number;
  matchedTerms: string[];
  document: LoadedDocument;
}

export type PromptRole = 'system' | 'user' | 'assistant';

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface PromptPayload {
  messages: PromptMessage[];
  documents: string[]; // names of documents included, highest score first
  droppedTurns: number;
  droppedDocuments: number;
}

export interface GatewayReply {
  text: string;
  latency: number; // ms
}

export type QueryType =
  | 'PTO & Leave'
  | 'Health Benefits'
  | 'IT Security'
  | 'Employee Handbook'
  | 'Organization'
  | 'AI Usage'
  | 'General';

export type GatewayFailureKind = 'RateLimited' | 'ApiError' | 'Timeout';

export interface InteractionRecord {
  timestamp: string;
  userId: string;
  department: string;
  query: string;
  responseLength: number;
  documentsUsed: string[];
  processingTime: number; // seconds
  queryType: QueryType;
  status: 'success' | 'error';
  errorKind?: GatewayFailureKind;
}

export interface UserActivity {
  userId: string;
  queryCount: number;
  firstSeen: string;
  lastSeen: string;
  departments: string[];
}

export interface AnalyticsSummary {
  totalInteractions: number;
  uniqueUsers: number;
  avgProcessingTime: number;
  mostActiveDepartment: string | null;
  queryTypeDistribution: Record<string, number>;
  performanceMetrics: {
    minProcessingTime: number;
    maxProcessingTime: number;
    p95ProcessingTime: number;
    avgResponseLength: number;
  };
  errorCount: number;
  errorRate: number; // percent
  departments: Record<string, number>;
  documentsAccessed: Record<string, number>;
  dailyUsage: Record<string, number>;
  popularQueries: string[];
  activeUsersToday: number;
  userDetails: UserActivity[];
}

export interface CitedSource {
  document: string;
  displayName: string;
  highlight: string;
}

export interface AnswerResult {
  query: string;
  answer: string;
  sources: CitedSource[];
  processingTime: number;
  droppedTurns: number;
  droppedDocuments: number;
}
