import { AnalyticsSummary, InteractionRecord, QueryType, UserActivity } from '../types';

// First matching category wins
const QUERY_CATEGORIES: Array<{ type: QueryType; keywords: string[] }> = [
  { type: 'PTO & Leave', keywords: ['pto', 'vacation', 'time off', 'leave', 'holiday'] },
  { type: 'Health Benefits', keywords: ['health', 'medical', 'benefits', 'insurance', 'dental'] },
  { type: 'IT Security', keywords: ['security', 'password', 'it policy', 'vpn', 'network'] },
  { type: 'Employee Handbook', keywords: ['handbook', 'policy', 'employee', 'work hours', 'dress code'] },
  { type: 'Organization', keywords: ['org', 'organization', 'structure', 'contact', 'email', 'phone'] },
  { type: 'AI Usage', keywords: ['claude', 'chatgpt', 'ai', 'usage'] }
];

const POPULAR_QUERY_COUNT = 10;
const POPULAR_QUERY_LENGTH = 100;

// Substring match, so plurals and other inflections count ("holidays", "passwords")
export function classifyQuery(query: string): QueryType {
  const lower = query.toLowerCase();
  const category = QUERY_CATEGORIES.find(c => c.keywords.some(keyword => lower.includes(keyword)));
  return category ? category.type : 'General';
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function round(value: number, digits = 3): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
  return sorted[Math.max(0, index)];
}

/**
 * Append-only interaction log. The summary is computed from the full record
 * set on read and cached until the next record arrives.
 */
export class AnalyticsRecorder {
  private readonly records: InteractionRecord[] = [];
  private cached: AnalyticsSummary | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  get size(): number {
    return this.records.length;
  }

  record(record: InteractionRecord): void {
    this.records.push(Object.freeze({ ...record, documentsUsed: [...record.documentsUsed] }));
    this.cached = null;
  }

  all(): readonly InteractionRecord[] {
    return this.records;
  }

  aggregate(): AnalyticsSummary {
    if (!this.cached) {
      this.cached = this.compute();
    }
    return this.cached;
  }

  private compute(): AnalyticsSummary {
    const records = this.records;
    const total = records.length;
    const today = this.now().toISOString().slice(0, 10);

    const departments: Record<string, number> = {};
    const queryTypes: Record<string, number> = {};
    const documentsAccessed: Record<string, number> = {};
    const dailyUsage: Record<string, number> = {};
    const users = new Map<string, UserActivity>();
    let errorCount = 0;
    let totalTime = 0;
    let totalResponseLength = 0;

    for (const record of records) {
      const day = record.timestamp.slice(0, 10);
      increment(departments, record.department);
      increment(queryTypes, record.queryType);
      increment(dailyUsage, day);
      record.documentsUsed.forEach(doc => increment(documentsAccessed, doc));
      if (record.status === 'error') errorCount++;
      totalTime += record.processingTime;
      totalResponseLength += record.responseLength;

      const activity = users.get(record.userId);
      if (activity) {
        activity.queryCount++;
        activity.lastSeen = day;
        if (!activity.departments.includes(record.department)) {
          activity.departments.push(record.department);
        }
      } else {
        users.set(record.userId, {
          userId: record.userId,
          queryCount: 1,
          firstSeen: day,
          lastSeen: day,
          departments: [record.department]
        });
      }
    }

    // Object key order is insertion order, so ties go to the department seen first
    let mostActiveDepartment: string | null = null;
    for (const [department, count] of Object.entries(departments)) {
      if (mostActiveDepartment === null || count > departments[mostActiveDepartment]) {
        mostActiveDepartment = department;
      }
    }

    const times = records.map(r => r.processingTime).sort((a, b) => a - b);
    const userDetails = [...users.values()];

    return {
      totalInteractions: total,
      uniqueUsers: users.size,
      avgProcessingTime: total > 0 ? round(totalTime / total) : 0,
      mostActiveDepartment,
      queryTypeDistribution: queryTypes,
      performanceMetrics: {
        minProcessingTime: times.length > 0 ? times[0] : 0,
        maxProcessingTime: times.length > 0 ? times[times.length - 1] : 0,
        p95ProcessingTime: percentile(times, 95),
        avgResponseLength: total > 0 ? round(totalResponseLength / total, 1) : 0
      },
      errorCount,
      errorRate: total > 0 ? round((errorCount / total) * 100, 2) : 0,
      departments,
      documentsAccessed,
      dailyUsage,
      popularQueries: records.slice(-POPULAR_QUERY_COUNT).map(r => r.query.slice(0, POPULAR_QUERY_LENGTH)),
      activeUsersToday: userDetails.filter(u => u.lastSeen === today).length,
      userDetails
    };
  }
}
