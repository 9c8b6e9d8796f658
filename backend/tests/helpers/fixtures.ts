import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LoadedDocument, PromptMessage, User } from '../../src/types';
import { RegistryFile, hashPassword } from '../../src/utils/credentialStore';
import { CompletionProvider } from '../../src/utils/openaiService';

export const TEST_PASSWORD = 'test-password';

export const HANDBOOK_TEXT = [
  'Employee Handbook',
  'Full-time employees receive 20 PTO days per calendar year.',
  'Unused PTO carries over up to 5 days.',
  'Core hours are 10:00 to 15:00.'
].join('\n');

export const SECURITY_TEXT = [
  'IT Security Policy',
  'Passwords must be at least 14 characters long and are rotated every 180 days.',
  'Always connect through the company VPN when working remotely.'
].join('\n');

function employee(username: string, first: string, last: string, department: string, isAdmin: boolean, isActive = true) {
  return {
    employee_id: `EMP-${username}`,
    username,
    email: `${username}@company.example`,
    password_hash: hashPassword(TEST_PASSWORD),
    first_name: first,
    last_name: last,
    department,
    position: isAdmin ? 'Engineering Lead' : 'Specialist',
    is_admin: isAdmin,
    is_active: isActive
  };
}

export function testRegistry(): RegistryFile {
  return {
    employees: {
      'jane.smith': employee('jane.smith', 'Jane', 'Smith', 'Human Resources', false),
      'john.doe': employee('john.doe', 'John', 'Doe', 'Engineering', true),
      'old.account': employee('old.account', 'Old', 'Account', 'Finance', false, false)
    }
  };
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    username: 'jane.smith',
    employeeId: 'EMP-jane.smith',
    displayName: 'Jane Smith',
    email: 'jane.smith@company.example',
    department: 'Human Resources',
    position: 'Specialist',
    role: 'employee',
    passwordHash: hashPassword(TEST_PASSWORD),
    isActive: true,
    ...overrides
  };
}

export function makeDocument(name: string, rawText: string): LoadedDocument {
  return {
    name,
    fileName: `${name}.txt`,
    path: `/docs/${name}.txt`,
    extension: '.txt',
    rawText,
    byteSize: Buffer.byteLength(rawText),
    modified: '2026-01-15 09:30'
  };
}

export async function makeTempDir(prefix = 'support-assistant-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeDocuments(dir: string, files: Record<string, string>): Promise<void> {
  for (const [fileName, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, fileName), content);
  }
}

/** Stands in for the hosted model: records every call and replays queued replies. */
export class FakeProvider implements CompletionProvider {
  readonly calls: PromptMessage[][] = [];
  private readonly queued: Array<string | null | Error> = [];

  constructor(private readonly fallback = 'Please check with HR.') {}

  enqueue(...replies: Array<string | null | Error>): this {
    this.queued.push(...replies);
    return this;
  }

  async complete(messages: PromptMessage[]): Promise<string | null> {
    this.calls.push(messages);
    if (this.queued.length === 0) {
      return this.fallback;
    }
    const next = this.queued.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? null;
  }
}

/** Provider whose reply is computed per call, for tests that act while a query is in flight. */
export class ScriptedProvider implements CompletionProvider {
  constructor(private readonly reply: (messages: PromptMessage[]) => Promise<string | null>) {}

  complete(messages: PromptMessage[]): Promise<string | null> {
    return this.reply(messages);
  }
}
